/**
 * Match Repository
 *
 * Stores fixtures and results. Records are validated on the way in and on
 * the way out, so the engine only ever sees well-formed matches.
 */

import { z } from 'zod';
import type { CompletedMatch, MatchFilter, MatchRecord, PendingMatch } from '@scoreline/shared';
import {
    createLogger,
    isCompleted,
    isPending,
    parseMatchRecord,
    validateMatchRecord,
} from '@scoreline/shared';
import { config } from './config';

const logger = createLogger('predictor:repository', config.logLevel);

export interface MatchRepository {
    /** Completed matches, ascending by date */
    listCompleted(filter?: MatchFilter): Promise<CompletedMatch[]>;

    /** Fixtures without a result, ascending by date */
    listPending(filter?: MatchFilter): Promise<PendingMatch[]>;

    /**
     * Opaque token that changes whenever the completed matches under
     * `filter` change. Cached models are keyed by it.
     */
    revision(filter?: MatchFilter): Promise<string>;

    addMatch(match: MatchRecord): Promise<void>;
    addMatches(matches: readonly MatchRecord[]): Promise<number>;
}

/** The slice of pg.Pool the repository uses */
export interface SqlClient {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

// ============================================
// SQL
// ============================================

export const MATCHES_TABLE_DDL = `
    CREATE TABLE IF NOT EXISTS matches (
        id SERIAL PRIMARY KEY,
        date TEXT NOT NULL,
        competition TEXT NOT NULL,
        season INTEGER NOT NULL DEFAULT 0,
        home_team TEXT NOT NULL,
        away_team TEXT NOT NULL,
        home_goals INTEGER,
        away_goals INTEGER
    )`;

const COLUMNS = 'date, competition, season, home_team, away_team, home_goals, away_goals';
const INSERT_BATCH_SIZE = 500;

type ResultState = 'completed' | 'pending';

interface SqlQuery {
    text: string;
    values: unknown[];
}

/**
 * Competition and season filters are applied identically for completed and
 * pending queries.
 */
function whereClause(state: ResultState, filter: MatchFilter): { where: string; values: unknown[] } {
    const conditions = state === 'completed'
        ? ['home_goals IS NOT NULL', 'away_goals IS NOT NULL']
        : ['home_goals IS NULL', 'away_goals IS NULL'];
    const values: unknown[] = [];

    if (filter.competition !== undefined) {
        values.push(filter.competition);
        conditions.push(`competition = $${values.length}`);
    }
    if (filter.season !== undefined) {
        values.push(filter.season);
        conditions.push(`season = $${values.length}`);
    }

    return { where: conditions.join(' AND '), values };
}

export function buildMatchQuery(state: ResultState, filter: MatchFilter = {}): SqlQuery {
    const { where, values } = whereClause(state, filter);
    return {
        text: `SELECT ${COLUMNS} FROM matches WHERE ${where} ORDER BY date ASC, id ASC`,
        values,
    };
}

/**
 * Count and newest id of the completed matches under `filter`. Rows are
 * only ever inserted, so the pair changes exactly when that set does.
 */
export function buildRevisionQuery(filter: MatchFilter = {}): SqlQuery {
    const { where, values } = whereClause('completed', filter);
    return {
        text: `SELECT COUNT(*) AS matches, COALESCE(MAX(id), 0) AS last_id FROM matches WHERE ${where}`,
        values,
    };
}

// COUNT(*) comes back from pg as a string
const RevisionRowSchema = z.object({
    matches: z.coerce.number().int().min(0),
    last_id: z.coerce.number().int().min(0),
});

function formatRevision(matches: number, lastId: number): string {
    return `${matches}-${lastId}`;
}

function toRecords(rows: unknown[]): MatchRecord[] {
    const records: MatchRecord[] = [];
    for (const row of rows) {
        const result = validateMatchRecord(row);
        if (result.success) {
            records.push(result.data);
        } else {
            logger.warn('Rejected malformed match row', {
                row: JSON.stringify(row),
                issues: result.error.issues.map(i => i.message),
            });
        }
    }
    return records;
}

// ============================================
// PostgreSQL
// ============================================

export interface PgMatchRepository extends MatchRepository {
    ensureSchema(): Promise<void>;
}

export function createPgMatchRepository(db: SqlClient): PgMatchRepository {
    async function insert(matches: readonly MatchRecord[]): Promise<void> {
        const values: unknown[] = [];
        const tuples = matches.map((match) => {
            const base = values.length;
            values.push(
                match.date,
                match.competition,
                match.season,
                match.home_team,
                match.away_team,
                match.home_goals,
                match.away_goals
            );
            return `(${Array.from({ length: 7 }, (_, i) => `$${base + i + 1}`).join(', ')})`;
        });

        await db.query(`INSERT INTO matches (${COLUMNS}) VALUES ${tuples.join(', ')}`, values);
    }

    return {
        async ensureSchema(): Promise<void> {
            await db.query(MATCHES_TABLE_DDL);
            logger.debug('Matches table ready');
        },

        async listCompleted(filter?: MatchFilter): Promise<CompletedMatch[]> {
            const { text, values } = buildMatchQuery('completed', filter);
            const result = await db.query(text, values);
            return toRecords(result.rows).filter(isCompleted);
        },

        async listPending(filter?: MatchFilter): Promise<PendingMatch[]> {
            const { text, values } = buildMatchQuery('pending', filter);
            const result = await db.query(text, values);
            return toRecords(result.rows).filter(isPending);
        },

        async revision(filter?: MatchFilter): Promise<string> {
            const { text, values } = buildRevisionQuery(filter);
            const result = await db.query(text, values);
            const row = RevisionRowSchema.safeParse(result.rows[0]);
            if (!row.success) {
                throw new Error(`Unexpected revision row: ${JSON.stringify(result.rows[0])}`);
            }
            return formatRevision(row.data.matches, row.data.last_id);
        },

        async addMatch(match: MatchRecord): Promise<void> {
            await insert([parseMatchRecord(match)]);
        },

        async addMatches(matches: readonly MatchRecord[]): Promise<number> {
            // Validate everything before the first write
            const valid = matches.map(parseMatchRecord);

            for (let i = 0; i < valid.length; i += INSERT_BATCH_SIZE) {
                await insert(valid.slice(i, i + INSERT_BATCH_SIZE));
            }

            logger.info('Matches stored', { count: valid.length });
            return valid.length;
        },
    };
}

// ============================================
// In-memory
// ============================================

/**
 * Repository over an in-process array. Insertion order breaks date ties,
 * mirroring the SERIAL id ordering of the SQL store.
 */
export function createMemoryMatchRepository(initial: readonly MatchRecord[] = []): MatchRepository {
    const rows: MatchRecord[] = initial.map(parseMatchRecord);

    const inFilter = (m: MatchRecord, filter: MatchFilter) =>
        (filter.competition === undefined || m.competition === filter.competition)
        && (filter.season === undefined || m.season === filter.season);

    const matching = (filter: MatchFilter = {}) => rows
        .filter(m => inFilter(m, filter))
        .map((match, index) => ({ match, index }))
        .sort((a, b) => a.match.date.localeCompare(b.match.date) || a.index - b.index)
        .map(({ match }) => match);

    return {
        async listCompleted(filter?: MatchFilter): Promise<CompletedMatch[]> {
            return matching(filter).filter(isCompleted);
        },

        async listPending(filter?: MatchFilter): Promise<PendingMatch[]> {
            return matching(filter).filter(isPending);
        },

        // Array position + 1 plays the part of the SERIAL id
        async revision(filter: MatchFilter = {}): Promise<string> {
            let matches = 0;
            let lastId = 0;
            rows.forEach((match, index) => {
                if (isCompleted(match) && inFilter(match, filter)) {
                    matches++;
                    lastId = index + 1;
                }
            });
            return formatRevision(matches, lastId);
        },

        async addMatch(match: MatchRecord): Promise<void> {
            rows.push(parseMatchRecord(match));
        },

        async addMatches(matches: readonly MatchRecord[]): Promise<number> {
            const valid = matches.map(parseMatchRecord);
            rows.push(...valid);
            return valid.length;
        },
    };
}
