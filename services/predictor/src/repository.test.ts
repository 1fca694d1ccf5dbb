import { describe, it, expect, vi } from 'vitest';
import type { MatchRecord } from '@scoreline/shared';
import { MatchValidationError } from '@scoreline/shared';
import {
    MATCHES_TABLE_DDL,
    buildMatchQuery,
    buildRevisionQuery,
    createMemoryMatchRepository,
    createPgMatchRepository,
} from './repository';
import type { SqlClient } from './repository';

const SELECT = 'SELECT date, competition, season, home_team, away_team, home_goals, away_goals FROM matches';

function record(overrides: Partial<MatchRecord> = {}): MatchRecord {
    return {
        date: '2024-08-17',
        competition: 'PL',
        season: 2024,
        home_team: 'Harbor City',
        away_team: 'Mill Lane',
        home_goals: 2,
        away_goals: 1,
        ...overrides,
    };
}

function fakeClient(rows: unknown[] = []) {
    const query = vi.fn(async (_text: string, _values?: unknown[]) => ({ rows }));
    const client: SqlClient = { query };
    return { client, query };
}

describe('buildMatchQuery', () => {
    it('selects completed matches with both filters', () => {
        expect(buildMatchQuery('completed', { competition: 'PL', season: 2024 })).toEqual({
            text: `${SELECT} WHERE home_goals IS NOT NULL AND away_goals IS NOT NULL AND competition = $1 AND season = $2 ORDER BY date ASC, id ASC`,
            values: ['PL', 2024],
        });
    });

    it('applies the season filter to pending fixtures too', () => {
        expect(buildMatchQuery('pending', { season: 2023 })).toEqual({
            text: `${SELECT} WHERE home_goals IS NULL AND away_goals IS NULL AND season = $1 ORDER BY date ASC, id ASC`,
            values: [2023],
        });
    });

    it('omits filters that are not given', () => {
        expect(buildMatchQuery('pending')).toEqual({
            text: `${SELECT} WHERE home_goals IS NULL AND away_goals IS NULL ORDER BY date ASC, id ASC`,
            values: [],
        });
    });
});

describe('buildRevisionQuery', () => {
    it('counts completed matches under the filter', () => {
        expect(buildRevisionQuery({ competition: 'PL' })).toEqual({
            text: 'SELECT COUNT(*) AS matches, COALESCE(MAX(id), 0) AS last_id FROM matches ' +
                'WHERE home_goals IS NOT NULL AND away_goals IS NOT NULL AND competition = $1',
            values: ['PL'],
        });
    });
});

describe('createPgMatchRepository', () => {
    it('reads the revision from the count and newest id', async () => {
        const { client, query } = fakeClient([{ matches: '12', last_id: 40 }]);
        const revision = await createPgMatchRepository(client).revision({ season: 2024 });

        expect(revision).toBe('12-40');
        expect(query.mock.calls[0]?.[1]).toEqual([2024]);
    });

    it('fails on an unexpected revision row', async () => {
        const { client } = fakeClient([]);
        await expect(createPgMatchRepository(client).revision()).rejects.toThrow('Unexpected revision row');
    });

    it('creates the matches table', async () => {
        const { client, query } = fakeClient();
        await createPgMatchRepository(client).ensureSchema();
        expect(query).toHaveBeenCalledWith(MATCHES_TABLE_DDL);
    });

    it('returns completed rows and rejects malformed ones', async () => {
        const { client, query } = fakeClient([
            record(),
            { ...record(), home_team: '' },
            record({ date: '2024-08-24', home_goals: 0, away_goals: 0 }),
        ]);

        const matches = await createPgMatchRepository(client).listCompleted({ competition: 'PL' });

        expect(query).toHaveBeenCalledWith(
            `${SELECT} WHERE home_goals IS NOT NULL AND away_goals IS NOT NULL AND competition = $1 ORDER BY date ASC, id ASC`,
            ['PL']
        );
        expect(matches.map(m => m.date)).toEqual(['2024-08-17', '2024-08-24']);
    });

    it('returns pending rows only', async () => {
        const { client } = fakeClient([
            record({ home_goals: null, away_goals: null }),
        ]);

        const pending = await createPgMatchRepository(client).listPending({ competition: 'PL', season: 2024 });
        expect(pending).toHaveLength(1);
        expect(pending[0]?.home_goals).toBeNull();
    });

    it('inserts a batch in one statement', async () => {
        const { client, query } = fakeClient();
        const stored = await createPgMatchRepository(client).addMatches([
            record(),
            record({ home_team: 'Mill Lane', away_team: 'Harbor City', home_goals: null, away_goals: null }),
        ]);

        expect(stored).toBe(2);
        expect(query).toHaveBeenCalledTimes(1);
        expect(query.mock.calls[0]?.[0]).toBe(
            'INSERT INTO matches (date, competition, season, home_team, away_team, home_goals, away_goals) VALUES ' +
            '($1, $2, $3, $4, $5, $6, $7), ($8, $9, $10, $11, $12, $13, $14)'
        );
        expect(query.mock.calls[0]?.[1]).toEqual([
            '2024-08-17', 'PL', 2024, 'Harbor City', 'Mill Lane', 2, 1,
            '2024-08-17', 'PL', 2024, 'Mill Lane', 'Harbor City', null, null,
        ]);
    });

    it('rejects a record without a team before writing', async () => {
        const { client, query } = fakeClient();
        const repository = createPgMatchRepository(client);

        await expect(repository.addMatch(record({ away_team: ' ' }))).rejects.toBeInstanceOf(MatchValidationError);
        expect(query).not.toHaveBeenCalled();
    });

    it('rejects a record with only one score', async () => {
        const { client, query } = fakeClient();
        const repository = createPgMatchRepository(client);

        await expect(repository.addMatches([record(), record({ away_goals: null })]))
            .rejects.toThrow('home_goals and away_goals must both be set or both be null');
        expect(query).not.toHaveBeenCalled();
    });
});

describe('createMemoryMatchRepository', () => {
    const rows = [
        record({ date: '2024-08-24', home_team: 'B', away_team: 'C' }),
        record({ date: '2024-08-17', home_team: 'A', away_team: 'B' }),
        record({ date: '2023-09-02', season: 2023, home_team: 'A', away_team: 'C' }),
        record({ date: '2024-09-14', home_team: 'C', away_team: 'A', home_goals: null, away_goals: null }),
        record({ date: '2023-10-01', season: 2023, home_team: 'B', away_team: 'A', home_goals: null, away_goals: null }),
        record({ date: '2024-08-17', competition: 'CUP', home_team: 'A', away_team: 'D' }),
    ];

    it('lists completed matches in date order', async () => {
        const repository = createMemoryMatchRepository(rows);
        const completed = await repository.listCompleted();

        expect(completed.map(m => `${m.date} ${m.home_team}-${m.away_team}`)).toEqual([
            '2023-09-02 A-C',
            '2024-08-17 A-B',
            '2024-08-17 A-D',
            '2024-08-24 B-C',
        ]);
    });

    it('filters by competition and season on both queries', async () => {
        const repository = createMemoryMatchRepository(rows);
        const filter = { competition: 'PL', season: 2024 };

        expect((await repository.listCompleted(filter)).map(m => m.date)).toEqual(['2024-08-17', '2024-08-24']);
        expect((await repository.listPending(filter)).map(m => m.date)).toEqual(['2024-09-14']);
        expect((await repository.listPending({ season: 2023 })).map(m => m.date)).toEqual(['2023-10-01']);
    });

    it('moves the revision only when completed matches are added', async () => {
        const repository = createMemoryMatchRepository(rows);
        const filter = { competition: 'PL', season: 2024 };

        expect(await repository.revision(filter)).toBe('2-2');

        await repository.addMatch(record({ date: '2024-09-28', home_goals: null, away_goals: null }));
        expect(await repository.revision(filter)).toBe('2-2');

        await repository.addMatch(record({ date: '2024-09-28' }));
        expect(await repository.revision(filter)).toBe('3-8');
        expect(await repository.revision({ season: 2023 })).toBe('1-3');
    });

    it('validates added matches', async () => {
        const repository = createMemoryMatchRepository();
        await repository.addMatch(record());

        await expect(repository.addMatch(record({ date: '17/08/2024' }))).rejects.toBeInstanceOf(MatchValidationError);
        expect(await repository.listCompleted()).toHaveLength(1);
    });
});
