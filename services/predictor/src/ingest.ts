/**
 * Bulk result files
 *
 * Newline-delimited JSON, one match per line:
 *   {"date": "2024-08-17", "competition": "PL", "season": 2024,
 *    "home": "Harbor City", "away": "Mill Lane", "home_goals": 2, "away_goals": 0}
 *
 * Lines without both team names, or that fail to parse, are skipped and
 * reported; everything else gets defaults for the missing fields.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { ImportLine, MatchRecord } from '@scoreline/shared';
import {
    INGEST,
    ImportLineSchema,
    createLogger,
    todayISODate,
    toISODate,
    validateMatchRecord,
} from '@scoreline/shared';
import { config } from './config';

const logger = createLogger('predictor:ingest', config.logLevel);

export interface SkippedLine {
    /** 1-based line number in the source text */
    line: number;
    reason: string;
}

export interface ParsedMatchFile {
    matches: MatchRecord[];
    skipped: SkippedLine[];
}

export function parseMatchLines(content: string, now: Date = new Date()): ParsedMatchFile {
    const matches: MatchRecord[] = [];
    const skipped: SkippedLine[] = [];
    const today = todayISODate(now);

    content.split(/\r?\n/).forEach((text, index) => {
        const line = index + 1;
        if (!text.trim()) return;

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (error) {
            skipped.push({ line, reason: `invalid JSON: ${String(error)}` });
            return;
        }

        const parsed = ImportLineSchema.safeParse(json);
        if (!parsed.success) {
            skipped.push({ line, reason: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') });
            return;
        }

        const fields: ImportLine = parsed.data;
        const { date, competition, season, home, away, home_goals, away_goals } = fields;
        const record = validateMatchRecord({
            date: date ? toISODate(date) : today,
            competition: competition?.trim() || INGEST.DEFAULT_COMPETITION,
            season: season ?? INGEST.DEFAULT_SEASON,
            home_team: home,
            away_team: away,
            home_goals: home_goals ?? null,
            away_goals: away_goals ?? null,
        });

        if (!record.success) {
            skipped.push({ line, reason: record.error.issues.map(i => i.message).join('; ') });
            return;
        }

        matches.push(record.data);
    });

    return { matches, skipped };
}

// ============================================
// Files and folders
// ============================================

export interface FileReport {
    file: string;
    matches: number;
    skipped: SkippedLine[];
}

export interface UnreadableFile {
    file: string;
    reason: string;
}

export interface MatchSourceImport {
    matches: MatchRecord[];
    files: FileReport[];
    unreadable: UnreadableFile[];
}

/**
 * Read one results file, or every regular file directly inside a folder in
 * name order. A file that cannot be read is reported and the rest still
 * load; subfolders are ignored. A missing `source` rejects.
 */
export async function loadMatchSource(source: string, now: Date = new Date()): Promise<MatchSourceImport> {
    const info = await fs.stat(source);
    const candidates = info.isDirectory()
        ? (await fs.readdir(source)).sort().map(name => path.join(source, name))
        : [source];

    const result: MatchSourceImport = { matches: [], files: [], unreadable: [] };

    for (const file of candidates) {
        let content: string;
        try {
            if (!(await fs.stat(file)).isFile()) continue;
            content = await fs.readFile(file, 'utf-8');
        } catch (error) {
            logger.warn('Skipping unreadable results file', { file, error: String(error) });
            result.unreadable.push({ file, reason: String(error) });
            continue;
        }

        const { matches, skipped } = parseMatchLines(content, now);
        result.matches.push(...matches);
        result.files.push({ file, matches: matches.length, skipped });
    }

    logger.debug('Results source read', {
        source,
        files: result.files.length,
        unreadable: result.unreadable.length,
        matches: result.matches.length,
    });

    return result;
}
