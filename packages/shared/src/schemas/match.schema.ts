/**
 * Match Schema Validation
 *
 * Zod schemas guarding the repository boundary:
 * - Stored match records (strict)
 * - Bulk import lines (lenient, defaults filled in by the importer)
 */

import { z } from 'zod';
import { API } from '../constants';
import type { MatchRecord } from '../types/matches';

// ============================================
// Match Record
// ============================================

const GoalsSchema = z.number().int().min(0).nullable();

export const MatchRecordSchema = z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
    competition: z.string().trim().min(1, 'competition is required'),
    season: z.number().int().min(0),
    home_team: z.string().trim().min(1, 'home_team is required'),
    away_team: z.string().trim().min(1, 'away_team is required'),
    home_goals: GoalsSchema,
    away_goals: GoalsSchema,
}).refine(
    (m) => (m.home_goals === null) === (m.away_goals === null),
    { message: 'home_goals and away_goals must both be set or both be null', path: ['away_goals'] }
);

export class MatchValidationError extends Error {
    constructor(
        message: string,
        readonly issues: z.ZodIssue[]
    ) {
        super(message);
        this.name = 'MatchValidationError';
    }
}

export function validateMatchRecord(data: unknown) {
    return MatchRecordSchema.safeParse(data);
}

/**
 * Parse a match record or throw MatchValidationError.
 */
export function parseMatchRecord(data: unknown): MatchRecord {
    const result = MatchRecordSchema.safeParse(data);
    if (!result.success) {
        const summary = result.error.issues
            .map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
            .join('; ');
        throw new MatchValidationError(`Invalid match record (${summary})`, result.error.issues);
    }
    return result.data;
}

// ============================================
// Import Line
// ============================================

/**
 * One line of a newline-delimited results file. Only the team names are
 * required; the importer supplies defaults for the rest.
 */
export const ImportLineSchema = z.object({
    date: z.string().nullish(),
    competition: z.string().nullish(),
    season: z.coerce.number().int().min(0).nullish(),
    home: z.string().trim().min(1),
    away: z.string().trim().min(1),
    home_goals: GoalsSchema.optional(),
    away_goals: GoalsSchema.optional(),
}).passthrough();

export type ImportLine = z.output<typeof ImportLineSchema>;

// ============================================
// Request Bodies
// ============================================

// A blank or null season means "any season", not season 0
const SeasonFilterSchema = z.preprocess(
    (value) => (value === '' || value === null ? undefined : value),
    z.coerce.number().int().min(0).optional()
);

export const MatchFilterSchema = z.object({
    competition: z.string().trim().min(1).optional(),
    season: SeasonFilterSchema,
});

export const PredictBodySchema = MatchFilterSchema.extend({
    home_team: z.string().trim().min(1),
    away_team: z.string().trim().min(1),
    home_advantage: z.number().positive().max(API.MAX_HOME_ADVANTAGE).optional(),
});

export type PredictBody = z.output<typeof PredictBodySchema>;
