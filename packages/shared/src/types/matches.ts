/**
 * Match Types
 * Fixtures and results as stored by the match repository
 */

// ============================================
// Match Record
// ============================================

export interface MatchRecord {
    /** ISO date (YYYY-MM-DD) the fixture is played on */
    date: string;

    /** Competition code, e.g. "PL" */
    competition: string;

    /** Season start year, 0 when unknown */
    season: number;

    home_team: string;
    away_team: string;

    /** Goals are null until the result is known */
    home_goals: number | null;
    away_goals: number | null;
}

/** A fixture with a known result */
export interface CompletedMatch extends MatchRecord {
    home_goals: number;
    away_goals: number;
}

/** A fixture still to be played */
export interface PendingMatch extends MatchRecord {
    home_goals: null;
    away_goals: null;
}

export function isCompleted(match: MatchRecord): match is CompletedMatch {
    return match.home_goals !== null && match.away_goals !== null;
}

export function isPending(match: MatchRecord): match is PendingMatch {
    return match.home_goals === null && match.away_goals === null;
}

// ============================================
// Query Filter
// ============================================

/**
 * Narrows repository queries. Both fields are optional and apply the
 * same way to completed and pending queries.
 */
export interface MatchFilter {
    competition?: string;
    season?: number;
}
