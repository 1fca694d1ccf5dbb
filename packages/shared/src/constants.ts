/**
 * Shared Constants
 */

// ============================================
// Rating Model
// ============================================

export const RATING = {
    // Rating assigned to a team the first time it is referenced
    BASE_RATING: 1500,

    // Update step per match
    K_FACTOR: 20,

    // Logistic scale: a 400-point gap means 10:1 expected odds
    SCALE: 400,
} as const;

// ============================================
// Scoring Model
// ============================================

export const SCORING = {
    // Fallback goals per team-appearance when there is no history
    DEFAULT_LEAGUE_AVERAGE_GOALS: 1.4,

    // Multiplier on the home side's expected goals
    HOME_ADVANTAGE: 1.05,

    // Factor used for teams with no recorded matches
    NEUTRAL_FACTOR: 1.0,

    // Scoreline grid covers 0..MAX_GOALS per side
    MAX_GOALS: 6,

    // Number of exact scorelines reported per prediction
    TOP_SCORELINES: 6,
} as const;

// ============================================
// Ingestion Defaults
// ============================================

export const INGEST = {
    DEFAULT_COMPETITION: 'OPEN',
    DEFAULT_SEASON: 0,
} as const;

// ============================================
// Redis Keys
// ============================================

export const REDIS_KEYS = {
    // Fitted model: model:{competition}:{season}:{revision}
    model: (competition: string | undefined, season: number | undefined, revision: string) =>
        `model:${competition ?? '*'}:${season ?? '*'}:${revision}`,
} as const;

// ============================================
// API
// ============================================

export const API = {
    // Cached model TTL (seconds)
    MODEL_CACHE_TTL: 3600,

    // Upper bound on home advantage accepted from callers
    MAX_HOME_ADVANTAGE: 2,
} as const;
