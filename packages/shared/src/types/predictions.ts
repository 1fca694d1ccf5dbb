/**
 * Prediction Types
 * Scoreline forecasts and the fitted parameters they are computed from
 */

import type { MatchFilter } from './matches';

// ============================================
// Fitted Parameters
// ============================================

/** Team name -> Elo-style rating */
export type RatingTable = ReadonlyMap<string, number>;

export interface StrengthTable {
    /** Team name -> goals scored per match relative to league average */
    attack: ReadonlyMap<string, number>;

    /** Team name -> goals conceded per match relative to league average */
    defense: ReadonlyMap<string, number>;

    /** Mean goals per team-appearance across the fitted matches */
    league_average_goals: number;
}

// ============================================
// Prediction Output
// ============================================

export interface ScorelineProbability {
    home_goals: number;
    away_goals: number;
    probability: number;
}

export interface Prediction {
    home_team: string;
    away_team: string;

    /** Expected goals for each side */
    lambda_home: number;
    lambda_away: number;

    /** Most likely exact scores, most probable first */
    ranked_scorelines: ScorelineProbability[];

    /** Home win / draw / away win mass over the truncated grid */
    p_win: number;
    p_draw: number;
    p_loss: number;
}

export interface RatingContext {
    home: number;
    away: number;

    /** Elo expected score of the home side (0-1) */
    expected_home: number;
}

export interface FixturePrediction extends Prediction {
    date: string;
    competition: string;
    season: number;

    /** Present when the model carries a rating table */
    ratings?: RatingContext;
}

// ============================================
// Fitted Model
// ============================================

export interface ForecastModel {
    filter: MatchFilter;
    ratings: RatingTable;
    strengths: StrengthTable;

    /** Completed matches the model was fitted on */
    matches_fitted: number;

    /** Repository revision of those matches, see MatchRepository.revision */
    revision: string;

    built_at: string;
}
