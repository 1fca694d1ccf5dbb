/**
 * API Types
 * Request/Response types for the forecast service
 */

import type { FixturePrediction, Prediction, RatingContext } from './predictions';

// ============================================
// Serialized Model
// ============================================

/** Wire/cache form of a ForecastModel: maps flattened to objects */
export interface SerializedModel {
    filter: {
        competition?: string;
        season?: number;
    };
    ratings: Record<string, number>;
    strengths: {
        attack: Record<string, number>;
        defense: Record<string, number>;
        league_average_goals: number;
    };
    matches_fitted: number;
    revision: string;
    built_at: string;
}

export interface ModelSummary {
    competition?: string;
    season?: number;
    teams: number;
    matches_fitted: number;
    revision: string;
    league_average_goals: number;
    built_at: string;
}

// ============================================
// Ratings
// ============================================

export interface RatingEntry {
    rank: number;
    team: string;
    rating: number;
}

// ============================================
// Predictions
// ============================================

export interface PredictResponse {
    prediction: Prediction & { ratings: RatingContext };
    model: ModelSummary;
}

export interface UpcomingResponse {
    count: number;
    predictions: FixturePrediction[];
    model: ModelSummary;
}
