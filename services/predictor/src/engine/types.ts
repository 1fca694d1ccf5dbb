import type { RatingTable } from '@scoreline/shared';

export interface RatingEngineOptions {
    /** Update step per match (default 20) */
    kFactor?: number;

    /** Rating of a team on first reference (default 1500) */
    baseRating?: number;
}

/** Rating movement caused by one match */
export interface RatingUpdate {
    team_a: string;
    team_b: string;
    expected_a: number;
    actual_a: number;
    delta_a: number;
    delta_b: number;
}

export interface ForecastOptions {
    /** Multiplier on the home side's expected goals (default 1.05) */
    homeAdvantage?: number;

    /** When given, predictions carry both teams' ratings and the Elo expectation */
    ratings?: RatingTable;

    /** Base rating used for teams missing from `ratings` */
    baseRating?: number;
}
