/**
 * Forecast Workflow
 *
 * Repository -> completed history -> {ratings, strengths} -> forecasts for
 * every pending fixture. Both fits read the same snapshot, which keeps the
 * ratings and strengths of one model consistent with each other.
 */

import type {
    FixturePrediction,
    ForecastModel,
    MatchFilter,
    ModelSummary,
    RatingEntry,
    RatingTable,
} from '@scoreline/shared';
import { createLogger, nowISO } from '@scoreline/shared';
import { fitStrengths, predictFixture, replayRatings } from './engine';
import type { RatingEngineOptions } from './engine';
import type { MatchRepository } from './repository';
import { config } from './config';

const logger = createLogger('predictor:workflow', config.logLevel);

export async function buildModel(
    repository: MatchRepository,
    filter: MatchFilter = {},
    options: RatingEngineOptions = {}
): Promise<ForecastModel> {
    const start = performance.now();
    // Read before the matches so a concurrent insert leaves an older revision
    const revision = await repository.revision(filter);
    const completed = await repository.listCompleted(filter);

    const model: ForecastModel = {
        filter: { ...filter },
        ratings: replayRatings(completed, {
            kFactor: options.kFactor ?? config.model.kFactor,
            baseRating: options.baseRating ?? config.model.baseRating,
        }),
        strengths: fitStrengths(completed),
        matches_fitted: completed.length,
        revision,
        built_at: nowISO(),
    };

    logger.info('Model built', {
        competition: filter.competition,
        season: filter.season,
        matches: completed.length,
        revision,
        teams: model.ratings.size,
        league_average_goals: model.strengths.league_average_goals.toFixed(3),
        latency_ms: (performance.now() - start).toFixed(2),
    });

    return model;
}

export interface UpcomingOptions {
    /** Defaults to the filter the model was built with */
    filter?: MatchFilter;
    homeAdvantage?: number;
}

export async function predictUpcoming(
    repository: MatchRepository,
    model: ForecastModel,
    options: UpcomingOptions = {}
): Promise<FixturePrediction[]> {
    const filter = options.filter ?? model.filter;
    const pending = await repository.listPending(filter);

    const predictions = pending.map(fixture => predictFixture(fixture, model.strengths, {
        homeAdvantage: options.homeAdvantage ?? config.model.homeAdvantage,
        ratings: model.ratings,
        baseRating: config.model.baseRating,
    }));

    logger.debug('Upcoming fixtures predicted', {
        competition: filter.competition,
        season: filter.season,
        fixtures: predictions.length,
    });

    return predictions;
}

export function summarizeModel(model: ForecastModel): ModelSummary {
    const teams = new Set([...model.ratings.keys(), ...model.strengths.attack.keys()]);
    return {
        competition: model.filter.competition,
        season: model.filter.season,
        teams: teams.size,
        matches_fitted: model.matches_fitted,
        revision: model.revision,
        league_average_goals: model.strengths.league_average_goals,
        built_at: model.built_at,
    };
}

/**
 * Ratings as a leaderboard: highest first, ties by team name.
 */
export function rankRatings(ratings: RatingTable): RatingEntry[] {
    return [...ratings.entries()]
        .sort(([teamA, a], [teamB, b]) => b - a || teamA.localeCompare(teamB))
        .map(([team, rating], i) => ({ rank: i + 1, team, rating }));
}
