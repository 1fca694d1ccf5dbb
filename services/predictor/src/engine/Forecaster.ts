import type {
    FixturePrediction,
    MatchRecord,
    Prediction,
    RatingContext,
    RatingTable,
    StrengthTable,
} from '@scoreline/shared';
import { RATING, SCORING, getOrDefault } from '@scoreline/shared';
import { expectedScore } from './RatingEngine';
import { attackFactor, defenseFactor } from './StrengthFitter';
import { ScorelineGrid } from './poisson';
import type { ForecastOptions } from './types';

/**
 * Forecast one fixture from attack/defense tables.
 *
 * Teams missing from either table are treated as league average (1.0).
 */
export function predict(
    homeTeam: string,
    awayTeam: string,
    attack: ReadonlyMap<string, number>,
    defense: ReadonlyMap<string, number>,
    leagueAverageGoals: number,
    homeAdvantage: number = SCORING.HOME_ADVANTAGE
): Prediction {
    return predictWithStrengths(
        homeTeam,
        awayTeam,
        { attack, defense, league_average_goals: leagueAverageGoals },
        homeAdvantage
    );
}

export function predictWithStrengths(
    homeTeam: string,
    awayTeam: string,
    strengths: StrengthTable,
    homeAdvantage: number = SCORING.HOME_ADVANTAGE
): Prediction {
    const lambdaHome = strengths.league_average_goals
        * attackFactor(strengths, homeTeam)
        * defenseFactor(strengths, awayTeam)
        * homeAdvantage;
    const lambdaAway = strengths.league_average_goals
        * attackFactor(strengths, awayTeam)
        * defenseFactor(strengths, homeTeam);

    const grid = new ScorelineGrid(lambdaHome, lambdaAway);

    return {
        home_team: homeTeam,
        away_team: awayTeam,
        lambda_home: lambdaHome,
        lambda_away: lambdaAway,
        ranked_scorelines: grid.ranked().slice(0, SCORING.TOP_SCORELINES),
        ...grid.outcomes(),
    };
}

export function ratingContext(
    ratings: RatingTable,
    homeTeam: string,
    awayTeam: string,
    baseRating: number = RATING.BASE_RATING
): RatingContext {
    const home = getOrDefault(ratings, homeTeam, baseRating);
    const away = getOrDefault(ratings, awayTeam, baseRating);
    return { home, away, expected_home: expectedScore(home, away) };
}

/**
 * Forecast a stored fixture, carrying its date/competition/season through.
 */
export function predictFixture(
    fixture: MatchRecord,
    strengths: StrengthTable,
    options: ForecastOptions = {}
): FixturePrediction {
    const prediction = predictWithStrengths(
        fixture.home_team,
        fixture.away_team,
        strengths,
        options.homeAdvantage
    );

    return {
        date: fixture.date,
        competition: fixture.competition,
        season: fixture.season,
        ...prediction,
        ...(options.ratings
            ? { ratings: ratingContext(options.ratings, fixture.home_team, fixture.away_team, options.baseRating) }
            : {}),
    };
}
