import type { CompletedMatch, RatingTable } from '@scoreline/shared';
import { RATING, getOrDefault } from '@scoreline/shared';
import type { RatingEngineOptions, RatingUpdate } from './types';

/**
 * Elo-style pairwise ratings.
 *
 * One instance owns one rating table. Matches must be applied in
 * non-decreasing date order; the engine itself has no notion of time.
 * Instances are not reentrant: serialize `update` calls per instance.
 */
export class RatingEngine {
    readonly kFactor: number;
    readonly baseRating: number;
    private ratings = new Map<string, number>();

    constructor(options: RatingEngineOptions = {}) {
        this.kFactor = options.kFactor ?? RATING.K_FACTOR;
        this.baseRating = options.baseRating ?? RATING.BASE_RATING;
    }

    rating(team: string): number {
        return getOrDefault(this.ratings, team, this.baseRating);
    }

    /**
     * Expected score of `teamA` against `teamB` (0-1).
     */
    expected(teamA: string, teamB: string): number {
        return expectedScore(this.rating(teamA), this.rating(teamB));
    }

    update(teamA: string, teamB: string, goalsA: number, goalsB: number): RatingUpdate {
        const expectedA = this.expected(teamA, teamB);
        const actualA = goalsA > goalsB ? 1 : goalsA === goalsB ? 0.5 : 0;

        // S_b - E_b = (1 - S_a) - (1 - E_a), the mirror of team A's delta
        const deltaA = this.kFactor * (actualA - expectedA);
        const deltaB = this.kFactor * ((1 - actualA) - (1 - expectedA));

        this.ratings.set(teamA, this.rating(teamA) + deltaA);
        this.ratings.set(teamB, this.rating(teamB) + deltaB);

        return {
            team_a: teamA,
            team_b: teamB,
            expected_a: expectedA,
            actual_a: actualA,
            delta_a: deltaA,
            delta_b: deltaB,
        };
    }

    apply(match: CompletedMatch): RatingUpdate {
        return this.update(match.home_team, match.away_team, match.home_goals, match.away_goals);
    }

    get size(): number {
        return this.ratings.size;
    }

    snapshot(): Map<string, number> {
        return new Map(this.ratings);
    }
}

export function expectedScore(ratingA: number, ratingB: number): number {
    return 1 / (1 + Math.pow(10, (ratingB - ratingA) / RATING.SCALE));
}

/**
 * Replay a chronologically ordered history through a fresh engine.
 */
export function replayRatings(
    matches: readonly CompletedMatch[],
    options: RatingEngineOptions = {}
): RatingTable {
    const engine = new RatingEngine(options);
    for (const match of matches) {
        engine.apply(match);
    }
    return engine.snapshot();
}
