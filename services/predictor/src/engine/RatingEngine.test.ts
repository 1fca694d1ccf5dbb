import { describe, it, expect } from 'vitest';
import type { CompletedMatch } from '@scoreline/shared';
import { RatingEngine, expectedScore, replayRatings } from './RatingEngine';

function result(home: string, away: string, homeGoals: number, awayGoals: number, date = '2024-08-17'): CompletedMatch {
    return {
        date,
        competition: 'PL',
        season: 2024,
        home_team: home,
        away_team: away,
        home_goals: homeGoals,
        away_goals: awayGoals,
    };
}

describe('RatingEngine', () => {
    it('starts unseen teams at the base rating without storing them', () => {
        const engine = new RatingEngine();
        expect(engine.rating('Nobody')).toBe(1500);
        expect(engine.size).toBe(0);
    });

    it('moves a 3-1 winner up by exactly K/2 between equal teams', () => {
        const engine = new RatingEngine({ kFactor: 20, baseRating: 1500 });
        const update = engine.update('A', 'B', 3, 1);

        expect(update.expected_a).toBe(0.5);
        expect(update.actual_a).toBe(1);
        expect(engine.rating('A')).toBe(1510);
        expect(engine.rating('B')).toBe(1490);
        expect(engine.rating('A')).toBeGreaterThan(1500);
        expect(engine.rating('B')).toBeLessThan(1500);
    });

    it('follows the logistic expected score for unequal teams', () => {
        const engine = new RatingEngine();
        engine.update('A', 'B', 3, 1);

        // B (1490) beats A (1510)
        const expectedB = 1 / (1 + Math.pow(10, (1510 - 1490) / 400));
        const update = engine.update('B', 'A', 2, 0);

        expect(update.expected_a).toBeCloseTo(expectedB, 12);
        expect(engine.rating('B')).toBeCloseTo(1490 + 20 * (1 - expectedB), 10);
        expect(engine.rating('A')).toBeCloseTo(1510 - 20 * (1 - expectedB), 10);
    });

    it('leaves equal teams unchanged after a draw', () => {
        const engine = new RatingEngine();
        engine.update('A', 'B', 1, 1);
        expect(engine.rating('A')).toBe(1500);
        expect(engine.rating('B')).toBe(1500);
    });

    it('takes points from the stronger side on a draw', () => {
        const engine = new RatingEngine();
        engine.update('A', 'B', 2, 0);
        const update = engine.update('A', 'B', 0, 0);

        expect(update.actual_a).toBe(0.5);
        expect(update.delta_a).toBeLessThan(0);
        expect(update.delta_b).toBeGreaterThan(0);
    });

    it('conserves total rating on every update', () => {
        const engine = new RatingEngine({ kFactor: 32 });
        const scores: Array<[string, string, number, number]> = [
            ['A', 'B', 3, 1],
            ['B', 'C', 0, 0],
            ['C', 'A', 4, 2],
            ['D', 'A', 0, 1],
            ['B', 'D', 2, 2],
            ['C', 'B', 1, 5],
        ];

        for (const [a, b, ga, gb] of scores) {
            const before = engine.rating(a) + engine.rating(b);
            const update = engine.update(a, b, ga, gb);
            expect(update.delta_a + update.delta_b).toBeCloseTo(0, 10);
            expect(engine.rating(a) + engine.rating(b)).toBeCloseTo(before, 10);
        }
    });

    it('applies the K factor option', () => {
        const engine = new RatingEngine({ kFactor: 32 });
        engine.update('A', 'B', 1, 0);
        expect(engine.rating('A')).toBe(1516);
        expect(engine.rating('B')).toBe(1484);
    });

    it('returns snapshots that do not alias its own table', () => {
        const engine = new RatingEngine();
        engine.update('A', 'B', 1, 0);
        const snapshot = engine.snapshot();
        engine.update('A', 'B', 1, 0);

        expect(snapshot.get('A')).toBe(1510);
        expect(engine.rating('A')).toBeGreaterThan(1510);
    });
});

describe('expectedScore', () => {
    it('gives 10:1 odds across a 400-point gap', () => {
        expect(expectedScore(1900, 1500)).toBeCloseTo(10 / 11, 12);
        expect(expectedScore(1500, 1900)).toBeCloseTo(1 / 11, 12);
    });
});

describe('replayRatings', () => {
    it('replays a history in order on a fresh engine', () => {
        const ratings = replayRatings([
            result('A', 'B', 3, 1, '2024-08-17'),
            result('C', 'A', 0, 0, '2024-08-24'),
        ]);

        const expectedC = 1 / (1 + Math.pow(10, (1510 - 1500) / 400));

        expect(ratings.get('B')).toBe(1490);
        expect(ratings.get('C')).toBeCloseTo(1500 + 20 * (0.5 - expectedC), 10);
        expect(ratings.get('A')).toBeCloseTo(1510 - 20 * (0.5 - expectedC), 10);
        expect([...ratings.values()].reduce((a, b) => a + b, 0)).toBeCloseTo(4500, 10);
    });

    it('returns an empty table for an empty history', () => {
        expect(replayRatings([]).size).toBe(0);
    });
});
