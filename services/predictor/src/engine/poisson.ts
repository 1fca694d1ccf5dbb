/**
 * Poisson scoreline grid
 *
 * Goals for each side are independent Poisson variables. The support is
 * truncated at SCORING.MAX_GOALS per side, so the grid holds slightly less
 * than the full probability mass.
 */

import type { ScorelineProbability } from '@scoreline/shared';
import { SCORING } from '@scoreline/shared';

export const GRID_SIZE = SCORING.MAX_GOALS + 1;

/**
 * P(X = k) for X ~ Poisson(lambda). k is a small non-negative integer.
 */
export function poissonPmf(k: number, lambda: number): number {
    let factorial = 1;
    for (let i = 2; i <= k; i++) factorial *= i;
    return Math.exp(-lambda) * Math.pow(lambda, k) / factorial;
}

export interface OutcomeProbabilities {
    p_win: number;
    p_draw: number;
    p_loss: number;
}

/**
 * Fixed GRID_SIZE x GRID_SIZE table of scoreline probabilities, stored
 * row-major: home goals ascending, then away goals ascending. That storage
 * order is also the tie-break order when ranking.
 */
export class ScorelineGrid {
    private readonly cells: Float64Array;

    constructor(readonly lambdaHome: number, readonly lambdaAway: number) {
        const home = Array.from({ length: GRID_SIZE }, (_, g) => poissonPmf(g, lambdaHome));
        const away = Array.from({ length: GRID_SIZE }, (_, g) => poissonPmf(g, lambdaAway));

        this.cells = new Float64Array(GRID_SIZE * GRID_SIZE);
        home.forEach((ph, gh) => {
            away.forEach((pa, ga) => {
                this.cells[gh * GRID_SIZE + ga] = ph * pa;
            });
        });
    }

    at(homeGoals: number, awayGoals: number): number {
        if (!inRange(homeGoals) || !inRange(awayGoals)) return 0;
        return this.cells[homeGoals * GRID_SIZE + awayGoals] ?? 0;
    }

    /** Mass held by the truncated grid (< 1) */
    total(): number {
        let sum = 0;
        for (const p of this.cells) sum += p;
        return sum;
    }

    /**
     * All cells, most probable first. Equal probabilities keep grid order.
     */
    ranked(): ScorelineProbability[] {
        const order = Array.from(this.cells.keys());
        order.sort((a, b) => {
            const diff = (this.cells[b] ?? 0) - (this.cells[a] ?? 0);
            return diff !== 0 ? diff : a - b;
        });

        return order.map(index => ({
            home_goals: Math.floor(index / GRID_SIZE),
            away_goals: index % GRID_SIZE,
            probability: this.cells[index] ?? 0,
        }));
    }

    outcomes(): OutcomeProbabilities {
        let pWin = 0;
        let pDraw = 0;
        let pLoss = 0;

        this.cells.forEach((p, index) => {
            const gh = Math.floor(index / GRID_SIZE);
            const ga = index % GRID_SIZE;
            if (gh > ga) pWin += p;
            else if (gh === ga) pDraw += p;
            else pLoss += p;
        });

        return { p_win: pWin, p_draw: pDraw, p_loss: pLoss };
    }
}

function inRange(goals: number): boolean {
    return Number.isInteger(goals) && goals >= 0 && goals < GRID_SIZE;
}
