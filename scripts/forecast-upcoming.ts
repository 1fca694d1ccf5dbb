/**
 * Upcoming fixture forecasts
 * Fits a model from stored results and prints a forecast for every fixture
 * still waiting for a result.
 *
 * Usage: npm run forecast:upcoming -- [competition] [season]
 */

import type { MatchFilter } from '@scoreline/shared';
import { createDatabase } from '../services/predictor/src/database';
import { createPgMatchRepository } from '../services/predictor/src/repository';
import { buildModel, predictUpcoming } from '../services/predictor/src/workflow';

const [competition, seasonArg] = process.argv.slice(2);
const season = seasonArg === undefined ? undefined : Number.parseInt(seasonArg, 10);

if (season !== undefined && Number.isNaN(season)) {
    console.error(`Season must be a year, got "${seasonArg}"`);
    process.exit(1);
}

const filter: MatchFilter = { competition, season };
const db = createDatabase();
const pct = (p: number) => `${(p * 100).toFixed(1)}%`;

try {
    const repository = createPgMatchRepository({
        query: (text, values) => db.query(text, values),
    });
    const model = await buildModel(repository, filter);
    const predictions = await predictUpcoming(repository, model);

    if (predictions.length === 0) {
        console.log('No upcoming fixtures. Import fixtures without results first.');
    }

    console.log(`Model: ${model.matches_fitted} matches, league average ${model.strengths.league_average_goals.toFixed(3)} goals`);
    console.log('date       | competition | home vs away | win / draw / loss | top score');

    for (const p of predictions) {
        const top = p.ranked_scorelines[0];
        const topScore = top ? `${top.home_goals}-${top.away_goals} (${pct(top.probability)})` : '-';
        console.log(
            `${p.date} | ${p.competition} | ${p.home_team} vs ${p.away_team} | ` +
            `${pct(p.p_win)} / ${pct(p.p_draw)} / ${pct(p.p_loss)} | ${topScore}`
        );
    }
} catch (e) {
    console.error('Forecast failed:', e);
    process.exitCode = 1;
} finally {
    await db.end();
}
