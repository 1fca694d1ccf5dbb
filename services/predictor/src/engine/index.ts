/**
 * Rating and forecasting engine
 *
 * Synchronous and free of I/O. Ratings and strengths passed into one
 * forecast run must be fitted from the same completed-match snapshot;
 * mixing snapshots is not detected here.
 */

export { RatingEngine, expectedScore, replayRatings } from './RatingEngine';
export { fitStrengths, attackFactor, defenseFactor } from './StrengthFitter';
export { predict, predictWithStrengths, predictFixture, ratingContext } from './Forecaster';
export { ScorelineGrid, poissonPmf, GRID_SIZE } from './poisson';
export type { OutcomeProbabilities } from './poisson';
export type { RatingEngineOptions, RatingUpdate, ForecastOptions } from './types';
