/**
 * Predictor Service Metrics
 */

import { MetricsRegistry, createServiceMetrics } from '@scoreline/shared';

export function createPredictorMetrics(registry = new MetricsRegistry()) {
    const base = createServiceMetrics('predictor', registry);

    return {
        ...base,
        modelBuilds: registry.createCounter(
            'predictor_model_builds_total',
            'Total models fitted from the match repository'
        ),
        buildLatency: registry.createHistogram(
            'predictor_model_build_latency_ms',
            'Model build latency in milliseconds',
            [5, 25, 100, 250, 1000, 5000, 15000]
        ),
        modelTeams: registry.createGauge(
            'predictor_model_teams',
            'Teams rated by the most recently built model'
        ),
        cacheLookups: registry.createCounter(
            'predictor_model_cache_lookups_total',
            'Model cache lookups by result'
        ),
        predictions: registry.createCounter(
            'predictor_predictions_total',
            'Fixture forecasts calculated'
        ),
    };
}

export type PredictorMetrics = ReturnType<typeof createPredictorMetrics>;
