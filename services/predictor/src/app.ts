/**
 * HTTP routes for the predictor service
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { zValidator } from '@hono/zod-validator';
import type { ZodError } from 'zod';
import type { HealthChecks, PredictBody, PredictResponse, UpcomingResponse } from '@scoreline/shared';
import { MatchFilterSchema, PredictBodySchema, createLogger } from '@scoreline/shared';
import { predictWithStrengths, ratingContext } from './engine';
import type { MatchRepository } from './repository';
import type { ModelService } from './model';
import type { PredictorMetrics } from './metrics';
import { predictUpcoming, rankRatings, summarizeModel } from './workflow';
import { config } from './config';

const logger = createLogger('predictor:http', config.logLevel);

export interface AppDependencies {
    repository: MatchRepository;
    models: ModelService;
    health: HealthChecks;
    metrics: PredictorMetrics;
    modelVersion?: string;
    isShuttingDown?: () => boolean;
}

function invalid(result: { success: boolean; error?: ZodError }) {
    return {
        success: false,
        error: 'Invalid request',
        issues: result.error?.issues.map(i => ({ path: i.path.join('.'), message: i.message })) ?? [],
    };
}

export function createApp(deps: AppDependencies): Hono {
    const { repository, models, health, metrics } = deps;
    const modelVersion = deps.modelVersion ?? config.model.version;
    const app = new Hono();

    app.use('*', cors());

    // Request middleware
    app.use('*', async (c, next) => {
        if (deps.isShuttingDown?.()) {
            return c.json({ error: 'Service is shutting down' }, 503);
        }

        const start = performance.now();
        await next();
        const latency = performance.now() - start;

        const path = c.req.path.split('/').slice(0, 2).join('/') || '/';
        metrics.requests.inc({
            method: c.req.method,
            path,
            status: String(c.res.status),
        });
        metrics.requestLatency.observe(latency, { method: c.req.method, path });
    });

    // =====================================
    // Health Endpoints
    // =====================================

    app.get('/healthz', async (c) => {
        const result = await health.healthz();
        return c.json(result.body, result.status);
    });

    app.get('/readyz', async (c) => {
        const result = await health.readyz();
        return c.json(result.body, result.status);
    });

    app.get('/health', async (c) => {
        const result = await health.health();
        return c.json({ ...result.body, model_version: modelVersion }, result.status);
    });

    // =====================================
    // Metrics
    // =====================================

    app.get('/metrics', (c) => {
        c.header('Content-Type', 'text/plain; version=0.0.4');
        return c.text(metrics.registry.getMetrics());
    });

    // =====================================
    // Models
    // =====================================

    app.post(
        '/models',
        zValidator('json', MatchFilterSchema, (result, c) => {
            if (!result.success) return c.json(invalid(result), 400);
        }),
        async (c) => {
            const filter = c.req.valid('json');
            try {
                const model = await models.rebuild(filter);
                return c.json({ success: true, model: summarizeModel(model) }, 201);
            } catch (error) {
                metrics.errors.inc({ type: 'build' });
                logger.error('Model build failed', { error: String(error), ...filter });
                return c.json({ success: false, error: 'Model build failed' }, 500);
            }
        }
    );

    app.get(
        '/models',
        zValidator('query', MatchFilterSchema, (result, c) => {
            if (!result.success) return c.json(invalid(result), 400);
        }),
        async (c) => {
            const filter = c.req.valid('query');
            const model = await models.peek(filter);
            if (!model) {
                return c.json({ success: false, error: 'No model built for this filter' }, 404);
            }
            return c.json({ success: true, model: summarizeModel(model) });
        }
    );

    app.get(
        '/ratings',
        zValidator('query', MatchFilterSchema, (result, c) => {
            if (!result.success) return c.json(invalid(result), 400);
        }),
        async (c) => {
            const filter = c.req.valid('query');
            try {
                const model = await models.get(filter);
                return c.json({
                    success: true,
                    model: summarizeModel(model),
                    ratings: rankRatings(model.ratings),
                });
            } catch (error) {
                metrics.errors.inc({ type: 'ratings' });
                logger.error('Get ratings failed', { error: String(error), ...filter });
                return c.json({ success: false, error: 'Failed to get ratings' }, 500);
            }
        }
    );

    // =====================================
    // Predictions
    // =====================================

    app.post(
        '/predict',
        zValidator('json', PredictBodySchema, (result, c) => {
            if (!result.success) {
                metrics.errors.inc({ type: 'validation' });
                return c.json(invalid(result), 400);
            }
        }),
        async (c) => {
            const body: PredictBody = c.req.valid('json');
            const filter = { competition: body.competition, season: body.season };

            try {
                const model = await models.get(filter);
                const prediction = predictWithStrengths(
                    body.home_team,
                    body.away_team,
                    model.strengths,
                    body.home_advantage ?? config.model.homeAdvantage
                );
                metrics.predictions.inc({ trigger: 'request' });

                logger.info('Prediction calculated', {
                    home_team: body.home_team,
                    away_team: body.away_team,
                    p_win: prediction.p_win.toFixed(3),
                    p_draw: prediction.p_draw.toFixed(3),
                    p_loss: prediction.p_loss.toFixed(3),
                });

                const response: PredictResponse = {
                    prediction: {
                        ...prediction,
                        ratings: ratingContext(model.ratings, body.home_team, body.away_team, config.model.baseRating),
                    },
                    model: summarizeModel(model),
                };
                return c.json({ success: true, ...response });
            } catch (error) {
                metrics.errors.inc({ type: 'prediction' });
                logger.error('Prediction failed', { error: String(error) });
                return c.json({ success: false, error: 'Prediction failed' }, 500);
            }
        }
    );

    app.get(
        '/predictions/upcoming',
        zValidator('query', MatchFilterSchema, (result, c) => {
            if (!result.success) return c.json(invalid(result), 400);
        }),
        async (c) => {
            const filter = c.req.valid('query');

            try {
                const model = await models.get(filter);
                const predictions = await predictUpcoming(repository, model, { filter });
                metrics.predictions.inc({ trigger: 'upcoming' }, predictions.length);

                const response: UpcomingResponse = {
                    count: predictions.length,
                    predictions,
                    model: summarizeModel(model),
                };
                return c.json({ success: true, ...response });
            } catch (error) {
                metrics.errors.inc({ type: 'prediction' });
                logger.error('Upcoming predictions failed', { error: String(error), ...filter });
                return c.json({ success: false, error: 'Failed to predict upcoming fixtures' }, 500);
            }
        }
    );

    return app;
}
