/**
 * Predictor Service
 *
 * Fits Elo ratings and Poisson team strengths from stored results and
 * forecasts pending fixtures.
 *
 * Features:
 * - Match repository in PostgreSQL
 * - Fitted-model cache in Redis
 * - Request/build latency metrics
 * - Health checks (/healthz, /readyz)
 * - Graceful shutdown
 */

import { serve } from '@hono/node-server';
import { Redis } from 'ioredis';
import { createHealthChecks, createLogger } from '@scoreline/shared';
import { config } from './config';
import { createApp } from './app';
import { createModelCache } from './cache';
import { createDatabase } from './database';
import { createPredictorMetrics } from './metrics';
import { createModelService } from './model';
import { createPgMatchRepository } from './repository';

const logger = createLogger('predictor', config.logLevel);
const SERVICE_VERSION = '1.0.0';

// Shutdown state
let isShuttingDown = false;

async function main() {
    logger.info('Starting Predictor Service', {
        version: SERVICE_VERSION,
        model_version: config.model.version,
        port: config.port,
    });

    const db = createDatabase();
    const repository = createPgMatchRepository({
        query: (text, values) => db.query(text, values),
    });
    await repository.ensureSchema();
    logger.info('Connected to PostgreSQL');

    const redis = new Redis(config.redis.url, {
        lazyConnect: true,
    });

    redis.on('error', (err) => {
        logger.error('Redis connection error', { error: String(err) });
    });

    await redis.connect();
    logger.info('Connected to Redis');

    const metrics = createPredictorMetrics();
    const models = createModelService(repository, createModelCache(redis), metrics);

    const health = createHealthChecks(SERVICE_VERSION, [
        {
            name: 'postgres',
            check: async () => {
                await db.query('SELECT 1');
                return true;
            },
        },
        {
            name: 'redis',
            check: async () => (await redis.ping()) === 'PONG',
        },
    ]);

    const app = createApp({
        repository,
        models,
        health,
        metrics,
        isShuttingDown: () => isShuttingDown,
    });

    const server = serve({
        fetch: app.fetch,
        port: config.port,
        hostname: config.host,
    });

    logger.info(`Predictor Service listening on ${config.host}:${config.port}`, {
        model_version: config.model.version,
        endpoints: ['/models', '/ratings', '/predict', '/predictions/upcoming', '/health', '/healthz', '/readyz', '/metrics'],
    });

    // =====================================
    // Graceful Shutdown
    // =====================================

    const shutdown = async (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        logger.info('Graceful shutdown started', { signal });

        await new Promise<void>((resolve) => server.close(() => resolve()));
        await redis.quit();
        await db.end();

        logger.info('Shutdown complete');
        process.exit(0);
    };

    const onSignal = (signal: string) => {
        shutdown(signal).catch((error) => {
            logger.error('Shutdown failed', { error: String(error) });
            process.exit(1);
        });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error) => {
    logger.error('Failed to start service', { error: String(error) });
    process.exit(1);
});
