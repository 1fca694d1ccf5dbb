/**
 * Model Service
 *
 * Serves fitted models per competition/season: the cached copy when one
 * exists for the repository's current revision, otherwise a fresh build.
 * Every build runs on its own RatingEngine, so concurrent requests never
 * share mutable state.
 */

import type { ForecastModel, MatchFilter } from '@scoreline/shared';
import { createLogger } from '@scoreline/shared';
import type { ModelCache } from './cache';
import type { MatchRepository } from './repository';
import { buildModel } from './workflow';
import { config } from './config';
import type { PredictorMetrics } from './metrics';

const logger = createLogger('predictor:model', config.logLevel);

export interface ModelService {
    /** Cached model for `filter`, building one on a miss */
    get(filter: MatchFilter): Promise<ForecastModel>;

    /** Cached model for `filter` at the current revision or null, never builds */
    peek(filter: MatchFilter): Promise<ForecastModel | null>;

    /** Rebuild from the repository and replace the cached copy */
    rebuild(filter: MatchFilter): Promise<ForecastModel>;
}

export function createModelService(
    repository: MatchRepository,
    cache: ModelCache,
    metrics: PredictorMetrics
): ModelService {
    async function lookup(filter: MatchFilter, revision: string): Promise<ForecastModel | null> {
        try {
            const model = await cache.load(filter, revision);
            metrics.cacheLookups.inc({ result: model ? 'hit' : 'miss' });
            return model;
        } catch (error) {
            metrics.cacheLookups.inc({ result: 'error' });
            logger.warn('Model cache read failed', { error: String(error), revision, ...filter });
            return null;
        }
    }

    async function peek(filter: MatchFilter): Promise<ForecastModel | null> {
        return lookup(filter, await repository.revision(filter));
    }

    async function rebuild(filter: MatchFilter): Promise<ForecastModel> {
        const stopTimer = metrics.buildLatency.startTimer();
        const model = await buildModel(repository, filter);
        stopTimer();

        metrics.modelBuilds.inc();
        metrics.modelTeams.set(model.ratings.size);

        try {
            await cache.save(model);
        } catch (error) {
            metrics.errors.inc({ type: 'cache_write' });
            logger.error('Failed to cache model', { error: String(error), ...filter });
        }

        return model;
    }

    return {
        peek,
        rebuild,

        async get(filter: MatchFilter): Promise<ForecastModel> {
            return (await peek(filter)) ?? rebuild(filter);
        },
    };
}
