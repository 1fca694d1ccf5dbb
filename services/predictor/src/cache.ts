/**
 * Model Cache
 *
 * Keeps fitted models per competition/season in Redis so repeated forecast
 * requests skip the full-history replay. Keys carry the repository revision
 * the model was fitted at, so storing new results makes old entries
 * unreachable; they expire after the configured TTL.
 */

import { z } from 'zod';
import type { ForecastModel, MatchFilter, SerializedModel } from '@scoreline/shared';
import { REDIS_KEYS, createLogger, mapToRecord, recordToMap } from '@scoreline/shared';
import { config } from './config';

const logger = createLogger('predictor:cache', config.logLevel);

/** The slice of an ioredis client the cache uses */
export interface KeyValueStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}

export interface ModelCache {
    load(filter: MatchFilter, revision: string): Promise<ForecastModel | null>;
    save(model: ForecastModel): Promise<void>;
}

const TableSchema = z.record(z.number());

const SerializedModelSchema = z.object({
    filter: z.object({
        competition: z.string().optional(),
        season: z.number().int().optional(),
    }),
    ratings: TableSchema,
    strengths: z.object({
        attack: TableSchema,
        defense: TableSchema,
        league_average_goals: z.number(),
    }),
    matches_fitted: z.number().int().min(0),
    revision: z.string(),
    built_at: z.string(),
});

export function serializeModel(model: ForecastModel): SerializedModel {
    return {
        filter: { ...model.filter },
        ratings: mapToRecord(model.ratings),
        strengths: {
            attack: mapToRecord(model.strengths.attack),
            defense: mapToRecord(model.strengths.defense),
            league_average_goals: model.strengths.league_average_goals,
        },
        matches_fitted: model.matches_fitted,
        revision: model.revision,
        built_at: model.built_at,
    };
}

export function deserializeModel(data: unknown): ForecastModel | null {
    const result = SerializedModelSchema.safeParse(data);
    if (!result.success) return null;

    const { filter, ratings, strengths, matches_fitted, revision, built_at } = result.data;
    return {
        filter,
        ratings: recordToMap(ratings),
        strengths: {
            attack: recordToMap(strengths.attack),
            defense: recordToMap(strengths.defense),
            league_average_goals: strengths.league_average_goals,
        },
        matches_fitted,
        revision,
        built_at,
    };
}

export function createModelCache(store: KeyValueStore, ttlSeconds: number = config.cache.ttlSeconds): ModelCache {
    return {
        async load(filter: MatchFilter, revision: string): Promise<ForecastModel | null> {
            const key = REDIS_KEYS.model(filter.competition, filter.season, revision);
            const raw = await store.get(key);
            if (!raw) return null;

            let parsed: unknown;
            try {
                parsed = JSON.parse(raw);
            } catch (error) {
                logger.warn('Discarding unreadable cached model', { key, error: String(error) });
                return null;
            }

            const model = deserializeModel(parsed);
            if (!model) {
                logger.warn('Discarding cached model with unexpected shape', { key });
            }
            return model;
        },

        async save(model: ForecastModel): Promise<void> {
            const key = REDIS_KEYS.model(model.filter.competition, model.filter.season, model.revision);
            await store.set(key, JSON.stringify(serializeModel(model)), 'EX', ttlSeconds);
            logger.debug('Model cached', { key, ttl_seconds: ttlSeconds });
        },
    };
}
