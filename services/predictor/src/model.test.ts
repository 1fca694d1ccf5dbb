import { describe, it, expect, vi } from 'vitest';
import type { ForecastModel, MatchFilter, MatchRecord } from '@scoreline/shared';
import { MetricsRegistry } from '@scoreline/shared';
import type { ModelCache } from './cache';
import { createPredictorMetrics } from './metrics';
import { createModelService } from './model';
import { createMemoryMatchRepository } from './repository';

const MATCHES: MatchRecord[] = [
    { date: '2024-08-17', competition: 'PL', season: 2024, home_team: 'A', away_team: 'B', home_goals: 2, away_goals: 1 },
    { date: '2024-08-24', competition: 'PL', season: 2024, home_team: 'B', away_team: 'C', home_goals: 0, away_goals: 0 },
];

// Keyed by revision only; every test uses one filter at a time
function fakeCache() {
    const stored = new Map<string, ForecastModel>();
    const load = vi.fn(async (_filter: MatchFilter, revision: string) => stored.get(revision) ?? null);
    const save = vi.fn(async (model: ForecastModel) => {
        stored.set(model.revision, model);
    });
    const cache: ModelCache = { load, save };
    return { cache, load, save };
}

function setup(cache: ModelCache) {
    const registry = new MetricsRegistry();
    const metrics = createPredictorMetrics(registry);
    const repository = createMemoryMatchRepository(MATCHES);
    const service = createModelService(repository, cache, metrics);
    return { service, registry, repository };
}

describe('createModelService', () => {
    it('builds and caches a model on a miss', async () => {
        const { cache, save } = fakeCache();
        const { service, registry } = setup(cache);

        const model = await service.get({ competition: 'PL' });

        expect(model.matches_fitted).toBe(2);
        expect(save).toHaveBeenCalledWith(model);

        const text = registry.getMetrics();
        expect(text).toContain('predictor_model_builds_total 1');
        expect(text).toContain('predictor_model_teams 3');
        expect(text).toContain('predictor_model_cache_lookups_total{result="miss"} 1');
    });

    it('serves the cached model on a hit', async () => {
        const { cache, save } = fakeCache();
        const { service, registry } = setup(cache);

        const first = await service.get({ competition: 'PL' });
        const second = await service.get({ competition: 'PL' });

        expect(second).toBe(first);
        expect(save).toHaveBeenCalledTimes(1);
        expect(registry.getMetrics()).toContain('predictor_model_cache_lookups_total{result="hit"} 1');
    });

    it('refits after new results are stored', async () => {
        const { cache } = fakeCache();
        const { service, repository, registry } = setup(cache);

        const before = await service.get({ competition: 'PL' });
        await repository.addMatches([
            { date: '2024-08-31', competition: 'PL', season: 2024, home_team: 'C', away_team: 'A', home_goals: 3, away_goals: 1 },
        ]);
        const after = await service.get({ competition: 'PL' });

        expect(before.matches_fitted).toBe(2);
        expect(after.matches_fitted).toBe(3);
        expect(after.revision).not.toBe(before.revision);
        expect(registry.getMetrics()).toContain('predictor_model_builds_total 2');
    });

    it('keeps serving the cached model when only fixtures are added', async () => {
        const { cache } = fakeCache();
        const { service, repository } = setup(cache);

        const before = await service.get({ competition: 'PL' });
        await repository.addMatch({
            date: '2024-09-14', competition: 'PL', season: 2024, home_team: 'A', away_team: 'C', home_goals: null, away_goals: null,
        });

        expect(await service.get({ competition: 'PL' })).toBe(before);
    });

    it('peeks without building', async () => {
        const { cache, save } = fakeCache();
        const { service } = setup(cache);

        expect(await service.peek({ season: 2024 })).toBeNull();
        expect(save).not.toHaveBeenCalled();
    });

    it('builds when the cache cannot be read', async () => {
        const { cache, load } = fakeCache();
        load.mockRejectedValueOnce(new Error('connection refused'));
        const { service, registry } = setup(cache);

        const model = await service.get({});

        expect(model.matches_fitted).toBe(2);
        expect(registry.getMetrics()).toContain('predictor_model_cache_lookups_total{result="error"} 1');
    });

    it('returns the model when the cache cannot be written', async () => {
        const { cache, save } = fakeCache();
        save.mockRejectedValueOnce(new Error('read only'));
        const { service, registry } = setup(cache);

        const model = await service.rebuild({ competition: 'PL', season: 2024 });

        expect(model.ratings.get('A')).toBe(1510);
        expect(registry.getMetrics()).toContain('predictor_errors_total{type="cache_write"} 1');
    });
});
