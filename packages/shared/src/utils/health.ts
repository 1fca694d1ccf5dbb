/**
 * Health Check Handlers
 *
 * Standard /healthz (liveness) and /readyz (readiness) endpoints.
 * Framework-agnostic implementation.
 */

export interface HealthCheck {
    name: string;
    check: () => Promise<boolean>;
}

export interface CheckResult {
    name: string;
    status: 'pass' | 'fail';
    latency_ms: number;
}

export interface HealthStatus {
    status: 'healthy' | 'degraded' | 'unhealthy';
    version: string;
    uptime: number;
    checks: CheckResult[];
    timestamp: string;
}

export interface LivenessStatus {
    status: 'healthy';
    version: string;
    uptime: number;
    timestamp: string;
}

export interface HealthResponse<B> {
    status: 200 | 503;
    body: B;
}

async function runCheck({ name, check }: HealthCheck): Promise<CheckResult> {
    const checkStart = performance.now();
    let passed = false;
    try {
        passed = await check();
    } catch {
        passed = false;
    }
    return {
        name,
        status: passed ? 'pass' : 'fail',
        latency_ms: Math.round(performance.now() - checkStart),
    };
}

/**
 * Create health check functions
 */
export function createHealthChecks(
    version: string,
    checks: HealthCheck[] = []
) {
    const startTime = Date.now();
    const uptime = () => (Date.now() - startTime) / 1000;

    async function runAll(): Promise<CheckResult[]> {
        const results: CheckResult[] = [];
        for (const check of checks) {
            results.push(await runCheck(check));
        }
        return results;
    }

    return {
        /**
         * Liveness probe: /healthz
         * Returns 200 if the service is running (even if dependencies are down)
         */
        async healthz(): Promise<HealthResponse<LivenessStatus>> {
            return {
                status: 200,
                body: {
                    status: 'healthy',
                    version,
                    uptime: uptime(),
                    timestamp: new Date().toISOString(),
                },
            };
        },

        /**
         * Readiness probe: /readyz
         * Returns 200 only if all dependencies are available
         */
        async readyz(): Promise<HealthResponse<HealthStatus>> {
            const results = await runAll();
            const allPassing = results.every(r => r.status === 'pass');

            return {
                status: allPassing ? 200 : 503,
                body: {
                    status: allPassing ? 'healthy' : 'unhealthy',
                    version,
                    uptime: uptime(),
                    checks: results,
                    timestamp: new Date().toISOString(),
                },
            };
        },

        /**
         * Combined health endpoint: /health
         * Detailed status for monitoring dashboards
         */
        async health(): Promise<HealthResponse<HealthStatus>> {
            const results = await runAll();
            const failCount = results.filter(r => r.status === 'fail').length;

            return {
                status: failCount === 0 ? 200 : 503,
                body: {
                    status: failCount === 0 ? 'healthy' : failCount < checks.length ? 'degraded' : 'unhealthy',
                    version,
                    uptime: uptime(),
                    checks: results,
                    timestamp: new Date().toISOString(),
                },
            };
        },
    };
}

export type HealthChecks = ReturnType<typeof createHealthChecks>;
