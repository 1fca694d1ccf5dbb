/**
 * Prometheus Metrics Helpers
 * In-process counters, gauges and histograms rendered in the text exposition format
 */

// ============================================
// Metric Types
// ============================================

type Labels = Record<string, string>;

interface ValueMetric {
    type: 'counter' | 'gauge';
    name: string;
    help: string;
    values: Map<string, number>;
}

interface HistogramObservation {
    count: number;
    sum: number;
    /** Cumulative: buckets[i] counts observations <= le[i] */
    buckets: number[];
}

interface HistogramMetric {
    type: 'histogram';
    name: string;
    help: string;
    buckets: number[];
    observations: Map<string, HistogramObservation>;
}

type Metric = ValueMetric | HistogramMetric;

function labelsToString(labels: Labels): string {
    return Object.entries(labels)
        .map(([k, v]) => `${k}="${v}"`)
        .join(',');
}

// ============================================
// Registry
// ============================================

export class MetricsRegistry {
    private metrics: Map<string, Metric> = new Map();

    createCounter(name: string, help: string): Counter {
        const metric: ValueMetric = { type: 'counter', name, help, values: new Map() };
        this.metrics.set(name, metric);
        return new Counter(metric);
    }

    createGauge(name: string, help: string): Gauge {
        const metric: ValueMetric = { type: 'gauge', name, help, values: new Map() };
        this.metrics.set(name, metric);
        return new Gauge(metric);
    }

    createHistogram(
        name: string,
        help: string,
        buckets: number[] = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000]
    ): Histogram {
        const metric: HistogramMetric = {
            type: 'histogram',
            name,
            help,
            buckets,
            observations: new Map(),
        };
        this.metrics.set(name, metric);
        return new Histogram(metric);
    }

    // Output Prometheus format
    getMetrics(): string {
        const lines: string[] = [];

        for (const metric of this.metrics.values()) {
            lines.push(`# HELP ${metric.name} ${metric.help}`);
            lines.push(`# TYPE ${metric.name} ${metric.type}`);

            if (metric.type === 'histogram') {
                for (const [labelStr, obs] of metric.observations) {
                    const labelPrefix = labelStr ? `${labelStr},` : '';
                    const labels = labelStr ? `{${labelStr}}` : '';
                    metric.buckets.forEach((le, i) => {
                        lines.push(`${metric.name}_bucket{${labelPrefix}le="${le}"} ${obs.buckets[i] ?? 0}`);
                    });
                    lines.push(`${metric.name}_bucket{${labelPrefix}le="+Inf"} ${obs.count}`);
                    lines.push(`${metric.name}_sum${labels} ${obs.sum}`);
                    lines.push(`${metric.name}_count${labels} ${obs.count}`);
                }
            } else {
                for (const [labelStr, value] of metric.values) {
                    const labels = labelStr ? `{${labelStr}}` : '';
                    lines.push(`${metric.name}${labels} ${value}`);
                }
            }

            lines.push('');
        }

        return lines.join('\n');
    }

    // Reset all metrics (for testing)
    reset(): void {
        for (const metric of this.metrics.values()) {
            if (metric.type === 'histogram') {
                metric.observations.clear();
            } else {
                metric.values.clear();
            }
        }
    }
}

// ============================================
// Metric Classes
// ============================================

export class Counter {
    constructor(private metric: ValueMetric) { }

    inc(labels: Labels = {}, value = 1): void {
        const key = labelsToString(labels);
        this.metric.values.set(key, (this.metric.values.get(key) ?? 0) + value);
    }
}

export class Gauge {
    constructor(private metric: ValueMetric) { }

    set(value: number, labels: Labels = {}): void {
        this.metric.values.set(labelsToString(labels), value);
    }
}

export class Histogram {
    constructor(private metric: HistogramMetric) { }

    observe(value: number, labels: Labels = {}): void {
        const key = labelsToString(labels);

        let obs = this.metric.observations.get(key);
        if (!obs) {
            obs = { count: 0, sum: 0, buckets: this.metric.buckets.map(() => 0) };
            this.metric.observations.set(key, obs);
        }

        obs.count++;
        obs.sum += value;

        this.metric.buckets.forEach((le, i) => {
            if (value <= le && obs) {
                obs.buckets[i] = (obs.buckets[i] ?? 0) + 1;
            }
        });
    }

    // Timer helper
    startTimer(labels: Labels = {}): () => number {
        const start = performance.now();
        return () => {
            const duration = performance.now() - start;
            this.observe(duration, labels);
            return duration;
        };
    }
}

// ============================================
// Service Metrics Factory
// ============================================

export function createServiceMetrics(serviceName: string, registry = new MetricsRegistry()) {
    const prefix = serviceName.replace(/-/g, '_');

    return {
        registry,
        requests: registry.createCounter(
            `${prefix}_requests_total`,
            'Total number of requests'
        ),
        requestLatency: registry.createHistogram(
            `${prefix}_request_latency_ms`,
            'Request latency in milliseconds'
        ),
        errors: registry.createCounter(
            `${prefix}_errors_total`,
            'Total number of errors'
        ),
    };
}

export type ServiceMetrics = ReturnType<typeof createServiceMetrics>;
