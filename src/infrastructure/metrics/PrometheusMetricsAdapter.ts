import { Registry, Counter, Histogram, Gauge, LabelValues, collectDefaultMetrics } from 'prom-client';
import { IMetricsPort, MetricTags } from '../../domain/ports/IMetricsPort';

export interface PrometheusMetricsOptions {
    /** Prefix for the default process metrics */
    prefix?: string;
    /** Register Node.js process metrics (default: true) */
    collectDefaults?: boolean;
}

// Upstream fetches are bounded by FETCH_TIMEOUT_SECONDS (30s by default)
const FETCH_DURATION_BUCKETS_MS = [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

/**
 * Exposes pipeline metrics through a private prom-client registry.
 *
 * Metrics are registered on first use. Label names are fixed by the tags of
 * that first call.
 */
export class PrometheusMetricsAdapter implements IMetricsPort {
    private readonly registry = new Registry();
    private readonly counters = new Map<string, Counter<string>>();
    private readonly histograms = new Map<string, Histogram<string>>();
    private readonly gauges = new Map<string, Gauge<string>>();

    constructor(options?: PrometheusMetricsOptions) {
        this.registry.setDefaultLabels({ app: 'border-gates-api' });

        if (options?.collectDefaults ?? true) {
            collectDefaultMetrics({ register: this.registry, prefix: options?.prefix ?? 'border_gates_' });
        }
    }

    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        const counter = this.lookup(this.counters, name, (config) => new Counter(config), tags);
        counter.inc(toLabels(tags), value);
    }

    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        const histogram = this.lookup(
            this.histograms,
            name,
            (config) => new Histogram({ ...config, buckets: FETCH_DURATION_BUCKETS_MS }),
            tags
        );
        histogram.observe(toLabels(tags), durationMs);
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        const gauge = this.lookup(this.gauges, name, (config) => new Gauge(config), tags);
        gauge.set(toLabels(tags), value);
    }

    startTimer(name: string, tags?: MetricTags): () => void {
        const startedAt = Date.now();
        return () => this.recordDuration(name, Date.now() - startedAt, tags);
    }

    async getMetrics(): Promise<string> {
        return this.registry.metrics();
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    private lookup<M>(
        store: Map<string, M>,
        name: string,
        create: (config: { name: string; help: string; labelNames: string[]; registers: Registry[] }) => M,
        tags?: MetricTags
    ): M {
        // Prometheus names may not contain dots
        const metricName = name.replace(/\./g, '_');
        let metric = store.get(metricName);
        if (!metric) {
            metric = create({
                name: metricName,
                help: name,
                labelNames: tags ? Object.keys(tags) : [],
                registers: [this.registry],
            });
            store.set(metricName, metric);
        }
        return metric;
    }
}

function toLabels(tags?: MetricTags): LabelValues<string> {
    const labels: LabelValues<string> = {};
    for (const [key, value] of Object.entries(tags ?? {})) {
        labels[key] = String(value);
    }
    return labels;
}
