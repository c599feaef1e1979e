/**
 * Metrics Port Interface
 *
 * Defines the contract for observability and metrics collection.
 */

export interface MetricTags {
    [key: string]: string | number | boolean;
}

export interface IMetricsPort {
    /**
     * Increment a counter metric.
     * @param name - Metric name (e.g., 'border_gates.cache_hits')
     * @param tags - Optional tags for filtering/grouping
     * @param value - Increment amount (default: 1)
     */
    incrementCounter(name: string, tags?: MetricTags, value?: number): void;

    /**
     * Record a duration/timing metric in milliseconds.
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void;

    /**
     * Record a gauge metric (current value at a point in time).
     */
    recordGauge(name: string, value: number, tags?: MetricTags): void;

    /**
     * Start a timer and return a function to stop it.
     */
    startTimer(name: string, tags?: MetricTags): () => void;
}

/**
 * Standard metric names for the border gate pipeline.
 */
export const METRICS = {
    // Counters
    REQUESTS_TOTAL: 'border_gates.requests_total',
    CACHE_HITS: 'border_gates.cache_hits',
    CACHE_MISSES: 'border_gates.cache_misses',
    INFLIGHT_JOINS: 'border_gates.inflight_joins',
    UPSTREAM_FAILURES: 'border_gates.upstream_failures',

    // Durations
    UPSTREAM_FETCH_DURATION: 'border_gates.upstream_fetch_duration_ms',

    // Gauges
    CACHE_ENTRIES: 'border_gates.cache_entries',
} as const;
