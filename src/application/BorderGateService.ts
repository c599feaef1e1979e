import { DataMatrix, DataSource } from '../domain/entities/BorderGate';
import { DateRange, isValidRange, toIsoDate } from '../domain/entities/DateRange';
import { BorderDataError, InternalError, InvalidDateRangeError } from '../domain/errors/BorderDataErrors';
import { IBorderPageFetcher } from '../domain/ports/IBorderPageFetcher';
import { CacheStats, IGateDataCache } from '../domain/ports/IGateDataCache';
import { IGateTableParser } from '../domain/ports/IGateTableParser';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { buildCacheKey } from '../domain/services/CacheKey';
import { filterGates } from '../domain/services/GateFilter';

export interface BorderGateQuery {
    range: DateRange;
    /** Possibly empty; matched case-insensitively against the gate name column */
    gateNames: readonly string[];
}

export interface BorderGateResult {
    source: DataSource;
    gates: DataMatrix;
    cacheKey: string;
}

export interface BorderGateServiceDependencies {
    fetcher: IBorderPageFetcher;
    parser: IGateTableParser;
    cache: IGateDataCache;
    metrics?: IMetricsPort;
}

/**
 * Runs the fetch → parse → filter → cache pipeline.
 *
 * Concurrent misses for the same key share one upstream request. Failures
 * are never cached and never answered with an expired entry.
 */
export class BorderGateService {
    private readonly inFlight = new Map<string, Promise<DataMatrix>>();

    constructor(private readonly deps: BorderGateServiceDependencies) { }

    async getBorderGates(query: BorderGateQuery): Promise<BorderGateResult> {
        const { range, gateNames } = query;
        if (!isValidRange(range)) {
            throw new InvalidDateRangeError(range);
        }

        const cacheKey = buildCacheKey(range, gateNames);
        this.deps.metrics?.incrementCounter(METRICS.REQUESTS_TOTAL);

        const cached = await this.deps.cache.get(cacheKey);
        if (cached !== null) {
            this.deps.metrics?.incrementCounter(METRICS.CACHE_HITS);
            return { source: 'cache', gates: cached, cacheKey };
        }
        this.deps.metrics?.incrementCounter(METRICS.CACHE_MISSES);

        // Checked and registered without an intervening await
        let pending = this.inFlight.get(cacheKey);
        if (pending) {
            this.deps.metrics?.incrementCounter(METRICS.INFLIGHT_JOINS);
            console.log(`[BorderGateService] Joining in-flight load for key: ${cacheKey}`);
        } else {
            pending = this.loadLive(cacheKey, query).finally(() => {
                this.inFlight.delete(cacheKey);
            });
            this.inFlight.set(cacheKey, pending);
        }

        const gates = await pending;
        return { source: 'live', gates, cacheKey };
    }

    cacheStats(): Promise<CacheStats> {
        return this.deps.cache.stats();
    }

    /**
     * Number of distinct keys currently being fetched.
     */
    inFlightCount(): number {
        return this.inFlight.size;
    }

    private async loadLive(cacheKey: string, query: BorderGateQuery): Promise<DataMatrix> {
        const { range, gateNames } = query;
        console.log(
            `[BorderGateService] Fetching live data for ${toIsoDate(range.start)}..${toIsoDate(range.end)}`
        );

        const html = await this.fetchPage(range);

        let matrix: DataMatrix;
        try {
            matrix = this.deps.parser.parse(html);
        } catch (error) {
            if (error instanceof BorderDataError) {
                console.warn(`[BorderGateService] ${error.code}: ${error.message}`);
                throw error;
            }
            console.error('[BorderGateService] Unexpected parser failure:', error);
            throw new InternalError(error);
        }

        const filtered = filterGates(matrix, gateNames);
        await this.deps.cache.set(cacheKey, filtered);
        await this.reportCacheSize();

        return filtered;
    }

    private async fetchPage(range: DateRange): Promise<string> {
        const stopTimer = this.deps.metrics?.startTimer(METRICS.UPSTREAM_FETCH_DURATION);
        try {
            return await this.deps.fetcher.fetchPage(range);
        } catch (error) {
            if (error instanceof BorderDataError) {
                this.deps.metrics?.incrementCounter(METRICS.UPSTREAM_FAILURES, { code: error.code });
                throw error;
            }
            console.error('[BorderGateService] Unexpected fetch failure:', error);
            this.deps.metrics?.incrementCounter(METRICS.UPSTREAM_FAILURES, { code: 'INTERNAL_ERROR' });
            throw new InternalError(error);
        } finally {
            stopTimer?.();
        }
    }

    private async reportCacheSize(): Promise<void> {
        if (!this.deps.metrics) {
            return;
        }
        try {
            const stats = await this.deps.cache.stats();
            this.deps.metrics.recordGauge(METRICS.CACHE_ENTRIES, stats.activeEntries);
        } catch (error) {
            console.warn('[BorderGateService] Could not read cache stats for metrics:', error);
        }
    }
}
