import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { isDateFormat } from '../domain/entities/DateRange';
import { BorderGateService } from '../application/BorderGateService';
import { IBorderPageFetcher } from '../domain/ports/IBorderPageFetcher';
import { IGateDataCache } from '../domain/ports/IGateDataCache';
import { InMemoryGateCache } from '../infrastructure/cache/InMemoryGateCache';
import { createRedisClient, RedisGateCache } from '../infrastructure/cache/RedisGateCache';
import { PrometheusMetricsAdapter } from '../infrastructure/metrics/PrometheusMetricsAdapter';
import { GateTableParser } from '../infrastructure/scraper/GateTableParser';
import { HttpBorderPageFetcher } from '../infrastructure/scraper/HttpBorderPageFetcher';
import { createBorderGateRoutes } from './routes/borderGateRoutes';
import { asyncHandler, errorHandler, NotFoundError } from './middleware/errorHandler';

export const API_VERSION = '2.0.0';

export interface AppDependencies {
    service: BorderGateService;
    cache: IGateDataCache;
    metrics: PrometheusMetricsAdapter | null;
    /** Releases connections held by the dependencies */
    dispose: () => Promise<void>;
}

/**
 * Overrides for tests and alternative wiring.
 */
export interface DependencyOverrides {
    fetcher?: IBorderPageFetcher;
    cache?: IGateDataCache;
    metrics?: PrometheusMetricsAdapter | null;
}

function createCache(config: Config): { cache: IGateDataCache; dispose: () => Promise<void> } {
    if (config.redisUrl) {
        console.log('🗄️  Using Redis gate cache');
        const redisCache = new RedisGateCache(createRedisClient(config.redisUrl), {
            ttlSeconds: config.cacheTtlSeconds,
        });
        return { cache: redisCache, dispose: () => redisCache.disconnect() };
    }
    return {
        cache: new InMemoryGateCache({ ttlSeconds: config.cacheTtlSeconds }),
        dispose: async () => undefined,
    };
}

function createFetcher(config: Config): HttpBorderPageFetcher {
    const dateFormat = config.upstreamDateFormat;
    if (!isDateFormat(dateFormat)) {
        throw new Error(`Unsupported UPSTREAM_DATE_FORMAT: ${dateFormat}`);
    }
    return new HttpBorderPageFetcher({
        baseUrl: config.borderSourceUrl,
        dateFormat,
        timeoutMs: config.fetchTimeoutSeconds * 1000,
        userAgent: config.scraperUserAgent,
    });
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config, overrides: DependencyOverrides = {}): AppDependencies {
    const fetcher = overrides.fetcher ?? createFetcher(config);

    const { cache, dispose } = overrides.cache
        ? { cache: overrides.cache, dispose: async () => undefined }
        : createCache(config);

    const metrics = overrides.metrics !== undefined
        ? overrides.metrics
        : config.metricsEnabled ? new PrometheusMetricsAdapter() : null;

    const service = new BorderGateService({
        fetcher,
        parser: new GateTableParser(),
        cache,
        metrics: metrics ?? undefined,
    });

    return { service, cache, metrics, dispose };
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, dependencies: AppDependencies = createDependencies(config)): Application {
    const app = express();
    const { service, metrics } = dependencies;

    // Middleware
    app.use(cors({
        origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
        methods: ['GET'],
    }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            service: 'Border Gates API',
            version: API_VERSION,
            timestamp: new Date().toISOString(),
        });
    });

    if (metrics) {
        app.get('/metrics', asyncHandler(async (req: Request, res: Response) => {
            res.setHeader('Content-Type', metrics.contentType);
            res.send(await metrics.getMetrics());
        }));
    }

    // Routes
    app.use(createBorderGateRoutes(service, {
        cacheTtlSeconds: config.cacheTtlSeconds,
        apiVersion: API_VERSION,
    }));

    app.use((req: Request) => {
        throw new NotFoundError(`Route not found: ${req.method} ${req.path}`, 'ROUTE_NOT_FOUND');
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}
