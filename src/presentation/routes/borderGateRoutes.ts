import { Router, Request, Response } from 'express';
import { BorderGateService } from '../../application/BorderGateService';
import { CalendarDate, compareCalendarDates, parseCalendarDate } from '../../domain/entities/DateRange';
import { CacheStats } from '../../domain/ports/IGateDataCache';
import { asyncHandler, BadRequestError, NotFoundError } from '../middleware/errorHandler';

export interface BorderGateRouteOptions {
    cacheTtlSeconds: number;
    apiVersion: string;
}

function readQueryString(value: unknown): string | undefined {
    if (typeof value === 'string') {
        return value;
    }
    if (Array.isArray(value)) {
        const first: unknown = value[0];
        return typeof first === 'string' ? first : undefined;
    }
    return undefined;
}

function readQueryList(value: unknown): string[] {
    const values: unknown[] = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
    return values
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

function parseDateParam(raw: string | undefined, label: string, code: string): CalendarDate {
    if (raw === undefined || raw.trim() === '') {
        throw new BadRequestError(`Missing ${label}. Use DD-MM-YYYY format.`, code, 'Expected format: DD-MM-YYYY');
    }
    const date = parseCalendarDate(raw);
    if (!date) {
        throw new BadRequestError(
            `Invalid ${label} format. Use DD-MM-YYYY format.`,
            code,
            `Received: ${raw}, Expected format: DD-MM-YYYY`
        );
    }
    return date;
}

function statsBody(stats: CacheStats) {
    return {
        active_entries: stats.activeEntries,
        timeout_seconds: stats.ttlSeconds,
        cache_size_mb: stats.approximateSizeMb,
    };
}

/**
 * Creates border gate routes with dependency injection.
 */
export function createBorderGateRoutes(service: BorderGateService, options: BorderGateRouteOptions): Router {
    const router = Router();

    /**
     * GET /border-gates?start_date=DD-MM-YYYY&end_date=DD-MM-YYYY&gates=...
     *
     * Returns traffic density rows for the range, optionally limited to the
     * named gates (case-insensitive, `gates` may repeat).
     */
    router.get(
        '/border-gates',
        asyncHandler(async (req: Request, res: Response) => {
            const startRaw = readQueryString(req.query.start_date);
            const endRaw = readQueryString(req.query.end_date);
            const start = parseDateParam(startRaw, 'start date', 'INVALID_START_DATE');
            const end = parseDateParam(endRaw, 'end date', 'INVALID_END_DATE');

            if (compareCalendarDates(start, end) > 0) {
                throw new BadRequestError(
                    'Start date must be before or equal to end date',
                    'INVALID_DATE_RANGE',
                    `Start: ${startRaw}, End: ${endRaw}`
                );
            }

            const gateNames = readQueryList(req.query.gates);
            const result = await service.getBorderGates({ range: { start, end }, gateNames });

            if (gateNames.length > 0 && result.gates.length === 0) {
                throw new NotFoundError(
                    'No border gates matched the requested names',
                    'NO_MATCHING_GATES',
                    `Gates: ${gateNames.join(', ')}`
                );
            }

            const stats = await service.cacheStats();
            res.json({
                success: true,
                source: result.source,
                total_gates: result.gates.length,
                date_range: { start_date: startRaw, end_date: endRaw },
                data: result.gates,
                metadata: {
                    cache_duration: `${options.cacheTtlSeconds} seconds`,
                    api_version: options.apiVersion,
                    filtered_gates: gateNames,
                    data_freshness: result.source,
                    ...statsBody(stats),
                },
            });
        })
    );

    /**
     * GET /cache/stats
     *
     * Cache statistics for monitoring.
     */
    router.get(
        '/cache/stats',
        asyncHandler(async (_req: Request, res: Response) => {
            const stats = await service.cacheStats();
            res.json({
                cache_statistics: statsBody(stats),
                timestamp: new Date().toISOString(),
                cache_timeout_seconds: options.cacheTtlSeconds,
            });
        })
    );

    return router;
}
