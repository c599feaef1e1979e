import { DateRange, toIsoDate } from '../entities/DateRange';
import { normalizeGateNames } from './GateFilter';

export const CACHE_KEY_PREFIX = 'border_data';

/**
 * Builds the cache key for a query. Filter order, duplicates, letter case and
 * the textual date format of the request do not affect the key.
 */
export function buildCacheKey(range: DateRange, gateNames?: readonly string[]): string {
    const base = `${CACHE_KEY_PREFIX}:${toIsoDate(range.start)}:${toIsoDate(range.end)}`;
    const names = normalizeGateNames(gateNames);

    if (names.length === 0) {
        return `${base}:all`;
    }
    return `${base}:only=${names.map(encodeURIComponent).join(',')}`;
}
