/**
 * In-Memory Gate Cache
 *
 * Process-local cache with a fixed TTL. Expired entries are removed lazily by
 * the lookup that finds them; there is no background sweep, so the store
 * holds every distinct key seen within the TTL.
 */

import { DataMatrix } from '../../domain/entities/BorderGate';
import { CacheStats, DEFAULT_CACHE_TTL_SECONDS, IGateDataCache } from '../../domain/ports/IGateDataCache';

interface CacheEntry {
    matrix: DataMatrix;
    insertedAt: number;
}

export interface InMemoryGateCacheOptions {
    ttlSeconds?: number;
    /** Clock in epoch milliseconds */
    now?: () => number;
}

export class InMemoryGateCache implements IGateDataCache {
    private readonly cache = new Map<string, CacheEntry>();
    private readonly ttlSeconds: number;
    private readonly now: () => number;

    constructor(options?: InMemoryGateCacheOptions) {
        this.ttlSeconds = options?.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
        this.now = options?.now ?? Date.now;
    }

    async get(key: string): Promise<DataMatrix | null> {
        const entry = this.cache.get(key);
        if (!entry) {
            return null;
        }

        if (this.now() - entry.insertedAt < this.ttlSeconds * 1000) {
            console.log(`[GateCache] Hit for key: ${key}`);
            return entry.matrix;
        }

        this.cache.delete(key);
        console.log(`[GateCache] Expired entry removed for key: ${key}`);
        return null;
    }

    async set(key: string, matrix: DataMatrix): Promise<void> {
        this.cache.set(key, { matrix, insertedAt: this.now() });
        console.log(`[GateCache] Stored ${matrix.length} rows for key: ${key}`);
    }

    async delete(key: string): Promise<void> {
        this.cache.delete(key);
    }

    async clear(): Promise<void> {
        this.cache.clear();
    }

    async stats(): Promise<CacheStats> {
        let bytes = 0;
        for (const { matrix } of this.cache.values()) {
            bytes += JSON.stringify(matrix).length;
        }

        return {
            activeEntries: this.cache.size,
            ttlSeconds: this.ttlSeconds,
            approximateSizeMb: bytes / (1024 * 1024),
        };
    }

    /**
     * Number of stored entries, expired ones included until looked up.
     */
    size(): number {
        return this.cache.size;
    }
}
