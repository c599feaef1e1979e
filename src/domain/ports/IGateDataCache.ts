import { DataMatrix } from '../entities/BorderGate';

/**
 * Snapshot of cache state, for observability only.
 */
export interface CacheStats {
    activeEntries: number;
    ttlSeconds: number;
    /** JSON-serialized size of all entries, in MiB */
    approximateSizeMb: number;
}

/**
 * Cache Port Interface
 *
 * Time-bounded store for computed gate matrices. The TTL is fixed per
 * instance. Implementations: in-memory, Redis.
 */
export interface IGateDataCache {
    /**
     * @returns The cached matrix, or null if absent or expired
     */
    get(key: string): Promise<DataMatrix | null>;

    /**
     * Stores a matrix, overwriting any previous entry for the key.
     */
    set(key: string, matrix: DataMatrix): Promise<void>;

    delete(key: string): Promise<void>;

    /**
     * Removes every entry (use with caution).
     */
    clear(): Promise<void>;

    stats(): Promise<CacheStats>;
}

export const DEFAULT_CACHE_TTL_SECONDS = 3600;
