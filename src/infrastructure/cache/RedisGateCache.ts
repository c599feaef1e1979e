import Redis from 'ioredis';
import { DataMatrix, freezeMatrix, isDataMatrix } from '../../domain/entities/BorderGate';
import { CacheStats, DEFAULT_CACHE_TTL_SECONDS, IGateDataCache } from '../../domain/ports/IGateDataCache';

/**
 * The subset of the ioredis client this cache talks to.
 */
export interface RedisCacheClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
    del(...keys: string[]): Promise<number>;
    scan(cursor: string, matchToken: 'MATCH', pattern: string, countToken: 'COUNT', count: number): Promise<[string, string[]]>;
    strlen(key: string): Promise<number>;
    quit(): Promise<unknown>;
}

const SCAN_BATCH_SIZE = 100;

/**
 * Creates an ioredis client with bounded reconnect backoff.
 */
export function createRedisClient(redisUrl: string): Redis {
    const client = new Redis(redisUrl, {
        retryStrategy: (times) => Math.min(times * 50, 2000),
        maxRetriesPerRequest: 3,
    });

    client.on('error', (err) => {
        console.error('[GateCache] Redis connection error:', err);
    });

    return client;
}

/**
 * Redis Gate Cache
 *
 * Shares cached matrices between processes. Expiry is delegated to Redis
 * (SET ... EX). Read and write failures are logged and reported as a miss.
 */
export class RedisGateCache implements IGateDataCache {
    private readonly ttlSeconds: number;
    private readonly keyPrefix: string;

    constructor(
        private readonly client: RedisCacheClient,
        options?: { ttlSeconds?: number; keyPrefix?: string }
    ) {
        this.ttlSeconds = options?.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
        this.keyPrefix = options?.keyPrefix ?? 'border-gates:';
    }

    async get(key: string): Promise<DataMatrix | null> {
        let data: string | null;
        try {
            data = await this.client.get(this.keyPrefix + key);
        } catch (error) {
            console.error(`[GateCache] Redis get failed [${key}]:`, error);
            return null;
        }
        if (data === null) {
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(data);
        } catch (error) {
            console.warn(`[GateCache] Discarding unparsable entry [${key}]:`, error);
            return null;
        }
        if (!isDataMatrix(parsed)) {
            console.warn(`[GateCache] Discarding malformed entry [${key}]`);
            return null;
        }

        console.log(`[GateCache] Hit for key: ${key}`);
        return freezeMatrix(parsed);
    }

    async set(key: string, matrix: DataMatrix): Promise<void> {
        try {
            await this.client.set(this.keyPrefix + key, JSON.stringify(matrix), 'EX', this.ttlSeconds);
            console.log(`[GateCache] Stored ${matrix.length} rows for key: ${key}`);
        } catch (error) {
            console.error(`[GateCache] Redis set failed [${key}]:`, error);
        }
    }

    async delete(key: string): Promise<void> {
        await this.client.del(this.keyPrefix + key);
    }

    async clear(): Promise<void> {
        const keys: string[] = [];
        for await (const batch of this.scanOwnKeys()) {
            keys.push(...batch);
        }
        for (let i = 0; i < keys.length; i += SCAN_BATCH_SIZE) {
            await this.client.del(...keys.slice(i, i + SCAN_BATCH_SIZE));
        }
    }

    /**
     * Walks the prefix with SCAN, one STRLEN batch at a time. An unreachable
     * Redis reports an empty cache.
     */
    async stats(): Promise<CacheStats> {
        let activeEntries = 0;
        let bytes = 0;
        try {
            for await (const batch of this.scanOwnKeys()) {
                const lengths = await Promise.all(batch.map((key) => this.client.strlen(key)));
                activeEntries += batch.length;
                bytes += lengths.reduce((sum, length) => sum + length, 0);
            }
        } catch (error) {
            console.error('[GateCache] Redis stats failed:', error);
            return { activeEntries: 0, ttlSeconds: this.ttlSeconds, approximateSizeMb: 0 };
        }

        return {
            activeEntries,
            ttlSeconds: this.ttlSeconds,
            approximateSizeMb: bytes / (1024 * 1024),
        };
    }

    /**
     * Gracefully close the Redis connection.
     */
    async disconnect(): Promise<void> {
        await this.client.quit();
    }

    private async *scanOwnKeys(): AsyncGenerator<string[]> {
        let cursor = '0';
        do {
            const [next, keys] = await this.client.scan(cursor, 'MATCH', `${this.keyPrefix}*`, 'COUNT', SCAN_BATCH_SIZE);
            cursor = next;
            yield keys;
        } while (cursor !== '0');
    }
}
