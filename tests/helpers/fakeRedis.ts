import { RedisCacheClient } from '../../src/infrastructure/cache/RedisGateCache';

/**
 * In-process stand-in for the Redis commands the gate cache uses.
 * SCAN hands out `pageSize` keys per call so cursors get exercised.
 */
export class FakeRedis implements RedisCacheClient {
    readonly store = new Map<string, string>();
    readonly expirations = new Map<string, number>();
    readonly scanCalls: string[] = [];
    failing = false;

    constructor(private readonly pageSize: number = 2) { }

    async get(key: string): Promise<string | null> {
        this.assertConnected();
        return this.store.get(key) ?? null;
    }

    async set(key: string, value: string, _token: 'EX', seconds: number): Promise<'OK'> {
        this.assertConnected();
        this.store.set(key, value);
        this.expirations.set(key, seconds);
        return 'OK';
    }

    async del(...keys: string[]): Promise<number> {
        this.assertConnected();
        let removed = 0;
        for (const key of keys) {
            if (this.store.delete(key)) removed++;
        }
        return removed;
    }

    async scan(cursor: string, _match: 'MATCH', pattern: string, _count: 'COUNT', _size: number): Promise<[string, string[]]> {
        this.assertConnected();
        this.scanCalls.push(cursor);
        const prefix = pattern.replace(/\*$/, '');
        const matching = [...this.store.keys()].filter((key) => key.startsWith(prefix)).sort();
        const start = Number(cursor);
        const end = start + this.pageSize;
        return [end >= matching.length ? '0' : String(end), matching.slice(start, end)];
    }

    async strlen(key: string): Promise<number> {
        this.assertConnected();
        return this.store.get(key)?.length ?? 0;
    }

    async quit(): Promise<'OK'> {
        return 'OK';
    }

    private assertConnected(): void {
        if (this.failing) throw new Error('connection lost');
    }
}
