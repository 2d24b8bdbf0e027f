import neo4j from 'neo4j-driver';
import { CacheBackend } from './cacheBackend';
import { Logger } from '../utils/logger';

export interface CacheManagerOptions {
    /** Namespace prepended to every key, e.g. `constitution`. */
    prefix: string;
    logger: Logger;
}

/**
 * Opaque identifiers that JSON has no type for (bigint, neo4j Integer) are
 * written as strings. Reads return plain JSON; nothing is revived.
 */
function jsonReplacer(_key: string, value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (neo4j.isInt(value)) return value.toString();
    return value;
}

/**
 * JSON cache over a {@link CacheBackend}. No method throws: a backend failure
 * is logged and reported as a miss (`undefined`), `false` or `0`.
 */
export class CacheManager {
    private readonly prefix: string;
    private readonly logger: Logger;

    constructor(private readonly backend: CacheBackend, options: CacheManagerOptions) {
        this.prefix = options.prefix;
        this.logger = options.logger;
    }

    private prefixed(key: string): string {
        return `${this.prefix}:${key}`;
    }

    private degraded(operation: string, key: string, error: unknown): void {
        this.logger.warn({ err: error, key, operation, kind: 'CacheUnavailable' }, `Cache ${operation} failed`);
    }

    async get(key: string): Promise<unknown | undefined> {
        try {
            const raw = await this.backend.get(this.prefixed(key));
            if (raw === null) return undefined;
            return JSON.parse(raw);
        } catch (error) {
            this.degraded('get', key, error);
            return undefined;
        }
    }

    async set(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
        try {
            const serialized = JSON.stringify(value, jsonReplacer);
            if (serialized === undefined) {
                this.logger.warn({ key }, 'Refusing to cache a value with no JSON representation');
                return false;
            }
            await this.backend.set(this.prefixed(key), serialized, ttlSeconds);
            return true;
        } catch (error) {
            this.degraded('set', key, error);
            return false;
        }
    }

    async delete(key: string): Promise<boolean> {
        try {
            return (await this.backend.del([this.prefixed(key)])) > 0;
        } catch (error) {
            this.degraded('delete', key, error);
            return false;
        }
    }

    async exists(key: string): Promise<boolean> {
        try {
            return await this.backend.exists(this.prefixed(key));
        } catch (error) {
            this.degraded('exists', key, error);
            return false;
        }
    }

    /**
     * Adds `amount` to an integer counter. With `ttlSeconds`, a counter this
     * call created gets that TTL; later increments leave it alone.
     */
    async increment(key: string, amount: number = 1, ttlSeconds?: number): Promise<number> {
        try {
            const value = await this.backend.incrBy(this.prefixed(key), amount);
            if (ttlSeconds !== undefined && ttlSeconds > 0 && value === amount) {
                await this.backend.expire(this.prefixed(key), ttlSeconds);
            }
            return value;
        } catch (error) {
            this.degraded('increment', key, error);
            return 0;
        }
    }

    /** Deletes every key under the namespace matching `pattern`; returns how many went. */
    async clearPattern(pattern: string): Promise<number> {
        try {
            const keys = await this.backend.keys(this.prefixed(pattern));
            if (keys.length === 0) return 0;
            const removed = await this.backend.del(keys);
            this.logger.debug({ pattern, removed }, 'Cleared cache entries');
            return removed;
        } catch (error) {
            this.degraded('clearPattern', pattern, error);
            return 0;
        }
    }

    async healthCheck(): Promise<boolean> {
        const probeKey = 'health_check';
        const stored = await this.set(probeKey, { timestamp: new Date().toISOString() }, 10);
        if (!stored) return false;
        const probe = await this.get(probeKey);
        await this.delete(probeKey);
        return probe !== undefined;
    }

    async close(): Promise<void> {
        try {
            await this.backend.quit();
        } catch (error) {
            this.logger.warn({ err: error }, 'Error while closing the cache backend');
        }
    }
}
