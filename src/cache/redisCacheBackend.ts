import Redis from 'ioredis';
import { CacheBackend } from './cacheBackend';
import { Logger } from '../utils/logger';

const SCAN_BATCH_SIZE = 200;

export class RedisCacheBackend implements CacheBackend {
    private readonly client: Redis;

    constructor(url: string, private readonly logger: Logger) {
        // Commands fail immediately while Redis is unreachable.
        this.client = new Redis(url, {
            maxRetriesPerRequest: 1,
            enableOfflineQueue: false,
        });
        this.client.on('error', (error: Error) => {
            this.logger.warn({ err: error, kind: 'CacheUnavailable' }, 'Redis connection error');
        });
        this.client.on('ready', () => {
            this.logger.info('Redis cache backend connected.');
        });
    }

    async get(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        if (ttlSeconds > 0) {
            await this.client.set(key, value, 'EX', ttlSeconds);
        } else {
            await this.client.set(key, value);
        }
    }

    async del(keys: string[]): Promise<number> {
        if (keys.length === 0) return 0;
        return this.client.del(...keys);
    }

    async exists(key: string): Promise<boolean> {
        return (await this.client.exists(key)) > 0;
    }

    async incrBy(key: string, amount: number): Promise<number> {
        return this.client.incrby(key, amount);
    }

    async expire(key: string, ttlSeconds: number): Promise<boolean> {
        return (await this.client.expire(key, ttlSeconds)) === 1;
    }

    async keys(pattern: string): Promise<string[]> {
        const found = new Set<string>();
        let cursor = '0';
        do {
            const [next, batch] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_BATCH_SIZE);
            cursor = next;
            batch.forEach(key => found.add(key));
        } while (cursor !== '0');
        return Array.from(found);
    }

    async ping(): Promise<void> {
        await this.client.ping();
    }

    async quit(): Promise<void> {
        await this.client.quit();
        this.logger.info('Redis cache backend closed.');
    }
}
