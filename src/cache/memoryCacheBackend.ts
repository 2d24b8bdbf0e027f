import { CacheBackend, globToRegExp } from './cacheBackend';

interface MemoryEntry {
    value: string;
    expiresAt: number | null;
}

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * In-process backend used when no Redis URL is configured, and by the tests.
 * Entries expire lazily on access.
 */
export class MemoryCacheBackend implements CacheBackend {
    private readonly entries = new Map<string, MemoryEntry>();

    constructor(private readonly now: () => number = Date.now) {}

    get size(): number {
        return this.entries.size;
    }

    private read(key: string): MemoryEntry | undefined {
        const entry = this.entries.get(key);
        if (entry && entry.expiresAt !== null && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    async get(key: string): Promise<string | null> {
        return this.read(key)?.value ?? null;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.entries.set(key, {
            value,
            expiresAt: ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null,
        });
    }

    async del(keys: string[]): Promise<number> {
        let removed = 0;
        for (const key of keys) {
            if (this.read(key) !== undefined) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    async exists(key: string): Promise<boolean> {
        return this.read(key) !== undefined;
    }

    async incrBy(key: string, amount: number): Promise<number> {
        const entry = this.read(key);
        if (entry && !INTEGER_PATTERN.test(entry.value)) {
            throw new Error('ERR value is not an integer or out of range');
        }
        const next = (entry ? parseInt(entry.value, 10) : 0) + amount;
        this.entries.set(key, { value: String(next), expiresAt: entry ? entry.expiresAt : null });
        return next;
    }

    async expire(key: string, ttlSeconds: number): Promise<boolean> {
        const entry = this.read(key);
        if (!entry) return false;
        entry.expiresAt = this.now() + ttlSeconds * 1000;
        return true;
    }

    async keys(pattern: string): Promise<string[]> {
        const matcher = globToRegExp(pattern);
        return Array.from(this.entries.keys()).filter(key => matcher.test(key) && this.read(key) !== undefined);
    }

    async ping(): Promise<void> {}

    async quit(): Promise<void> {
        this.entries.clear();
    }
}
