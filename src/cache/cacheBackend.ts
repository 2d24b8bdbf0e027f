/**
 * Minimal key-value contract the cache layer needs from its store: string
 * values with a TTL, atomic increment and glob-based key enumeration.
 * Implementations may throw; CacheManager turns every failure into a miss.
 */
export interface CacheBackend {
    get(key: string): Promise<string | null>;
    /** `ttlSeconds <= 0` stores the value without expiry. */
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    del(keys: string[]): Promise<number>;
    exists(key: string): Promise<boolean>;
    incrBy(key: string, amount: number): Promise<number>;
    /** Sets a TTL on an existing key; false when the key does not exist. */
    expire(key: string, ttlSeconds: number): Promise<boolean>;
    /** Redis glob syntax: `*`, `?`, `[abc]`, `[^a]`, `\` escapes. */
    keys(pattern: string): Promise<string[]>;
    ping(): Promise<void>;
    quit(): Promise<void>;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

export function globToRegExp(pattern: string): RegExp {
    let source = '';
    for (let i = 0; i < pattern.length; i++) {
        const char = pattern[i];
        if (char === '\\' && i + 1 < pattern.length) {
            i++;
            source += escapeRegExp(pattern[i]);
        } else if (char === '*') {
            source += '.*';
        } else if (char === '?') {
            source += '.';
        } else if (char === '[') {
            const close = pattern.indexOf(']', i + 1);
            if (close === -1) {
                source += '\\[';
                continue;
            }
            let body = pattern.slice(i + 1, close);
            let negate = '';
            if (body.startsWith('^')) {
                negate = '^';
                body = body.slice(1);
            }
            source += `[${negate}${body.replace(/[\\\]^]/g, '\\$&')}]`;
            i = close;
        } else {
            source += escapeRegExp(char);
        }
    }
    return new RegExp(`^${source}$`, 's');
}
