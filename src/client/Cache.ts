/**
 * Cache Utility
 * Process-lifetime in-memory cache with per-entry TTL, prefix clearing,
 * expiry sweeping and observability counters.
 *
 * Entry maps are only touched synchronously, so each read or write is atomic
 * with respect to other async callers. `getOrFetch` awaits the fetch with no
 * cache state held; two concurrent misses on one key may both fetch.
 */

import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger, type Logger } from '../utils/logger.js';

interface CacheEntry<T> {
    value: T;
    expiresAt: number;
}

export interface CacheOptions {
    /** Default TTL in seconds for entries stored without one */
    defaultTtlSeconds?: number;
    clock?: Clock;
    logger?: Logger;
}

export interface CacheStats {
    /** Number of entries currently stored, expired ones included */
    size: number;
    /** Total cache hits (key found and not expired) */
    hits: number;
    /** Total cache misses (key not found or expired) */
    misses: number;
    /** Entries removed by the expiry sweep */
    evictions: number;
    /** Hit rate as a fraction (0–1), or 0 if no lookups */
    hitRate: number;
}

export interface CacheInfo {
    totalEntries: number;
    /** Stored entries whose TTL has passed but which have not been swept yet */
    expiredEntries: number;
    /** Entry count per key category (text before the first underscore) */
    categories: Record<string, number>;
    keys: string[];
    /** Whole seconds left for every live entry */
    expiresIn: Record<string, number>;
}

export class Cache {
    private readonly entries = new Map<string, CacheEntry<unknown>>();
    private readonly defaultTtlSeconds: number;
    private readonly clock: Clock;
    private readonly logger: Logger;
    private _hits = 0;
    private _misses = 0;
    private _evictions = 0;

    constructor(options: CacheOptions = {}) {
        this.defaultTtlSeconds = options.defaultTtlSeconds ?? 3600;
        this.clock = options.clock ?? systemClock;
        this.logger = options.logger ?? createLogger('cache');
    }

    /**
     * Returns the stored value while it is live, otherwise null.
     * Expired entries stay in the map until `sweepExpired` runs.
     */
    get<T>(key: string): T | null {
        const entry = this.entries.get(key) as CacheEntry<T> | undefined;
        if (!entry || this.clock.now() >= entry.expiresAt) {
            this._misses++;
            return null;
        }
        this._hits++;
        return entry.value;
    }

    has(key: string): boolean {
        const entry = this.entries.get(key);
        return !!entry && this.clock.now() < entry.expiresAt;
    }

    store<T>(key: string, value: T, ttlSeconds?: number): void {
        const ttl = ttlSeconds ?? this.defaultTtlSeconds;
        this.entries.set(key, {
            value,
            expiresAt: this.clock.now() + ttl * 1000,
        });
        this.logger.debug(`Stored ${key} (ttl ${ttl}s)`);
    }

    /**
     * Read-through lookup. A null or undefined fetch result is returned as
     * null and never cached, so the next call fetches again.
     */
    async getOrFetch<T>(
        key: string,
        fetch: () => Promise<T | null | undefined>,
        ttlSeconds?: number,
    ): Promise<T | null> {
        const cached = this.get<T>(key);
        if (cached !== null) {
            this.logger.debug(`Cache hit: ${key}`);
            return cached;
        }

        const value = await fetch();
        if (value === null || value === undefined) return null;

        this.store(key, value, ttlSeconds);
        return value;
    }

    /**
     * Clear everything (no key), one exact key, or every key starting with a
     * prefix (`"channel_cz_*"`). Returns the number of removed entries.
     */
    clear(key?: string): number {
        if (key === undefined) {
            const count = this.entries.size;
            this.entries.clear();
            this.logger.info(`Cleared all ${count} cache entries`);
            return count;
        }

        if (this.entries.delete(key)) {
            this.logger.debug(`Cleared cache entry ${key}`);
            return 1;
        }

        if (key.endsWith('*')) {
            const prefix = key.slice(0, -1);
            let removed = 0;
            for (const k of [...this.entries.keys()]) {
                if (k.startsWith(prefix)) {
                    this.entries.delete(k);
                    removed++;
                }
            }
            this.logger.debug(`Cleared ${removed} cache entries with prefix ${prefix}`);
            return removed;
        }

        return 0;
    }

    /** Physically removes expired entries and returns how many were dropped */
    sweepExpired(): number {
        const now = this.clock.now();
        let removed = 0;
        for (const [key, entry] of [...this.entries.entries()]) {
            if (now >= entry.expiresAt) {
                this.entries.delete(key);
                removed++;
            }
        }
        this._evictions += removed;
        if (removed > 0) {
            this.logger.debug(`Swept ${removed} expired cache entries`);
        }
        return removed;
    }

    /**
     * Run `sweepExpired` every `intervalSeconds` on a timer that does not keep
     * the process alive. Returns a function that stops the sweeper.
     */
    startSweeper(intervalSeconds: number = 300): () => void {
        const timer = setInterval(() => this.sweepExpired(), intervalSeconds * 1000);
        timer.unref();
        return () => clearInterval(timer);
    }

    info(): CacheInfo {
        const now = this.clock.now();
        const categories: Record<string, number> = {};
        const expiresIn: Record<string, number> = {};
        let expiredEntries = 0;

        for (const [key, entry] of this.entries) {
            const category = key.includes('_') ? key.split('_')[0] : 'other';
            categories[category] = (categories[category] ?? 0) + 1;

            const remainingMs = entry.expiresAt - now;
            if (remainingMs > 0) {
                expiresIn[key] = Math.floor(remainingMs / 1000);
            } else {
                expiredEntries++;
            }
        }

        return {
            totalEntries: this.entries.size,
            expiredEntries,
            categories,
            keys: [...this.entries.keys()],
            expiresIn,
        };
    }

    /** Returns current cache statistics */
    stats(): CacheStats {
        const total = this._hits + this._misses;
        return {
            size: this.entries.size,
            hits: this._hits,
            misses: this._misses,
            evictions: this._evictions,
            hitRate: total > 0 ? this._hits / total : 0,
        };
    }
}
