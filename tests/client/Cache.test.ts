/**
 * Tests for Cache
 */
import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Cache } from '../../src/client/Cache.js';
import { ManualClock, recordingLogger } from '../helpers.js';

describe('Cache', () => {
    let clock: ManualClock;
    let cache: Cache;

    beforeEach(() => {
        clock = new ManualClock();
        cache = new Cache({ clock, logger: recordingLogger() });
    });

    it('should store and retrieve values', () => {
        cache.store('key1', { data: 'hello' }, 60);
        expect(cache.get('key1')).toEqual({ data: 'hello' });
        expect(cache.has('key1')).toBe(true);
    });

    it('should return null for missing keys', () => {
        expect(cache.get('nonexistent')).toBeNull();
        expect(cache.has('nonexistent')).toBe(false);
    });

    it('should expire entries exactly at the TTL', () => {
        cache.store('key1', 'value', 5);

        clock.advance(4999);
        expect(cache.get('key1')).toBe('value');

        clock.advance(1);
        expect(cache.get('key1')).toBeNull();
        expect(cache.has('key1')).toBe(false);
    });

    it('should use the default TTL when none is given', () => {
        const short = new Cache({ defaultTtlSeconds: 10, clock, logger: recordingLogger() });
        short.store('key', 'value');

        clock.advance(9_999);
        expect(short.get('key')).toBe('value');
        clock.advance(1);
        expect(short.get('key')).toBeNull();
    });

    it('should overwrite existing keys', () => {
        cache.store('key1', 'first', 60);
        cache.store('key1', 'second', 60);
        expect(cache.get('key1')).toBe('second');
    });

    describe('getOrFetch', () => {
        it('should fetch once and serve later calls from the cache', async () => {
            const fetch = vi.fn(async () => 'computed-value');

            expect(await cache.getOrFetch('key', fetch, 60)).toBe('computed-value');
            expect(await cache.getOrFetch('key', fetch, 60)).toBe('computed-value');
            expect(fetch).toHaveBeenCalledOnce();
        });

        it('should not cache a null result', async () => {
            const fetch = vi.fn(async (): Promise<string | null> => null);

            expect(await cache.getOrFetch('missing', fetch)).toBeNull();
            expect(await cache.getOrFetch('missing', fetch)).toBeNull();
            expect(fetch).toHaveBeenCalledTimes(2);
            expect(cache.info().totalEntries).toBe(0);
        });

        it('should not cache an undefined result', async () => {
            const fetch = vi.fn(async (): Promise<number | undefined> => undefined);

            await cache.getOrFetch('missing', fetch);
            await cache.getOrFetch('missing', fetch);
            expect(fetch).toHaveBeenCalledTimes(2);
        });

        it('should re-fetch a catch-up stream after its 600s TTL passes', async () => {
            const fetch = vi.fn(async () => ({ url: 'https://cdn.example/archive.m3u8' }));

            await cache.getOrFetch('catchup_stream_cz_12345_p5', fetch, 600);
            clock.advance(300_000);
            await cache.getOrFetch('catchup_stream_cz_12345_p5', fetch, 600);
            expect(fetch).toHaveBeenCalledOnce();

            clock.advance(301_000);
            await cache.getOrFetch('catchup_stream_cz_12345_p5', fetch, 600);
            expect(fetch).toHaveBeenCalledTimes(2);
        });

        it('should propagate fetch errors without storing anything', async () => {
            await expect(
                cache.getOrFetch('key', async () => {
                    throw new Error('upstream down');
                }),
            ).rejects.toThrow('upstream down');
            expect(cache.has('key')).toBe(false);
        });
    });

    describe('clear', () => {
        beforeEach(() => {
            cache.store('channel_cz_1', 'a', 60);
            cache.store('channel_cz_2', 'b', 60);
            cache.store('channel_sk_1', 'c', 60);
        });

        it('should remove only the keys matching a prefix pattern', () => {
            expect(cache.clear('channel_cz_*')).toBe(2);
            expect(cache.info().keys).toEqual(['channel_sk_1']);
        });

        it('should remove a single exact key', () => {
            expect(cache.clear('channel_cz_1')).toBe(1);
            expect(cache.info().keys).toEqual(['channel_cz_2', 'channel_sk_1']);
        });

        it('should report zero for an unknown exact key', () => {
            expect(cache.clear('channel_de_1')).toBe(0);
            expect(cache.info().totalEntries).toBe(3);
        });

        it('should clear everything without a key', () => {
            expect(cache.clear()).toBe(3);
            expect(cache.info().totalEntries).toBe(0);
        });
    });

    describe('sweepExpired', () => {
        it('should keep expired entries until swept and then drop them', () => {
            cache.store('short_a', 1, 10);
            cache.store('short_b', 2, 10);
            cache.store('long_a', 3, 100);
            clock.advance(10_000);

            expect(cache.info().totalEntries).toBe(3);
            expect(cache.info().expiredEntries).toBe(2);

            expect(cache.sweepExpired()).toBe(2);
            expect(cache.info().keys).toEqual(['long_a']);
            expect(cache.stats().evictions).toBe(2);
        });

        it('should run on a timer until stopped', () => {
            vi.useFakeTimers();
            try {
                const sweep = vi.spyOn(cache, 'sweepExpired');
                const stop = cache.startSweeper(5);

                vi.advanceTimersByTime(10_000);
                expect(sweep).toHaveBeenCalledTimes(2);

                stop();
                vi.advanceTimersByTime(10_000);
                expect(sweep).toHaveBeenCalledTimes(2);
            } finally {
                vi.useRealTimers();
            }
        });
    });

    describe('info', () => {
        it('should group keys by the text before the first underscore', () => {
            cache.store('channels_cz', [], 60);
            cache.store('stream_cz_1_p5', {}, 60);
            cache.store('stream_cz_2_p5', {}, 60);
            cache.store('plain', 1, 60);

            expect(cache.info().categories).toEqual({ channels: 1, stream: 2, other: 1 });
        });

        it('should report whole seconds left for live entries only', () => {
            cache.store('a_key', 1, 60);
            cache.store('b_key', 2, 5);
            clock.advance(5_500);

            const info = cache.info();
            expect(info.expiresIn).toEqual({ a_key: 54 });
            expect(info.expiredEntries).toBe(1);
        });
    });

    describe('stats', () => {
        it('should count hits and misses', () => {
            cache.store('key', 'value', 60);
            cache.get('key');
            cache.get('key');
            cache.get('other');

            const stats = cache.stats();
            expect(stats.hits).toBe(2);
            expect(stats.misses).toBe(1);
            expect(stats.size).toBe(1);
            expect(stats.hitRate).toBeCloseTo(2 / 3);
        });

        it('should report a zero hit rate before any lookup', () => {
            expect(cache.stats().hitRate).toBe(0);
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });
});
