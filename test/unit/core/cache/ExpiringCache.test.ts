import * as v from 'valibot';
import { beforeEach, describe, expect, it } from 'vitest';
import { ExpiringCache } from '@/core/cache/ExpiringCache';
import { ManualClock } from '../../../support/manual-clock';
import { createSettings } from '../../../support/settings';

function createCache(capacity: number, clock: ManualClock, defaultTtlMs = 300_000): ExpiringCache {
    return new ExpiringCache(createSettings({ cache: { capacity, defaultTtlMs } }), clock);
}

describe('ExpiringCache', () => {
    let clock: ManualClock;

    beforeEach(() => {
        clock = new ManualClock(1_000);
    });

    describe('get and set', () => {
        it('returns a stored value and counts a hit', () => {
            const cache = createCache(10, clock);
            cache.set('greeting', 'hello', 1_000);
            clock.advance(5);

            expect(cache.get('greeting', v.string())).toBe('hello');
            expect(cache.getStatistics().hitCount).toBe(1);
            expect(cache.inspect('greeting')).toEqual({ expiresAt: 2_000, lastAccessed: 1_005 });
        });

        it('counts exactly one miss for an unknown key', () => {
            const cache = createCache(10, clock);

            expect(cache.get('missing', v.string())).toBeUndefined();
            expect(cache.getStatistics()).toMatchObject({ hitCount: 0, missCount: 1 });
        });

        it('treats an entry as live until its expiration has passed', () => {
            const cache = createCache(10, clock);
            cache.set('token', 'abc', 100);

            clock.set(1_100);
            expect(cache.get('token', v.string())).toBe('abc');

            clock.set(1_101);
            expect(cache.get('token', v.string())).toBeUndefined();
            expect(cache.getCacheSize()).toBe(0);
            expect(cache.getStatistics()).toMatchObject({ hitCount: 1, missCount: 1 });
        });

        it('reports why a lookup missed', () => {
            const cache = createCache(10, clock);
            cache.set('count', 42, 50);

            expect(cache.lookup('count', v.number())).toEqual({ status: 'hit', value: 42 });
            expect(cache.lookup('count', v.string())).toEqual({ status: 'type-mismatch' });
            expect(cache.lookup('other', v.number())).toEqual({ status: 'miss' });
            clock.advance(51);
            expect(cache.lookup('count', v.number())).toEqual({ status: 'expired' });
        });

        it('counts a type mismatch as a miss without touching lastAccessed', () => {
            const cache = createCache(10, clock);
            cache.set('count', 42);
            clock.advance(10);

            expect(cache.get('count', v.string())).toBeUndefined();
            expect(cache.getStatistics()).toMatchObject({ missCount: 1, typeMismatchCount: 1, hitCount: 0 });
            expect(cache.inspect('count')?.lastAccessed).toBe(1_000);
            expect(cache.get('count', v.number())).toBe(42);
        });

        it('validates structured values against the expected schema', () => {
            const cache = createCache(10, clock);
            const UserSchema = v.object({ id: v.number(), name: v.string() });
            cache.set('user:1', { id: 1, name: 'Ada' });

            expect(cache.get('user:1', UserSchema)).toEqual({ id: 1, name: 'Ada' });
            expect(cache.get('user:1', v.object({ id: v.string() }))).toBeUndefined();
        });

        it('falls back to the default TTL for a negative or non-finite TTL', () => {
            const cache = createCache(10, clock, 500);
            cache.set('a', 1, -5);
            cache.set('b', 2, Number.NaN);
            cache.set('c', 3);

            expect(cache.inspect('a')?.expiresAt).toBe(1_500);
            expect(cache.inspect('b')?.expiresAt).toBe(1_500);
            expect(cache.inspect('c')?.expiresAt).toBe(1_500);
        });

        it('moves an overwritten key to the end of insertion order', () => {
            const cache = createCache(10, clock);
            cache.set('a', 1);
            cache.set('b', 2);
            cache.set('a', 3);

            expect(cache.keys()).toEqual(['b', 'a']);
            expect(cache.get('a', v.number())).toBe(3);
        });
    });

    describe('statistics', () => {
        it('reports zero rates before any lookup', () => {
            const cache = createCache(10, clock);

            expect(cache.getCacheInfo()).toEqual({ itemCount: 0, capacity: 10, hitRate: 0, missRate: 0 });
        });

        it('keeps hit and miss rates complementary', () => {
            const cache = createCache(10, clock);
            cache.set('a', 1);
            cache.get('a', v.number());
            cache.get('b', v.number());
            cache.get('c', v.number());

            const info = cache.getCacheInfo();
            expect(info.hitRate).toBeCloseTo(1 / 3);
            expect(info.missRate).toBeCloseTo(2 / 3);
            expect(info.hitRate + info.missRate).toBeCloseTo(1);
        });

        it('counts expired entries and utilization', () => {
            const cache = createCache(4, clock);
            cache.set('short', 1, 10);
            cache.set('long', 2, 1_000);
            clock.advance(20);

            expect(cache.getStatistics()).toEqual({
                hitCount: 0,
                missCount: 0,
                hitRate: 0,
                missRate: 0,
                itemCount: 2,
                expiredItemCount: 1,
                typeMismatchCount: 0,
                capacity: 4,
                utilization: 0.5,
            });
        });

        it('returns frozen snapshots', () => {
            const cache = createCache(4, clock);

            expect(Object.isFrozen(cache.getStatistics())).toBe(true);
            expect(Object.isFrozen(cache.getCacheInfo())).toBe(true);
        });
    });

    describe('eviction', () => {
        it('evicts the oldest entry when inserting into a full cache', () => {
            const cache = createCache(5, clock);
            for (let i = 0; i < 5; i++) {
                cache.set(`k${i}`, i);
            }

            cache.set('k5', 5);

            expect(cache.getCacheSize()).toBe(5);
            expect(cache.keys()).toEqual(['k1', 'k2', 'k3', 'k4', 'k5']);
        });

        it('ranks by last access rather than insertion', () => {
            const cache = createCache(5, clock);
            for (let i = 0; i < 5; i++) {
                clock.advance(1);
                cache.set(`k${i}`, i);
            }
            clock.advance(1);
            cache.get('k0', v.number());

            cache.set('k5', 5);

            expect(cache.keys()).toEqual(['k0', 'k2', 'k3', 'k4', 'k5']);
        });

        it('evicts a fifth of the capacity at once', () => {
            const cache = createCache(10, clock);
            for (let i = 0; i < 10; i++) {
                cache.set(`k${i}`, i);
            }

            cache.set('k10', 10);

            expect(cache.getCacheSize()).toBe(9);
            expect(cache.keys()).toEqual(['k2', 'k3', 'k4', 'k5', 'k6', 'k7', 'k8', 'k9', 'k10']);
        });

        it('stores nothing with a capacity of zero', () => {
            const cache = createCache(0, clock);
            cache.set('a', 1);

            expect(cache.getCacheSize()).toBe(0);
            expect(cache.get('a', v.number())).toBeUndefined();
        });

        it('never exceeds capacity after set returns', () => {
            const cache = createCache(3, clock);
            for (let i = 0; i < 20; i++) {
                cache.set(`k${i % 7}`, i);
                expect(cache.getCacheSize()).toBeLessThanOrEqual(3);
            }
        });
    });

    describe('removal', () => {
        it('invalidates keys but keeps counters', () => {
            const cache = createCache(10, clock);
            cache.set('a', 1);
            cache.set('b', 2);
            cache.get('a', v.number());

            cache.invalidate('a');
            expect(cache.keys()).toEqual(['b']);

            cache.invalidateAll();
            expect(cache.getCacheSize()).toBe(0);
            expect(cache.getStatistics().hitCount).toBe(1);
        });

        it('resets counters on clearAll', () => {
            const cache = createCache(10, clock);
            cache.set('a', 1);
            cache.get('a', v.number());
            cache.get('a', v.string());

            cache.clearAll();

            expect(cache.getStatistics()).toMatchObject({ itemCount: 0, hitCount: 0, missCount: 0, typeMismatchCount: 0 });
        });

        it('resets counters only on resetStatistics', () => {
            const cache = createCache(10, clock);
            cache.set('a', 1);
            cache.get('a', v.number());

            cache.resetStatistics();

            expect(cache.getStatistics()).toMatchObject({ itemCount: 1, hitCount: 0 });
        });

        it('removes only entries that expired before now', () => {
            const cache = createCache(10, clock);
            cache.set('a', 1, 50);
            cache.set('b', 2, 200);
            cache.set('c', 3, 50);
            clock.set(1_010);
            cache.get('b', v.number());

            clock.set(1_060);
            expect(cache.clearExpiredItems()).toBe(2);
            expect(cache.keys()).toEqual(['b']);
            expect(cache.inspect('b')).toEqual({ expiresAt: 1_200, lastAccessed: 1_010 });
        });

        it('removes keys by prefix', () => {
            const cache = createCache(10, clock);
            cache.set('user:1', 'a');
            cache.set('user:2', 'b');
            cache.set('post:1', 'c');

            expect(cache.removeByPrefix('user:')).toBe(2);
            expect(cache.keys()).toEqual(['post:1']);
        });
    });

    describe('memory pressure', () => {
        it('shrinks to half capacity, least recently accessed first', () => {
            const cache = createCache(10, clock);
            for (let i = 0; i < 10; i++) {
                clock.advance(1);
                cache.set(`k${i}`, i);
            }

            cache.reduceCacheSize();

            expect(cache.keys()).toEqual(['k5', 'k6', 'k7', 'k8', 'k9']);
        });

        it('leaves a cache at or below half capacity alone', () => {
            const cache = createCache(10, clock);
            cache.set('a', 1);
            cache.set('b', 2);

            cache.reduceCacheSize();

            expect(cache.getCacheSize()).toBe(2);
        });

        it('sweeps expired entries then shrinks to a quarter when still above half', () => {
            const cache = createCache(8, clock);
            cache.set('e0', 0, 5);
            cache.set('e1', 1, 5);
            for (let i = 2; i < 8; i++) {
                clock.advance(1);
                cache.set(`e${i}`, i);
            }
            clock.set(1_020);

            cache.respondToMemoryPressure();

            expect(cache.keys()).toEqual(['e6', 'e7']);
        });

        it('only sweeps when the sweep brings the cache to half capacity', () => {
            const cache = createCache(8, clock);
            for (let i = 0; i < 6; i++) {
                cache.set(`e${i}`, i, i < 3 ? 5 : 1_000);
            }
            clock.advance(10);

            cache.respondToMemoryPressure();

            expect(cache.keys()).toEqual(['e3', 'e4', 'e5']);
        });
    });
});
