import { inject, injectable } from 'inversify';
import * as v from 'valibot';
import { TYPES } from '@/types/inversify.types';
import type { Clock } from '@/core/runtime/clock';
import type { ServiceCoreSettings } from '@/schemas';
import { LOG_PREFIX } from '@/constants';
import { ReadWriteBarrier } from '@/utils/read-write-barrier';
import { evictionBatchSize, halfCapacity, quarterCapacity, shrinkTo, selectLeastRecentlyAccessed } from './eviction-policy';
import { calculateInfo, calculateStatistics, type CacheCounters } from './metrics';
import type { CacheEntry, CacheEntrySnapshot, CacheInfo, CacheLookup, CacheStatistics, TypeToken } from './types';

const MEMORY_PRESSURE_KEY = 'memory-pressure';

/**
 * In-memory key/value store with per-entry TTL and capacity-bounded eviction.
 *
 * Reads run in the shared section of a reader/writer barrier; every mutation
 * (including the removal of an entry found expired on read) runs in its
 * exclusive section. No method throws: absence is the only failure signal.
 */
@injectable()
export class ExpiringCache {
    private readonly entries = new Map<string, CacheEntry>();
    private readonly barrier = new ReadWriteBarrier('cache');
    private readonly capacity: number;
    private readonly defaultTtlMs: number;

    private hitCount = 0;
    private missCount = 0;
    private typeMismatchCount = 0;

    constructor(
        @inject(TYPES.Settings) settings: ServiceCoreSettings,
        @inject(TYPES.Clock) private readonly clock: Clock
    ) {
        this.capacity = settings.cache.capacity;
        this.defaultTtlMs = settings.cache.defaultTtlMs;
    }

    get maxCapacity(): number {
        return this.capacity;
    }

    // --- Reads ---

    /**
     * Returns the value stored under `key` when it is present, unexpired and
     * satisfies `expectedType`. Every other outcome counts one miss.
     */
    get<T>(key: string, expectedType: TypeToken<T>): T | undefined {
        const result = this.lookup(key, expectedType);
        return result.status === 'hit' ? result.value : undefined;
    }

    /**
     * Same read as `get`, reporting why a lookup missed.
     */
    lookup<T>(key: string, expectedType: TypeToken<T>): CacheLookup<T> {
        const now = this.clock.now();
        return this.barrier.shared((): CacheLookup<T> => {
            const entry = this.entries.get(key);
            if (entry === undefined) {
                this.missCount++;
                return { status: 'miss' };
            }

            if (entry.expiresAt < now) {
                this.missCount++;
                this.barrier.exclusive(() => {
                    if (this.entries.get(key) === entry) {
                        this.entries.delete(key);
                    }
                });
                return { status: 'expired' };
            }

            const value = entry.value;
            if (!v.is(expectedType, value)) {
                this.missCount++;
                this.typeMismatchCount++;
                return { status: 'type-mismatch' };
            }

            entry.lastAccessed = now;
            this.hitCount++;
            return { status: 'hit', value };
        });
    }

    getCacheSize(): number {
        return this.barrier.shared(() => this.entries.size);
    }

    /** Keys in insertion order, read without touching statistics. */
    keys(): string[] {
        return this.barrier.shared(() => Array.from(this.entries.keys()));
    }

    /** Entry timestamps, read without touching statistics or `lastAccessed`. */
    inspect(key: string): CacheEntrySnapshot | undefined {
        return this.barrier.shared(() => {
            const entry = this.entries.get(key);
            return entry !== undefined ? { expiresAt: entry.expiresAt, lastAccessed: entry.lastAccessed } : undefined;
        });
    }

    getCacheInfo(): CacheInfo {
        return this.barrier.shared(() => calculateInfo(this.counters(), this.entries.size, this.capacity));
    }

    getStatistics(): CacheStatistics {
        const now = this.clock.now();
        return this.barrier.shared(() => {
            let expired = 0;
            for (const entry of this.entries.values()) {
                if (entry.expiresAt < now) expired++;
            }
            return calculateStatistics(this.counters(), this.entries.size, expired, this.capacity);
        });
    }

    // --- Mutations ---

    /**
     * Stores `value` for `ttlMs` (or the configured default). A full cache
     * first drops its least recently accessed fifth. With a capacity of zero
     * nothing is retained.
     */
    set(key: string, value: unknown, ttlMs?: number): void {
        const now = this.clock.now();
        const ttl = ttlMs !== undefined && Number.isFinite(ttlMs) && ttlMs >= 0 ? ttlMs : this.defaultTtlMs;

        this.barrier.exclusive(() => {
            if (this.capacity === 0) {
                this.entries.clear();
                return;
            }
            if (this.entries.size >= this.capacity) {
                for (const victim of selectLeastRecentlyAccessed(this.entries, evictionBatchSize(this.capacity))) {
                    this.entries.delete(victim);
                }
            }
            // Re-inserting moves an overwritten key behind older ties.
            this.entries.delete(key);
            this.entries.set(key, { value, expiresAt: now + ttl, lastAccessed: now });
        });
    }

    invalidate(key: string): void {
        this.barrier.exclusive(() => {
            this.entries.delete(key);
        });
    }

    invalidateAll(): void {
        this.barrier.exclusive(() => {
            this.entries.clear();
        });
    }

    /** Drops every entry and resets the hit, miss and mismatch counters. */
    clearAll(): void {
        this.barrier.exclusive(() => {
            this.entries.clear();
            this.resetCounters();
        });
    }

    resetStatistics(): void {
        this.barrier.exclusive(() => {
            this.resetCounters();
        });
    }

    /**
     * Removes every entry whose expiration is strictly before now.
     * @returns The number of entries removed, or 0 when the sweep was deferred.
     */
    clearExpiredItems(): number {
        const now = this.clock.now();
        let removed = 0;
        this.barrier.exclusive(() => {
            removed = this.removeExpired(now);
        });
        return removed;
    }

    /**
     * Removes every key that starts with `prefix`.
     * @returns The number of entries removed, or 0 when the removal was deferred.
     */
    removeByPrefix(prefix: string): number {
        let removed = 0;
        this.barrier.exclusive(() => {
            for (const key of Array.from(this.entries.keys())) {
                if (key.startsWith(prefix)) {
                    this.entries.delete(key);
                    removed++;
                }
            }
        });
        return removed;
    }

    /** Shrinks to half capacity, least recently accessed entries first. */
    reduceCacheSize(): void {
        this.barrier.exclusive(() => {
            const removed = shrinkTo(this.entries, halfCapacity(this.capacity));
            if (removed > 0) {
                console.info(`${LOG_PREFIX} Cache reduced by ${removed} entries to ${this.entries.size}.`);
            }
        });
    }

    /**
     * Memory-pressure response: sweep expired entries, then shrink to a
     * quarter of capacity if more than half is still occupied. Requests that
     * arrive while another mutation is in flight coalesce into one response.
     */
    respondToMemoryPressure(): void {
        const now = this.clock.now();
        this.barrier.exclusive(() => {
            const expired = this.removeExpired(now);
            let evicted = 0;
            if (this.entries.size > halfCapacity(this.capacity)) {
                evicted = shrinkTo(this.entries, quarterCapacity(this.capacity));
            }
            console.info(
                `${LOG_PREFIX} Memory pressure handled (expired: ${expired}, evicted: ${evicted}, remaining: ${this.entries.size}).`
            );
        }, MEMORY_PRESSURE_KEY);
    }

    // --- Internals (callers hold the exclusive section) ---

    private removeExpired(now: number): number {
        let removed = 0;
        for (const [key, entry] of Array.from(this.entries)) {
            if (entry.expiresAt < now) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    private resetCounters(): void {
        this.hitCount = 0;
        this.missCount = 0;
        this.typeMismatchCount = 0;
    }

    private counters(): CacheCounters {
        return {
            hitCount: this.hitCount,
            missCount: this.missCount,
            typeMismatchCount: this.typeMismatchCount,
        };
    }
}
