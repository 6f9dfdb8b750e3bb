import type * as v from 'valibot';

/**
 * Schema used as the type token on reads. A stored value is returned only
 * when it satisfies the schema the caller expects.
 */
export type TypeToken<T> = v.GenericSchema<T>;

export interface CacheEntry {
    readonly value: unknown;
    readonly expiresAt: number;
    lastAccessed: number;
}

/** Timestamps of an entry, read without counting a hit or miss. */
export interface CacheEntrySnapshot {
    readonly expiresAt: number;
    readonly lastAccessed: number;
}

export type CacheLookup<T> =
    | { readonly status: 'hit'; readonly value: T }
    | { readonly status: 'miss' }
    | { readonly status: 'expired' }
    | { readonly status: 'type-mismatch' };

export interface CacheStatistics {
    readonly hitCount: number;
    readonly missCount: number;
    /** Share of lookups that hit; 0 before the first lookup. */
    readonly hitRate: number;
    readonly missRate: number;
    readonly itemCount: number;
    readonly expiredItemCount: number;
    /** Misses caused by a stored value failing the expected schema. */
    readonly typeMismatchCount: number;
    readonly capacity: number;
    readonly utilization: number;
}

export interface CacheInfo {
    readonly itemCount: number;
    readonly capacity: number;
    readonly hitRate: number;
    readonly missRate: number;
}
