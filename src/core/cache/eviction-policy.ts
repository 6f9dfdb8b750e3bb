/**
 * Eviction ranking for the expiring cache.
 *
 * Entries are ranked by ascending `lastAccessed` with a linear scan and sort.
 * Ties keep insertion order. The capacity check happens before insertion, so
 * this is an approximate LRU rather than an exact one.
 */

import { orderBy } from 'es-toolkit';
import { EVICTION_FRACTION } from '@/constants';
import type { CacheEntry } from './types';

/** Entries dropped when a `set` finds the cache full. */
export function evictionBatchSize(capacity: number): number {
    return Math.max(1, Math.floor(capacity / EVICTION_FRACTION));
}

export function halfCapacity(capacity: number): number {
    return Math.floor(capacity / 2);
}

export function quarterCapacity(capacity: number): number {
    return Math.floor(capacity / 4);
}

/**
 * Returns up to `count` keys, least recently accessed first.
 */
export function selectLeastRecentlyAccessed(entries: ReadonlyMap<string, CacheEntry>, count: number): string[] {
    if (count <= 0 || entries.size === 0) {
        return [];
    }
    const ranked = orderBy(
        Array.from(entries, ([key, entry]) => ({ key, lastAccessed: entry.lastAccessed })),
        [item => item.lastAccessed],
        ['asc']
    );
    return ranked.slice(0, count).map(item => item.key);
}

/**
 * Deletes the least recently accessed entries until at most `targetSize` remain.
 * @returns The number of entries removed.
 */
export function shrinkTo(entries: Map<string, CacheEntry>, targetSize: number): number {
    const excess = entries.size - Math.max(0, targetSize);
    if (excess <= 0) {
        return 0;
    }
    const victims = selectLeastRecentlyAccessed(entries, excess);
    for (const key of victims) {
        entries.delete(key);
    }
    return victims.length;
}
