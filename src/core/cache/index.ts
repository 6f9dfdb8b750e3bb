/**
 * Expiring cache module.
 *
 * @module core/cache
 */

export { ExpiringCache } from './ExpiringCache';
export { evictionBatchSize, selectLeastRecentlyAccessed } from './eviction-policy';
export type {
    CacheEntrySnapshot,
    CacheInfo,
    CacheLookup,
    CacheStatistics,
    TypeToken,
} from './types';
