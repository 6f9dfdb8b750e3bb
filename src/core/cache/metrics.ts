import { freeze } from 'immer';
import type { CacheInfo, CacheStatistics } from './types';

export interface CacheCounters {
    readonly hitCount: number;
    readonly missCount: number;
    readonly typeMismatchCount: number;
}

function rates(counters: CacheCounters): { hitRate: number; missRate: number } {
    const total = counters.hitCount + counters.missCount;
    if (total === 0) {
        return { hitRate: 0, missRate: 0 };
    }
    return {
        hitRate: counters.hitCount / total,
        missRate: counters.missCount / total,
    };
}

export function calculateStatistics(
    counters: CacheCounters,
    itemCount: number,
    expiredItemCount: number,
    capacity: number
): CacheStatistics {
    return freeze({
        hitCount: counters.hitCount,
        missCount: counters.missCount,
        ...rates(counters),
        itemCount,
        expiredItemCount,
        typeMismatchCount: counters.typeMismatchCount,
        capacity,
        utilization: capacity > 0 ? itemCount / capacity : 0,
    });
}

export function calculateInfo(counters: CacheCounters, itemCount: number, capacity: number): CacheInfo {
    return freeze({
        itemCount,
        capacity,
        ...rates(counters),
    });
}
