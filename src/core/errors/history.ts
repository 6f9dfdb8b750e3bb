import { countBy, maxBy } from 'es-toolkit';
import { freeze } from 'immer';
import { ONE_DAY_MS, ONE_HOUR_MS } from '@/constants';
import { ERROR_KINDS, type ErrorKind } from './taxonomy';
import type { ErrorRecord, ErrorStatistics } from './types';

export const EMPTY_ERROR_STATISTICS: ErrorStatistics = freeze(
    {
        totalErrors: 0,
        recentErrors: 0,
        todayErrors: 0,
        countsByKind: {},
        mostFrequentKind: undefined,
    },
    true
);

/**
 * Bounded, newest-first record list.
 */
export class ErrorHistory {
    private records: ErrorRecord[] = [];

    constructor(private readonly capacity: number) {}

    get size(): number {
        return this.records.length;
    }

    add(record: ErrorRecord): void {
        this.records.unshift(record);
        if (this.records.length > this.capacity) {
            this.records.length = this.capacity;
        }
    }

    recent(limit?: number): readonly ErrorRecord[] {
        const count = limit === undefined ? this.records.length : Math.max(0, Math.floor(limit));
        return this.records.slice(0, count);
    }

    /** @returns The number of records dropped. */
    removeOlderThan(cutoff: number): number {
        const before = this.records.length;
        this.records = this.records.filter(record => record.timestamp >= cutoff);
        return before - this.records.length;
    }

    clear(): void {
        this.records = [];
    }

    statistics(now: number): ErrorStatistics {
        if (this.records.length === 0) {
            return EMPTY_ERROR_STATISTICS;
        }
        const countsByKind: Partial<Record<ErrorKind, number>> = countBy(this.records, record => record.kind);
        // Ties resolve in taxonomy order.
        const mostFrequentKind = maxBy(
            ERROR_KINDS.filter(kind => countsByKind[kind] !== undefined),
            kind => countsByKind[kind] ?? 0
        );

        return freeze(
            {
                totalErrors: this.records.length,
                recentErrors: this.records.filter(record => now - record.timestamp < ONE_HOUR_MS).length,
                todayErrors: this.records.filter(record => now - record.timestamp < ONE_DAY_MS).length,
                countsByKind,
                mostFrequentKind,
            },
            true
        );
    }
}
