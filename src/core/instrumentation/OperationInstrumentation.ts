import { freeze } from 'immer';
import { injectable } from 'inversify';
import type { OperationStats, PerformanceStats } from './types';

interface MutableOperationStats {
    callCount: number;
    totalDuration: number;
    minDuration: number;
    maxDuration: number;
}

/**
 * Count and duration statistics per named operation. Bound in transient
 * scope: every service gets its own instance.
 */
@injectable()
export class OperationInstrumentation {
    private readonly operations = new Map<string, MutableOperationStats>();

    /** Non-finite durations are ignored; negative ones (a clock step back) count as 0. */
    recordOperation(operation: string, elapsed: number): void {
        if (!Number.isFinite(elapsed)) {
            return;
        }
        const duration = Math.max(0, elapsed);
        const stats = this.operations.get(operation);
        if (stats === undefined) {
            this.operations.set(operation, {
                callCount: 1,
                totalDuration: duration,
                minDuration: duration,
                maxDuration: duration,
            });
            return;
        }
        stats.callCount++;
        stats.totalDuration += duration;
        stats.minDuration = Math.min(stats.minDuration, duration);
        stats.maxDuration = Math.max(stats.maxDuration, duration);
    }

    getOperationStats(operation: string): OperationStats | undefined {
        const stats = this.operations.get(operation);
        return stats !== undefined ? freeze(snapshot(operation, stats)) : undefined;
    }

    getStats(): PerformanceStats {
        const operations: Record<string, OperationStats> = {};
        let totalOperations = 0;
        let totalDuration = 0;
        for (const [operation, stats] of this.operations) {
            operations[operation] = snapshot(operation, stats);
            totalOperations += stats.callCount;
            totalDuration += stats.totalDuration;
        }
        return freeze(
            {
                operations,
                totalOperations,
                totalDuration,
                averageDuration: totalOperations > 0 ? totalDuration / totalOperations : 0,
            },
            true
        );
    }

    reset(): void {
        this.operations.clear();
    }
}

function snapshot(operation: string, stats: MutableOperationStats): OperationStats {
    return {
        operation,
        callCount: stats.callCount,
        totalDuration: stats.totalDuration,
        averageDuration: stats.totalDuration / stats.callCount,
        minDuration: stats.minDuration,
        maxDuration: stats.maxDuration,
    };
}
