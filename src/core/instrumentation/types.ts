export interface OperationStats {
    readonly operation: string;
    readonly callCount: number;
    readonly totalDuration: number;
    readonly averageDuration: number;
    readonly minDuration: number;
    readonly maxDuration: number;
}

/** Durations are in milliseconds. */
export interface PerformanceStats {
    readonly operations: Readonly<Record<string, OperationStats>>;
    readonly totalOperations: number;
    readonly totalDuration: number;
    readonly averageDuration: number;
}
