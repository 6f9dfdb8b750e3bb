import type { AppError } from './app-error';
import type { ErrorKind, ErrorSeverity } from './taxonomy';

export interface ErrorRecord {
    readonly id: string;
    readonly kind: ErrorKind;
    readonly severity: ErrorSeverity;
    readonly message: string;
    readonly context: string;
    readonly timestamp: number;
}

export interface ErrorStatistics {
    readonly totalErrors: number;
    /** Records accepted within the last hour. */
    readonly recentErrors: number;
    /** Records accepted within the last 24 hours. */
    readonly todayErrors: number;
    readonly countsByKind: Readonly<Partial<Record<ErrorKind, number>>>;
    readonly mostFrequentKind: ErrorKind | undefined;
}

export interface SystemInfo {
    readonly appVersion: string;
    readonly nodeVersion: string;
    readonly platform: string;
    readonly arch: string;
    readonly pid: number;
    readonly uptimeSeconds: number;
    readonly rssBytes: number;
    readonly heapUsedBytes: number;
}

export interface ErrorReport {
    readonly generatedAt: number;
    readonly statistics: ErrorStatistics;
    readonly recentErrors: readonly ErrorRecord[];
    readonly systemInfo: SystemInfo;
}

/**
 * What `ErrorPipeline.handle` did with an error.
 *
 * - `throttled`: dropped before it reached the history.
 * - `recovered`: recorded, then resolved by a recovery strategy.
 * - `surfaced`: recorded, then displayed and/or reported by severity.
 * - `discarded`: recorded, but `clearAllErrors` ran before presentation.
 */
export type HandleOutcome =
    | { readonly status: 'throttled'; readonly error: AppError }
    | { readonly status: 'recovered'; readonly error: AppError; readonly record: ErrorRecord }
    | {
          readonly status: 'surfaced';
          readonly error: AppError;
          readonly record: ErrorRecord;
          readonly displayed: boolean;
          readonly reported: boolean;
      }
    | { readonly status: 'discarded'; readonly error: AppError; readonly record: ErrorRecord };
