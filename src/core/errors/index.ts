/**
 * Error taxonomy, classification and the error pipeline.
 *
 * @module core/errors
 */

export { AppError, isAppError, type AppErrorOptions } from './app-error';
export { classifyError, resolveErrorKind } from './classifier';
export { ErrorPipeline } from './ErrorPipeline';
export { ErrorHistory, EMPTY_ERROR_STATISTICS } from './history';
export {
    NetworkRecoveryStrategy,
    RecoveryError,
    StorageRecoveryStrategy,
    type RecoveryStrategy,
} from './recovery';
export {
    ERROR_KINDS,
    SEVERITY_RANK,
    describeKind,
    isReportable,
    isRetryableKind,
    isUserVisible,
    recoverySuggestionFor,
    severityOf,
    type ErrorKind,
    type ErrorSeverity,
} from './taxonomy';
export { ConsoleTelemetryReporter, type TelemetryReporter } from './telemetry';
export { ThrottleGate } from './throttle';
export type { ErrorRecord, ErrorReport, ErrorStatistics, HandleOutcome, SystemInfo } from './types';
