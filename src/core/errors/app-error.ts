import { freeze } from 'immer';
import {
    describeKind,
    isRetryableKind,
    recoverySuggestionFor,
    severityOf,
    type ErrorKind,
    type ErrorSeverity,
} from './taxonomy';

export interface AppErrorOptions {
    readonly cause?: unknown;
    readonly details?: Record<string, unknown>;
}

/**
 * A failure that has been placed in the taxonomy. Anything thrown by a
 * service is converted to an `AppError` before the pipeline acts on it.
 */
export class AppError extends Error {
    readonly kind: ErrorKind;
    readonly details: Readonly<Record<string, unknown>> | undefined;

    constructor(kind: ErrorKind, message?: string, options: AppErrorOptions = {}) {
        super(message ?? describeKind(kind), { cause: options.cause });
        this.name = 'AppError';
        this.kind = kind;
        this.details = options.details !== undefined ? freeze({ ...options.details }, true) : undefined;
    }

    get severity(): ErrorSeverity {
        return severityOf(this.kind);
    }

    get retryable(): boolean {
        return isRetryableKind(this.kind);
    }

    get recoverySuggestion(): string {
        return recoverySuggestionFor(this.kind);
    }

    static network(cause?: unknown): AppError {
        return new AppError('network', undefined, { cause });
    }

    static storage(cause?: unknown): AppError {
        return new AppError('storage', undefined, { cause });
    }

    static notFound(resource: string): AppError {
        return new AppError('notFound', `Resource not found: ${resource}`, { details: { resource } });
    }

    static validation(message: string): AppError {
        return new AppError('validation', message);
    }

    static server(status: number, message: string): AppError {
        return new AppError('server', `Server error (${status}): ${message}`, { details: { status } });
    }

    static cancelled(operation?: string): AppError {
        return new AppError(
            'cancelled',
            operation !== undefined ? `Operation '${operation}' was cancelled` : undefined,
            operation !== undefined ? { details: { operation } } : {}
        );
    }
}

export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}
