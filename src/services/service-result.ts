import { AppError } from '@/core/errors/app-error';
import { classifyError } from '@/core/errors/classifier';
import type { ErrorKind } from '@/core/errors/taxonomy';

/**
 * Outcome of a service operation with the failure carried as data.
 */
export type ServiceResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: AppError };

function ok<T>(value: T): ServiceResult<T> {
    return { ok: true, value };
}

function err<T = never>(error: AppError): ServiceResult<T> {
    return { ok: false, error };
}

function map<T, U>(result: ServiceResult<T>, transform: (value: T) => U): ServiceResult<U> {
    return result.ok ? ok(transform(result.value)) : result;
}

function flatMap<T, U>(result: ServiceResult<T>, transform: (value: T) => ServiceResult<U>): ServiceResult<U> {
    return result.ok ? transform(result.value) : result;
}

function mapError<T>(result: ServiceResult<T>, transform: (error: AppError) => AppError): ServiceResult<T> {
    return result.ok ? result : err(transform(result.error));
}

function unwrapOr<T>(result: ServiceResult<T>, fallback: T): T {
    return result.ok ? result.value : fallback;
}

function unwrapOrElse<T>(result: ServiceResult<T>, fallback: (error: AppError) => T): T {
    return result.ok ? result.value : fallback(result.error);
}

function match<T, R>(
    result: ServiceResult<T>,
    handlers: { ok: (value: T) => R; err: (error: AppError) => R }
): R {
    return result.ok ? handlers.ok(result.value) : handlers.err(result.error);
}

/** `undefined` and `null` become a failure of `kind` (default `notFound`). */
function fromOptional<T>(value: T | null | undefined, kind: ErrorKind = 'notFound', message?: string): ServiceResult<T> {
    return value === undefined || value === null ? err(new AppError(kind, message)) : ok(value);
}

function fromThrowing<T>(action: () => T): ServiceResult<T> {
    try {
        return ok(action());
    } catch (error) {
        return err(classifyError(error));
    }
}

async function fromAsync<T>(action: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
        return ok(await action());
    } catch (error) {
        return err(classifyError(error));
    }
}

/** True for failures whose kind is worth retrying. */
function shouldRetry<T>(result: ServiceResult<T>): boolean {
    return !result.ok && result.error.retryable;
}

export const ServiceResult = {
    ok,
    err,
    map,
    flatMap,
    mapError,
    unwrapOr,
    unwrapOrElse,
    match,
    fromOptional,
    fromThrowing,
    fromAsync,
    shouldRetry,
} as const;
