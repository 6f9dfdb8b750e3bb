import { inject, injectable } from 'inversify';
import type { ExpiringCache } from '@/core/cache/ExpiringCache';
import type { TypeToken } from '@/core/cache/types';
import { AppError } from '@/core/errors/app-error';
import { classifyError } from '@/core/errors/classifier';
import type { ErrorPipeline } from '@/core/errors/ErrorPipeline';
import type { OperationInstrumentation } from '@/core/instrumentation/OperationInstrumentation';
import type { PerformanceStats } from '@/core/instrumentation/types';
import type { Clock } from '@/core/runtime/clock';
import { TYPES } from '@/types/inversify.types';
import { executeWithRetry, type RetryOptions } from '@/utils/retry';
import { ServiceResult } from './service-result';

export interface ExecuteOptions {
    /** Aborting stops waiting for the action and routes a `cancelled` error. */
    signal?: AbortSignal;
}

export type Action<T> = (signal: AbortSignal | undefined) => Promise<T> | T;

export type Provider<T> = () => Promise<T | undefined> | T | undefined;

/**
 * Base class for business services.
 *
 * Wraps operations with timing and error routing: failures never propagate
 * out of `execute`, they are handled by the error pipeline and the caller
 * sees `undefined`. Also offers a cached-or-compute helper over the shared
 * cache. Each service instance owns its own instrumentation.
 */
@injectable()
export abstract class ServiceBase {
    constructor(
        @inject(TYPES.Cache) protected readonly cache: ExpiringCache,
        @inject(TYPES.ErrorPipeline) protected readonly errorPipeline: ErrorPipeline,
        @inject(TYPES.OperationInstrumentation) private readonly instrumentation: OperationInstrumentation,
        @inject(TYPES.Clock) protected readonly clock: Clock
    ) {}

    /** Used as the prefix of error contexts. */
    protected get serviceName(): string {
        return this.constructor.name;
    }

    // --- Operations ---

    protected async execute<T>(
        operation: string,
        context: string,
        action: Action<T>,
        options: ExecuteOptions = {}
    ): Promise<T | undefined> {
        const result = await this.executeResult(operation, context, action, options);
        return result.ok ? result.value : undefined;
    }

    /** Like `execute`, but hands the classified failure back to the caller. */
    protected async executeResult<T>(
        operation: string,
        context: string,
        action: Action<T>,
        options: ExecuteOptions = {}
    ): Promise<ServiceResult<T>> {
        const startedAt = this.clock.now();
        try {
            const value = await runCancellable(operation, action, options.signal);
            this.instrumentation.recordOperation(operation, this.clock.now() - startedAt);
            return ServiceResult.ok(value);
        } catch (error) {
            this.instrumentation.recordOperation(operation, this.clock.now() - startedAt);
            const outcome = await this.errorPipeline.handle(error, `${this.serviceName}.${operation}: ${context}`);
            return ServiceResult.err(outcome.error);
        }
    }

    /**
     * Runs `action`, retrying failures of a retryable kind with exponential
     * backoff. Only the final failure reaches the error pipeline.
     */
    protected executeWithRetry<T>(
        operation: string,
        context: string,
        action: Action<T>,
        retry: RetryOptions = {}
    ): Promise<T | undefined> {
        return this.execute(
            operation,
            context,
            signal =>
                executeWithRetry(() => action(signal), {
                    shouldRetry: error => classifyError(error).retryable,
                    context: operation,
                    ...retry,
                }),
            retry.signal !== undefined ? { signal: retry.signal } : {}
        );
    }

    // --- Cache ---

    /**
     * Returns the cached value for `key`, or computes it with `provider` and
     * caches a result other than `undefined` or `null` for `ttlMs` (the cache
     * default when omitted).
     * A provider failure is routed to the error pipeline and yields `undefined`.
     */
    protected async cachedOrFetch<T>(
        key: string,
        ttlMs: number | undefined,
        expectedType: TypeToken<T>,
        provider: Provider<T>
    ): Promise<T | undefined> {
        const cached = this.cache.get(key, expectedType);
        if (cached !== undefined) {
            return cached;
        }

        let value: T | undefined;
        try {
            value = await provider();
        } catch (error) {
            await this.errorPipeline.handle(error, `${this.serviceName}.cachedOrFetch: ${key}`);
            return undefined;
        }

        if (value !== undefined && value !== null) {
            this.cache.set(key, value, ttlMs);
        }
        return value;
    }

    protected invalidateCache(key: string): void {
        this.cache.invalidate(key);
    }

    /** @returns The number of entries removed. */
    protected invalidateCachePattern(prefix: string): number {
        return this.cache.removeByPrefix(prefix);
    }

    // --- Instrumentation ---

    getPerformanceStats(): PerformanceStats {
        return this.instrumentation.getStats();
    }

    resetPerformanceStats(): void {
        this.instrumentation.reset();
    }
}

function runCancellable<T>(operation: string, action: Action<T>, signal: AbortSignal | undefined): Promise<T> {
    if (signal === undefined) {
        return Promise.resolve().then(() => action(undefined));
    }
    if (signal.aborted) {
        return Promise.reject(AppError.cancelled(operation));
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(AppError.cancelled(operation));
        signal.addEventListener('abort', onAbort, { once: true });
        void Promise.resolve()
            .then(() => action(signal))
            .then(resolve, reject)
            .finally(() => signal.removeEventListener('abort', onAbort));
    });
}
