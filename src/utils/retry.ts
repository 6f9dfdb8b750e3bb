import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryOptions {
    maxRetries?: number;
    baseDelay?: number;
    maxDelay?: number;
    /** Per-attempt timeout in ms; 0 disables it. */
    timeout?: number;
    context?: string;
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    /** Aborting stops further attempts and rejects with the signal's reason. */
    signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Pick<RetryOptions, 'maxRetries' | 'baseDelay' | 'maxDelay' | 'timeout'>> = {
    maxRetries: 3,
    baseDelay: 100,
    maxDelay: 5000,
    timeout: 0,
};

export class OperationTimeoutError extends Error {
    readonly code = 'ETIMEDOUT';

    constructor(
        readonly timeoutMs: number,
        context?: string
    ) {
        super(`Timeout: ${context ?? 'Operation timed out'} after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/** Delay before the retry that follows `attempt` (1-based), without jitter. */
export function backoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
    return Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
}

/**
 * Executes an operation with exponential backoff retry logic and optional
 * per-attempt timeout protection.
 */
export async function executeWithRetry<T>(
    operation: () => Promise<T> | T,
    options: RetryOptions = {}
): Promise<T> {
    const config = { ...DEFAULT_OPTIONS, ...options };
    let lastError: unknown;

    for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
        config.signal?.throwIfAborted();
        try {
            return await runAttempt(operation, config.timeout, config.context);
        } catch (error) {
            lastError = error;

            const isLastAttempt = attempt > config.maxRetries;
            const shouldRetry = config.shouldRetry ? config.shouldRetry(error, attempt) : true;
            if (isLastAttempt || !shouldRetry) {
                throw error;
            }

            // Exponential backoff with +/-15% jitter.
            const jitter = Math.random() * 0.3 + 0.85;
            const delay = Math.min(backoffDelay(attempt, config.baseDelay, config.maxDelay) * jitter, config.maxDelay);
            await sleep(delay, undefined, config.signal !== undefined ? { signal: config.signal } : {});
        }
    }

    throw lastError;
}

async function runAttempt<T>(operation: () => Promise<T> | T, timeout: number, context: string | undefined): Promise<T> {
    if (timeout <= 0) {
        return await operation();
    }
    let timer: NodeJS.Timeout | undefined;
    try {
        return await Promise.race([
            Promise.resolve().then(operation),
            new Promise<never>((_, reject) => {
                timer = setTimeout(() => reject(new OperationTimeoutError(timeout, context)), timeout);
            }),
        ]);
    } finally {
        clearTimeout(timer);
    }
}
