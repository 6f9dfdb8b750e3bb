import type { ExpiringCache } from '@/core/cache/ExpiringCache';
import type { ServiceEvents } from '@/core/runtime/service-events';
import type { AppError } from './app-error';
import type { ErrorKind } from './taxonomy';

/**
 * Corrective action attempted before an error is surfaced. Completing means
 * the error is resolved; throwing (or rejecting) means recovery failed.
 */
export interface RecoveryStrategy {
    recover(error: AppError): void | Promise<void>;
}

export class RecoveryError extends Error {
    readonly code = 'RECOVERY_FAILED';

    constructor(
        readonly kind: ErrorKind,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'RecoveryError';
    }
}

/**
 * Asks listeners of `retry-requested` to retry. Fails when nobody listens.
 */
export class NetworkRecoveryStrategy implements RecoveryStrategy {
    constructor(private readonly events: ServiceEvents) {}

    recover(error: AppError): void {
        if (!this.events.emit('retry-requested', error)) {
            throw new RecoveryError(error.kind, 'No retry handler is listening', { cause: error });
        }
    }
}

/**
 * Drops every cached value so the next read goes back to its source. The
 * storage failure itself is not resolved by this, so the error still surfaces.
 */
export class StorageRecoveryStrategy implements RecoveryStrategy {
    constructor(private readonly cache: ExpiringCache) {}

    recover(error: AppError): void {
        this.cache.invalidateAll();
        throw new RecoveryError(error.kind, 'Cache invalidated; the storage failure remains', { cause: error });
    }
}
