import * as v from 'valibot';
import { AppError, isAppError } from './app-error';
import type { ErrorKind } from './taxonomy';

/** Node.js and driver error codes with a fixed place in the taxonomy. */
const CODE_KINDS: Readonly<Record<string, ErrorKind>> = {
    ECONNREFUSED: 'network',
    ECONNRESET: 'network',
    ECONNABORTED: 'network',
    EHOSTUNREACH: 'network',
    ENETUNREACH: 'network',
    ENOTFOUND: 'network',
    EAI_AGAIN: 'network',
    EPIPE: 'network',
    ETIMEDOUT: 'timeout',
    ESOCKETTIMEDOUT: 'timeout',
    ENOENT: 'notFound',
    EACCES: 'forbidden',
    EPERM: 'forbidden',
    ENOSPC: 'storage',
    EROFS: 'storage',
    EIO: 'storage',
    EDQUOT: 'storage',
    ABORT_ERR: 'cancelled',
    ERR_ENCODING_NOT_SUPPORTED: 'encoding',
    ERR_ENCODING_INVALID_ENCODED_DATA: 'decoding',
    SQLITE_CORRUPT: 'dataCorruption',
    SQLITE_NOTADB: 'dataCorruption',
    SQLITE_FULL: 'storage',
};

const NAME_KINDS: Readonly<Record<string, ErrorKind>> = {
    AbortError: 'cancelled',
    TimeoutError: 'timeout',
    SyntaxError: 'decoding',
};

function readStringField(error: unknown, field: 'code' | 'name'): string | undefined {
    if (typeof error !== 'object' || error === null || !(field in error)) {
        return undefined;
    }
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
}

function readStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) {
        return undefined;
    }
    for (const field of ['status', 'statusCode']) {
        if (field in error) {
            const value: unknown = Reflect.get(error, field);
            if (typeof value === 'number' && Number.isInteger(value)) {
                return value;
            }
        }
    }
    return undefined;
}

function kindForCode(code: string): ErrorKind | undefined {
    const known = CODE_KINDS[code];
    if (known !== undefined) return known;
    if (code.startsWith('SQLITE_') || code.startsWith('ER_')) return 'database';
    return undefined;
}

function kindForStatus(status: number): ErrorKind | undefined {
    if (status === 401) return 'unauthorized';
    if (status === 403) return 'forbidden';
    if (status === 404 || status === 410) return 'notFound';
    if (status === 408 || status === 504) return 'timeout';
    if (status === 400 || status === 422) return 'validation';
    if (status >= 500 && status <= 599) return 'server';
    return undefined;
}

/**
 * Resolves the taxonomy kind of a raw failure without wrapping it.
 */
export function resolveErrorKind(error: unknown): ErrorKind {
    if (isAppError(error)) return error.kind;
    if (error instanceof v.ValiError) return 'validation';

    const code = readStringField(error, 'code');
    if (code !== undefined) {
        const byCode = kindForCode(code);
        if (byCode !== undefined) return byCode;
    }

    const status = readStatus(error);
    if (status !== undefined) {
        const byStatus = kindForStatus(status);
        if (byStatus !== undefined) return byStatus;
    }

    const name = readStringField(error, 'name');
    if (name !== undefined) {
        const byName = NAME_KINDS[name];
        if (byName !== undefined) return byName;
    }

    // undici rejects with a bare TypeError when the connection itself fails
    if (error instanceof TypeError && error.message === 'fetch failed') return 'network';

    return 'unknown';
}

/**
 * Converts any thrown value into an `AppError`. Already classified errors
 * pass through unchanged; everything else keeps its message and is attached
 * as `cause`.
 */
export function classifyError(error: unknown): AppError {
    if (isAppError(error)) return error;

    const kind = resolveErrorKind(error);
    const message = error instanceof Error ? error.message : String(error);
    const status = readStatus(error);
    const code = readStringField(error, 'code');

    const details: Record<string, unknown> = {};
    if (code !== undefined) details['code'] = code;
    if (status !== undefined) details['status'] = status;

    return new AppError(kind, message.length > 0 ? message : undefined, {
        cause: error,
        ...(Object.keys(details).length > 0 ? { details } : {}),
    });
}
