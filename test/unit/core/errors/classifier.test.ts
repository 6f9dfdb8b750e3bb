import * as v from 'valibot';
import { describe, expect, it } from 'vitest';
import { AppError } from '@/core/errors/app-error';
import { classifyError, resolveErrorKind } from '@/core/errors/classifier';
import { describeKind } from '@/core/errors/taxonomy';

function withFields(message: string, fields: Record<string, unknown>): Error {
    return Object.assign(new Error(message), fields);
}

function thrownBy(action: () => unknown): unknown {
    try {
        action();
    } catch (error) {
        return error;
    }
    return undefined;
}

describe('resolveErrorKind', () => {
    it.each([
        ['ECONNREFUSED', 'network'],
        ['ETIMEDOUT', 'timeout'],
        ['ENOENT', 'notFound'],
        ['EACCES', 'forbidden'],
        ['ENOSPC', 'storage'],
        ['ABORT_ERR', 'cancelled'],
        ['SQLITE_CORRUPT', 'dataCorruption'],
        ['SQLITE_BUSY', 'database'],
        ['ER_DUP_ENTRY', 'database'],
    ])('maps code %s to %s', (code, kind) => {
        expect(resolveErrorKind(withFields('failed', { code }))).toBe(kind);
    });

    it.each([
        [401, 'unauthorized'],
        [403, 'forbidden'],
        [404, 'notFound'],
        [408, 'timeout'],
        [422, 'validation'],
        [503, 'server'],
    ])('maps status %d to %s', (status, kind) => {
        expect(resolveErrorKind(withFields('failed', { status }))).toBe(kind);
    });

    it('reads statusCode as well as status', () => {
        expect(resolveErrorKind(withFields('failed', { statusCode: 500 }))).toBe('server');
    });

    it('maps abort, timeout and syntax errors by name', () => {
        expect(resolveErrorKind(withFields('stopped', { name: 'AbortError' }))).toBe('cancelled');
        expect(resolveErrorKind(withFields('too slow', { name: 'TimeoutError' }))).toBe('timeout');
        expect(resolveErrorKind(thrownBy(() => JSON.parse('{')))).toBe('decoding');
    });

    it('maps valibot failures to validation', () => {
        expect(resolveErrorKind(thrownBy(() => v.parse(v.string(), 1)))).toBe('validation');
    });

    it('maps a failed fetch to network', () => {
        expect(resolveErrorKind(new TypeError('fetch failed'))).toBe('network');
    });

    it('falls back to unknown', () => {
        expect(resolveErrorKind(new Error('boom'))).toBe('unknown');
        expect(resolveErrorKind('plain string')).toBe('unknown');
        expect(resolveErrorKind(withFields('odd', { code: 'E_CUSTOM', status: 302 }))).toBe('unknown');
    });
});

describe('classifyError', () => {
    it('passes an AppError through unchanged', () => {
        const error = AppError.storage();

        expect(classifyError(error)).toBe(error);
    });

    it('keeps the message, cause, code and status', () => {
        const raw = withFields('upstream unavailable', { code: 'ECONNRESET', status: 502 });

        const error = classifyError(raw);

        expect(error.kind).toBe('network');
        expect(error.message).toBe('upstream unavailable');
        expect(error.cause).toBe(raw);
        expect(error.details).toEqual({ code: 'ECONNRESET', status: 502 });
    });

    it('describes the kind when there is no message', () => {
        const error = classifyError(new Error(''));

        expect(error.message).toBe(describeKind('unknown'));
        expect(error.details).toBeUndefined();
        expect(error.severity).toBe('critical');
    });

    it('stringifies thrown non-errors', () => {
        expect(classifyError(42).message).toBe('42');
    });
});

describe('AppError', () => {
    it('derives severity and retryability from its kind', () => {
        const server = AppError.server(500, 'down');
        expect(server.kind).toBe('server');
        expect(server.severity).toBe('error');
        expect(server.retryable).toBe(true);
        expect(server.message).toBe('Server error (500): down');
        expect(AppError.storage().severity).toBe('error');
        expect(AppError.storage().retryable).toBe(false);
        expect(AppError.network().severity).toBe('warning');
        expect(AppError.validation('bad input').severity).toBe('info');
        expect(new AppError('dataCorruption').severity).toBe('critical');
    });

    it('freezes its details', () => {
        const error = AppError.notFound('user:1');

        expect(error.details).toEqual({ resource: 'user:1' });
        expect(Object.isFrozen(error.details)).toBe(true);
    });

    it('offers the recovery suggestion of its kind', () => {
        expect(AppError.storage().recoverySuggestion).toBe('Check the available storage space and try again.');
        expect(AppError.network().recoverySuggestion).toBe('Check the network connection and try again.');
    });

    it('names the cancelled operation', () => {
        expect(AppError.cancelled('sync').message).toBe("Operation 'sync' was cancelled");
        expect(AppError.cancelled().message).toBe(describeKind('cancelled'));
    });
});
