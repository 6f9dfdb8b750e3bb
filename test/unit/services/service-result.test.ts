import { describe, expect, it } from 'vitest';
import { AppError } from '@/core/errors/app-error';
import { ServiceResult } from '@/services/service-result';

describe('ServiceResult', () => {
    const failure = ServiceResult.err<number>(AppError.notFound('item'));

    it('maps and chains successes', () => {
        const doubled = ServiceResult.map(ServiceResult.ok(2), value => value * 2);
        const chained = ServiceResult.flatMap(doubled, value => ServiceResult.ok(`${value}`));

        expect(chained).toEqual({ ok: true, value: '4' });
    });

    it('passes failures through map and flatMap untouched', () => {
        expect(ServiceResult.map(failure, value => value + 1)).toBe(failure);
        expect(ServiceResult.flatMap(failure, value => ServiceResult.ok(value))).toBe(failure);
    });

    it('replaces the error with mapError', () => {
        const mapped = ServiceResult.mapError(failure, () => AppError.storage());

        expect(mapped.ok).toBe(false);
        if (!mapped.ok) {
            expect(mapped.error.kind).toBe('storage');
        }
    });

    it('unwraps with a fallback', () => {
        expect(ServiceResult.unwrapOr(ServiceResult.ok(1), 0)).toBe(1);
        expect(ServiceResult.unwrapOr(failure, 0)).toBe(0);
        expect(ServiceResult.unwrapOrElse(failure, error => error.message.length)).toBe('Resource not found: item'.length);
    });

    it('matches on both branches', () => {
        const render = (result: ServiceResult<number>): string =>
            ServiceResult.match(result, { ok: value => `value ${value}`, err: error => `error ${error.kind}` });

        expect(render(ServiceResult.ok(5))).toBe('value 5');
        expect(render(failure)).toBe('error notFound');
    });

    it('builds results from optionals and throwing code', async () => {
        expect(ServiceResult.fromOptional('x')).toEqual({ ok: true, value: 'x' });
        const missing = ServiceResult.fromOptional(null, 'validation', 'required');
        expect(missing.ok ? undefined : missing.error.kind).toBe('validation');

        const thrown = ServiceResult.fromThrowing(() => JSON.parse('{'));
        expect(thrown.ok ? undefined : thrown.error.kind).toBe('decoding');

        const rejected = await ServiceResult.fromAsync(() => Promise.reject(Object.assign(new Error('x'), { status: 504 })));
        expect(rejected.ok ? undefined : rejected.error.kind).toBe('timeout');
    });

    it('suggests a retry only for retryable failures', () => {
        expect(ServiceResult.shouldRetry(ServiceResult.err(AppError.network()))).toBe(true);
        expect(ServiceResult.shouldRetry(failure)).toBe(false);
        expect(ServiceResult.shouldRetry(ServiceResult.ok(1))).toBe(false);
    });
});
