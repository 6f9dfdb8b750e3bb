import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS } from '@/constants';
import { SettingsInitializer, SettingsValidationError } from '@/main/initialization';

describe('SettingsInitializer', () => {
    const initializer = new SettingsInitializer();

    it('returns the defaults for missing input', () => {
        expect(initializer.resolve(undefined)).toEqual(DEFAULT_SETTINGS);
        expect(DEFAULT_SETTINGS).toEqual({
            appVersion: '0.0.0',
            cache: { capacity: 100, defaultTtlMs: 300_000, sweepIntervalMs: 60_000 },
            errors: {
                historyCapacity: 100,
                retentionMs: 7 * 24 * 60 * 60 * 1000,
                cleanupIntervalMs: 300_000,
                reportRecentCount: 20,
                throttle: { mode: 'interval', intervalMs: 5_000 },
            },
            memory: { enabled: true, sampleIntervalMs: 5_000, lowMemoryThresholdBytes: 512 * 1024 * 1024 },
        });
    });

    it('fills defaults inside a chosen throttle policy', () => {
        const settings = initializer.resolve({ errors: { throttle: { mode: 'window' } } });

        expect(settings.errors.throttle).toEqual({ mode: 'window', windowMs: 60_000, maxOccurrences: 5 });
    });

    it('accepts a capacity of zero', () => {
        expect(initializer.resolve({ cache: { capacity: 0 } }).cache.capacity).toBe(0);
    });

    it('lists every invalid field', () => {
        let caught: unknown;
        try {
            initializer.resolve({ cache: { capacity: 1.5 }, memory: { sampleIntervalMs: 10 } });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(SettingsValidationError);
        const paths = caught instanceof SettingsValidationError ? caught.issues.map(issue => issue.split(':')[0]) : [];
        expect(paths).toEqual(['cache.capacity', 'memory.sampleIntervalMs']);
    });

    it('rejects a non-object', () => {
        expect(() => initializer.resolve('fast')).toThrow(SettingsValidationError);
    });
});
