import * as v from 'valibot';

// ============================================================================
// CACHE SCHEMAS
// ============================================================================

/**
 * Schema for the expiring cache. A capacity of zero is accepted and turns the
 * cache into a pass-through that never retains a value.
 */
export const CacheSettingsSchema = v.object({
    capacity: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0)), 100),
    defaultTtlMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), 300_000),
    sweepIntervalMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1000)), 60_000),
});

export type CacheSettings = v.InferOutput<typeof CacheSettingsSchema>;

// ============================================================================
// ERROR PIPELINE SCHEMAS
// ============================================================================

const IntervalThrottleSchema = v.object({
    mode: v.literal('interval'),
    intervalMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0)), 5000),
});

const WindowThrottleSchema = v.object({
    mode: v.literal('window'),
    windowMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), 60_000),
    maxOccurrences: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), 5),
});

/**
 * Throttle policy per error kind. `interval` suppresses everything that
 * arrives within `intervalMs` of the last accepted occurrence; `window`
 * accepts at most `maxOccurrences` per fixed window.
 */
export const ThrottlePolicySchema = v.variant('mode', [IntervalThrottleSchema, WindowThrottleSchema]);

export type ThrottlePolicy = v.InferOutput<typeof ThrottlePolicySchema>;

export const ErrorSettingsSchema = v.object({
    historyCapacity: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(10_000)), 100),
    retentionMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), 7 * 24 * 60 * 60 * 1000),
    cleanupIntervalMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1000)), 300_000),
    reportRecentCount: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0)), 20),
    throttle: v.optional(ThrottlePolicySchema, { mode: 'interval', intervalMs: 5000 }),
});

export type ErrorSettings = v.InferOutput<typeof ErrorSettingsSchema>;

// ============================================================================
// MEMORY SCHEMAS
// ============================================================================

export const MemorySettingsSchema = v.object({
    enabled: v.optional(v.boolean(), true),
    sampleIntervalMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(100)), 5000),
    lowMemoryThresholdBytes: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), 512 * 1024 * 1024),
});

export type MemorySettings = v.InferOutput<typeof MemorySettingsSchema>;

// ============================================================================
// ROOT SCHEMA
// ============================================================================

export const ServiceCoreSettingsSchema = v.object({
    appVersion: v.optional(v.string(), '0.0.0'),
    cache: v.optional(CacheSettingsSchema, {}),
    errors: v.optional(ErrorSettingsSchema, {}),
    memory: v.optional(MemorySettingsSchema, {}),
});

export type ServiceCoreSettings = v.InferOutput<typeof ServiceCoreSettingsSchema>;
export type ServiceCoreSettingsInput = v.InferInput<typeof ServiceCoreSettingsSchema>;
