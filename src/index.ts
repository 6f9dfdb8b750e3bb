import 'reflect-metadata'; // Must be the first import

export * from '@/core';
export * from '@/services';
export { ServiceCore, SettingsInitializer, SettingsValidationError } from '@/main';
export type { ServiceConstructor, ServiceCoreOptions, ServiceCoreStatus } from '@/main';
export { configureServices, type ServiceOverrides } from '@/inversify.config';
export { TYPES } from '@/types/inversify.types';
export { DEFAULT_SETTINGS, LOG_PREFIX } from '@/constants';
export {
    CacheSettingsSchema,
    ErrorSettingsSchema,
    MemorySettingsSchema,
    ServiceCoreSettingsSchema,
    ThrottlePolicySchema,
    type CacheSettings,
    type ErrorSettings,
    type MemorySettings,
    type ServiceCoreSettings,
    type ServiceCoreSettingsInput,
    type ThrottlePolicy,
} from '@/schemas';
export { BarrierViolationError, ReadWriteBarrier } from '@/utils/read-write-barrier';
export { OperationTimeoutError, backoffDelay, executeWithRetry, type RetryOptions } from '@/utils/retry';
