import * as v from 'valibot';
import { ServiceCoreSettingsSchema, type ServiceCoreSettings } from '@/schemas';

export const LOG_PREFIX = 'ServiceCore:';

export const ONE_HOUR_MS = 60 * 60 * 1000;
export const ONE_DAY_MS = 24 * ONE_HOUR_MS;

/** Share of capacity evicted when a `set` finds the cache full. */
export const EVICTION_FRACTION = 5;

export const DEFAULT_SETTINGS: ServiceCoreSettings = v.parse(ServiceCoreSettingsSchema, {});
