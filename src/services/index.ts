/**
 * Services Module
 *
 * The base class business services extend, and the result type its
 * operations return.
 *
 * @module services
 *
 * ## Components
 *
 * - **ServiceBase**: Times operations, routes failures to the error pipeline
 *   and offers a cached-or-fetch helper
 * - **ServiceResult**: Success/failure union with combinators
 *
 * ## Usage
 *
 * ```typescript
 * import * as v from 'valibot';
 * import { injectable } from 'inversify';
 * import { ServiceBase } from '@/services';
 *
 * @injectable()
 * class ProfileService extends ServiceBase {
 *   loadProfile(id: string) {
 *     return this.cachedOrFetch(`profile:${id}`, 60_000, ProfileSchema, () => api.fetchProfile(id));
 *   }
 * }
 * ```
 */

// ============================================================================
// CONCRETE IMPLEMENTATIONS
// ============================================================================

export { ServiceBase } from './ServiceBase';
export { ServiceResult } from './service-result';

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type { Action, ExecuteOptions, Provider } from './ServiceBase';
