/**
 * Core Module
 *
 * Infrastructure shared by every business service.
 *
 * @module core
 *
 * ## Sub-modules
 *
 * - **cache**: Expiring key/value cache with capacity-bounded eviction
 * - **errors**: Error taxonomy, classification and the error pipeline
 * - **instrumentation**: Per-operation count and duration statistics
 * - **runtime**: Clock, event bus and the component lifecycle base
 * - **tasks**: Background maintenance and memory monitoring
 */

export * from './cache';
export * from './errors';
export * from './instrumentation';
export * from './runtime';
export * from './tasks';
