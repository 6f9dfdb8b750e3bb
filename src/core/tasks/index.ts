/**
 * Background Tasks Module
 *
 * Periodic maintenance and memory-pressure handling.
 *
 * @module core/tasks
 */

export { BackgroundTaskManager } from './BackgroundTaskManager';
export { MemoryMonitor, processHeapSampler, type MemorySampler } from './MemoryMonitor';
