import { inject, injectable } from 'inversify';
import { LOG_PREFIX } from '@/constants';
import type { ExpiringCache } from '@/core/cache/ExpiringCache';
import type { ErrorPipeline } from '@/core/errors/ErrorPipeline';
import { Component } from '@/core/runtime/component';
import type { MemoryPressureLevel, ServiceEvents } from '@/core/runtime/service-events';
import type { ServiceCoreSettings } from '@/schemas';
import { TYPES } from '@/types/inversify.types';

/**
 * Owns the periodic maintenance work: the cache expiry sweep, the error
 * history cleanup and the response to memory-pressure events. Everything it
 * starts on load is stopped on unload.
 */
@injectable()
export class BackgroundTaskManager extends Component {
  private readonly sweepIntervalMs: number;
  private readonly cleanupIntervalMs: number;

  constructor(
    @inject(TYPES.Settings) settings: ServiceCoreSettings,
    @inject(TYPES.Cache) private readonly cache: ExpiringCache,
    @inject(TYPES.ErrorPipeline) private readonly errorPipeline: ErrorPipeline,
    @inject(TYPES.EventBus) private readonly events: ServiceEvents
  ) {
    super();
    this.sweepIntervalMs = settings.cache.sweepIntervalMs;
    this.cleanupIntervalMs = settings.errors.cleanupIntervalMs;
  }

  protected override onload(): void {
    this.startInterval(() => this.sweepCache(), this.sweepIntervalMs);
    this.startInterval(() => this.cleanupErrors(), this.cleanupIntervalMs);

    const onPressure = (level: MemoryPressureLevel): void => this.handleMemoryPressure(level);
    this.events.on('memory-pressure', onPressure);
    this.register(() => this.events.off('memory-pressure', onPressure));
  }

  sweepCache(): void {
    const removed = this.cache.clearExpiredItems();
    if (removed > 0) {
      console.debug(`${LOG_PREFIX} Swept ${removed} expired cache entries.`);
    }
  }

  cleanupErrors(): void {
    const removed = this.errorPipeline.cleanupOldErrors();
    if (removed > 0) {
      console.debug(`${LOG_PREFIX} Removed ${removed} old error records.`);
    }
  }

  handleMemoryPressure(level: MemoryPressureLevel): void {
    if (level === 'warning') {
      this.cache.respondToMemoryPressure();
    } else {
      this.cache.reduceCacheSize();
    }
  }

  private startInterval(task: () => void, intervalMs: number): void {
    const timer = setInterval(() => {
      try {
        task();
      } catch (error) {
        console.error(`${LOG_PREFIX} Background task failed.`, error);
      }
    }, intervalMs);
    timer.unref();
    this.register(() => clearInterval(timer));
  }
}
