import { Container } from 'inversify';
import { ExpiringCache } from '@/core/cache/ExpiringCache';
import { ErrorPipeline } from '@/core/errors/ErrorPipeline';
import { NetworkRecoveryStrategy, StorageRecoveryStrategy } from '@/core/errors/recovery';
import { ConsoleTelemetryReporter, type TelemetryReporter } from '@/core/errors/telemetry';
import { OperationInstrumentation } from '@/core/instrumentation/OperationInstrumentation';
import { systemClock, type Clock } from '@/core/runtime/clock';
import { ServiceEvents } from '@/core/runtime/service-events';
import { BackgroundTaskManager } from '@/core/tasks/BackgroundTaskManager';
import { MemoryMonitor, processHeapSampler, type MemorySampler } from '@/core/tasks/MemoryMonitor';
import type { ServiceCoreSettings } from '@/schemas';
import { TYPES } from '@/types/inversify.types';

/** Collaborators that callers (and tests) may substitute. */
export interface ServiceOverrides {
  clock?: Clock;
  events?: ServiceEvents;
  telemetryReporter?: TelemetryReporter;
  memorySampler?: MemorySampler;
}

export function configureServices(settings: ServiceCoreSettings, overrides: ServiceOverrides = {}): Container {
  const container = new Container({
    defaultScope: 'Singleton',
  });

  // == CORE & CONSTANT BINDINGS ==
  container.bind<Container>(TYPES.Container).toConstantValue(container);
  container.bind<ServiceCoreSettings>(TYPES.Settings).toConstantValue(settings);
  container.bind<Clock>(TYPES.Clock).toConstantValue(overrides.clock ?? systemClock);
  container.bind<ServiceEvents>(TYPES.EventBus).toConstantValue(overrides.events ?? new ServiceEvents());
  container.bind<TelemetryReporter>(TYPES.TelemetryReporter).toConstantValue(overrides.telemetryReporter ?? new ConsoleTelemetryReporter());
  container.bind<MemorySampler>(TYPES.MemorySampler).toConstantValue(overrides.memorySampler ?? processHeapSampler);

  // == SINGLETON CLASS BINDINGS ==
  container.bind<ExpiringCache>(TYPES.Cache).to(ExpiringCache);
  container
    .bind<ErrorPipeline>(TYPES.ErrorPipeline)
    .to(ErrorPipeline)
    .onActivation((context, pipeline) => {
      pipeline.registerRecoveryStrategy('network', new NetworkRecoveryStrategy(context.container.get<ServiceEvents>(TYPES.EventBus)));
      pipeline.registerRecoveryStrategy('storage', new StorageRecoveryStrategy(context.container.get<ExpiringCache>(TYPES.Cache)));
      return pipeline;
    });

  // Task Managers
  container.bind<MemoryMonitor>(TYPES.MemoryMonitor).to(MemoryMonitor);
  container.bind<BackgroundTaskManager>(TYPES.BackgroundTaskManager).to(BackgroundTaskManager);

  // == TRANSIENT BINDINGS ==
  // Every service gets its own statistics.
  container.bind<OperationInstrumentation>(TYPES.OperationInstrumentation).to(OperationInstrumentation).inTransientScope();

  return container;
}
