import type { Container, interfaces } from 'inversify';
import { LOG_PREFIX } from '@/constants';
import type { ExpiringCache } from '@/core/cache/ExpiringCache';
import type { ErrorPipeline } from '@/core/errors/ErrorPipeline';
import type { OperationInstrumentation } from '@/core/instrumentation/OperationInstrumentation';
import type { Clock } from '@/core/runtime/clock';
import type { ServiceEvents } from '@/core/runtime/service-events';
import type { BackgroundTaskManager } from '@/core/tasks/BackgroundTaskManager';
import type { MemoryMonitor } from '@/core/tasks/MemoryMonitor';
import { configureServices, type ServiceOverrides } from '@/inversify.config';
import type { ServiceCoreSettings } from '@/schemas';
import type { ServiceBase } from '@/services/ServiceBase';
import { TYPES } from '@/types/inversify.types';
import { SettingsInitializer } from './initialization';

export interface ServiceCoreOptions extends ServiceOverrides {
    /** Partial settings; omitted fields take their defaults. */
    settings?: unknown;
}

export type ServiceCoreStatus = 'created' | 'running' | 'stopped';

/** A business service built from the base dependencies alone. */
export type ServiceConstructor<T extends ServiceBase> = new (
    cache: ExpiringCache,
    errorPipeline: ErrorPipeline,
    instrumentation: OperationInstrumentation,
    clock: Clock
) => T;

/**
 * Owns the container and the lifetime of everything in it. Create one per
 * process, `start()` it, register business services, and `shutdown()` it.
 */
export class ServiceCore {
    private _status: ServiceCoreStatus = 'created';
    private shutdownPromise: Promise<void> | null = null;

    private constructor(
        readonly settings: ServiceCoreSettings,
        readonly container: Container
    ) {}

    /**
     * Validates the settings and builds the container.
     * @throws SettingsValidationError when the settings do not parse.
     */
    static create(options: ServiceCoreOptions = {}): ServiceCore {
        const { settings: input, ...overrides } = options;
        const settings = new SettingsInitializer().resolve(input);
        return new ServiceCore(settings, configureServices(settings, overrides));
    }

    get status(): ServiceCoreStatus {
        return this._status;
    }

    get cache(): ExpiringCache {
        return this.container.get<ExpiringCache>(TYPES.Cache);
    }

    get errorPipeline(): ErrorPipeline {
        return this.container.get<ErrorPipeline>(TYPES.ErrorPipeline);
    }

    get events(): ServiceEvents {
        return this.container.get<ServiceEvents>(TYPES.EventBus);
    }

    get memoryMonitor(): MemoryMonitor {
        return this.container.get<MemoryMonitor>(TYPES.MemoryMonitor);
    }

    get backgroundTasks(): BackgroundTaskManager {
        return this.container.get<BackgroundTaskManager>(TYPES.BackgroundTaskManager);
    }

    /** Starts the maintenance timers and the memory monitor. */
    start(): void {
        if (this._status === 'running') return;
        if (this._status === 'stopped') {
            throw new Error(`${LOG_PREFIX} A stopped core cannot be restarted.`);
        }
        this.backgroundTasks.load();
        this.memoryMonitor.load();
        this._status = 'running';
        console.info(`${LOG_PREFIX} Started (version ${this.settings.appVersion}).`);
    }

    /**
     * Binds a business service as a singleton and returns its instance. The
     * service gets the shared cache and pipeline and its own instrumentation.
     * Services with further dependencies bind through `container` directly.
     */
    registerService<T extends ServiceBase>(identifier: interfaces.ServiceIdentifier<T>, service: ServiceConstructor<T>): T {
        if (this._status === 'stopped') {
            throw new Error(`${LOG_PREFIX} Cannot register a service after shutdown.`);
        }
        this.container
            .bind<T>(identifier)
            .toDynamicValue(
                ({ container }) =>
                    new service(
                        container.get<ExpiringCache>(TYPES.Cache),
                        container.get<ErrorPipeline>(TYPES.ErrorPipeline),
                        container.get<OperationInstrumentation>(TYPES.OperationInstrumentation),
                        container.get<Clock>(TYPES.Clock)
                    )
            )
            .inSingletonScope();
        return this.container.get<T>(identifier);
    }

    getService<T>(identifier: interfaces.ServiceIdentifier<T>): T {
        return this.container.get<T>(identifier);
    }

    /**
     * Stops every timer and subscription, waits for queued error presentation
     * and releases the container. Safe to call more than once.
     */
    shutdown(): Promise<void> {
        if (this.shutdownPromise === null) {
            this.shutdownPromise = this.performShutdown();
        }
        return this.shutdownPromise;
    }

    private async performShutdown(): Promise<void> {
        const wasStarted = this._status === 'running';
        this._status = 'stopped';
        try {
            if (wasStarted) {
                this.memoryMonitor.unload();
                this.backgroundTasks.unload();
            }
            await this.errorPipeline.onIdle();
            this.cache.clearAll();
            this.events.removeAllListeners();
        } catch (error) {
            console.error(`${LOG_PREFIX} Error during shutdown.`, error);
        } finally {
            this.container.unbindAll();
        }
        console.info(`${LOG_PREFIX} Stopped.`);
    }
}
