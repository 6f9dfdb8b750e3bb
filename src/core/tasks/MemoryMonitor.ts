import { inject, injectable } from 'inversify';
import { LOG_PREFIX } from '@/constants';
import { Component } from '@/core/runtime/component';
import type { ServiceEvents } from '@/core/runtime/service-events';
import type { ServiceCoreSettings } from '@/schemas';
import { TYPES } from '@/types/inversify.types';

/** Returns the number of heap bytes currently in use. */
export type MemorySampler = () => number;

export const processHeapSampler: MemorySampler = () => process.memoryUsage().heapUsed;

/**
 * Samples heap usage on an interval and turns threshold crossings into
 * `memory-pressure` / `memory-recovered` events.
 */
@injectable()
export class MemoryMonitor extends Component {
    private readonly enabled: boolean;
    private readonly sampleIntervalMs: number;
    private readonly thresholdBytes: number;
    private lowMemory = false;

    constructor(
        @inject(TYPES.Settings) settings: ServiceCoreSettings,
        @inject(TYPES.EventBus) private readonly events: ServiceEvents,
        @inject(TYPES.MemorySampler) private readonly sampler: MemorySampler
    ) {
        super();
        this.enabled = settings.memory.enabled;
        this.sampleIntervalMs = settings.memory.sampleIntervalMs;
        this.thresholdBytes = settings.memory.lowMemoryThresholdBytes;
    }

    get isLowMemory(): boolean {
        return this.lowMemory;
    }

    protected override onload(): void {
        if (!this.enabled) return;
        const timer = setInterval(() => this.sample(), this.sampleIntervalMs);
        timer.unref();
        this.register(() => clearInterval(timer));
    }

    protected override onunload(): void {
        this.lowMemory = false;
    }

    /** Takes one sample and emits on a threshold crossing. */
    sample(): void {
        const used = this.sampler();
        if (!this.lowMemory && used >= this.thresholdBytes) {
            this.lowMemory = true;
            console.warn(`${LOG_PREFIX} Entering low-memory mode (${used} bytes in use).`);
            this.events.emit('memory-pressure', 'low');
        } else if (this.lowMemory && used < this.thresholdBytes) {
            this.lowMemory = false;
            console.info(`${LOG_PREFIX} Leaving low-memory mode.`);
            this.events.emit('memory-recovered');
        }
    }

    /** Forwards an external memory warning to every pressure listener. */
    signalMemoryWarning(): void {
        console.warn(`${LOG_PREFIX} Memory warning received.`);
        this.events.emit('memory-pressure', 'warning');
    }
}
