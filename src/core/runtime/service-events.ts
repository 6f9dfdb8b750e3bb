import { EventEmitter } from 'eventemitter3';
import type { AppError } from '@/core/errors/app-error';

export type MemoryPressureLevel = 'low' | 'warning';

/**
 * Signatures for every event that crosses component boundaries.
 */
export interface ServiceCoreEvents {
    'memory-pressure': (level: MemoryPressureLevel) => void;
    'memory-recovered': () => void;
    /** Raised by the network recovery strategy; a listener that returns without throwing owns the retry. */
    'retry-requested': (error: AppError) => void;
    'error-displayed': (error: AppError) => void;
    'error-dismissed': () => void;
}

/**
 * The central event bus. eventemitter3 checks event names and listener
 * arguments against `ServiceCoreEvents` at compile time.
 */
export class ServiceEvents extends EventEmitter<ServiceCoreEvents> {}
