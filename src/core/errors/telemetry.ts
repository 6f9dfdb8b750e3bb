import { LOG_PREFIX } from '@/constants';
import type { AppError } from './app-error';

/**
 * Receives errors of severity `error` and `critical` together with the
 * context they were raised in.
 */
export interface TelemetryReporter {
    report(error: AppError, context: string): void | Promise<void>;
}

export class ConsoleTelemetryReporter implements TelemetryReporter {
    report(error: AppError, context: string): void {
        console.error(`${LOG_PREFIX} [telemetry] ${error.severity} ${error.kind} in ${context}: ${error.message}`);
    }
}
