import { randomUUID } from 'node:crypto';
import { freeze } from 'immer';
import { inject, injectable } from 'inversify';
import PQueue from 'p-queue';
import { LOG_PREFIX } from '@/constants';
import type { Clock } from '@/core/runtime/clock';
import type { ServiceEvents } from '@/core/runtime/service-events';
import type { ServiceCoreSettings } from '@/schemas';
import { TYPES } from '@/types/inversify.types';
import { ReadWriteBarrier } from '@/utils/read-write-barrier';
import type { AppError } from './app-error';
import { classifyError } from './classifier';
import { EMPTY_ERROR_STATISTICS, ErrorHistory } from './history';
import type { RecoveryStrategy } from './recovery';
import { isReportable, isUserVisible, type ErrorKind, type ErrorSeverity } from './taxonomy';
import type { TelemetryReporter } from './telemetry';
import { ThrottleGate } from './throttle';
import type { ErrorRecord, ErrorReport, ErrorStatistics, HandleOutcome, SystemInfo } from './types';

/**
 * Turns arbitrary failures into classified, throttled and recorded errors,
 * then decides whether each one is recovered, displayed or reported.
 *
 * Bookkeeping (throttle state, history, statistics) runs synchronously in
 * `handle` under the pipeline's own barrier. Recovery runs next, outside the
 * queue, so a strategy may itself hand failures back to `handle`. Display and
 * reporting run on a serial queue.
 */
@injectable()
export class ErrorPipeline {
    private readonly barrier = new ReadWriteBarrier('error-pipeline');
    private readonly presentation = new PQueue({ concurrency: 1 });
    private readonly history: ErrorHistory;
    private readonly throttle: ThrottleGate;
    private readonly strategies = new Map<ErrorKind, RecoveryStrategy>();
    private readonly retentionMs: number;
    private readonly reportRecentCount: number;
    private readonly appVersion: string;

    private statistics: ErrorStatistics = EMPTY_ERROR_STATISTICS;
    private displayed: AppError | undefined;
    /** Bumped by `clearAllErrors`; queued presentation from an older generation is skipped. */
    private generation = 0;

    constructor(
        @inject(TYPES.Settings) settings: ServiceCoreSettings,
        @inject(TYPES.Clock) private readonly clock: Clock,
        @inject(TYPES.TelemetryReporter) private readonly reporter: TelemetryReporter,
        @inject(TYPES.EventBus) private readonly events: ServiceEvents
    ) {
        this.history = new ErrorHistory(settings.errors.historyCapacity);
        this.throttle = new ThrottleGate(settings.errors.throttle);
        this.retentionMs = settings.errors.retentionMs;
        this.reportRecentCount = settings.errors.reportRecentCount;
        this.appVersion = settings.appVersion;
    }

    get currentError(): AppError | undefined {
        return this.displayed;
    }

    get isShowingError(): boolean {
        return this.displayed !== undefined;
    }

    /**
     * Classifies and processes one failure. Resolves once the error has been
     * recovered or has gone through display and reporting, or immediately
     * when throttled.
     */
    async handle(error: unknown, context: string): Promise<HandleOutcome> {
        const appError = classifyError(error);
        const now = this.clock.now();

        const record = this.barrier.exclusiveNow(() => {
            if (!this.throttle.tryAccept(appError.kind, now)) {
                return undefined;
            }
            const accepted = createRecord(appError, context, now);
            this.history.add(accepted);
            this.statistics = this.history.statistics(now);
            return accepted;
        });

        if (record === undefined) {
            console.debug(`${LOG_PREFIX} Throttled ${appError.kind} error in ${context}.`);
            return { status: 'throttled', error: appError };
        }

        logBySeverity(record.severity, `${LOG_PREFIX} ${record.severity} ${record.kind} error in ${context}: ${record.message}`, appError);

        const generation = this.generation;
        const strategy = this.strategies.get(appError.kind);
        if (strategy !== undefined && (await this.tryRecover(strategy, appError, record))) {
            return { status: 'recovered', error: appError, record };
        }
        return this.presentation.add(() => this.present(appError, record, generation), { throwOnTimeout: true });
    }

    dismissError(): void {
        if (this.displayed === undefined) return;
        this.displayed = undefined;
        this.events.emit('error-dismissed');
    }

    /**
     * Resets history, statistics and throttle state and hides the displayed
     * error. Errors already queued for presentation are not displayed.
     */
    clearAllErrors(): void {
        this.generation++;
        this.barrier.exclusiveNow(() => {
            this.history.clear();
            this.throttle.reset();
            this.statistics = EMPTY_ERROR_STATISTICS;
        });
        this.dismissError();
    }

    registerRecoveryStrategy(kind: ErrorKind, strategy: RecoveryStrategy): void {
        this.strategies.set(kind, strategy);
    }

    unregisterRecoveryStrategy(kind: ErrorKind): boolean {
        return this.strategies.delete(kind);
    }

    hasRecoveryStrategy(kind: ErrorKind): boolean {
        return this.strategies.has(kind);
    }

    /** Newest first. */
    getErrorHistory(limit?: number): readonly ErrorRecord[] {
        return this.barrier.shared(() => this.history.recent(limit));
    }

    getErrorStatistics(): ErrorStatistics {
        return this.barrier.shared(() => this.statistics);
    }

    exportErrorReport(): ErrorReport {
        const now = this.clock.now();
        return this.barrier.shared(() =>
            freeze(
                {
                    generatedAt: now,
                    statistics: this.statistics,
                    recentErrors: this.history.recent(this.reportRecentCount),
                    systemInfo: this.collectSystemInfo(),
                },
                true
            )
        );
    }

    /**
     * Drops records older than the retention period and throttle state that
     * no longer suppresses anything.
     * @returns The number of records dropped.
     */
    cleanupOldErrors(): number {
        const now = this.clock.now();
        return this.barrier.exclusiveNow(() => {
            const removed = this.history.removeOlderThan(now - this.retentionMs);
            this.throttle.prune(now);
            this.statistics = this.history.statistics(now);
            return removed;
        });
    }

    /** Resolves when every queued presentation step has run. */
    onIdle(): Promise<void> {
        return this.presentation.onIdle();
    }

    private async tryRecover(strategy: RecoveryStrategy, error: AppError, record: ErrorRecord): Promise<boolean> {
        try {
            await strategy.recover(error);
            console.info(`${LOG_PREFIX} Recovered from ${error.kind} error in ${record.context}.`);
            return true;
        } catch (recoveryError) {
            console.warn(`${LOG_PREFIX} Recovery for ${error.kind} error failed.`, recoveryError);
            return false;
        }
    }

    private async present(error: AppError, record: ErrorRecord, generation: number): Promise<HandleOutcome> {
        // Also covers a clear that happened while recovery was pending.
        if (generation !== this.generation) {
            return { status: 'discarded', error, record };
        }

        const displayed = isUserVisible(error.severity);
        if (displayed) {
            this.displayed = error;
            this.events.emit('error-displayed', error);
        }

        const reported = isReportable(error.severity) ? await this.report(error, record.context) : false;
        return { status: 'surfaced', error, record, displayed, reported };
    }

    private async report(error: AppError, context: string): Promise<boolean> {
        try {
            await this.reporter.report(error, context);
            return true;
        } catch (reportError) {
            console.error(`${LOG_PREFIX} Telemetry reporter failed.`, reportError);
            return false;
        }
    }

    private collectSystemInfo(): SystemInfo {
        const memory = process.memoryUsage();
        return {
            appVersion: this.appVersion,
            nodeVersion: process.version,
            platform: process.platform,
            arch: process.arch,
            pid: process.pid,
            uptimeSeconds: Math.floor(process.uptime()),
            rssBytes: memory.rss,
            heapUsedBytes: memory.heapUsed,
        };
    }
}

function createRecord(error: AppError, context: string, timestamp: number): ErrorRecord {
    return freeze({
        id: randomUUID(),
        kind: error.kind,
        severity: error.severity,
        message: error.message,
        context,
        timestamp,
    });
}

function logBySeverity(severity: ErrorSeverity, message: string, error: AppError): void {
    switch (severity) {
        case 'info':
            console.info(message);
            break;
        case 'warning':
            console.warn(message);
            break;
        case 'error':
        case 'critical':
            console.error(message, error);
            break;
    }
}
