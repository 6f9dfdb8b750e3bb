/**
 * Reader/writer barrier for synchronous sections.
 *
 * Any number of shared sections may be active at once; an exclusive section
 * runs alone. Sections are synchronous, so on a single event loop they can
 * only nest through re-entrant calls. A shared section requested inside an
 * exclusive one would observe a half-applied mutation and is rejected; an
 * exclusive section requested while any section is active is deferred until
 * the barrier drains. Deferred work carrying the same coalesce key runs once.
 */

export class BarrierViolationError extends Error {
    constructor(
        readonly barrier: string,
        reason = 'shared section requested during an exclusive section'
    ) {
        super(`Barrier '${barrier}': ${reason}`);
        this.name = 'BarrierViolationError';
    }
}

interface DeferredSection {
    readonly section: () => void;
    readonly coalesceKey: string | undefined;
}

export class ReadWriteBarrier {
    private activeReaders = 0;
    private writing = false;
    private draining = false;
    private readonly deferred: DeferredSection[] = [];

    constructor(private readonly name: string) {}

    get isExclusive(): boolean {
        return this.writing;
    }

    get readerCount(): number {
        return this.activeReaders;
    }

    get pendingCount(): number {
        return this.deferred.length;
    }

    shared<T>(section: () => T): T {
        if (this.writing) {
            throw new BarrierViolationError(this.name);
        }
        this.activeReaders++;
        try {
            return section();
        } finally {
            this.activeReaders--;
            this.drain();
        }
    }

    /**
     * Runs `section` exclusively, or queues it when the barrier is busy.
     * @returns `true` when the section ran before returning.
     */
    exclusive(section: () => void, coalesceKey?: string): boolean {
        if (this.writing || this.activeReaders > 0) {
            const alreadyQueued = coalesceKey !== undefined && this.deferred.some(d => d.coalesceKey === coalesceKey);
            if (!alreadyQueued) {
                this.deferred.push({ section, coalesceKey });
            }
            return false;
        }
        this.runExclusive(section);
        this.drain();
        return true;
    }

    /**
     * Runs `section` exclusively and returns its result. Unlike `exclusive`,
     * it cannot be deferred, so a re-entrant call is a violation.
     */
    exclusiveNow<T>(section: () => T): T {
        if (this.writing || this.activeReaders > 0) {
            throw new BarrierViolationError(this.name, 'immediate exclusive section requested while busy');
        }
        this.writing = true;
        try {
            return section();
        } finally {
            this.writing = false;
            this.drain();
        }
    }

    private runExclusive(section: () => void): void {
        this.writing = true;
        try {
            section();
        } finally {
            this.writing = false;
        }
    }

    private drain(): void {
        if (this.draining || this.writing || this.activeReaders > 0) return;
        this.draining = true;
        try {
            let next = this.deferred.shift();
            while (next !== undefined) {
                this.runExclusive(next.section);
                next = this.deferred.shift();
            }
        } finally {
            this.draining = false;
        }
    }
}
