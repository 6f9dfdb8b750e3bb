import type { Clock } from '@/core/runtime/clock';

export class ManualClock implements Clock {
    constructor(private current = 0) {}

    now(): number {
        return this.current;
    }

    set(ms: number): void {
        this.current = ms;
    }

    advance(ms: number): void {
        this.current += ms;
    }
}
