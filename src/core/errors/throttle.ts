import type { ThrottlePolicy } from '@/schemas';
import type { ErrorKind } from './taxonomy';

interface ThrottleState {
    /** Last accepted occurrence (interval) or start of the current window. */
    since: number;
    accepted: number;
}

/**
 * Per-kind throttle. Only accepted occurrences move the state; a rejected
 * one neither resets nor extends the window. A clock that steps backwards is
 * clamped so stored timestamps never decrease.
 */
export class ThrottleGate {
    private readonly states = new Map<ErrorKind, ThrottleState>();

    constructor(private readonly policy: ThrottlePolicy) {}

    get trackedKinds(): number {
        return this.states.size;
    }

    tryAccept(kind: ErrorKind, now: number): boolean {
        const state = this.states.get(kind);
        if (state === undefined) {
            this.states.set(kind, { since: now, accepted: 1 });
            return true;
        }

        const at = Math.max(now, state.since);
        if (this.hasElapsed(state, at)) {
            state.since = at;
            state.accepted = 1;
            return true;
        }

        if (this.policy.mode === 'window' && state.accepted < this.policy.maxOccurrences) {
            state.accepted++;
            return true;
        }
        return false;
    }

    /** Drops state for kinds that would accept their next occurrence anyway. */
    prune(now: number): number {
        let pruned = 0;
        for (const [kind, state] of Array.from(this.states)) {
            if (this.hasElapsed(state, Math.max(now, state.since))) {
                this.states.delete(kind);
                pruned++;
            }
        }
        return pruned;
    }

    reset(): void {
        this.states.clear();
    }

    private hasElapsed(state: ThrottleState, at: number): boolean {
        const span = this.policy.mode === 'interval' ? this.policy.intervalMs : this.policy.windowMs;
        return at - state.since >= span;
    }
}
