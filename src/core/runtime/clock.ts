/**
 * Time source for every TTL, throttle and history decision in the core.
 * Substituted in tests to make expiration deterministic.
 */
export interface Clock {
    /** Milliseconds since the Unix epoch. */
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now(),
};
