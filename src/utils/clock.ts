/**
 * Time source used by every polling, backoff and timeout path.
 * Injected so the whole lifecycle can run against a virtual clock.
 */
export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep,
};

/**
 * UTC calendar date, YYYY-MM-DD
 */
export function utcDateKey(timestampMs: number): string {
    return new Date(timestampMs).toISOString().slice(0, 10);
}
