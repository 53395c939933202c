import { BOT_CONFIG } from '../config/constants';
import { Clock, systemClock } from '../utils/clock';
import logger from '../utils/logger';

/**
 * Sliding-window request limiter shared by every call of one gateway.
 *
 * Keeps the timestamps of requests sent in the last window. At capacity,
 * waits until the oldest one leaves the window (plus a small buffer) and
 * checks again.
 */
export class SlidingWindowRateLimiter {
    private readonly sent: number[] = [];

    constructor(
        private readonly maxRequests: number,
        private readonly windowMs: number = BOT_CONFIG.RATE_LIMIT_WINDOW_MS,
        private readonly clock: Clock = systemClock
    ) {
        if (maxRequests <= 0) {
            throw new RangeError('maxRequests must be positive');
        }
    }

    /**
     * Reserve a slot for one request. Resolves with the total time waited.
     */
    async acquire(): Promise<number> {
        let waitedMs = 0;

        for (;;) {
            const now = this.clock.now();
            this.prune(now);

            if (this.sent.length < this.maxRequests) {
                this.sent.push(now);
                return waitedMs;
            }

            const waitMs = this.sent[0] + this.windowMs - now + BOT_CONFIG.RATE_LIMIT_WAIT_BUFFER_MS;
            logger.warn(`[GATEWAY] Rate limit reached (${this.sent.length}/${this.maxRequests}), waiting ${waitMs}ms`);
            await this.clock.sleep(waitMs);
            waitedMs += waitMs;
        }
    }

    /**
     * Requests still inside the window.
     */
    inFlight(): number {
        this.prune(this.clock.now());
        return this.sent.length;
    }

    private prune(now: number): void {
        const cutoff = now - this.windowMs;
        while (this.sent.length > 0 && this.sent[0] <= cutoff) {
            this.sent.shift();
        }
    }
}
