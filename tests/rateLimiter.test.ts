import { SlidingWindowRateLimiter } from '../src/exchange/rateLimiter';
import { FakeClock } from './helpers/fakeClock';

describe('SlidingWindowRateLimiter', () => {
    test('admits requests up to capacity without waiting', async () => {
        const clock = new FakeClock();
        const limiter = new SlidingWindowRateLimiter(2, 1000, clock);

        expect(await limiter.acquire()).toBe(0);
        expect(await limiter.acquire()).toBe(0);
        expect(limiter.inFlight()).toBe(2);
        expect(clock.sleeps).toEqual([]);
    });

    test('at capacity waits for the oldest request to leave the window plus buffer', async () => {
        const clock = new FakeClock();
        const limiter = new SlidingWindowRateLimiter(2, 1000, clock);
        await limiter.acquire();
        await limiter.acquire();

        const waited = await limiter.acquire();

        expect(waited).toBe(1100);
        expect(clock.sleeps).toEqual([1100]);
        expect(limiter.inFlight()).toBe(1);
    });

    test('requests older than the window no longer count', async () => {
        const clock = new FakeClock();
        const limiter = new SlidingWindowRateLimiter(1, 1000, clock);
        await limiter.acquire();

        clock.advance(1000);

        expect(await limiter.acquire()).toBe(0);
    });

    test('rejects a non-positive capacity', () => {
        expect(() => new SlidingWindowRateLimiter(0)).toThrow(RangeError);
    });
});
