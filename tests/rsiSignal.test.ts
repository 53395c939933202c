/**
 * RSI Signal Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Wilder RSI, confidence scaling and per-pair cooldown. Prices come from a
 * queue of market summaries on the in-memory exchange.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { calculateRsi, RsiSignalSource, signalConfidence } from '../src/scoring/rsiSignal';
import { FakeClock } from './helpers/fakeClock';
import { FakeExchange } from './helpers/fakeExchange';

describe('calculateRsi', () => {
    test('needs period + 1 samples', () => {
        expect(calculateRsi([1, 2, 3], 3)).toBeNull();
        expect(calculateRsi([1, 2, 3, 4], 3)).not.toBeNull();
        expect(calculateRsi([1, 2, 3], 0)).toBeNull();
    });

    test('only gains reads 100, only losses reads 0, flat reads 50', () => {
        expect(calculateRsi([1, 2, 3, 4], 3)).toBe(100);
        expect(calculateRsi([4, 3, 2, 1], 3)).toBe(0);
        expect(calculateRsi([5, 5, 5, 5], 3)).toBe(50);
    });

    test('applies Wilder smoothing after the seed window', () => {
        // seed: gain 0.5 / loss 0.5, then +1 → 0.75 / 0.25, then -1 → 0.375 / 0.625
        expect(calculateRsi([1, 2, 1, 2, 1], 2)).toBeCloseTo(37.5, 10);
    });
});

describe('signalConfidence', () => {
    test('scales the distance below threshold into [0, 1]', () => {
        expect(signalConfidence(30, 45)).toBeCloseTo(1 / 3, 10);
        expect(signalConfidence(0, 45)).toBe(1);
        expect(signalConfidence(50, 45)).toBe(0);
    });
});

describe('RsiSignalSource', () => {
    const PAIR = 'BTCZAR';
    let clock: FakeClock;
    let exchange: FakeExchange;

    beforeEach(() => {
        clock = new FakeClock();
        exchange = new FakeExchange();
    });

    test('idle until enough samples, then a reading, then cooldown', async () => {
        exchange.lastPrices.set(PAIR, ['100', '101', '100', '101', '100']);
        const source = new RsiSignalSource(exchange, { period: 2, threshold: 45, cooldownMs: 60_000, clock });

        expect((await source.evaluate(PAIR)).value).toBeNull();
        expect((await source.evaluate(PAIR)).value).toBeNull();

        const neutral = await source.evaluate(PAIR);
        expect(neutral).toEqual({ pair: PAIR, shouldBuy: false, confidence: 0, value: 50 });
        expect(source.isInCooldown(PAIR)).toBe(true);

        const cooling = await source.evaluate(PAIR);
        expect(cooling.value).toBeNull();
        expect(source.getStatistics().samplesByPair[PAIR]).toBe(4);

        clock.advance(60_000);
        const oversold = await source.evaluate(PAIR);
        expect(oversold.shouldBuy).toBe(true);
        expect(oversold.value).toBeCloseTo(37.5, 10);
        expect(oversold.confidence).toBeCloseTo(7.5 / 45, 10);
    });

    test('a failed market summary yields an idle signal', async () => {
        const source = new RsiSignalSource(exchange, { period: 2, threshold: 45, clock });

        const signal = await source.evaluate(PAIR);

        expect(signal).toEqual({ pair: PAIR, shouldBuy: false, confidence: 0, value: null });
        expect(source.getStatistics().pairsTracked).toBe(0);
    });

    test('history is capped and ignores unusable prices', () => {
        const source = new RsiSignalSource(exchange, { period: 2, threshold: 45, maxSamples: 3, clock });

        for (const price of [1, 2, 3, 4, 5]) source.record(PAIR, price);
        source.record(PAIR, 0);
        source.record(PAIR, Number.NaN);

        expect(source.getStatistics().samplesByPair[PAIR]).toBe(3);
    });

    test('resetCooldowns clears every pair', async () => {
        exchange.lastPrices.set(PAIR, ['1', '2', '3']);
        const source = new RsiSignalSource(exchange, { period: 2, threshold: 45, clock });
        await source.evaluate(PAIR);
        await source.evaluate(PAIR);
        await source.evaluate(PAIR);
        expect(source.getStatistics().pairsInCooldown).toBe(1);

        source.resetCooldowns();

        expect(source.isInCooldown(PAIR)).toBe(false);
    });
});
