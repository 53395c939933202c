/**
 * Fill-Wait Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Poll cadence 0.5s → 1s → 2s; terminal states FILLED, PARTIALLY_FILLED,
 * CANCELLED, TIMEOUT, SHUTDOWN.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { pollIntervalFor, resolveFilledOutcome, waitForFill } from '../src/engine/fillWait';
import { FakeClock } from './helpers/fakeClock';
import { FakeExchange } from './helpers/fakeExchange';

describe('pollIntervalFor', () => {
    test.each([
        [0, 500],
        [9_999, 500],
        [10_000, 1_000],
        [29_999, 1_000],
        [30_000, 2_000],
        [120_000, 2_000],
    ])('%ims elapsed -> %ims', (elapsed, interval) => {
        expect(pollIntervalFor(elapsed)).toBe(interval);
    });
});

describe('waitForFill', () => {
    let clock: FakeClock;
    let exchange: FakeExchange;
    let shutdown: boolean;

    const context = () => ({ client: exchange, clock, isShutdownRequested: () => shutdown });
    const request = (timeoutMs: number) => ({
        pair: 'BTCZAR',
        orderId: 'o1',
        submittedQuantity: new BigNumber('1'),
        timeoutMs,
    });

    beforeEach(() => {
        clock = new FakeClock();
        exchange = new FakeExchange();
        shutdown = false;
        exchange.addOpenOrder({
            orderId: 'o1',
            pair: 'BTCZAR',
            side: 'buy',
            quantity: new BigNumber('1'),
            price: new BigNumber('100'),
        });
    });

    test('returns FILLED on the poll that sees the fill', async () => {
        const sleep = clock.sleep.bind(clock);
        jest.spyOn(clock, 'sleep').mockImplementation(async ms => {
            await sleep(ms);
            if (clock.sleeps.length === 2) exchange.fillOrder('o1', '1', '100.5');
        });

        const outcome = await waitForFill(context(), request(60_000));

        expect(outcome.state).toBe('FILLED');
        expect(outcome.filledQuantity.toFixed()).toBe('1');
        expect(outcome.averagePrice?.toFixed()).toBe('100.5');
        expect(exchange.callsTo('getOrderStatus')).toHaveLength(3);
        expect(clock.sleeps).toEqual([500, 500]);
    });

    test('times out exactly at the deadline following the poll schedule', async () => {
        const startedAt = clock.now();

        const outcome = await waitForFill(context(), request(12_000));

        expect(outcome.state).toBe('TIMEOUT');
        expect(outcome.filledQuantity.isZero()).toBe(true);
        expect(clock.now() - startedAt).toBe(12_000);
        expect(clock.sleeps).toHaveLength(22);
        expect(clock.sleeps.slice(-3)).toEqual([500, 1_000, 1_000]);
    });

    test('a partial fill at the deadline is PARTIALLY_FILLED', async () => {
        exchange.setStatus('o1', 'PENDING', '0.4');

        const outcome = await waitForFill(context(), request(1_000));

        expect(outcome.state).toBe('PARTIALLY_FILLED');
        expect(outcome.filledQuantity.toFixed()).toBe('0.4');
    });

    test('an exchange-side cancel with nothing filled is CANCELLED', async () => {
        exchange.dropOrder('o1');

        const outcome = await waitForFill(context(), request(60_000));

        expect(outcome.state).toBe('CANCELLED');
        expect(exchange.callsTo('getOrderStatus')).toHaveLength(1);
    });

    test('shutdown returns before polling', async () => {
        shutdown = true;

        const outcome = await waitForFill(context(), request(60_000));

        expect(outcome.state).toBe('SHUTDOWN');
        expect(exchange.callsTo('getOrderStatus')).toHaveLength(0);
    });

    test('failed polls are retried until the deadline', async () => {
        exchange.fail('getOrderStatus');

        const outcome = await waitForFill(context(), request(1_000));

        expect(outcome.state).toBe('TIMEOUT');
        expect(exchange.callsTo('getOrderStatus')).toHaveLength(3);
    });
});

describe('resolveFilledOutcome', () => {
    const request = { pair: 'BTCZAR', orderId: 'o1', submittedQuantity: new BigNumber('1') };

    test('uses the reported quantity when present', async () => {
        const exchange = new FakeExchange();

        const outcome = await resolveFilledOutcome({ client: exchange }, request, new BigNumber('0.9'), null);

        expect(outcome.filledQuantity.toFixed()).toBe('0.9');
        expect(exchange.callsTo('getOrderFills')).toHaveLength(0);
    });

    test('falls back to the sum of fills with a volume-weighted price', async () => {
        const exchange = new FakeExchange();
        exchange.fills.set('o1', [
            { orderId: 'o1', price: new BigNumber('100'), quantity: new BigNumber('0.6'), tradedAt: null },
            { orderId: 'o1', price: new BigNumber('101'), quantity: new BigNumber('0.4'), tradedAt: null },
        ]);

        const outcome = await resolveFilledOutcome({ client: exchange }, request, new BigNumber(0), null);

        expect(outcome.state).toBe('FILLED');
        expect(outcome.filledQuantity.toFixed()).toBe('1');
        expect(outcome.averagePrice?.toFixed()).toBe('100.4');
    });

    test('falls back to the submitted quantity when no fills are found', async () => {
        const exchange = new FakeExchange();
        exchange.fail('getOrderFills');

        const outcome = await resolveFilledOutcome({ client: exchange }, request, new BigNumber(0), null);

        expect(outcome.filledQuantity.toFixed()).toBe('1');
        expect(outcome.averagePrice).toBeNull();
    });
});
