/**
 * Scan Loop Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * One scan cycle per call against a real engine on the in-memory exchange.
 * Signals are scripted per pair.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TradingEngine } from '../src/engine/TradingEngine';
import { ScanLoop } from '../src/runtime/scanLoop';
import { SignalSource } from '../src/scoring/rsiSignal';
import { OrderStore } from '../src/storage/orderStore';
import { PositionStore } from '../src/storage/positionStore';
import { Signal } from '../src/types';
import { FakeClock } from './helpers/fakeClock';
import { FakeExchange } from './helpers/fakeExchange';
import { makeTradingConfig, TEST_PAIR } from './helpers/tradingConfig';

const OTHER_PAIR = 'ABCZAR';

class ScriptedSignals implements SignalSource {
    readonly evaluated: string[] = [];
    failing = new Set<string>();

    constructor(private readonly buyPairs: Set<string>) {}

    async evaluate(pair: string): Promise<Signal> {
        this.evaluated.push(pair);
        if (this.failing.has(pair)) throw new Error(`no data for ${pair}`);
        const shouldBuy = this.buyPairs.has(pair);
        return { pair, shouldBuy, confidence: shouldBuy ? 0.4 : 0, value: shouldBuy ? 27 : 60 };
    }
}

describe('ScanLoop', () => {
    let dir: string;
    let exchange: FakeExchange;
    let engine: TradingEngine;
    let signals: ScriptedSignals;
    let loop: ScanLoop;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scan-test-'));
        const clock = new FakeClock();
        exchange = new FakeExchange();
        exchange.setBook(TEST_PAIR, [['99', '5']], [['100', '5']]);
        exchange.setBalance('ZAR', '1000');
        exchange.onPlace = order => {
            if (order.side === 'buy' && order.type === 'limit') exchange.fillOrder(order.orderId);
        };

        engine = new TradingEngine({
            client: exchange,
            config: makeTradingConfig({ pairs: [TEST_PAIR, OTHER_PAIR] }),
            orderStore: new OrderStore(path.join(dir, 'orders.json'), true, clock),
            positionStore: new PositionStore(path.join(dir, 'positions.json')),
            clock,
        });
        signals = new ScriptedSignals(new Set([TEST_PAIR]));
        loop = new ScanLoop(engine, signals, [TEST_PAIR, OTHER_PAIR], {
            scanIntervalMs: 60_000,
            monitorIntervalMs: 60_000,
        });
    });

    afterEach(async () => {
        await loop.stop();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('opens a position on a buy signal and skips the rest', async () => {
        const summary = await loop.scanCycle();

        expect(summary).toEqual({ scanned: 2, signals: 1, opened: 1, skipped: { NO_SIGNAL: 1 } });
        expect(engine.hasOpenPosition(TEST_PAIR)).toBe(true);
    });

    test('pairs with an open position are not evaluated again', async () => {
        await loop.scanCycle();
        signals.evaluated.length = 0;

        const summary = await loop.scanCycle();

        expect(signals.evaluated).toEqual([OTHER_PAIR]);
        expect(summary.skipped).toEqual({ POSITION_ALREADY_OPEN: 1, NO_SIGNAL: 1 });
    });

    test('no-trade results are counted by reason', async () => {
        exchange.setBalance('ZAR', '50');

        const summary = await loop.scanCycle();

        expect(summary.opened).toBe(0);
        expect(summary.skipped).toEqual({ INSUFFICIENT_BALANCE: 1, NO_SIGNAL: 1 });
    });

    test('a failing pair does not stop the cycle', async () => {
        signals.failing.add(TEST_PAIR);

        const summary = await loop.scanCycle();

        expect(summary.scanned).toBe(2);
        expect(summary.skipped).toEqual({ ERROR: 1, NO_SIGNAL: 1 });
    });

    test('stops scanning once shutdown is requested', async () => {
        engine.requestShutdown();

        const summary = await loop.scanCycle();

        expect(summary.scanned).toBe(0);
        expect(signals.evaluated).toEqual([]);
    });

    test('start runs a scan immediately and stop waits for it', async () => {
        loop.start();
        expect(loop.isLoopRunning()).toBe(true);

        await loop.stop();

        expect(loop.isLoopRunning()).toBe(false);
        expect(signals.evaluated).toEqual([TEST_PAIR, OTHER_PAIR]);
        expect(engine.hasOpenPosition(TEST_PAIR)).toBe(true);
    });
});
