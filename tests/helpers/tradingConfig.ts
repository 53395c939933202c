import BigNumber from 'bignumber.js';
import type { TradingConfig } from '../../src/config';

/** Test pair with a 0.01 tick and 4 quantity decimals */
export const TEST_PAIR = 'XYZZAR';

export function makeTradingConfig(overrides: Partial<TradingConfig> = {}): TradingConfig {
    return {
        pairs: [TEST_PAIR],
        signalThreshold: 45,
        rsiPeriod: 14,
        takeProfitPct: new BigNumber('1.5'),
        stopLossPct: new BigNumber('2'),
        baseTradeAmount: new BigNumber('100'),
        maxDailyTrades: 20,
        entryOrderTimeoutMs: 60_000,
        positionTimeoutMs: 60 * 60_000,
        exitOrderTimeoutMs: 120 * 60_000,
        takerFeePct: new BigNumber('0.1'),
        balanceSafetyMarginPct: new BigNumber('0.5'),
        stopLimitSlippagePct: new BigNumber('0.2'),
        entryStrategy: 'cross_ask',
        protectionMode: 'dual',
        pairSpecs: {
            [TEST_PAIR]: { pair: TEST_PAIR, baseCurrency: 'XYZ', quoteCurrency: 'ZAR', tickSize: '0.01', quantityDecimals: 4 },
        },
        ...overrides,
    };
}
