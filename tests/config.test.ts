/**
 * Configuration Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Environment → AppConfig. Only the credentials are required.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigError, describeConfig, loadConfig } from '../src/config';
import { getPairSpec, splitPair } from '../src/config/pairs';

const CREDENTIALS = { VALR_API_KEY: 'test-key', VALR_API_SECRET: 'test-secret' };

describe('loadConfig', () => {
    test('applies defaults', () => {
        const config = loadConfig(CREDENTIALS);

        expect(config.exchange.baseUrl).toBe('https://api.valr.com');
        expect(config.exchange.maxRetries).toBe(3);
        expect(config.exchange.requestTimeoutMs).toBe(30_000);
        expect(config.trading.pairs).toEqual(['BTCZAR', 'ETHZAR']);
        expect(config.trading.takeProfitPct.toFixed()).toBe('1.5');
        expect(config.trading.stopLossPct.toFixed()).toBe('2');
        expect(config.trading.entryOrderTimeoutMs).toBe(60_000);
        expect(config.trading.positionTimeoutMs).toBe(60 * 60_000);
        expect(config.trading.exitOrderTimeoutMs).toBe(120 * 60_000);
        expect(config.trading.entryStrategy).toBe('cross_ask');
        expect(config.trading.protectionMode).toBe('dual');
        expect(config.trading.pairSpecs.BTCZAR.tickSize).toBe('1');
        expect(config.runtime).toEqual({ scanIntervalMs: 300_000, monitorIntervalMs: 15_000 });
        expect(config.storage).toEqual({
            ordersFilePath: 'data/orders.json',
            positionsFilePath: 'data/positions.json',
            enableOrderPersistence: true,
        });
        expect(config.logging).toEqual({ level: 'info' });
    });

    test('normalizes pairs, URLs and flags', () => {
        const config = loadConfig({
            ...CREDENTIALS,
            TRADING_PAIRS: ' btczar , xrpzar ,',
            VALR_BASE_URL: 'https://api.example.test/',
            ENABLE_ORDER_PERSISTENCE: 'FALSE',
            PROTECTION_MODE: 'stop_loss_with_tp_watch',
        });

        expect(config.trading.pairs).toEqual(['BTCZAR', 'XRPZAR']);
        expect(config.trading.pairSpecs.XRPZAR.quantityDecimals).toBe(2);
        expect(config.exchange.baseUrl).toBe('https://api.example.test');
        expect(config.storage.enableOrderPersistence).toBe(false);
        expect(config.trading.protectionMode).toBe('stop_loss_with_tp_watch');
    });

    test('rejects empty credentials', () => {
        expect(() => loadConfig({ ...CREDENTIALS, VALR_API_KEY: '' })).toThrow('VALR_API_KEY is required');
    });

    test('rejects missing credentials', () => {
        expect(() => loadConfig({})).toThrow(ConfigError);
    });

    test('stop-loss must stay below 100%', () => {
        expect(() => loadConfig({ ...CREDENTIALS, STOP_LOSS_PERCENTAGE: '100' }))
            .toThrow('STOP_LOSS_PERCENTAGE must be a positive decimal below 100');
    });

    test('log level must be one of the known levels', () => {
        expect(loadConfig({ ...CREDENTIALS, LOG_LEVEL: 'debug' }).logging.level).toBe('debug');
        expect(() => loadConfig({ ...CREDENTIALS, LOG_LEVEL: 'verbose' })).toThrow('LOG_LEVEL Invalid enum value');
    });

    test('rejects non-positive amounts and unknown strategies', () => {
        expect(() => loadConfig({ ...CREDENTIALS, BASE_TRADE_AMOUNT: '0' })).toThrow('BASE_TRADE_AMOUNT must be a positive decimal');
        expect(() => loadConfig({ ...CREDENTIALS, ENTRY_STRATEGY: 'yolo' })).toThrow(ConfigError);
        expect(() => loadConfig({ ...CREDENTIALS, MAX_DAILY_TRADES: '0' })).toThrow(ConfigError);
    });
});

describe('describeConfig', () => {
    test('summarizes without credentials', () => {
        expect(describeConfig(loadConfig(CREDENTIALS))).toEqual({
            pairs: 'BTCZAR,ETHZAR',
            signalThreshold: 45,
            takeProfitPct: '1.5',
            stopLossPct: '2',
            baseTradeAmount: '100',
            maxDailyTrades: 20,
            entryStrategy: 'cross_ask',
            protectionMode: 'dual',
            maxRetries: 3,
            orderPersistence: true,
            logLevel: 'info',
        });
    });
});

describe('pair specs', () => {
    test('known pairs carry their precision', () => {
        expect(getPairSpec('ETHZAR')).toEqual({
            pair: 'ETHZAR',
            baseCurrency: 'ETH',
            quoteCurrency: 'ZAR',
            tickSize: '1',
            quantityDecimals: 6,
        });
    });

    test('unknown pairs fall back to defaults with currencies from the suffix', () => {
        expect(getPairSpec('DOGEUSDT')).toEqual({
            pair: 'DOGEUSDT',
            baseCurrency: 'DOGE',
            quoteCurrency: 'USDT',
            tickSize: '0.01',
            quantityDecimals: 8,
        });
    });

    test('overrides win over the built-in table', () => {
        const spec = getPairSpec('BTCZAR', {
            BTCZAR: { baseCurrency: 'BTC', quoteCurrency: 'ZAR', tickSize: '10', quantityDecimals: 4 },
        });
        expect(spec.tickSize).toBe('10');
    });

    test('splitPair', () => {
        expect(splitPair('SOLZAR')).toEqual({ base: 'SOL', quote: 'ZAR' });
        expect(splitPair('ABCXYZ')).toEqual({ base: 'ABC', quote: 'XYZ' });
    });
});
