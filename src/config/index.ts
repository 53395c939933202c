/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CONFIGURATION — SINGLE SOURCE OF TRUTH
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Environment variables (loaded from .env by start.ts) are validated and
 * coerced here. Any invalid value fails startup with a ConfigError listing
 * every problem at once.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const config = loadConfig();
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { z } from 'zod';
import { ScalpBotError } from '../exchange/errors';
import { LOG_LEVELS, LogLevel } from '../utils/logger';
import { getPairSpec, PairSpec } from './pairs';

export class ConfigError extends ScalpBotError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type EntryStrategyName = 'cross_ask' | 'join_bid' | 'market';

/**
 * dual: stop-loss and take-profit orders both rest on the book.
 * stop_loss_with_tp_watch: only the stop-loss rests; take-profit is watched
 * from the order book by the monitor.
 */
export type ProtectionMode = 'dual' | 'stop_loss_with_tp_watch';

export interface ExchangeConfig {
    apiKey: string;
    apiSecret: string;
    baseUrl: string;
    apiVersion: string;
    requestTimeoutMs: number;
    maxRetries: number;
    retryBackoffFactor: number;
    rateLimitPerMinute: number;
}

export interface TradingConfig {
    pairs: string[];
    signalThreshold: number;
    rsiPeriod: number;
    takeProfitPct: BigNumber;
    stopLossPct: BigNumber;
    baseTradeAmount: BigNumber;
    maxDailyTrades: number;
    entryOrderTimeoutMs: number;
    positionTimeoutMs: number;
    exitOrderTimeoutMs: number;
    takerFeePct: BigNumber;
    balanceSafetyMarginPct: BigNumber;
    stopLimitSlippagePct: BigNumber;
    entryStrategy: EntryStrategyName;
    protectionMode: ProtectionMode;
    pairSpecs: Record<string, PairSpec>;
}

export interface RuntimeConfig {
    scanIntervalMs: number;
    monitorIntervalMs: number;
}

export interface StorageConfig {
    ordersFilePath: string;
    positionsFilePath: string;
    enableOrderPersistence: boolean;
}

export interface LoggingConfig {
    level: LogLevel;
}

export interface AppConfig {
    exchange: ExchangeConfig;
    trading: TradingConfig;
    runtime: RuntimeConfig;
    storage: StorageConfig;
    logging: LoggingConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const positiveDecimal = (fallback: string, maxExclusive?: number) =>
    z
        .string()
        .default(fallback)
        .refine(value => {
            const parsed = new BigNumber(value.trim());
            if (!parsed.isFinite() || parsed.lte(0)) return false;
            return maxExclusive === undefined || parsed.lt(maxExclusive);
        }, {
            message: maxExclusive === undefined
                ? 'must be a positive decimal'
                : `must be a positive decimal below ${maxExclusive}`,
        })
        .transform(value => new BigNumber(value.trim()));

const nonNegativeDecimal = (fallback: string) =>
    z
        .string()
        .default(fallback)
        .refine(value => {
            const parsed = new BigNumber(value.trim());
            return parsed.isFinite() && parsed.gte(0);
        }, { message: 'must be a non-negative decimal' })
        .transform(value => new BigNumber(value.trim()));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: 'true' | 'false') =>
    z.string().default(fallback).transform(value => value.trim().toLowerCase() === 'true');

const envSchema = z.object({
    VALR_API_KEY: z.string().min(1, 'is required'),
    VALR_API_SECRET: z.string().min(1, 'is required'),
    VALR_BASE_URL: z.string().url().default('https://api.valr.com'),
    VALR_API_VERSION: z.string().default('v1'),

    TRADING_PAIRS: z
        .string()
        .default('BTCZAR,ETHZAR')
        .transform(value => value.split(',').map(pair => pair.trim().toUpperCase()).filter(Boolean))
        .refine(pairs => pairs.length > 0, { message: 'at least one trading pair is required' }),
    RSI_THRESHOLD: z.coerce.number().gt(0).lt(100).default(45),
    RSI_PERIOD: positiveInt(14),
    TAKE_PROFIT_PERCENTAGE: positiveDecimal('1.5'),
    STOP_LOSS_PERCENTAGE: positiveDecimal('2.0', 100),
    BASE_TRADE_AMOUNT: positiveDecimal('100'),
    MAX_DAILY_TRADES: positiveInt(20),
    ENTRY_ORDER_TIMEOUT_SECONDS: positiveInt(60),
    POSITION_TIMEOUT_MINUTES: positiveInt(60),
    EXIT_ORDER_TIMEOUT_MINUTES: positiveInt(120),
    TAKER_FEE_PERCENT: nonNegativeDecimal('0.1'),
    BALANCE_SAFETY_MARGIN_PERCENT: nonNegativeDecimal('0.5'),
    STOP_LIMIT_SLIPPAGE_PERCENT: nonNegativeDecimal('0.2'),
    ENTRY_STRATEGY: z.enum(['cross_ask', 'join_bid', 'market']).default('cross_ask'),
    PROTECTION_MODE: z.enum(['dual', 'stop_loss_with_tp_watch']).default('dual'),

    MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    RETRY_BACKOFF_FACTOR: z.coerce.number().positive().default(2),
    REQUEST_TIMEOUT_SECONDS: positiveInt(30),
    RATE_LIMIT_REQUESTS_PER_MINUTE: positiveInt(600),

    SCAN_INTERVAL_SECONDS: positiveInt(300),
    MONITOR_INTERVAL_SECONDS: positiveInt(15),

    ORDERS_FILE_PATH: z.string().min(1).default('data/orders.json'),
    POSITIONS_FILE_PATH: z.string().min(1).default('data/positions.json'),
    ENABLE_ORDER_PERSISTENCE: flag('true'),

    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate the environment and build the application config.
 *
 * @throws ConfigError when any variable is missing or invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
        throw new ConfigError(`Configuration validation failed: ${problems.join('; ')}`);
    }

    const e = parsed.data;

    const pairSpecs: Record<string, PairSpec> = {};
    for (const pair of e.TRADING_PAIRS) {
        pairSpecs[pair] = getPairSpec(pair);
    }

    return {
        exchange: {
            apiKey: e.VALR_API_KEY,
            apiSecret: e.VALR_API_SECRET,
            baseUrl: e.VALR_BASE_URL.replace(/\/+$/, ''),
            apiVersion: e.VALR_API_VERSION,
            requestTimeoutMs: e.REQUEST_TIMEOUT_SECONDS * 1000,
            maxRetries: e.MAX_RETRIES,
            retryBackoffFactor: e.RETRY_BACKOFF_FACTOR,
            rateLimitPerMinute: e.RATE_LIMIT_REQUESTS_PER_MINUTE,
        },
        trading: {
            pairs: e.TRADING_PAIRS,
            signalThreshold: e.RSI_THRESHOLD,
            rsiPeriod: e.RSI_PERIOD,
            takeProfitPct: e.TAKE_PROFIT_PERCENTAGE,
            stopLossPct: e.STOP_LOSS_PERCENTAGE,
            baseTradeAmount: e.BASE_TRADE_AMOUNT,
            maxDailyTrades: e.MAX_DAILY_TRADES,
            entryOrderTimeoutMs: e.ENTRY_ORDER_TIMEOUT_SECONDS * 1000,
            positionTimeoutMs: e.POSITION_TIMEOUT_MINUTES * 60 * 1000,
            exitOrderTimeoutMs: e.EXIT_ORDER_TIMEOUT_MINUTES * 60 * 1000,
            takerFeePct: e.TAKER_FEE_PERCENT,
            balanceSafetyMarginPct: e.BALANCE_SAFETY_MARGIN_PERCENT,
            stopLimitSlippagePct: e.STOP_LIMIT_SLIPPAGE_PERCENT,
            entryStrategy: e.ENTRY_STRATEGY,
            protectionMode: e.PROTECTION_MODE,
            pairSpecs,
        },
        runtime: {
            scanIntervalMs: e.SCAN_INTERVAL_SECONDS * 1000,
            monitorIntervalMs: e.MONITOR_INTERVAL_SECONDS * 1000,
        },
        storage: {
            ordersFilePath: e.ORDERS_FILE_PATH,
            positionsFilePath: e.POSITIONS_FILE_PATH,
            enableOrderPersistence: e.ENABLE_ORDER_PERSISTENCE,
        },
        logging: {
            level: e.LOG_LEVEL,
        },
    };
}

/**
 * Config summary safe for logs (no credentials).
 */
export function describeConfig(config: AppConfig): Record<string, string | number | boolean> {
    const t = config.trading;
    return {
        pairs: t.pairs.join(','),
        signalThreshold: t.signalThreshold,
        takeProfitPct: t.takeProfitPct.toString(),
        stopLossPct: t.stopLossPct.toString(),
        baseTradeAmount: t.baseTradeAmount.toString(),
        maxDailyTrades: t.maxDailyTrades,
        entryStrategy: t.entryStrategy,
        protectionMode: t.protectionMode,
        maxRetries: config.exchange.maxRetries,
        orderPersistence: config.storage.enableOrderPersistence,
        logLevel: config.logging.level,
    };
}
