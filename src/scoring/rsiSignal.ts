/**
 * RSI Signal Source
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Oversold detection over a per-pair price history sampled from the
 * exchange's market summary on every evaluation.
 *
 *   shouldBuy  = rsi < threshold
 *   confidence = clamp((threshold - rsi) / threshold, 0, 1)
 *
 * Wilder smoothing: the first average is a simple mean over `period` changes,
 * every later change folds in as avg = (avg * (period - 1) + x) / period.
 *
 * After a completed reading the pair enters a cooldown; samples are still
 * taken during it, no signal is emitted.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BOT_CONFIG } from '../config/constants';
import { errorMessage } from '../exchange/errors';
import { ExchangeClient } from '../exchange/types';
import { Signal } from '../types';
import { Clock, systemClock } from '../utils/clock';
import logger from '../utils/logger';

export interface SignalSource {
    evaluate(pair: string): Promise<Signal>;
}

export interface RsiSignalOptions {
    period: number;
    threshold: number;
    cooldownMs?: number;
    maxSamples?: number;
    clock?: Clock;
}

export interface RsiScanStatistics {
    pairsTracked: number;
    pairsInCooldown: number;
    samplesByPair: Record<string, number>;
    lastReadingByPair: Record<string, number>;
}

/**
 * Wilder RSI of the last reading in `prices`. Null until period + 1 samples.
 */
export function calculateRsi(prices: number[], period: number): number | null {
    if (period <= 0 || prices.length < period + 1) return null;

    let avgGain = 0;
    let avgLoss = 0;
    for (let i = 1; i <= period; i++) {
        const change = prices[i] - prices[i - 1];
        if (change > 0) avgGain += change;
        else avgLoss -= change;
    }
    avgGain /= period;
    avgLoss /= period;

    for (let i = period + 1; i < prices.length; i++) {
        const change = prices[i] - prices[i - 1];
        avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
        avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    }

    if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
}

export function signalConfidence(rsi: number, threshold: number): number {
    const raw = (threshold - rsi) / threshold;
    return Math.min(1, Math.max(0, raw));
}

export class RsiSignalSource implements SignalSource {
    private readonly history = new Map<string, number[]>();
    private readonly lastReadingAt = new Map<string, number>();
    private readonly period: number;
    private readonly threshold: number;
    private readonly cooldownMs: number;
    private readonly maxSamples: number;
    private readonly clock: Clock;

    constructor(private readonly client: ExchangeClient, options: RsiSignalOptions) {
        this.period = options.period;
        this.threshold = options.threshold;
        this.cooldownMs = options.cooldownMs ?? BOT_CONFIG.SCAN_COOLDOWN_MS;
        this.maxSamples = Math.max(options.maxSamples ?? BOT_CONFIG.PRICE_HISTORY_MAX_SAMPLES, options.period + 1);
        this.clock = options.clock ?? systemClock;
    }

    async evaluate(pair: string): Promise<Signal> {
        const idle: Signal = { pair, shouldBuy: false, confidence: 0, value: null };

        try {
            const summary = await this.client.getMarketSummary(pair);
            this.record(pair, summary.lastTradedPrice.toNumber());
        } catch (error) {
            logger.warn(`[SCAN] ${pair}: market summary unavailable: ${errorMessage(error)}`);
            return idle;
        }

        if (this.isInCooldown(pair)) {
            logger.debug(`[SCAN] ${pair} in cooldown`);
            return idle;
        }

        const prices = this.history.get(pair) ?? [];
        const rsi = calculateRsi(prices, this.period);
        if (rsi === null) {
            logger.debug(`[SCAN] ${pair}: ${prices.length}/${this.period + 1} samples, no reading yet`);
            return idle;
        }

        this.lastReadingAt.set(pair, this.clock.now());
        const shouldBuy = rsi < this.threshold;
        logger.info(`[SCAN] ${pair} RSI ${rsi.toFixed(2)} (threshold ${this.threshold}) -> ${shouldBuy ? 'BUY_SIGNAL' : 'NO_SIGNAL'}`);

        return {
            pair,
            shouldBuy,
            confidence: shouldBuy ? signalConfidence(rsi, this.threshold) : 0,
            value: rsi,
        };
    }

    record(pair: string, price: number): void {
        if (!Number.isFinite(price) || price <= 0) return;
        const samples = this.history.get(pair) ?? [];
        samples.push(price);
        if (samples.length > this.maxSamples) {
            samples.splice(0, samples.length - this.maxSamples);
        }
        this.history.set(pair, samples);
    }

    isInCooldown(pair: string): boolean {
        const last = this.lastReadingAt.get(pair);
        return last !== undefined && this.clock.now() - last < this.cooldownMs;
    }

    resetCooldowns(): void {
        this.lastReadingAt.clear();
        logger.info('[SCAN] Reset all scan cooldowns');
    }

    getStatistics(): RsiScanStatistics {
        const samplesByPair: Record<string, number> = {};
        for (const [pair, samples] of this.history) {
            samplesByPair[pair] = samples.length;
        }
        const lastReadingByPair: Record<string, number> = {};
        let pairsInCooldown = 0;
        for (const [pair, at] of this.lastReadingAt) {
            lastReadingByPair[pair] = at;
            if (this.isInCooldown(pair)) pairsInCooldown++;
        }
        return {
            pairsTracked: this.history.size,
            pairsInCooldown,
            samplesByPair,
            lastReadingByPair,
        };
    }
}
