/**
 * TradingEngine.ts - Order / Position Lifecycle
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENTRY → FILL → PROTECT → EXIT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PUBLIC API:
 * - initialize(): load order records, recover positions, reconcile orphans
 * - executeTradeSetup(pair, signal): one entry attempt, never throws for
 *   exchange failures (returns a TradeSetupResult instead)
 * - monitorPositions(): one exit-detection pass over every open position
 * - forceClose(positionId, reason): idempotent shared close path
 * - requestShutdown(): stops new setups and releases any fill-wait
 * - flush() / runMaintenance() / getStatistics()
 *
 * RULES:
 * 1. A position exists only after its entry fill is confirmed
 * 2. A filled entry is never left without a stop-loss: protection failure
 *    liquidates immediately
 * 3. Monitor passes and position registration run under one SerialLock;
 *    fill-wait runs outside it
 * 4. Persistence failures are logged and the engine keeps running in memory
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import type { TradingConfig } from '../config';
import { BOT_CONFIG } from '../config/constants';
import { getPairSpec, PairSpec } from '../config/pairs';
import {
    errorMessage,
    InsufficientBalanceError,
    PersistenceError,
    ScalpBotError,
    TradingError,
} from '../exchange/errors';
import { ExchangeClient, OrderStatusReport } from '../exchange/types';
import { recoverPositions } from '../services/positionRecovery';
import { NewOrderRecord, OrderStore, OrderStoreStatistics } from '../storage/orderStore';
import { PositionStore } from '../storage/positionStore';
import { logOrderEvent, logPositionUpdate, logTradeEvent } from '../telemetry/tradeEvents';
import {
    DailyCountersSnapshot,
    ExitReason,
    NoTradeReason,
    OrderRecordStatus,
    Position,
    Signal,
    TradeSetupResult,
} from '../types';
import { Clock, systemClock } from '../utils/clock';
import { generatePositionId } from '../utils/id';
import logger from '../utils/logger';
import {
    calculatePnL,
    calculateStopLossPrice,
    calculateTakeProfitPrice,
    percentOf,
    roundQuantityDown,
    roundToTick,
} from '../utils/math';
import { SerialLock } from '../utils/serialLock';
import { DailyCounters } from './dailyCounters';
import { createEntryStrategy, EntryPlan, EntryStrategy } from './entryStrategy';
import { FillWaitContext, resolveFilledOutcome, waitForFill } from './fillWait';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface TradingEngineDependencies {
    client: ExchangeClient;
    config: TradingConfig;
    orderStore: OrderStore;
    positionStore: PositionStore;
    clock?: Clock;
    entryStrategy?: EntryStrategy;
}

export interface EngineStatistics {
    openPositions: number;
    pairsWithPositions: string[];
    watchedTakeProfits: number;
    daily: DailyCountersSnapshot;
    orders: OrderStoreStatistics;
    shutdownRequested: boolean;
}

interface ProtectionLevels {
    quantity: BigNumber;
    takeProfitPrice: BigNumber;
    stopLossPrice: BigNumber;
    stopLimitPrice: BigNumber;
}

const noTrade = (reason: NoTradeReason, detail: string): TradeSetupResult => ({ ok: false, reason, detail });

export class TradingEngine {
    private readonly client: ExchangeClient;
    private readonly config: TradingConfig;
    private readonly orderStore: OrderStore;
    private readonly positionStore: PositionStore;
    private readonly clock: Clock;
    private readonly entryStrategy: EntryStrategy;
    private readonly counters: DailyCounters;
    private readonly lock = new SerialLock();

    private readonly positions = new Map<string, Position>();
    private readonly closing = new Set<string>();
    private readonly pairsInSetup = new Set<string>();
    private shutdownRequested = false;

    constructor(deps: TradingEngineDependencies) {
        this.client = deps.client;
        this.config = deps.config;
        this.orderStore = deps.orderStore;
        this.positionStore = deps.positionStore;
        this.clock = deps.clock ?? systemClock;
        this.entryStrategy = deps.entryStrategy ?? createEntryStrategy(deps.config.entryStrategy);
        this.counters = new DailyCounters(this.clock);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STARTUP
    // ═══════════════════════════════════════════════════════════════════════════

    async initialize(): Promise<void> {
        try {
            await this.orderStore.load();
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            logger.error(`[ENGINE] Order store unreadable, starting without order records: ${error.message}`);
        }

        const recovered = await recoverPositions({
            client: this.client,
            positionStore: this.positionStore,
            takeProfitPct: this.config.takeProfitPct,
            clock: this.clock,
        });

        await this.lock.runExclusive(async () => {
            for (const position of recovered.values()) {
                this.positions.set(position.id, position);
            }
        });

        await this.reconcileOrphanedEntries();

        logger.info(
            `[ENGINE] Initialized: ${this.positions.size} open position(s), ` +
            `${this.orderStore.getActive().length} active order record(s), ` +
            `entry=${this.entryStrategy.name}, protection=${this.config.protectionMode}`
        );
    }

    /**
     * Entry orders a previous run placed but never turned into a position.
     * Still working → cancelled. Any filled quantity → liquidated.
     */
    private async reconcileOrphanedEntries(): Promise<void> {
        const knownEntryIds = new Set([...this.positions.values()].map(p => p.entryOrderId));

        for (const record of this.orderStore.getActive()) {
            if (record.role !== 'entry' || knownEntryIds.has(record.id)) continue;

            logger.warn(`[RECOVERY] Orphaned entry order ${record.id} on ${record.pair}, reconciling`);
            try {
                const report = await this.client.getOrderStatus(record.pair, record.id);
                let filled = report.filledQuantity;

                if (report.status === 'PENDING' || report.status === 'PARTIALLY_FILLED') {
                    await this.cancelOrderSafely(record.pair, record.id, 'entry');
                    const recheck = await this.recheckStatus(record.pair, record.id, record.quantity);
                    if (recheck && recheck.filledQuantity.gt(filled)) filled = recheck.filledQuantity;
                } else if (report.status === 'FILLED') {
                    const resolved = await resolveFilledOutcome(
                        { client: this.client },
                        { pair: record.pair, orderId: record.id, submittedQuantity: record.quantity },
                        report.filledQuantity,
                        report.averagePrice
                    );
                    filled = resolved.filledQuantity;
                }

                const spec = this.pairSpec(record.pair);
                const sellable = roundQuantityDown(filled, spec.quantityDecimals);
                if (sellable.gt(0)) {
                    const sold = await this.liquidate(record.pair, sellable);
                    if (!sold) {
                        logger.error(
                            `[CRITICAL] Orphaned fill of ${sellable.toFixed()} on ${record.pair} ` +
                            `(order ${record.id}) could not be liquidated. Manual intervention required.`
                        );
                    }
                }

                await this.markOrder(record.id, filled.gt(0) ? 'filled' : 'cancelled');
            } catch (error) {
                logger.error(`[RECOVERY] Could not reconcile orphaned entry ${record.id}: ${errorMessage(error)}`);
            }
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TRADE SETUP
    // ═══════════════════════════════════════════════════════════════════════════

    async executeTradeSetup(pair: string, signal: Signal): Promise<TradeSetupResult> {
        if (this.shutdownRequested) {
            return noTrade('SHUTTING_DOWN', 'Shutdown requested');
        }
        if (!signal.shouldBuy) {
            return noTrade('NO_SIGNAL', `No buy signal for ${pair}`);
        }
        if (!this.counters.canTrade(this.config.maxDailyTrades)) {
            logger.info(`[ENGINE] Daily trade limit (${this.config.maxDailyTrades}) reached, skipping ${pair}`);
            return noTrade('DAILY_LIMIT_REACHED', `Daily limit of ${this.config.maxDailyTrades} trades reached`);
        }
        if (this.hasOpenPosition(pair) || this.pairsInSetup.has(pair)) {
            return noTrade('POSITION_ALREADY_OPEN', `${pair} already has an open position`);
        }

        this.pairsInSetup.add(pair);
        try {
            logger.info(`[ENGINE] Trade setup for ${pair} (signal ${signal.value ?? 'n/a'}, confidence ${signal.confidence.toFixed(2)})`);
            return await this.setupTrade(pair);
        } catch (error) {
            if (!(error instanceof ScalpBotError)) throw error;
            logger.error(`[ENGINE] Trade setup for ${pair} aborted: ${error.message}`);
            return noTrade('EXCHANGE_ERROR', error.message);
        } finally {
            this.pairsInSetup.delete(pair);
        }
    }

    private async setupTrade(pair: string): Promise<TradeSetupResult> {
        const spec = this.pairSpec(pair);

        const book = await this.client.getOrderBook(pair);
        if (book.bids.length === 0 || book.asks.length === 0) {
            return noTrade('NO_MARKET_DATA', `Empty order book for ${pair}`);
        }
        const bestBid = book.bids[0].price;
        const bestAsk = book.asks[0].price;
        if (bestBid.gte(bestAsk)) {
            return noTrade('NO_MARKET_DATA', `Crossed book for ${pair}: bid ${bestBid.toFixed()} >= ask ${bestAsk.toFixed()}`);
        }

        const amount = this.config.baseTradeAmount;
        const required = amount
            .plus(percentOf(amount, this.config.takerFeePct))
            .plus(percentOf(amount, this.config.balanceSafetyMarginPct));
        const balances = await this.client.getAccountBalances();
        const available = balances[spec.quoteCurrency] ?? new BigNumber(0);
        if (available.lt(required)) {
            const shortfall = new InsufficientBalanceError(spec.quoteCurrency, required.toFixed(), available.toFixed());
            logger.warn(`[ENGINE] ${shortfall.message}, skipping ${pair}`);
            return noTrade('INSUFFICIENT_BALANCE', shortfall.message);
        }

        const plan = this.entryStrategy.plan({ bestBid, bestAsk });
        const price = roundToTick(plan.price, spec.tickSize);
        const quantity = roundQuantityDown(amount.dividedBy(price), spec.quantityDecimals);
        if (quantity.lte(0) || price.lte(0)) {
            return noTrade('INVALID_ORDER_SIZE', `Trade amount ${amount.toFixed()} too small for ${pair} at ${price.toFixed()}`);
        }

        const entryOrderId = await this.placeEntry(pair, plan, price, quantity, amount);

        const fillContext: FillWaitContext = {
            client: this.client,
            clock: this.clock,
            isShutdownRequested: () => this.shutdownRequested,
        };
        const outcome = await waitForFill(fillContext, {
            pair,
            orderId: entryOrderId,
            submittedQuantity: quantity,
            timeoutMs: this.config.entryOrderTimeoutMs,
        });

        let filledQuantity = outcome.filledQuantity;
        let averagePrice = outcome.averagePrice;

        if (outcome.state !== 'FILLED') {
            await this.cancelOrderSafely(pair, entryOrderId, 'entry');
            const late = await this.recheckStatus(pair, entryOrderId, quantity);
            if (late && late.filledQuantity.gt(filledQuantity)) {
                logger.info(`[ENGINE] Late fill on ${entryOrderId}: ${late.filledQuantity.toFixed()}`);
                filledQuantity = late.filledQuantity;
                averagePrice = late.averagePrice ?? averagePrice;
            }
        }

        if (filledQuantity.lte(0)) {
            await this.markOrder(entryOrderId, 'cancelled');
            return noTrade('ENTRY_NOT_FILLED', `Entry ${entryOrderId} ended ${outcome.state} with nothing filled`);
        }

        if (outcome.state !== 'FILLED') {
            logger.info(`[ENGINE] Entry ${entryOrderId} ${outcome.state}, protecting filled ${filledQuantity.toFixed()}`);
        }
        logOrderEvent(outcome.state === 'FILLED' ? 'FILLED' : 'PARTIALLY_FILLED', {
            orderId: entryOrderId,
            pair,
            side: 'buy',
            role: 'entry',
            quantity: filledQuantity,
            price: averagePrice ?? price,
        });

        return this.protect(pair, spec, entryOrderId, filledQuantity, averagePrice ?? price);
    }

    private async placeEntry(
        pair: string,
        plan: EntryPlan,
        price: BigNumber,
        quantity: BigNumber,
        amount: BigNumber
    ): Promise<string> {
        const placed = plan.kind === 'limit'
            ? await this.client.placeLimitOrder({ pair, side: 'buy', quantity, price, postOnly: plan.postOnly })
            : await this.client.placeMarketOrder({ pair, side: 'buy', quoteAmount: amount });

        logOrderEvent('PLACED', {
            orderId: placed.orderId,
            pair,
            side: 'buy',
            role: 'entry',
            quantity,
            price,
            note: this.entryStrategy.name,
        });
        await this.recordOrder({ id: placed.orderId, pair, side: 'buy', quantity, price, role: 'entry' });
        return placed.orderId;
    }

    /**
     * One status read after cancelling a working order, to catch fills that
     * landed between the last poll and the cancel.
     */
    private async recheckStatus(
        pair: string,
        orderId: string,
        submittedQuantity: BigNumber
    ): Promise<OrderStatusReport | null> {
        try {
            const report = await this.client.getOrderStatus(pair, orderId);
            if (report.status !== 'FILLED') return report;
            const resolved = await resolveFilledOutcome(
                { client: this.client },
                { pair, orderId, submittedQuantity },
                report.filledQuantity,
                report.averagePrice
            );
            return { ...report, filledQuantity: resolved.filledQuantity, averagePrice: resolved.averagePrice };
        } catch (error) {
            logger.warn(`[ENGINE] Status re-check for ${orderId} failed: ${errorMessage(error)}`);
            return null;
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PROTECTION
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Tick-rounded exit levels. Rounding never collapses the ordering
     * stopLoss < entry < takeProfit: a level that lands on the wrong side is
     * moved one tick outward.
     */
    computeProtectionLevels(spec: PairSpec, entryPrice: BigNumber, filledQuantity: BigNumber): ProtectionLevels {
        const tick = new BigNumber(spec.tickSize);

        let takeProfitPrice = roundToTick(calculateTakeProfitPrice(entryPrice, this.config.takeProfitPct), tick);
        if (takeProfitPrice.lte(entryPrice)) takeProfitPrice = takeProfitPrice.plus(tick);

        let stopLossPrice = roundToTick(calculateStopLossPrice(entryPrice, this.config.stopLossPct), tick);
        if (stopLossPrice.gte(entryPrice)) stopLossPrice = stopLossPrice.minus(tick);

        const slippage = percentOf(stopLossPrice, this.config.stopLimitSlippagePct);
        const stopLimitPrice = BigNumber.maximum(roundToTick(stopLossPrice.minus(slippage), tick), tick);

        return {
            quantity: roundQuantityDown(filledQuantity, spec.quantityDecimals),
            takeProfitPrice,
            stopLossPrice,
            stopLimitPrice,
        };
    }

    private async protect(
        pair: string,
        spec: PairSpec,
        entryOrderId: string,
        filledQuantity: BigNumber,
        entryPrice: BigNumber
    ): Promise<TradeSetupResult> {
        const filledAt = new Date(this.clock.now());
        const levels = this.computeProtectionLevels(spec, entryPrice, filledQuantity);

        if (levels.quantity.lte(0)) {
            await this.markOrder(entryOrderId, 'filled');
            logger.warn(`[ENGINE] Filled ${filledQuantity.toFixed()} on ${pair} is below order precision, cannot protect or sell`);
            return noTrade('INVALID_ORDER_SIZE', `Filled quantity ${filledQuantity.toFixed()} below ${pair} precision`);
        }
        if (levels.stopLossPrice.lte(0)) {
            const failure = new TradingError(`Stop-loss price ${levels.stopLossPrice.toFixed()} is not positive`, pair);
            return this.emergencyLiquidation(pair, levels.quantity, entryPrice, entryOrderId, failure);
        }

        // Stop-loss first: it is the order that must exist.
        let stopLossOrderId: string;
        try {
            const placed = await this.client.placeStopLimitOrder({
                pair,
                side: 'sell',
                quantity: levels.quantity,
                stopPrice: levels.stopLossPrice,
                limitPrice: levels.stopLimitPrice,
            });
            stopLossOrderId = placed.orderId;
        } catch (error) {
            const failure = new TradingError(`Stop-loss placement failed: ${errorMessage(error)}`, pair);
            return this.emergencyLiquidation(pair, levels.quantity, entryPrice, entryOrderId, failure);
        }
        logOrderEvent('PLACED', {
            orderId: stopLossOrderId,
            pair,
            side: 'sell',
            role: 'stop_loss',
            quantity: levels.quantity,
            price: levels.stopLossPrice,
        });
        await this.recordOrder({
            id: stopLossOrderId,
            pair,
            side: 'sell',
            quantity: levels.quantity,
            price: levels.stopLossPrice,
            role: 'stop_loss',
        });

        let takeProfitOrderId: string | undefined;
        if (this.config.protectionMode === 'dual') {
            try {
                const placed = await this.client.placeLimitOrder({
                    pair,
                    side: 'sell',
                    quantity: levels.quantity,
                    price: levels.takeProfitPrice,
                    postOnly: true,
                });
                takeProfitOrderId = placed.orderId;
                logOrderEvent('PLACED', {
                    orderId: takeProfitOrderId,
                    pair,
                    side: 'sell',
                    role: 'take_profit',
                    quantity: levels.quantity,
                    price: levels.takeProfitPrice,
                });
                await this.recordOrder({
                    id: takeProfitOrderId,
                    pair,
                    side: 'sell',
                    quantity: levels.quantity,
                    price: levels.takeProfitPrice,
                    role: 'take_profit',
                });
            } catch (error) {
                logger.warn(`[ENGINE] Take-profit placement failed on ${pair}, watching it from the book: ${errorMessage(error)}`);
            }
        }

        const position: Position = {
            id: generatePositionId(),
            pair,
            quantity: levels.quantity,
            entryPrice,
            stopLossPrice: levels.stopLossPrice,
            takeProfitPrice: levels.takeProfitPrice,
            createdAt: filledAt,
            entryFilledAt: filledAt,
            status: 'open',
            entryOrderId,
            takeProfitOrderId,
            stopLossOrderId,
        };

        await this.lock.runExclusive(async () => {
            this.positions.set(position.id, position);
            this.counters.recordTrade();
            await this.persistPosition(position);
            await this.markOrder(entryOrderId, 'filled');
        });

        logPositionUpdate('OPENED', {
            positionId: position.id,
            pair,
            quantity: position.quantity,
            entryPrice,
        });
        if (this.config.protectionMode === 'dual' && takeProfitOrderId === undefined) {
            logPositionUpdate('PROTECTION_DEGRADED', { positionId: position.id, pair, reason: 'take_profit_watch' });
        }
        logger.info(
            `[ENGINE] ${pair} protected: qty ${position.quantity.toFixed()} entry ${entryPrice.toFixed()} ` +
            `TP ${position.takeProfitPrice.toFixed()}${takeProfitOrderId ? '' : ' (watched)'} SL ${position.stopLossPrice.toFixed()}`
        );

        return { ok: true, position };
    }

    private async emergencyLiquidation(
        pair: string,
        quantity: BigNumber,
        entryPrice: BigNumber,
        entryOrderId: string,
        failure: TradingError
    ): Promise<TradeSetupResult> {
        logger.error(`[ENGINE] ${failure.message}. Liquidating ${quantity.toFixed()} ${pair}`);

        const sold = await this.liquidate(pair, quantity);
        this.counters.recordTrade();
        await this.markOrder(entryOrderId, 'filled');

        if (!sold) {
            logger.error(
                `[CRITICAL] UNPROTECTED POSITION: ${quantity.toFixed()} ${pair} from entry ${entryOrderId} ` +
                `has no stop-loss and could not be sold. Manual intervention required.`
            );
        }
        logTradeEvent({
            positionId: null,
            entryOrderId,
            pair,
            exitReason: 'protection_failed',
            entryPrice,
            exitPrice: null,
            quantity,
            pnl: null,
        });

        return noTrade('PROTECTION_FAILED', `${failure.message}; liquidation ${sold ? 'submitted' : 'FAILED'}`);
    }

    /**
     * Market sell, falling back to a limit sell at the best bid.
     * Resolves true once either order is accepted.
     */
    private async liquidate(pair: string, quantity: BigNumber): Promise<boolean> {
        try {
            const placed = await this.client.placeMarketOrder({ pair, side: 'sell', baseAmount: quantity });
            logOrderEvent('PLACED', { orderId: placed.orderId, pair, side: 'sell', quantity, note: 'liquidation market' });
            return true;
        } catch (error) {
            logger.warn(`[ENGINE] Market sell of ${quantity.toFixed()} ${pair} failed: ${errorMessage(error)}`);
        }

        try {
            const book = await this.client.getOrderBook(pair);
            if (book.bids.length === 0) {
                throw new TradingError(`No bids to sell into`, pair);
            }
            const price = book.bids[0].price;
            const placed = await this.client.placeLimitOrder({ pair, side: 'sell', quantity, price, postOnly: false });
            logOrderEvent('PLACED', { orderId: placed.orderId, pair, side: 'sell', quantity, price, note: 'liquidation best-bid' });
            return true;
        } catch (error) {
            logger.error(`[ENGINE] Best-bid sell of ${quantity.toFixed()} ${pair} failed: ${errorMessage(error)}`);
            return false;
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MONITOR
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * One pass over every open position. A failure on one position is logged
     * and does not stop the pass.
     */
    async monitorPositions(): Promise<void> {
        await this.lock.runExclusive(async () => {
            const openOrderCache = new Map<string, Set<string>>();

            for (const position of [...this.positions.values()]) {
                if (!this.positions.has(position.id)) continue;
                try {
                    await this.monitorPosition(position, openOrderCache);
                } catch (error) {
                    logger.error(`[MONITOR] ${position.pair} ${position.id}: ${errorMessage(error)}`);
                }
            }
        });
    }

    private async openOrderIds(pair: string, cache: Map<string, Set<string>>): Promise<Set<string>> {
        const cached = cache.get(pair);
        if (cached) return cached;
        const orders = await this.client.getOpenOrders(pair);
        const ids = new Set(orders.map(order => order.orderId));
        cache.set(pair, ids);
        return ids;
    }

    private async monitorPosition(position: Position, cache: Map<string, Set<string>>): Promise<void> {
        const heldMs = this.clock.now() - position.entryFilledAt.getTime();
        const protectiveIds = this.protectiveOrderIds(position);

        // 1. Hard timeouts
        if (heldMs > this.config.positionTimeoutMs) {
            await this.closeForced(position, 'position_timeout', protectiveIds);
            return;
        }
        if (heldMs > this.config.exitOrderTimeoutMs) {
            await this.closeForced(position, 'exit_orders_timeout', protectiveIds);
            return;
        }

        // 2. Existence check
        const openIds = await this.openOrderIds(position.pair, cache);
        const tpId = position.takeProfitOrderId;
        const slId = position.stopLossOrderId;

        if (tpId !== undefined && slId !== undefined) {
            const tpOpen = openIds.has(tpId);
            const slOpen = openIds.has(slId);

            if (!tpOpen && !slOpen) {
                await this.closeForced(position, 'orders_missing', []);
                return;
            }
            if (!tpOpen) {
                await this.closeOnExit(position, 'take_profit', position.takeProfitPrice, slId);
                return;
            }
            if (!slOpen) {
                await this.closeOnExit(position, 'stop_loss', position.stopLossPrice, tpId);
                return;
            }

            // 3. Both listed open: read both statuses before acting on either
            const tpStatus = await this.client.getOrderStatus(position.pair, tpId);
            const slStatus = await this.client.getOrderStatus(position.pair, slId);

            if (tpStatus.status === 'FILLED' && slStatus.status === 'FILLED') {
                logger.error(`[MONITOR] Both exit orders of ${position.id} filled in one window`);
                await this.closeForced(position, 'both_orders_filled', []);
                return;
            }

            // 4. Exactly one filled
            if (tpStatus.status === 'FILLED') {
                await this.closeOnExit(position, 'take_profit', tpStatus.averagePrice ?? position.takeProfitPrice, slId);
                return;
            }
            if (slStatus.status === 'FILLED') {
                await this.closeOnExit(position, 'stop_loss', slStatus.averagePrice ?? position.stopLossPrice, tpId);
            }
            return;
        }

        if (slId !== undefined) {
            if (!openIds.has(slId)) {
                await this.resolveMissingSingle(position, slId, 'stop_loss', position.stopLossPrice);
                return;
            }
            // 5. Take-profit watch
            await this.watchTakeProfit(position, slId);
            return;
        }

        if (tpId !== undefined && !openIds.has(tpId)) {
            await this.resolveMissingSingle(position, tpId, 'take_profit', position.takeProfitPrice);
        }
    }

    /**
     * The only resting protective order is gone: a fill closes normally,
     * anything else is force-closed.
     */
    private async resolveMissingSingle(
        position: Position,
        orderId: string,
        reason: 'take_profit' | 'stop_loss',
        fallbackPrice: BigNumber
    ): Promise<void> {
        const report = await this.client.getOrderStatus(position.pair, orderId);
        if (report.status === 'FILLED') {
            await this.closeOnExit(position, reason, report.averagePrice ?? fallbackPrice, undefined);
            return;
        }
        logger.warn(`[MONITOR] ${reason} order ${orderId} of ${position.id} is ${report.rawStatus || report.status}, not filled`);
        await this.closeForced(position, 'orders_missing', []);
    }

    private async watchTakeProfit(position: Position, stopLossOrderId: string): Promise<void> {
        const book = await this.client.getOrderBook(position.pair);
        if (book.bids.length === 0) return;

        const bestBid = book.bids[0].price;
        if (bestBid.gte(position.takeProfitPrice)) {
            logger.info(
                `[MONITOR] ${position.pair} best bid ${bestBid.toFixed()} reached watched TP ${position.takeProfitPrice.toFixed()}`
            );
            await this.closeForced(position, 'take_profit_watch', [stopLossOrderId], bestBid);
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CLOSE PATHS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Idempotent force-close. Safe to call for unknown or already-closing ids.
     */
    async forceClose(positionId: string, reason: ExitReason): Promise<boolean> {
        return this.lock.runExclusive(async () => {
            const position = this.positions.get(positionId);
            if (!position) {
                logger.debug(`[ENGINE] forceClose(${positionId}): not open, nothing to do`);
                return false;
            }
            return this.closeForced(position, reason, this.protectiveOrderIds(position));
        });
    }

    /**
     * Cancel the listed protective orders, sell the full quantity, then drop
     * the position. PnL is attributed only when an exit estimate is given.
     */
    private async closeForced(
        position: Position,
        reason: ExitReason,
        ordersToCancel: string[],
        estimatedExitPrice?: BigNumber
    ): Promise<boolean> {
        if (!this.beginClose(position)) return false;

        try {
            logger.warn(`[ENGINE] Force-closing ${position.pair} ${position.id} (${reason})`);

            for (const orderId of ordersToCancel) {
                await this.cancelOrderSafely(position.pair, orderId, this.roleOf(position, orderId));
            }

            const sold = await this.liquidate(position.pair, position.quantity);
            if (!sold) {
                logger.error(`[ENGINE] Force-close sell failed for ${position.id}; residual may remain on ${position.pair}`);
            }

            const pnl = estimatedExitPrice === undefined
                ? null
                : calculatePnL(position.entryPrice, estimatedExitPrice, position.quantity);
            if (pnl !== null) this.counters.recordResult(pnl);

            await this.finishClose(position, reason, estimatedExitPrice ?? null, pnl, 'FORCE_CLOSED');
            return true;
        } finally {
            this.closing.delete(position.id);
        }
    }

    /**
     * Normal exit: one protective order filled. Cancel the other and book PnL.
     */
    private async closeOnExit(
        position: Position,
        reason: 'take_profit' | 'stop_loss',
        exitPrice: BigNumber,
        otherOrderId: string | undefined
    ): Promise<void> {
        if (!this.beginClose(position)) return;

        try {
            if (otherOrderId !== undefined) {
                await this.cancelOrderSafely(position.pair, otherOrderId, this.roleOf(position, otherOrderId));
            }

            const filledId = reason === 'take_profit' ? position.takeProfitOrderId : position.stopLossOrderId;
            if (filledId !== undefined) {
                logOrderEvent('FILLED', {
                    orderId: filledId,
                    pair: position.pair,
                    side: 'sell',
                    role: reason,
                    quantity: position.quantity,
                    price: exitPrice,
                });
                await this.markOrder(filledId, 'filled');
            }

            const pnl = calculatePnL(position.entryPrice, exitPrice, position.quantity);
            this.counters.recordResult(pnl);

            await this.finishClose(position, reason, exitPrice, pnl, 'CLOSED');
        } finally {
            this.closing.delete(position.id);
        }
    }

    private beginClose(position: Position): boolean {
        if (this.closing.has(position.id) || !this.positions.has(position.id)) {
            logger.debug(`[ENGINE] ${position.id} already closing or closed`);
            return false;
        }
        this.closing.add(position.id);
        return true;
    }

    private async finishClose(
        position: Position,
        reason: ExitReason,
        exitPrice: BigNumber | null,
        pnl: BigNumber | null,
        event: 'CLOSED' | 'FORCE_CLOSED'
    ): Promise<void> {
        this.positions.delete(position.id);
        for (const orderId of this.protectiveOrderIds(position)) {
            if (this.orderStore.get(orderId)) {
                await this.markOrder(orderId, 'cancelled');
            }
        }
        try {
            await this.positionStore.delete(position.id);
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            logger.error(`[POSITION-STORE] Could not delete ${position.id}, continuing in memory: ${error.message}`);
        }

        logPositionUpdate(event, { positionId: position.id, pair: position.pair, reason });
        logTradeEvent({
            positionId: position.id,
            entryOrderId: position.entryOrderId,
            pair: position.pair,
            exitReason: reason,
            entryPrice: position.entryPrice,
            exitPrice,
            quantity: position.quantity,
            pnl,
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // HELPERS
    // ═══════════════════════════════════════════════════════════════════════════

    private pairSpec(pair: string): PairSpec {
        return this.config.pairSpecs[pair] ?? getPairSpec(pair);
    }

    private protectiveOrderIds(position: Position): string[] {
        const ids: string[] = [];
        if (position.takeProfitOrderId !== undefined) ids.push(position.takeProfitOrderId);
        if (position.stopLossOrderId !== undefined) ids.push(position.stopLossOrderId);
        return ids;
    }

    private roleOf(position: Position, orderId: string): string {
        return orderId === position.takeProfitOrderId ? 'take_profit' : 'stop_loss';
    }

    private async cancelOrderSafely(pair: string, orderId: string, role: string): Promise<boolean> {
        try {
            await this.client.cancelOrder(pair, orderId);
            logOrderEvent('CANCELLED', { orderId, pair, role });
            return true;
        } catch (error) {
            logOrderEvent('CANCEL_FAILED', { orderId, pair, role, note: errorMessage(error) });
            return false;
        }
    }

    private async recordOrder(order: NewOrderRecord): Promise<void> {
        try {
            await this.orderStore.add(order);
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            logger.error(`[ORDER-STORE] ${error.message}; continuing in memory`);
        }
    }

    private async markOrder(orderId: string, status: OrderRecordStatus): Promise<void> {
        try {
            await this.orderStore.updateStatus(orderId, status);
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            logger.error(`[ORDER-STORE] ${error.message}; continuing in memory`);
        }
    }

    private async persistPosition(position: Position): Promise<void> {
        try {
            await this.positionStore.upsert(position);
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            logger.error(`[POSITION-STORE] ${error.message}; ${position.id} held in memory only`);
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIFECYCLE & INTROSPECTION
    // ═══════════════════════════════════════════════════════════════════════════

    requestShutdown(): void {
        if (this.shutdownRequested) return;
        this.shutdownRequested = true;
        logger.info('[SHUTDOWN] Engine shutdown requested, no new trade setups');
    }

    isShutdownRequested(): boolean {
        return this.shutdownRequested;
    }

    hasOpenPosition(pair: string): boolean {
        for (const position of this.positions.values()) {
            if (position.pair === pair) return true;
        }
        return false;
    }

    getOpenPositions(): Position[] {
        return [...this.positions.values()];
    }

    /**
     * Write both stores from the in-memory view.
     */
    async flush(): Promise<void> {
        await this.lock.runExclusive(async () => {
            try {
                await this.positionStore.save(this.positions.values());
                await this.orderStore.flush();
                logger.info(`[SHUTDOWN] Flushed ${this.positions.size} position(s) and order records`);
            } catch (error) {
                if (!(error instanceof PersistenceError)) throw error;
                logger.error(`[SHUTDOWN] Flush failed: ${error.message}`);
            }
        });
    }

    async runMaintenance(): Promise<number> {
        try {
            return await this.orderStore.cleanupOld(BOT_CONFIG.STALE_ORDER_MAX_AGE_HOURS);
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            logger.error(`[ORDER-STORE] Maintenance failed: ${error.message}`);
            return 0;
        }
    }

    getStatistics(): EngineStatistics {
        const open = this.getOpenPositions();
        return {
            openPositions: open.length,
            pairsWithPositions: [...new Set(open.map(position => position.pair))],
            watchedTakeProfits: open.filter(position => position.takeProfitOrderId === undefined).length,
            daily: this.counters.snapshot(),
            orders: this.orderStore.getStatistics(),
            shutdownRequested: this.shutdownRequested,
        };
    }
}
