// Type Definitions for the Scalp Bot

import type BigNumber from 'bignumber.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ORDERS
// ═══════════════════════════════════════════════════════════════════════════════

export type OrderSide = 'buy' | 'sell';

/**
 * Role an exchange order plays in a position's lifecycle
 */
export type OrderRole = 'entry' | 'take_profit' | 'stop_loss';

export type OrderRecordStatus = 'active' | 'filled' | 'cancelled';

/**
 * Persisted record of an in-flight exchange order.
 * One record per exchange-assigned order id.
 */
export interface OrderRecord {
    id: string;
    pair: string;
    side: OrderSide;
    quantity: BigNumber;
    price: BigNumber;
    role: OrderRole;
    status: OrderRecordStatus;
    createdAt: Date;
    lastUpdated: Date;
}

/**
 * Canonical order status. Raw exchange strings never leave the normalizer.
 */
export type OrderStatus = 'PENDING' | 'FILLED' | 'PARTIALLY_FILLED' | 'CANCELLED';

// ═══════════════════════════════════════════════════════════════════════════════
// POSITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type PositionStatus = 'open' | 'closed';

/**
 * A held long exposure.
 *
 * While open: quantity > 0, entryPrice > 0 and
 * stopLossPrice < entryPrice < takeProfitPrice.
 * At most one of takeProfitOrderId / stopLossOrderId is absent.
 */
export interface Position {
    id: string;
    pair: string;
    quantity: BigNumber;
    entryPrice: BigNumber;
    stopLossPrice: BigNumber;
    takeProfitPrice: BigNumber;
    createdAt: Date;
    entryFilledAt: Date;
    status: PositionStatus;
    entryOrderId: string;
    takeProfitOrderId?: string;
    stopLossOrderId?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FILL-WAIT
// ═══════════════════════════════════════════════════════════════════════════════

export type FillState = 'FILLED' | 'PARTIALLY_FILLED' | 'CANCELLED' | 'TIMEOUT' | 'SHUTDOWN';

/**
 * Transient result of waiting on an order. Consumed once by the caller.
 */
export interface FillOutcome {
    state: FillState;
    filledQuantity: BigNumber;
    averagePrice: BigNumber | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SIGNALS & COUNTERS
// ═══════════════════════════════════════════════════════════════════════════════

export interface Signal {
    pair: string;
    shouldBuy: boolean;
    /** 0..1 */
    confidence: number;
    /** Indicator reading that produced the decision */
    value: number | null;
}

export interface DailyCountersSnapshot {
    /** UTC calendar date, YYYY-MM-DD */
    date: string;
    tradesToday: number;
    winsToday: number;
    lossesToday: number;
    dailyPnl: BigNumber;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRADE SETUP RESULT
// ═══════════════════════════════════════════════════════════════════════════════

export type NoTradeReason =
    | 'NO_SIGNAL'
    | 'SHUTTING_DOWN'
    | 'DAILY_LIMIT_REACHED'
    | 'POSITION_ALREADY_OPEN'
    | 'NO_MARKET_DATA'
    | 'INSUFFICIENT_BALANCE'
    | 'INVALID_ORDER_SIZE'
    | 'ENTRY_NOT_FILLED'
    | 'PROTECTION_FAILED'
    | 'EXCHANGE_ERROR';

export type TradeSetupResult =
    | { ok: true; position: Position }
    | { ok: false; reason: NoTradeReason; detail: string };

/**
 * Why a position left the active set
 */
export type ExitReason =
    | 'take_profit'
    | 'stop_loss'
    | 'take_profit_watch'
    | 'position_timeout'
    | 'exit_orders_timeout'
    | 'orders_missing'
    | 'both_orders_filled';
