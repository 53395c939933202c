/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * RESPONSE NORMALIZATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * The exchange answers the same question with different field names and
 * casings depending on endpoint and API revision. This module is the only
 * place that reads raw payload fields. Everything past it works on the
 * canonical shapes in ./types.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { OrderSide, OrderStatus } from '../types';
import { parseDecimal } from '../utils/math';
import { BookLevel, Fill, MarketSummary, OpenOrder, OrderBook, OrderStatusReport } from './types';

type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstDecimal(raw: RawRecord, keys: readonly string[]): BigNumber | null {
    for (const key of keys) {
        const parsed = parseDecimal(raw[key]);
        if (parsed !== null) return parsed;
    }
    return null;
}

function firstString(raw: RawRecord, keys: readonly string[]): string | null {
    for (const key of keys) {
        const value = raw[key];
        if (typeof value === 'string' && value.length > 0) return value;
        if (typeof value === 'number') return String(value);
    }
    return null;
}

function parseDate(value: unknown): Date | null {
    if (typeof value !== 'string' && typeof value !== 'number') return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Arrays arrive bare or wrapped in an object under one of `keys`.
 */
function unwrapList(payload: unknown, keys: readonly string[]): unknown[] {
    if (Array.isArray(payload)) return payload;
    if (isRecord(payload)) {
        for (const key of keys) {
            const inner = payload[key];
            if (Array.isArray(inner)) return inner;
        }
    }
    return [];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORDER STATUS
// ═══════════════════════════════════════════════════════════════════════════════

const STATUS_FIELDS = ['orderStatusType', 'status', 'orderStatus'] as const;
const FILLED_QUANTITY_FIELDS = ['totalExecutedQuantity', 'executedQuantity', 'filledQuantity', 'filled'] as const;
const AVERAGE_PRICE_FIELDS = ['averagePrice', 'executedPrice', 'avgPrice', 'averageFilledPrice'] as const;
const ORIGINAL_QUANTITY_FIELDS = ['originalQuantity', 'quantity', 'baseAmount'] as const;

const STATUS_ALIASES: Record<string, OrderStatus> = {
    filled: 'FILLED',
    completed: 'FILLED',
    complete: 'FILLED',
    executed: 'FILLED',
    done: 'FILLED',
    partiallyfilled: 'PARTIALLY_FILLED',
    partialfilled: 'PARTIALLY_FILLED',
    partial: 'PARTIALLY_FILLED',
    cancelled: 'CANCELLED',
    canceled: 'CANCELLED',
    expired: 'CANCELLED',
    failed: 'CANCELLED',
    rejected: 'CANCELLED',
    placed: 'PENDING',
    active: 'PENDING',
    new: 'PENDING',
    open: 'PENDING',
    pending: 'PENDING',
    accepted: 'PENDING',
};

/**
 * Map any exchange status string ("Filled", "PARTIALLY_FILLED",
 * "Partially Filled", "canceled", ...) to the canonical set.
 * Unknown strings are treated as still working.
 */
export function normalizeStatusString(raw: string): OrderStatus {
    const key = raw.toLowerCase().replace(/[\s_-]+/g, '');
    return STATUS_ALIASES[key] ?? 'PENDING';
}

export function normalizeOrderStatus(orderId: string, payload: unknown): OrderStatusReport {
    const raw = isRecord(payload) ? payload : {};
    const rawStatus = firstString(raw, STATUS_FIELDS) ?? '';
    const originalQuantity = firstDecimal(raw, ORIGINAL_QUANTITY_FIELDS);

    let filledQuantity = firstDecimal(raw, FILLED_QUANTITY_FIELDS);
    if (filledQuantity === null) {
        const remaining = parseDecimal(raw.remainingQuantity);
        filledQuantity = originalQuantity !== null && remaining !== null
            ? originalQuantity.minus(remaining)
            : new BigNumber(0);
    }
    if (filledQuantity.isNegative()) {
        filledQuantity = new BigNumber(0);
    }

    let status = normalizeStatusString(rawStatus);
    if (status === 'PENDING' && filledQuantity.gt(0)) {
        status = 'PARTIALLY_FILLED';
    }

    const averagePrice = firstDecimal(raw, AVERAGE_PRICE_FIELDS);

    return {
        orderId: firstString(raw, ['orderId', 'id']) ?? orderId,
        status,
        filledQuantity,
        originalQuantity,
        averagePrice: averagePrice !== null && averagePrice.gt(0) ? averagePrice : null,
        rawStatus,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

function normalizeLevels(levels: unknown): BookLevel[] {
    if (!Array.isArray(levels)) return [];
    const result: BookLevel[] = [];
    for (const level of levels) {
        if (!isRecord(level)) continue;
        const price = parseDecimal(level.price);
        const quantity = parseDecimal(level.quantity);
        if (price === null || quantity === null || price.lte(0) || quantity.lte(0)) continue;
        result.push({ price, quantity });
    }
    return result;
}

export function normalizeOrderBook(pair: string, payload: unknown): OrderBook {
    const raw = isRecord(payload) ? payload : {};
    const bids = normalizeLevels(raw.Bids ?? raw.bids).sort((a, b) => b.price.comparedTo(a.price) ?? 0);
    const asks = normalizeLevels(raw.Asks ?? raw.asks).sort((a, b) => a.price.comparedTo(b.price) ?? 0);
    return { pair, bids, asks };
}

/**
 * Returns null when the payload carries no usable last traded price.
 */
export function normalizeMarketSummary(pair: string, payload: unknown): MarketSummary | null {
    if (!isRecord(payload)) return null;
    const lastTradedPrice = firstDecimal(payload, ['lastTradedPrice', 'lastPrice', 'last']);
    if (lastTradedPrice === null || lastTradedPrice.lte(0)) return null;
    return {
        pair,
        lastTradedPrice,
        bidPrice: firstDecimal(payload, ['bidPrice', 'bestBid']),
        askPrice: firstDecimal(payload, ['askPrice', 'bestAsk']),
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT & ORDERS
// ═══════════════════════════════════════════════════════════════════════════════

export function normalizeBalances(payload: unknown): Record<string, BigNumber> {
    const balances: Record<string, BigNumber> = {};
    for (const entry of unwrapList(payload, ['balances', 'data'])) {
        if (!isRecord(entry)) continue;
        const currency = firstString(entry, ['currency', 'asset']);
        const available = firstDecimal(entry, ['available', 'free']);
        if (currency === null || available === null) continue;
        balances[currency.toUpperCase()] = available;
    }
    return balances;
}

export function normalizeSide(value: unknown): OrderSide | null {
    if (typeof value !== 'string') return null;
    const side = value.toLowerCase();
    if (side === 'buy' || side === 'bid') return 'buy';
    if (side === 'sell' || side === 'ask') return 'sell';
    return null;
}

/**
 * Returns null for entries missing an id, pair, side, price or quantity.
 */
export function normalizeOpenOrder(payload: unknown): OpenOrder | null {
    if (!isRecord(payload)) return null;

    const orderId = firstString(payload, ['orderId', 'id']);
    const pair = firstString(payload, ['currencyPair', 'pair']);
    const side = normalizeSide(payload.side);
    const price = firstDecimal(payload, ['price', 'limitPrice', 'orderPrice']);
    const quantity = firstDecimal(payload, ['remainingQuantity', 'quantity', 'originalQuantity', 'baseAmount']);

    if (orderId === null || pair === null || side === null || price === null || quantity === null) {
        return null;
    }

    return {
        orderId,
        pair: pair.toUpperCase(),
        side,
        price,
        quantity,
        orderType: firstString(payload, ['type', 'orderType']) ?? 'unknown',
        stopPrice: firstDecimal(payload, ['stopPrice', 'triggerPrice']),
        createdAt: parseDate(payload.createdAt ?? payload.orderCreatedAt),
    };
}

export function normalizeOpenOrders(payload: unknown): { orders: OpenOrder[]; skipped: number } {
    const orders: OpenOrder[] = [];
    let skipped = 0;
    for (const entry of unwrapList(payload, ['orders', 'data'])) {
        const order = normalizeOpenOrder(entry);
        if (order) {
            orders.push(order);
        } else {
            skipped++;
        }
    }
    return { orders, skipped };
}

export function normalizeFills(payload: unknown, orderId?: string): Fill[] {
    const fills: Fill[] = [];
    for (const entry of unwrapList(payload, ['fills', 'trades', 'data'])) {
        if (!isRecord(entry)) continue;
        const price = parseDecimal(entry.price);
        const quantity = firstDecimal(entry, ['quantity', 'baseAmount']);
        if (price === null || quantity === null || quantity.lte(0)) continue;
        const fillOrderId = firstString(entry, ['orderId']);
        if (orderId !== undefined && fillOrderId !== null && fillOrderId !== orderId) continue;
        fills.push({
            orderId: fillOrderId,
            price,
            quantity,
            tradedAt: parseDate(entry.tradedAt ?? entry.time),
        });
    }
    return fills;
}

export function extractOrderId(payload: unknown): string | null {
    return isRecord(payload) ? firstString(payload, ['id', 'orderId']) : null;
}

export function extractServerTime(payload: unknown): Date | null {
    if (!isRecord(payload)) return null;
    const epoch = parseDecimal(payload.epochTime);
    if (epoch !== null) {
        // seconds vs milliseconds
        return new Date(epoch.lt(1e12) ? epoch.times(1000).toNumber() : epoch.toNumber());
    }
    return parseDate(payload.time ?? payload.serverTime);
}

export function extractErrorDetails(payload: unknown): { message: string | null; code: string | null } {
    if (!isRecord(payload)) {
        return { message: typeof payload === 'string' && payload.length > 0 ? payload : null, code: null };
    }
    return {
        message: firstString(payload, ['message', 'error']),
        code: firstString(payload, ['code', 'errorCode']),
    };
}
