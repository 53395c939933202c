/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * TRADE EVENT TELEMETRY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Structured log records for every gateway call, order event and position
 * transition. Decimals are logged as plain strings so the JSON log lines
 * can be replayed into BigNumber without loss.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';

export type OrderEventType = 'PLACED' | 'FILLED' | 'PARTIALLY_FILLED' | 'CANCELLED' | 'CANCEL_FAILED' | 'REJECTED';

export type PositionEventType = 'OPENED' | 'RECOVERED' | 'CLOSED' | 'FORCE_CLOSED' | 'PROTECTION_DEGRADED';

export interface ApiCallEvent {
    method: string;
    endpoint: string;
    status: number | null;
    latencyMs: number;
    attempt: number;
    error?: string;
}

export function logApiCall(event: ApiCallEvent): void {
    const level = event.status === null || event.status >= 400 ? 'warn' : 'debug';
    logger.log(level, `[GATEWAY] ${event.method} ${event.endpoint} -> ${event.status ?? 'ERR'} (${event.latencyMs}ms)`, {
        event: 'api_call',
        ...event,
    });
}

export function logOrderEvent(
    type: OrderEventType,
    details: {
        orderId: string;
        pair: string;
        side?: string;
        role?: string;
        quantity?: BigNumber;
        price?: BigNumber;
        note?: string;
    }
): void {
    logger.info(`[ORDER] ${type} ${details.pair} ${details.orderId}`, {
        event: 'order',
        type,
        orderId: details.orderId,
        pair: details.pair,
        side: details.side,
        role: details.role,
        quantity: details.quantity?.toFixed(),
        price: details.price?.toFixed(),
        note: details.note,
    });
}

export function logPositionUpdate(
    type: PositionEventType,
    details: {
        positionId: string;
        pair: string;
        quantity?: BigNumber;
        entryPrice?: BigNumber;
        reason?: string;
    }
): void {
    logger.info(`[POSITION] ${type} ${details.pair} ${details.positionId}${details.reason ? ` (${details.reason})` : ''}`, {
        event: 'position',
        type,
        positionId: details.positionId,
        pair: details.pair,
        quantity: details.quantity?.toFixed(),
        entryPrice: details.entryPrice?.toFixed(),
        reason: details.reason,
    });
}

/**
 * Completed round trip. pnl is null when the exit could not be attributed;
 * positionId is null when the entry filled but no position was ever opened.
 */
export function logTradeEvent(details: {
    positionId: string | null;
    entryOrderId: string;
    pair: string;
    exitReason: string;
    entryPrice: BigNumber;
    exitPrice: BigNumber | null;
    quantity: BigNumber;
    pnl: BigNumber | null;
}): void {
    const pnlText = details.pnl === null ? 'n/a' : details.pnl.toFixed();
    logger.info(`[TRADE] ${details.pair} closed by ${details.exitReason} | PnL ${pnlText}`, {
        event: 'trade',
        positionId: details.positionId,
        entryOrderId: details.entryOrderId,
        pair: details.pair,
        exitReason: details.exitReason,
        entryPrice: details.entryPrice.toFixed(),
        exitPrice: details.exitPrice?.toFixed(),
        quantity: details.quantity.toFixed(),
        pnl: details.pnl?.toFixed(),
    });
}
