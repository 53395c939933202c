/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * FILL-WAIT PROTOCOL
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Polls one order until it reaches a terminal state, the caller's timeout
 * expires, or shutdown is requested.
 *
 *   PENDING ──► FILLED | PARTIALLY_FILLED | CANCELLED | TIMEOUT | SHUTDOWN
 *
 * Poll cadence: 0.5s for the first 10s, 1s until 30s, 2s after.
 * The shutdown flag is read before every poll.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { BOT_CONFIG } from '../config/constants';
import { errorMessage } from '../exchange/errors';
import { ExchangeClient, Fill } from '../exchange/types';
import { FillOutcome } from '../types';
import { Clock } from '../utils/clock';
import logger from '../utils/logger';

export interface FillWaitRequest {
    pair: string;
    orderId: string;
    /** Quantity sent with the order; last-resort fill quantity */
    submittedQuantity: BigNumber;
    timeoutMs: number;
}

export interface FillWaitContext {
    client: ExchangeClient;
    clock: Clock;
    isShutdownRequested: () => boolean;
}

export function pollIntervalFor(elapsedMs: number): number {
    for (const step of BOT_CONFIG.FILL_WAIT_SCHEDULE) {
        if (elapsedMs < step.untilMs) return step.intervalMs;
    }
    return BOT_CONFIG.FILL_WAIT_TAIL_INTERVAL_MS;
}

function summarizeFills(fills: Fill[]): { quantity: BigNumber; averagePrice: BigNumber | null } {
    let quantity = new BigNumber(0);
    let notional = new BigNumber(0);
    for (const fill of fills) {
        quantity = quantity.plus(fill.quantity);
        notional = notional.plus(fill.quantity.times(fill.price));
    }
    return {
        quantity,
        averagePrice: quantity.gt(0) ? notional.dividedBy(quantity) : null,
    };
}

/**
 * Quantity for an order the exchange reports FILLED.
 * Reported quantity, else the sum of its fills, else what was submitted.
 */
export async function resolveFilledOutcome(
    context: Pick<FillWaitContext, 'client'>,
    request: Pick<FillWaitRequest, 'pair' | 'orderId' | 'submittedQuantity'>,
    reportedQuantity: BigNumber,
    reportedAverage: BigNumber | null
): Promise<FillOutcome> {
    if (reportedQuantity.gt(0)) {
        return { state: 'FILLED', filledQuantity: reportedQuantity, averagePrice: reportedAverage };
    }

    try {
        const fills = await context.client.getOrderFills(request.pair, request.orderId);
        const summary = summarizeFills(fills);
        if (summary.quantity.gt(0)) {
            logger.info(`[FILL-WAIT] ${request.orderId} filled quantity taken from ${fills.length} fill(s)`);
            return {
                state: 'FILLED',
                filledQuantity: summary.quantity,
                averagePrice: reportedAverage ?? summary.averagePrice,
            };
        }
    } catch (error) {
        logger.warn(`[FILL-WAIT] Could not fetch fills for ${request.orderId}: ${errorMessage(error)}`);
    }

    logger.warn(`[FILL-WAIT] ${request.orderId} reported FILLED without quantity, using submitted ${request.submittedQuantity.toFixed()}`);
    return { state: 'FILLED', filledQuantity: request.submittedQuantity, averagePrice: reportedAverage };
}

export async function waitForFill(context: FillWaitContext, request: FillWaitRequest): Promise<FillOutcome> {
    const { client, clock } = context;
    const startedAt = clock.now();
    let filledQuantity = new BigNumber(0);
    let averagePrice: BigNumber | null = null;
    let polls = 0;

    for (;;) {
        if (context.isShutdownRequested()) {
            logger.info(`[FILL-WAIT] Shutdown requested while waiting on ${request.orderId}`);
            return { state: 'SHUTDOWN', filledQuantity, averagePrice };
        }

        polls++;
        try {
            const report = await client.getOrderStatus(request.pair, request.orderId);
            if (report.filledQuantity.gt(filledQuantity)) {
                filledQuantity = report.filledQuantity;
            }
            averagePrice = report.averagePrice ?? averagePrice;

            if (report.status === 'FILLED') {
                const outcome = await resolveFilledOutcome(context, request, report.filledQuantity, averagePrice);
                logger.info(`[FILL-WAIT] ${request.orderId} FILLED ${outcome.filledQuantity.toFixed()} after ${polls} poll(s)`);
                return outcome;
            }

            if (report.status === 'CANCELLED') {
                const state = filledQuantity.gt(0) ? 'PARTIALLY_FILLED' : 'CANCELLED';
                logger.info(`[FILL-WAIT] ${request.orderId} cancelled by exchange (${report.rawStatus}), filled ${filledQuantity.toFixed()}`);
                return { state, filledQuantity, averagePrice };
            }
        } catch (error) {
            logger.warn(`[FILL-WAIT] Status poll ${polls} for ${request.orderId} failed: ${errorMessage(error)}`);
        }

        const elapsed = clock.now() - startedAt;
        if (elapsed >= request.timeoutMs) {
            const state = filledQuantity.gt(0) ? 'PARTIALLY_FILLED' : 'TIMEOUT';
            logger.info(`[FILL-WAIT] ${request.orderId} ${state} after ${elapsed}ms, filled ${filledQuantity.toFixed()}`);
            return { state, filledQuantity, averagePrice };
        }

        await clock.sleep(Math.min(pollIntervalFor(elapsed), request.timeoutMs - elapsed));
    }
}
