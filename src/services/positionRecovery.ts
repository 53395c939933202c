/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * POSITION RECOVERY — REBUILD OPEN POSITIONS AFTER A RESTART
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Persisted positions win. Only when the store is empty are positions
 * reconstructed from the exchange's open orders:
 *
 *   - group SELL orders by pair
 *   - pair up orders of the same quantity (within tolerance)
 *   - higher price = take-profit, lower price = stop-loss
 *   - entry = takeProfit / (1 + tp% / 100)
 *
 * A single unmatched order never becomes a position. Candidates that break
 * stopLoss < entry < takeProfit are skipped.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { BOT_CONFIG } from '../config/constants';
import { errorMessage, PersistenceError } from '../exchange/errors';
import { ExchangeClient, OpenOrder } from '../exchange/types';
import { PositionStore } from '../storage/positionStore';
import { logPositionUpdate } from '../telemetry/tradeEvents';
import { Position } from '../types';
import { Clock } from '../utils/clock';
import { generateRecoveredPositionId } from '../utils/id';
import logger from '../utils/logger';
import { entryPriceFromTakeProfit } from '../utils/math';

export const RECOVERED_ENTRY_ORDER_ID = 'recovered';

export interface ReconstructionResult {
    positions: Position[];
    unmatched: OpenOrder[];
}

/**
 * Trigger price for stop orders, limit price otherwise.
 */
function effectivePrice(order: OpenOrder): BigNumber {
    return order.stopPrice ?? order.price;
}

function earliest(a: Date | null, b: Date | null, fallback: Date): Date {
    if (a && b) return a < b ? a : b;
    return a ?? b ?? fallback;
}

function tryBuildPosition(
    first: OpenOrder,
    second: OpenOrder,
    takeProfitPct: BigNumber,
    now: Date
): Position | null {
    const [takeProfit, stopLoss] = effectivePrice(first).gt(effectivePrice(second))
        ? [first, second]
        : [second, first];

    const takeProfitPrice = effectivePrice(takeProfit);
    const stopLossPrice = effectivePrice(stopLoss);
    const entryPrice = entryPriceFromTakeProfit(takeProfitPrice, takeProfitPct);

    if (!(stopLossPrice.lt(entryPrice) && entryPrice.lt(takeProfitPrice))) {
        logger.warn(
            `[RECOVERY] ${first.pair}: skipping ${takeProfit.orderId}/${stopLoss.orderId}, ` +
            `SL ${stopLossPrice.toFixed()} < entry ${entryPrice.toFixed(8)} < TP ${takeProfitPrice.toFixed()} does not hold`
        );
        return null;
    }

    const openedAt = earliest(takeProfit.createdAt, stopLoss.createdAt, now);

    return {
        id: generateRecoveredPositionId(first.pair),
        pair: first.pair,
        quantity: BigNumber.minimum(takeProfit.quantity, stopLoss.quantity),
        entryPrice,
        stopLossPrice,
        takeProfitPrice,
        createdAt: openedAt,
        entryFilledAt: openedAt,
        status: 'open',
        entryOrderId: RECOVERED_ENTRY_ORDER_ID,
        takeProfitOrderId: takeProfit.orderId,
        stopLossOrderId: stopLoss.orderId,
    };
}

/**
 * Pure reconstruction over a snapshot of open orders.
 */
export function reconstructPositions(
    openOrders: OpenOrder[],
    takeProfitPct: BigNumber,
    now: Date,
    tolerance: BigNumber = new BigNumber(BOT_CONFIG.RECOVERY_QUANTITY_TOLERANCE)
): ReconstructionResult {
    const positions: Position[] = [];
    const unmatched: OpenOrder[] = [];
    const sellsByPair = new Map<string, OpenOrder[]>();

    for (const order of openOrders) {
        if (order.side !== 'sell') {
            unmatched.push(order);
            continue;
        }
        const list = sellsByPair.get(order.pair) ?? [];
        list.push(order);
        sellsByPair.set(order.pair, list);
    }

    for (const [pair, sells] of sellsByPair) {
        const used = new Set<number>();

        for (let i = 0; i < sells.length; i++) {
            if (used.has(i)) continue;

            for (let j = i + 1; j < sells.length; j++) {
                if (used.has(j)) continue;
                if (sells[i].quantity.minus(sells[j].quantity).abs().gt(tolerance)) continue;

                const position = tryBuildPosition(sells[i], sells[j], takeProfitPct, now);
                if (position) {
                    positions.push(position);
                    used.add(i);
                    used.add(j);
                    break;
                }
            }
        }

        sells.forEach((order, index) => {
            if (!used.has(index)) unmatched.push(order);
        });

        logger.debug(`[RECOVERY] ${pair}: ${sells.length} sell order(s), ${used.size / 2} pair(s) matched`);
    }

    return { positions, unmatched };
}

export interface RecoveryDependencies {
    client: ExchangeClient;
    positionStore: PositionStore;
    takeProfitPct: BigNumber;
    clock: Clock;
}

/**
 * Persisted positions, or positions rebuilt from open orders when none are
 * persisted. Rebuilt positions are written back to the store.
 */
export async function recoverPositions(deps: RecoveryDependencies): Promise<Map<string, Position>> {
    let persisted = new Map<string, Position>();
    try {
        persisted = await deps.positionStore.load();
    } catch (error) {
        if (!(error instanceof PersistenceError)) throw error;
        logger.error(`[RECOVERY] Position store unreadable, rebuilding from exchange: ${error.message}`);
    }
    if (persisted.size > 0) {
        logger.info(`[RECOVERY] Resuming ${persisted.size} persisted position(s)`);
        return persisted;
    }

    let openOrders: OpenOrder[];
    try {
        openOrders = await deps.client.getOpenOrders();
    } catch (error) {
        logger.error(`[RECOVERY] Could not fetch open orders, starting with no positions: ${errorMessage(error)}`);
        return new Map();
    }

    if (openOrders.length === 0) {
        logger.info('[RECOVERY] No persisted positions and no open orders');
        return new Map();
    }

    const { positions, unmatched } = reconstructPositions(
        openOrders,
        deps.takeProfitPct,
        new Date(deps.clock.now())
    );

    for (const order of unmatched) {
        logger.warn(
            `[RECOVERY] Unmatched ${order.side} order ${order.orderId} on ${order.pair}: ` +
            `${order.quantity.toFixed()} @ ${order.price.toFixed()}`
        );
    }

    const recovered = new Map<string, Position>();
    for (const position of positions) {
        recovered.set(position.id, position);
        logPositionUpdate('RECOVERED', {
            positionId: position.id,
            pair: position.pair,
            quantity: position.quantity,
            entryPrice: position.entryPrice,
        });
    }

    if (recovered.size > 0) {
        try {
            await deps.positionStore.save(recovered.values());
        } catch (error) {
            if (!(error instanceof PersistenceError)) throw error;
            logger.error(`[RECOVERY] Recovered positions not persisted: ${error.message}`);
        }
    }

    logger.info(`[RECOVERY] Recovered ${recovered.size} position(s), ${unmatched.length} order(s) unmatched`);
    return recovered;
}
