/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — OBJECT GRAPH FACTORY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Builds every long-lived object once. NO RUNTIME LOOPS are started here.
 *
 * RULES:
 * 1. Configuration is validated before anything touches the exchange
 * 2. Exchange reachability is verified before recovery runs
 * 3. The engine is fully initialized (recovery + orphan reconciliation)
 *    before the ScanLoop is created
 * 4. start.ts owns process concerns (lock, signals, exit codes)
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { AppConfig, describeConfig, loadConfig } from './config';
import { TradingEngine } from './engine/TradingEngine';
import { errorMessage } from './exchange/errors';
import { ExchangeGateway } from './exchange/gateway';
import { ExchangeClient } from './exchange/types';
import { ScanLoop } from './runtime/scanLoop';
import { RsiSignalSource } from './scoring/rsiSignal';
import { OrderStore } from './storage/orderStore';
import { PositionStore } from './storage/positionStore';
import { Clock, systemClock } from './utils/clock';
import logger from './utils/logger';

export interface BootstrapResult {
    config: AppConfig;
    gateway: ExchangeClient;
    engine: TradingEngine;
    scanLoop: ScanLoop;
}

export interface BootstrapOptions {
    env?: NodeJS.ProcessEnv;
    /** Replaces the HTTP gateway; used by integration harnesses */
    client?: ExchangeClient;
    clock?: Clock;
}

export async function bootstrap(options: BootstrapOptions = {}): Promise<BootstrapResult> {
    const clock = options.clock ?? systemClock;

    // ═══════════════════════════════════════════════════════════════════════════
    // STEP 1: Configuration
    // ═══════════════════════════════════════════════════════════════════════════

    logger.info('[BOOTSTRAP] Step 1: Loading configuration...');
    const config = loadConfig(options.env);
    logger.level = config.logging.level;
    logger.info('[BOOTSTRAP] ✅ Configuration valid', describeConfig(config));

    // ═══════════════════════════════════════════════════════════════════════════
    // STEP 2: Exchange connectivity
    // ═══════════════════════════════════════════════════════════════════════════

    logger.info('[BOOTSTRAP] Step 2: Checking exchange connectivity...');
    const gateway = options.client ?? new ExchangeGateway(config.exchange, { clock });
    try {
        const serverTime = await gateway.getServerTime();
        const skewMs = serverTime.getTime() - clock.now();
        logger.info(`[BOOTSTRAP] ✅ Exchange reachable (server time ${serverTime.toISOString()}, skew ${skewMs}ms)`);
    } catch (error) {
        await gateway.close();
        throw error;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STEP 3: Stores + engine
    // ═══════════════════════════════════════════════════════════════════════════

    logger.info('[BOOTSTRAP] Step 3: Initializing engine and recovering state...');
    const orderStore = new OrderStore(config.storage.ordersFilePath, config.storage.enableOrderPersistence, clock);
    const positionStore = new PositionStore(config.storage.positionsFilePath);
    const engine = new TradingEngine({
        client: gateway,
        config: config.trading,
        orderStore,
        positionStore,
        clock,
    });

    try {
        await engine.initialize();
    } catch (error) {
        logger.error(`[BOOTSTRAP] Engine initialization failed: ${errorMessage(error)}`);
        await gateway.close();
        throw error;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STEP 4: Signal source + loops (created, not started)
    // ═══════════════════════════════════════════════════════════════════════════

    const signals = new RsiSignalSource(gateway, {
        period: config.trading.rsiPeriod,
        threshold: config.trading.signalThreshold,
        clock,
    });
    const scanLoop = new ScanLoop(engine, signals, config.trading.pairs, config.runtime);

    const stats = engine.getStatistics();
    logger.info(
        `[BOOTSTRAP] ✅ Ready: ${stats.openPositions} open position(s), ` +
        `${stats.orders.active} active order record(s)`
    );

    return { config, gateway, engine, scanLoop };
}
