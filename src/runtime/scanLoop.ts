/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SCAN LOOP — RUNTIME ORCHESTRATOR
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Three independent interval tasks drive the engine:
 *   - scan:        signal per pair → engine.executeTradeSetup()
 *   - monitor:     engine.monitorPositions()
 *   - maintenance: engine.runMaintenance() (stale order records)
 *
 * ARCHITECTURAL RULES:
 * 1. NO module-level mutable state
 * 2. Each task has its own overlap guard; a slow scan never delays the monitor
 * 3. The engine owns every position and order mutation
 * 4. stop() waits for in-flight cycles before resolving
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { RuntimeConfig } from '../config';
import { BOT_CONFIG } from '../config/constants';
import { TradingEngine } from '../engine/TradingEngine';
import { errorMessage } from '../exchange/errors';
import { SignalSource } from '../scoring/rsiSignal';
import { TradeSetupResult } from '../types';
import logger from '../utils/logger';
import { IntervalTask } from '../utils/scheduler';

export interface ScanCycleSummary {
    scanned: number;
    signals: number;
    opened: number;
    skipped: Record<string, number>;
}

export class ScanLoop {
    private readonly scanTask: IntervalTask;
    private readonly monitorTask: IntervalTask;
    private readonly maintenanceTask: IntervalTask;
    private running = false;

    constructor(
        private readonly engine: TradingEngine,
        private readonly signals: SignalSource,
        private readonly pairs: string[],
        runtime: RuntimeConfig,
        maintenanceIntervalMs: number = BOT_CONFIG.MAINTENANCE_INTERVAL_MS
    ) {
        this.scanTask = new IntervalTask('scan', runtime.scanIntervalMs, async () => {
            await this.scanCycle();
        });
        this.monitorTask = new IntervalTask('monitor', runtime.monitorIntervalMs, () => this.engine.monitorPositions());
        this.maintenanceTask = new IntervalTask('maintenance', maintenanceIntervalMs, async () => {
            const pruned = await this.engine.runMaintenance();
            logger.info(`[SCAN] Maintenance pruned ${pruned} stale order record(s)`);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PUBLIC API
    // ═══════════════════════════════════════════════════════════════════════════

    start(): void {
        if (this.running) {
            logger.warn('[SCAN] Already running, ignoring start()');
            return;
        }
        this.running = true;

        this.monitorTask.start(true);
        this.scanTask.start(true);
        this.maintenanceTask.start(false);

        logger.info(`[SCAN] Loops started for ${this.pairs.join(', ')}`);
    }

    /**
     * Stop scheduling and wait for every in-flight cycle.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            logger.info('[SCAN] Not running, ignoring stop()');
            return;
        }
        logger.info('[SCAN] Stop requested, waiting for in-flight cycles...');
        await Promise.all([this.scanTask.stop(), this.monitorTask.stop(), this.maintenanceTask.stop()]);
        this.running = false;
        logger.info('[SCAN] Stopped');
    }

    isLoopRunning(): boolean {
        return this.running;
    }

    /**
     * One pass over every configured pair. Pairs are handled one at a time;
     * a failure on one pair is logged and the pass continues.
     */
    async scanCycle(): Promise<ScanCycleSummary> {
        const summary: ScanCycleSummary = { scanned: 0, signals: 0, opened: 0, skipped: {} };

        for (const pair of this.pairs) {
            if (this.engine.isShutdownRequested()) break;
            summary.scanned++;

            try {
                if (this.engine.hasOpenPosition(pair)) {
                    countSkip(summary, 'POSITION_ALREADY_OPEN');
                    continue;
                }

                const signal = await this.signals.evaluate(pair);
                if (!signal.shouldBuy) {
                    countSkip(summary, 'NO_SIGNAL');
                    continue;
                }
                summary.signals++;

                const result: TradeSetupResult = await this.engine.executeTradeSetup(pair, signal);
                if (result.ok) {
                    summary.opened++;
                } else {
                    countSkip(summary, result.reason);
                    logger.info(`[SCAN] ${pair}: no trade (${result.reason}) ${result.detail}`);
                }
            } catch (error) {
                countSkip(summary, 'ERROR');
                logger.error(`[SCAN] ${pair} failed: ${errorMessage(error)}`);
            }
        }

        logger.info(
            `[SCAN] Cycle complete: ${summary.scanned} scanned, ${summary.signals} signal(s), ${summary.opened} opened`
        );
        return summary;
    }
}

function countSkip(summary: ScanCycleSummary, reason: string): void {
    summary.skipped[reason] = (summary.skipped[reason] ?? 0) + 1;
}
