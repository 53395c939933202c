import 'dotenv/config';

import * as fs from 'fs';
import * as path from 'path';
import { bootstrap, BootstrapResult } from './bootstrap';
import { errorMessage } from './exchange/errors';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE PATH (prevents two bots trading one account)
// ═══════════════════════════════════════════════════════════════════════════════
const LOCKFILE_PATH = path.join(process.cwd(), '.scalp-bot.lock');

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let runtime: BootstrapResult | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE MANAGEMENT (Cross-process singleton enforcement)
// ═══════════════════════════════════════════════════════════════════════════════

function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

function acquireProcessLock(): boolean {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const existingPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);

            if (!isNaN(existingPid) && isProcessRunning(existingPid)) {
                return false;
            }

            console.log(`[STARTUP] Removing stale lockfile (PID ${existingPid} not running)`);
            fs.unlinkSync(LOCKFILE_PATH);
        }

        fs.writeFileSync(LOCKFILE_PATH, process.pid.toString(), 'utf8');
        return true;
    } catch (error) {
        console.error(`[STARTUP] Failed to acquire process lock: ${errorMessage(error)}`);
        return false;
    }
}

function releaseProcessLock(): void {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const storedPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            // Only remove if it's our lock
            if (storedPid === process.pid) {
                fs.unlinkSync(LOCKFILE_PATH);
            }
        }
    } catch (error) {
        console.error(`[SHUTDOWN] Could not release process lock: ${errorMessage(error)}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Graceful shutdown sequence
 * 1. Request engine shutdown (no new setups, fill-wait returns SHUTDOWN)
 * 2. Stop loops, waiting for in-flight cycles
 * 3. Flush order and position stores
 * 4. Close the exchange gateway
 * 5. Release process lock
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        console.log(`[SHUTDOWN] Already shutting down, ignoring ${signal}`);
        return;
    }

    isShuttingDown = true;

    console.log('');
    console.log('════════════════════════════════════════════════════════════════');
    console.log(`🛑 [SHUTDOWN] Received ${signal} — initiating graceful shutdown...`);
    console.log('════════════════════════════════════════════════════════════════');

    try {
        if (runtime) {
            console.log('[SHUTDOWN] Step 1: Requesting engine shutdown...');
            runtime.engine.requestShutdown();

            console.log('[SHUTDOWN] Step 2: Stopping loops...');
            await runtime.scanLoop.stop();
            console.log('[SHUTDOWN] ✅ Loops stopped');

            console.log('[SHUTDOWN] Step 3: Flushing stores...');
            await runtime.engine.flush();
            console.log('[SHUTDOWN] ✅ Stores flushed');

            console.log('[SHUTDOWN] Step 4: Closing exchange gateway...');
            await runtime.gateway.close();
            console.log('[SHUTDOWN] ✅ Gateway closed');
        }

        console.log('[SHUTDOWN] Step 5: Releasing process lock...');
        releaseProcessLock();
        console.log('[SHUTDOWN] ✅ Process lock released');

        console.log('');
        console.log('════════════════════════════════════════════════════════════════');
        console.log('✅ [SHUTDOWN] Graceful shutdown complete');
        console.log('════════════════════════════════════════════════════════════════');

        process.exit(0);
    } catch (error) {
        console.error(`[SHUTDOWN] ❌ Error during shutdown: ${errorMessage(error)}`);
        releaseProcessLock();
        process.exit(1);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

function attachProcessHandlers(): void {
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
        console.error('');
        console.error('════════════════════════════════════════════════════════════════');
        console.error(`🚨 [FATAL] Uncaught Exception: ${error.message}`);
        console.error('════════════════════════════════════════════════════════════════');
        console.error(error.stack);

        gracefulShutdown('uncaughtException').catch(() => {
            releaseProcessLock();
            process.exit(1);
        });
    });

    process.on('unhandledRejection', (reason) => {
        // Logged, not fatal: open positions stay protected by resting orders
        logger.error(`[FATAL] Unhandled rejection: ${errorMessage(reason)}`);
    });

    process.on('exit', () => {
        releaseProcessLock();
    });

    console.log('[STARTUP] ✅ Process handlers attached');
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

(async () => {
    console.log('');
    console.log('════════════════════════════════════════════════════════════════');
    console.log('🔧 SCALP BOT — STARTING');
    console.log('════════════════════════════════════════════════════════════════');
    console.log(`   PID: ${process.pid}`);
    console.log(`   Time: ${new Date().toISOString()}`);
    console.log('════════════════════════════════════════════════════════════════');

    // STEP 0: Process lock
    console.log('[STARTUP] Step 0: Checking for existing instance...');

    if (!acquireProcessLock()) {
        console.error('');
        console.error('════════════════════════════════════════════════════════════════');
        console.error('🚫 A second scalp-bot instance was prevented from starting.');
        console.error('════════════════════════════════════════════════════════════════');
        console.error('   Kill the existing process or remove .scalp-bot.lock manually.');
        console.error('════════════════════════════════════════════════════════════════');
        process.exit(0);
    }
    console.log('[STARTUP] ✅ Process lock acquired');

    // STEP 1: Handlers before any async work
    attachProcessHandlers();

    // STEP 2: Bootstrap
    console.log('[STARTUP] Step 2: Bootstrapping...');
    try {
        runtime = await bootstrap();
    } catch (error) {
        console.error('');
        console.error('════════════════════════════════════════════════════════════════');
        console.error('🚨 FATAL: Bootstrap failed');
        console.error('════════════════════════════════════════════════════════════════');
        console.error(`   ${errorMessage(error)}`);
        console.error('════════════════════════════════════════════════════════════════');
        releaseProcessLock();
        process.exit(1);
    }

    // STEP 3: Loops
    console.log('[STARTUP] Step 3: Starting loops...');
    runtime.scanLoop.start();

    const { trading, runtime: intervals } = runtime.config;
    console.log('');
    console.log('════════════════════════════════════════════════════════════════');
    console.log('🟢 BOT RUNTIME ACTIVE');
    console.log('════════════════════════════════════════════════════════════════');
    console.log(`   PID: ${process.pid}`);
    console.log(`   Pairs: ${trading.pairs.join(', ')}`);
    console.log(`   Entry: ${trading.entryStrategy} | Protection: ${trading.protectionMode}`);
    console.log(`   Scan: ${intervals.scanIntervalMs / 1000}s | Monitor: ${intervals.monitorIntervalMs / 1000}s`);
    console.log(`   Open positions: ${runtime.engine.getOpenPositions().length}`);
    console.log('   Press Ctrl+C for graceful shutdown');
    console.log('════════════════════════════════════════════════════════════════');
})().catch((error) => {
    console.error(`🚨 [FATAL] Startup failed: ${errorMessage(error)}`);
    releaseProcessLock();
    process.exit(1);
});
