import logger from './logger';

type AsyncTask = () => Promise<void>;

/**
 * Interval-driven task with an overlap guard: a tick that arrives while the
 * previous run is still in flight is skipped, not queued.
 */
export class IntervalTask {
    private intervalHandle: NodeJS.Timeout | null = null;
    private current: Promise<void> | null = null;

    constructor(
        private readonly name: string,
        private readonly intervalMs: number,
        private readonly task: AsyncTask
    ) {}

    start(runImmediately: boolean = false): void {
        if (this.intervalHandle) {
            logger.warn(`[SCHEDULER] ${this.name} already running.`);
            return;
        }

        this.intervalHandle = setInterval(() => {
            void this.tick();
        }, this.intervalMs);

        logger.info(`[SCHEDULER] ${this.name} started with interval ${this.intervalMs}ms.`);

        if (runImmediately) {
            void this.tick();
        }
    }

    /**
     * Run one cycle now. Resolves false if a cycle was already in flight.
     */
    async tick(): Promise<boolean> {
        if (this.current) {
            logger.debug(`[SCHEDULER] ${this.name} still running, skipping tick.`);
            return false;
        }

        this.current = this.runSafely();
        try {
            await this.current;
        } finally {
            this.current = null;
        }
        return true;
    }

    /**
     * Stop scheduling and wait for the in-flight cycle, if any.
     */
    async stop(): Promise<void> {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
            logger.info(`[SCHEDULER] ${this.name} stopped.`);
        }
        if (this.current) {
            await this.current;
        }
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    private async runSafely(): Promise<void> {
        try {
            await this.task();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`[SCHEDULER] ${this.name} failed: ${message}`);
        }
    }
}
