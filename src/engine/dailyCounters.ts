import BigNumber from 'bignumber.js';
import { DailyCountersSnapshot } from '../types';
import { Clock, utcDateKey } from '../utils/clock';
import logger from '../utils/logger';

/**
 * Per-UTC-day trade counters. Every read and write first rolls the counters
 * over if the UTC date has changed since the last access.
 */
export class DailyCounters {
    private date: string;
    private tradesToday = 0;
    private winsToday = 0;
    private lossesToday = 0;
    private dailyPnl = new BigNumber(0);

    constructor(private readonly clock: Clock) {
        this.date = utcDateKey(clock.now());
    }

    private rollover(): void {
        const today = utcDateKey(this.clock.now());
        if (today === this.date) return;

        logger.info(
            `[ENGINE] Daily counters reset (${this.date}: ${this.tradesToday} trades, ` +
            `${this.winsToday}W/${this.lossesToday}L, PnL ${this.dailyPnl.toFixed()})`
        );
        this.date = today;
        this.tradesToday = 0;
        this.winsToday = 0;
        this.lossesToday = 0;
        this.dailyPnl = new BigNumber(0);
    }

    canTrade(maxDailyTrades: number): boolean {
        this.rollover();
        return this.tradesToday < maxDailyTrades;
    }

    recordTrade(): void {
        this.rollover();
        this.tradesToday++;
    }

    /**
     * Zero PnL counts as neither a win nor a loss.
     */
    recordResult(pnl: BigNumber): void {
        this.rollover();
        this.dailyPnl = this.dailyPnl.plus(pnl);
        if (pnl.gt(0)) {
            this.winsToday++;
        } else if (pnl.lt(0)) {
            this.lossesToday++;
        }
    }

    snapshot(): DailyCountersSnapshot {
        this.rollover();
        return {
            date: this.date,
            tradesToday: this.tradesToday,
            winsToday: this.winsToday,
            lossesToday: this.lossesToday,
            dailyPnl: this.dailyPnl,
        };
    }
}
