import BigNumber from 'bignumber.js';
import type { EntryStrategyName } from '../config';

export interface EntryQuote {
    bestBid: BigNumber;
    bestAsk: BigNumber;
}

/**
 * How the entry order goes to the exchange. `price` is the limit price for
 * limit plans and the sizing reference for market plans.
 */
export type EntryPlan =
    | { kind: 'limit'; price: BigNumber; postOnly: boolean }
    | { kind: 'market'; price: BigNumber };

export interface EntryStrategy {
    readonly name: EntryStrategyName;
    plan(quote: EntryQuote): EntryPlan;
}

/** Limit buy at the best ask: crosses the spread and fills as taker. */
export const crossAskStrategy: EntryStrategy = {
    name: 'cross_ask',
    plan: quote => ({ kind: 'limit', price: quote.bestAsk, postOnly: false }),
};

/** Post-only buy at the best bid: rests as maker, may never fill. */
export const joinBidStrategy: EntryStrategy = {
    name: 'join_bid',
    plan: quote => ({ kind: 'limit', price: quote.bestBid, postOnly: true }),
};

export const marketStrategy: EntryStrategy = {
    name: 'market',
    plan: quote => ({ kind: 'market', price: quote.bestAsk }),
};

const STRATEGIES: Record<EntryStrategyName, EntryStrategy> = {
    cross_ask: crossAskStrategy,
    join_bid: joinBidStrategy,
    market: marketStrategy,
};

export function createEntryStrategy(name: EntryStrategyName): EntryStrategy {
    return STRATEGIES[name];
}
