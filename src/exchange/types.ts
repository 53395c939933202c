// Exchange-facing types. Every value here is already normalized: decimals are
// BigNumber, statuses are canonical and sides are lower-case.

import type BigNumber from 'bignumber.js';
import type { OrderSide, OrderStatus } from '../types';

export interface BookLevel {
    price: BigNumber;
    quantity: BigNumber;
}

/**
 * bids sorted best (highest) first, asks sorted best (lowest) first
 */
export interface OrderBook {
    pair: string;
    bids: BookLevel[];
    asks: BookLevel[];
}

export interface MarketSummary {
    pair: string;
    lastTradedPrice: BigNumber;
    bidPrice: BigNumber | null;
    askPrice: BigNumber | null;
}

export interface OrderStatusReport {
    orderId: string;
    status: OrderStatus;
    filledQuantity: BigNumber;
    originalQuantity: BigNumber | null;
    averagePrice: BigNumber | null;
    /** Exchange status string as received, for logs only */
    rawStatus: string;
}

export interface OpenOrder {
    orderId: string;
    pair: string;
    side: OrderSide;
    price: BigNumber;
    quantity: BigNumber;
    orderType: string;
    stopPrice: BigNumber | null;
    createdAt: Date | null;
}

export interface Fill {
    orderId: string | null;
    price: BigNumber;
    quantity: BigNumber;
    tradedAt: Date | null;
}

export interface LimitOrderRequest {
    pair: string;
    side: OrderSide;
    quantity: BigNumber;
    price: BigNumber;
    postOnly: boolean;
}

export type MarketOrderRequest =
    | { pair: string; side: OrderSide; baseAmount: BigNumber }
    | { pair: string; side: OrderSide; quoteAmount: BigNumber };

export interface StopLimitOrderRequest {
    pair: string;
    side: OrderSide;
    quantity: BigNumber;
    stopPrice: BigNumber;
    limitPrice: BigNumber;
}

export interface PlacedOrder {
    orderId: string;
}

/**
 * Everything the engine, recovery and signal source need from an exchange.
 * ExchangeGateway is the production implementation.
 */
export interface ExchangeClient {
    getServerTime(): Promise<Date>;
    /** currency -> available balance */
    getAccountBalances(): Promise<Record<string, BigNumber>>;
    getOrderBook(pair: string): Promise<OrderBook>;
    getMarketSummary(pair: string): Promise<MarketSummary>;
    placeLimitOrder(request: LimitOrderRequest): Promise<PlacedOrder>;
    placeMarketOrder(request: MarketOrderRequest): Promise<PlacedOrder>;
    placeStopLimitOrder(request: StopLimitOrderRequest): Promise<PlacedOrder>;
    cancelOrder(pair: string, orderId: string): Promise<void>;
    getOrderStatus(pair: string, orderId: string): Promise<OrderStatusReport>;
    /** All open orders, or only those for `pair` */
    getOpenOrders(pair?: string): Promise<OpenOrder[]>;
    getOrderFills(pair: string, orderId: string): Promise<Fill[]>;
    close(): Promise<void>;
}
