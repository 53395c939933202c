/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * EXCHANGE GATEWAY — SIGNED REST CLIENT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every request:
 *   1. takes a slot from the shared sliding-window rate limiter
 *   2. is signed with a fresh timestamp (per attempt)
 *   3. is retried with exponential backoff on transport failures, 429 and 5xx
 *   4. falls through an ordered list of endpoint candidates on 404
 *
 * Only the final candidate's 404 surfaces to the caller. Payloads are
 * handed to ./normalize before they leave this module.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import BigNumber from 'bignumber.js';
import { BOT_CONFIG } from '../config/constants';
import type { ExchangeConfig } from '../config';
import { logApiCall } from '../telemetry/tradeEvents';
import { OrderSide } from '../types';
import { Clock, systemClock } from '../utils/clock';
import logger from '../utils/logger';
import { ApiError, ConnectionError, errorMessage, RateLimitError } from './errors';
import {
    extractErrorDetails,
    extractOrderId,
    extractServerTime,
    normalizeBalances,
    normalizeFills,
    normalizeMarketSummary,
    normalizeOpenOrders,
    normalizeOrderBook,
    normalizeOrderStatus,
} from './normalize';
import { SlidingWindowRateLimiter } from './rateLimiter';
import { sign } from './signing';
import {
    ExchangeClient,
    Fill,
    LimitOrderRequest,
    MarketOrderRequest,
    MarketSummary,
    OpenOrder,
    OrderBook,
    OrderStatusReport,
    PlacedOrder,
    StopLimitOrderRequest,
} from './types';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RequestOptions {
    body?: Record<string, unknown>;
    query?: Record<string, string | number>;
}

export interface GatewayResponse {
    endpoint: string;
    status: number;
    data: unknown;
}

export interface GatewayOptions {
    clock?: Clock;
    /** Replaces the HTTP transport; tests pass an in-process adapter */
    adapter?: AxiosAdapter;
}

const wireSide = (side: OrderSide): string => side.toUpperCase();

const isRetryableStatus = (status: number): boolean =>
    status === BOT_CONFIG.RATE_LIMITED_STATUS || status >= 500;

export class ExchangeGateway implements ExchangeClient {
    private readonly http: AxiosInstance;
    private readonly limiter: SlidingWindowRateLimiter;
    private readonly clock: Clock;
    private closed = false;

    constructor(private readonly config: ExchangeConfig, options: GatewayOptions = {}) {
        this.clock = options.clock ?? systemClock;
        this.http = axios.create({
            baseURL: config.baseUrl,
            timeout: config.requestTimeoutMs,
            // status handling is ours, not axios'
            validateStatus: () => true,
            adapter: options.adapter,
        });
        this.limiter = new SlidingWindowRateLimiter(
            config.rateLimitPerMinute,
            BOT_CONFIG.RATE_LIMIT_WINDOW_MS,
            this.clock
        );
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CORE REQUEST
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Send a signed request, trying each endpoint candidate in order.
     *
     * @throws ConnectionError transport failure after all retries
     * @throws RateLimitError 429 after all retries
     * @throws ApiError any other non-2xx outcome
     */
    async request(
        method: HttpMethod,
        endpoints: string | readonly string[],
        options: RequestOptions = {}
    ): Promise<GatewayResponse> {
        const candidates = typeof endpoints === 'string' ? [endpoints] : endpoints;
        if (candidates.length === 0) {
            throw new RangeError('At least one endpoint candidate is required');
        }

        const body = options.body === undefined ? '' : JSON.stringify(options.body);

        for (let i = 0; i < candidates.length; i++) {
            const endpoint = candidates[i];
            const response = await this.sendWithRetry(method, endpoint, body, options.query);
            const isLast = i === candidates.length - 1;

            if (response.status === 404 && !isLast) {
                logger.debug(`[GATEWAY] ${method} ${endpoint} not found, trying ${candidates[i + 1]}`);
                continue;
            }

            if (response.status >= 400) {
                throw this.toApiError(response);
            }

            return response;
        }

        // unreachable: the last candidate always returns or throws
        throw new RangeError('Endpoint candidates exhausted');
    }

    private buildPath(endpoint: string, query?: Record<string, string | number>): string {
        let path = `/${this.config.apiVersion}${endpoint}`;
        if (query && Object.keys(query).length > 0) {
            const params = new URLSearchParams();
            for (const [key, value] of Object.entries(query)) {
                params.append(key, String(value));
            }
            path += `?${params.toString()}`;
        }
        return path;
    }

    private async sendWithRetry(
        method: HttpMethod,
        endpoint: string,
        body: string,
        query?: Record<string, string | number>
    ): Promise<GatewayResponse> {
        if (this.closed) {
            throw new ConnectionError('Gateway is closed', endpoint);
        }

        const path = this.buildPath(endpoint, query);
        const maxRetries = this.config.maxRetries;

        for (let attempt = 0; ; attempt++) {
            await this.limiter.acquire();

            const timestamp = this.clock.now();
            const headers: Record<string, string> = {
                'X-VALR-API-KEY': this.config.apiKey,
                'X-VALR-API-SIGNATURE': sign(this.config.apiSecret, timestamp, method, path, body),
                'X-VALR-API-TIMESTAMP': String(timestamp),
                'Content-Type': 'application/json',
            };

            const startedAt = this.clock.now();
            let response: AxiosResponse<unknown>;

            try {
                response = await this.http.request<unknown>({
                    method,
                    url: path,
                    headers,
                    data: body === '' ? undefined : body,
                });
            } catch (error) {
                const message = errorMessage(error);
                logApiCall({
                    method,
                    endpoint,
                    status: null,
                    latencyMs: this.clock.now() - startedAt,
                    attempt: attempt + 1,
                    error: message,
                });

                if (attempt < maxRetries) {
                    await this.backoff(attempt, `${method} ${endpoint} failed: ${message}`);
                    continue;
                }
                throw new ConnectionError(
                    `Failed to reach ${endpoint} after ${attempt + 1} attempts: ${message}`,
                    endpoint
                );
            }

            logApiCall({
                method,
                endpoint,
                status: response.status,
                latencyMs: this.clock.now() - startedAt,
                attempt: attempt + 1,
            });

            if (isRetryableStatus(response.status)) {
                if (attempt < maxRetries) {
                    await this.backoff(attempt, `${method} ${endpoint} returned ${response.status}`);
                    continue;
                }
                if (response.status === BOT_CONFIG.RATE_LIMITED_STATUS) {
                    throw new RateLimitError(
                        `Rate limit exceeded on ${endpoint} after ${attempt + 1} attempts`,
                        endpoint
                    );
                }
            }

            return { endpoint, status: response.status, data: response.data };
        }
    }

    private async backoff(attempt: number, reason: string): Promise<void> {
        const delayMs = this.config.retryBackoffFactor * Math.pow(2, attempt) * 1000;
        logger.warn(`[GATEWAY] ${reason}, retrying in ${delayMs}ms (attempt ${attempt + 1}/${this.config.maxRetries})`);
        await this.clock.sleep(delayMs);
    }

    private toApiError(response: GatewayResponse): ApiError {
        const { message, code } = extractErrorDetails(response.data);
        return new ApiError(
            `API error ${response.status} on ${response.endpoint}: ${message ?? 'no message'}`,
            response.status,
            response.endpoint,
            code ?? undefined
        );
    }

    private requireOrderId(response: GatewayResponse): PlacedOrder {
        const orderId = extractOrderId(response.data);
        if (orderId === null) {
            throw new ApiError(
                `No order id in response from ${response.endpoint}`,
                response.status,
                response.endpoint
            );
        }
        return { orderId };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MARKET DATA
    // ═══════════════════════════════════════════════════════════════════════════

    async getServerTime(): Promise<Date> {
        const response = await this.request('GET', ['/public/time', '/time']);
        const time = extractServerTime(response.data);
        if (time === null) {
            throw new ApiError('Unparseable server time', response.status, response.endpoint);
        }
        return time;
    }

    async getOrderBook(pair: string): Promise<OrderBook> {
        const response = await this.request('GET', [
            `/marketdata/${pair}/orderbook`,
            `/public/${pair}/orderbook`,
        ]);
        return normalizeOrderBook(pair, response.data);
    }

    async getMarketSummary(pair: string): Promise<MarketSummary> {
        const response = await this.request('GET', [
            `/public/${pair}/marketsummary`,
            `/marketsummary/pair/${pair}`,
        ]);
        const summary = normalizeMarketSummary(pair, response.data);
        if (summary === null) {
            throw new ApiError(`No last traded price for ${pair}`, response.status, response.endpoint);
        }
        return summary;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ACCOUNT
    // ═══════════════════════════════════════════════════════════════════════════

    async getAccountBalances(): Promise<Record<string, BigNumber>> {
        const response = await this.request('GET', '/account/balances');
        return normalizeBalances(response.data);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ORDERS
    // ═══════════════════════════════════════════════════════════════════════════

    async placeLimitOrder(request: LimitOrderRequest): Promise<PlacedOrder> {
        const response = await this.request('POST', ['/orders/limit', '/orders'], {
            body: {
                side: wireSide(request.side),
                quantity: request.quantity.toFixed(),
                price: request.price.toFixed(),
                pair: request.pair,
                postOnly: request.postOnly,
                timeInForce: 'GTC',
            },
        });
        return this.requireOrderId(response);
    }

    async placeMarketOrder(request: MarketOrderRequest): Promise<PlacedOrder> {
        const amount = 'baseAmount' in request
            ? { baseAmount: request.baseAmount.toFixed() }
            : { quoteAmount: request.quoteAmount.toFixed() };
        const response = await this.request('POST', ['/orders/market', '/orders'], {
            body: {
                side: wireSide(request.side),
                pair: request.pair,
                ...amount,
            },
        });
        return this.requireOrderId(response);
    }

    async placeStopLimitOrder(request: StopLimitOrderRequest): Promise<PlacedOrder> {
        const response = await this.request('POST', '/orders/stop/limit', {
            body: {
                side: wireSide(request.side),
                quantity: request.quantity.toFixed(),
                price: request.limitPrice.toFixed(),
                stopPrice: request.stopPrice.toFixed(),
                pair: request.pair,
                type: 'STOP_LOSS_LIMIT',
                timeInForce: 'GTC',
            },
        });
        return this.requireOrderId(response);
    }

    async cancelOrder(pair: string, orderId: string): Promise<void> {
        await this.request('DELETE', ['/orders/order', `/orders/${encodeURIComponent(orderId)}`], {
            body: { orderId, pair },
        });
    }

    async getOrderStatus(pair: string, orderId: string): Promise<OrderStatusReport> {
        const id = encodeURIComponent(orderId);
        const response = await this.request('GET', [
            `/orders/${pair}/orderid/${id}`,
            `/orders/history/summary/orderid/${id}`,
            `/orders/${id}`,
        ]);
        return normalizeOrderStatus(orderId, response.data);
    }

    async getOpenOrders(pair?: string): Promise<OpenOrder[]> {
        const response = await this.request('GET', '/orders/open');
        const { orders, skipped } = normalizeOpenOrders(response.data);
        if (skipped > 0) {
            logger.warn(`[GATEWAY] Skipped ${skipped} unparseable open order(s)`);
        }
        return pair === undefined ? orders : orders.filter(order => order.pair === pair);
    }

    async getOrderFills(pair: string, orderId: string): Promise<Fill[]> {
        const response = await this.request('GET', [
            `/orders/${encodeURIComponent(orderId)}/fills`,
            `/account/${pair}/tradehistory`,
        ]);
        return normalizeFills(response.data, orderId);
    }

    async close(): Promise<void> {
        this.closed = true;
        logger.info('[GATEWAY] Closed');
    }
}
