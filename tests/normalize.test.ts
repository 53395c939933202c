/**
 * Response Normalization Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Field-name and casing variants all land on the canonical shapes.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

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
    normalizeSide,
    normalizeStatusString,
} from '../src/exchange/normalize';

describe('normalizeStatusString', () => {
    test.each([
        ['Filled', 'FILLED'],
        ['COMPLETED', 'FILLED'],
        ['Partially Filled', 'PARTIALLY_FILLED'],
        ['PARTIALLY_FILLED', 'PARTIALLY_FILLED'],
        ['canceled', 'CANCELLED'],
        ['Expired', 'CANCELLED'],
        ['Placed', 'PENDING'],
        ['Something Unexpected', 'PENDING'],
    ])('%s -> %s', (raw, expected) => {
        expect(normalizeStatusString(raw)).toBe(expected);
    });
});

describe('normalizeOrderStatus', () => {
    test('derives the filled quantity from original minus remaining', () => {
        const report = normalizeOrderStatus('order-1', {
            orderStatusType: 'Placed',
            originalQuantity: '1',
            remainingQuantity: '0.4',
        });

        expect(report.filledQuantity.toFixed()).toBe('0.6');
        expect(report.status).toBe('PARTIALLY_FILLED');
        expect(report.orderId).toBe('order-1');
        expect(report.rawStatus).toBe('Placed');
    });

    test('reads alternative field names', () => {
        const report = normalizeOrderStatus('order-1', {
            id: 'order-1',
            status: 'Filled',
            executedQuantity: '2',
            avgPrice: '101.5',
        });

        expect(report.status).toBe('FILLED');
        expect(report.filledQuantity.toFixed()).toBe('2');
        expect(report.averagePrice?.toFixed()).toBe('101.5');
    });

    test('a zero average price is treated as unknown', () => {
        expect(normalizeOrderStatus('x', { status: 'Filled', averagePrice: '0' }).averagePrice).toBeNull();
    });

    test('a non-object payload is a pending order with nothing filled', () => {
        const report = normalizeOrderStatus('x', null);
        expect(report.status).toBe('PENDING');
        expect(report.filledQuantity.isZero()).toBe(true);
    });
});

describe('normalizeOrderBook', () => {
    test('sorts bids descending and asks ascending, dropping bad levels', () => {
        const book = normalizeOrderBook('BTCZAR', {
            Bids: [{ price: '99', quantity: '1' }, { price: '100', quantity: '2' }, { price: 'bad', quantity: '1' }],
            Asks: [{ price: '102', quantity: '1' }, { price: '101', quantity: '0' }, { price: '101.5', quantity: '3' }],
        });

        expect(book.bids.map(level => level.price.toFixed())).toEqual(['100', '99']);
        expect(book.asks.map(level => level.price.toFixed())).toEqual(['101.5', '102']);
    });

    test('accepts lower-case keys', () => {
        const book = normalizeOrderBook('BTCZAR', { bids: [{ price: '1', quantity: '1' }], asks: [] });
        expect(book.bids).toHaveLength(1);
        expect(book.asks).toHaveLength(0);
    });
});

describe('normalizeMarketSummary', () => {
    test('needs a positive last traded price', () => {
        expect(normalizeMarketSummary('BTCZAR', { lastTradedPrice: '0' })).toBeNull();
        expect(normalizeMarketSummary('BTCZAR', 'nope')).toBeNull();
        expect(normalizeMarketSummary('BTCZAR', { lastPrice: '101' })?.lastTradedPrice.toFixed()).toBe('101');
    });
});

describe('normalizeBalances', () => {
    test('keys available balances by upper-case currency', () => {
        const balances = normalizeBalances([
            { currency: 'zar', available: '12.5' },
            { currency: 'BTC' },
        ]);

        expect(Object.keys(balances)).toEqual(['ZAR']);
        expect(balances.ZAR.toFixed()).toBe('12.5');
    });

    test('unwraps a balances envelope', () => {
        const balances = normalizeBalances({ balances: [{ asset: 'ETH', free: '3' }] });
        expect(balances.ETH.toFixed()).toBe('3');
    });
});

describe('normalizeOpenOrders', () => {
    test('parses valid entries and counts the rest as skipped', () => {
        const { orders, skipped } = normalizeOpenOrders([
            {
                orderId: 'sl-1',
                currencyPair: 'btczar',
                side: 'SELL',
                price: '97',
                stopPrice: '98',
                remainingQuantity: '0.5',
                type: 'stop-loss-limit',
                createdAt: '2024-01-15T10:00:00.000Z',
            },
            { orderId: 'x', currencyPair: 'BTCZAR', price: '1', quantity: '1' },
        ]);

        expect(skipped).toBe(1);
        expect(orders).toHaveLength(1);
        const [order] = orders;
        expect(order.pair).toBe('BTCZAR');
        expect(order.side).toBe('sell');
        expect(order.stopPrice?.toFixed()).toBe('98');
        expect(order.quantity.toFixed()).toBe('0.5');
        expect(order.orderType).toBe('stop-loss-limit');
        expect(order.createdAt?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    });
});

describe('normalizeSide', () => {
    test('maps bid/ask aliases', () => {
        expect(normalizeSide('BID')).toBe('buy');
        expect(normalizeSide('ask')).toBe('sell');
        expect(normalizeSide('hold')).toBeNull();
    });
});

describe('normalizeFills', () => {
    test('keeps fills of the requested order and fills without an order id', () => {
        const fills = normalizeFills(
            [
                { id: 'trade-1', orderId: 'order-1', price: '100', quantity: '0.6' },
                { id: 'trade-2', orderId: 'order-2', price: '100', quantity: '1' },
                { id: 'trade-3', price: '101', baseAmount: '0.4' },
                { orderId: 'order-1', price: '100', quantity: '0' },
            ],
            'order-1'
        );

        expect(fills.map(fill => fill.quantity.toFixed())).toEqual(['0.6', '0.4']);
        expect(fills[1].orderId).toBeNull();
    });
});

describe('extractors', () => {
    test('order id from id or orderId', () => {
        expect(extractOrderId({ id: 'abc' })).toBe('abc');
        expect(extractOrderId({ orderId: 'def' })).toBe('def');
        expect(extractOrderId({})).toBeNull();
    });

    test('server time in seconds or milliseconds', () => {
        expect(extractServerTime({ epochTime: 1705320000 })?.getTime()).toBe(1705320000000);
        expect(extractServerTime({ epochTime: 1705320000000 })?.getTime()).toBe(1705320000000);
        expect(extractServerTime({ time: '2024-01-15T12:00:00.000Z' })?.getTime()).toBe(1705320000000);
    });

    test('error details from a body or a bare string', () => {
        expect(extractErrorDetails({ message: 'Insufficient Balance', code: -11 })).toEqual({
            message: 'Insufficient Balance',
            code: '-11',
        });
        expect(extractErrorDetails('boom')).toEqual({ message: 'boom', code: null });
    });
});
