/**
 * Decimal Math Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Tick rounding is half-up to the nearest tick. Quantities only ever round down.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    calculatePnL,
    calculateStopLossPrice,
    calculateTakeProfitPrice,
    entryPriceFromTakeProfit,
    parseDecimal,
    percentOf,
    roundQuantityDown,
    roundToTick,
} from '../src/utils/math';

describe('roundToTick', () => {
    test('rounds half up to the nearest tick', () => {
        expect(roundToTick('101.505', '0.01').toFixed()).toBe('101.51');
        expect(roundToTick('101.504', '0.01').toFixed()).toBe('101.5');
        expect(roundToTick('1234.5', '1').toFixed()).toBe('1235');
    });

    test('handles ticks that are not powers of ten', () => {
        expect(roundToTick('0.125', '0.05').toFixed()).toBe('0.15');
        expect(roundToTick('0.12', '0.05').toFixed()).toBe('0.1');
    });
});

describe('roundQuantityDown', () => {
    test('never rounds up', () => {
        expect(roundQuantityDown('1.23456789', 4).toFixed()).toBe('1.2345');
        expect(roundQuantityDown('0.99999', 2).toFixed()).toBe('0.99');
    });

    test('collapses dust to zero', () => {
        expect(roundQuantityDown('0.00009', 4).isZero()).toBe(true);
    });
});

describe('protection levels', () => {
    test('take-profit and stop-loss are percentages of entry', () => {
        expect(calculateTakeProfitPrice(100, '1.5').toFixed()).toBe('101.5');
        expect(calculateStopLossPrice(100, 2).toFixed()).toBe('98');
    });

    test('entryPriceFromTakeProfit inverts calculateTakeProfitPrice', () => {
        expect(entryPriceFromTakeProfit('101.5', '1.5').toFixed()).toBe('100');
        expect(entryPriceFromTakeProfit(105, 1).toFixed(6)).toBe('103.960396');
    });

    test('percentOf', () => {
        expect(percentOf(200, '0.5').toFixed()).toBe('1');
    });
});

describe('calculatePnL', () => {
    test('long-only: (exit - entry) * quantity', () => {
        expect(calculatePnL(100, '101.5', 2).toFixed()).toBe('3');
        expect(calculatePnL(100, 98, 2).toFixed()).toBe('-4');
    });
});

describe('parseDecimal', () => {
    test('accepts numeric strings and numbers', () => {
        expect(parseDecimal('12.5')?.toFixed()).toBe('12.5');
        expect(parseDecimal(3)?.toFixed()).toBe('3');
    });

    test('rejects absent and non-numeric input', () => {
        expect(parseDecimal('')).toBeNull();
        expect(parseDecimal(undefined)).toBeNull();
        expect(parseDecimal('abc')).toBeNull();
        expect(parseDecimal({ value: 1 })).toBeNull();
    });
});
