import BigNumber from 'bignumber.js';

// Division results keep 20 decimal places; rounding is explicit everywhere else.
BigNumber.config({ DECIMAL_PLACES: 20, ROUNDING_MODE: BigNumber.ROUND_HALF_UP });

const HUNDRED = new BigNumber(100);

/**
 * Parse an exchange-supplied decimal. Returns null for absent or non-numeric input.
 */
export const parseDecimal = (value: unknown): BigNumber | null => {
    if (value === null || value === undefined || value === '') return null;
    if (typeof value !== 'string' && typeof value !== 'number') return null;
    const parsed = new BigNumber(value);
    return parsed.isFinite() ? parsed : null;
};

/**
 * Round a price to the nearest multiple of the pair's tick size.
 */
export const roundToTick = (price: BigNumber.Value, tickSize: BigNumber.Value): BigNumber => {
    const tick = new BigNumber(tickSize);
    return new BigNumber(price)
        .dividedBy(tick)
        .integerValue(BigNumber.ROUND_HALF_UP)
        .multipliedBy(tick);
};

/**
 * Round a quantity DOWN to the pair's precision. Never rounds up, so an order
 * never asks for more than the balance that backs it.
 */
export const roundQuantityDown = (quantity: BigNumber.Value, decimals: number): BigNumber => {
    return new BigNumber(quantity).decimalPlaces(decimals, BigNumber.ROUND_DOWN);
};

export const percentOf = (value: BigNumber.Value, percent: BigNumber.Value): BigNumber => {
    return new BigNumber(value).multipliedBy(percent).dividedBy(HUNDRED);
};

export const calculateTakeProfitPrice = (entryPrice: BigNumber.Value, takeProfitPct: BigNumber.Value): BigNumber => {
    return new BigNumber(entryPrice).multipliedBy(HUNDRED.plus(takeProfitPct).dividedBy(HUNDRED));
};

export const calculateStopLossPrice = (entryPrice: BigNumber.Value, stopLossPct: BigNumber.Value): BigNumber => {
    return new BigNumber(entryPrice).multipliedBy(HUNDRED.minus(stopLossPct).dividedBy(HUNDRED));
};

/**
 * Inverse of calculateTakeProfitPrice.
 */
export const entryPriceFromTakeProfit = (takeProfitPrice: BigNumber.Value, takeProfitPct: BigNumber.Value): BigNumber => {
    return new BigNumber(takeProfitPrice).dividedBy(HUNDRED.plus(takeProfitPct).dividedBy(HUNDRED));
};

/**
 * Long-only PnL: (exit - entry) * quantity
 */
export const calculatePnL = (
    entryPrice: BigNumber.Value,
    exitPrice: BigNumber.Value,
    quantity: BigNumber.Value
): BigNumber => {
    return new BigNumber(exitPrice).minus(entryPrice).multipliedBy(quantity);
};
