/**
 * Per-pair exchange precision.
 *
 * tickSize is the minimum price increment; quantityDecimals bounds the base
 * amount of any order. Unknown pairs get DEFAULT_PAIR_SPEC with currencies
 * inferred from the pair suffix.
 */

export interface PairSpec {
    pair: string;
    baseCurrency: string;
    quoteCurrency: string;
    tickSize: string;
    quantityDecimals: number;
}

const KNOWN_QUOTES = ['USDT', 'USDC', 'ZAR', 'USD', 'EUR', 'BTC'] as const;

export const PAIR_SPECS: Record<string, Omit<PairSpec, 'pair'>> = {
    BTCZAR: { baseCurrency: 'BTC', quoteCurrency: 'ZAR', tickSize: '1', quantityDecimals: 8 },
    ETHZAR: { baseCurrency: 'ETH', quoteCurrency: 'ZAR', tickSize: '1', quantityDecimals: 6 },
    XRPZAR: { baseCurrency: 'XRP', quoteCurrency: 'ZAR', tickSize: '0.01', quantityDecimals: 2 },
    SOLZAR: { baseCurrency: 'SOL', quoteCurrency: 'ZAR', tickSize: '1', quantityDecimals: 4 },
    BTCUSDT: { baseCurrency: 'BTC', quoteCurrency: 'USDT', tickSize: '1', quantityDecimals: 8 },
    ETHUSDT: { baseCurrency: 'ETH', quoteCurrency: 'USDT', tickSize: '0.01', quantityDecimals: 6 },
    ADAUSDT: { baseCurrency: 'ADA', quoteCurrency: 'USDT', tickSize: '0.0001', quantityDecimals: 1 },
    USDTZAR: { baseCurrency: 'USDT', quoteCurrency: 'ZAR', tickSize: '0.01', quantityDecimals: 2 },
};

export const DEFAULT_PAIR_SPEC = {
    tickSize: '0.01',
    quantityDecimals: 8,
};

export function splitPair(pair: string): { base: string; quote: string } {
    for (const quote of KNOWN_QUOTES) {
        if (pair.endsWith(quote) && pair.length > quote.length) {
            return { base: pair.slice(0, -quote.length), quote };
        }
    }
    return { base: pair.slice(0, 3), quote: pair.slice(3) || 'USDT' };
}

export function getPairSpec(
    pair: string,
    overrides: Record<string, Omit<PairSpec, 'pair'>> = {}
): PairSpec {
    const known = overrides[pair] ?? PAIR_SPECS[pair];
    if (known) {
        return { pair, ...known };
    }
    const { base, quote } = splitPair(pair);
    return {
        pair,
        baseCurrency: base,
        quoteCurrency: quote,
        ...DEFAULT_PAIR_SPEC,
    };
}
