/**
 * Typed failures raised by the gateway, stores and engine.
 *
 * Every class extends ScalpBotError so callers can separate bot failures
 * from programming errors with one instanceof check.
 */

export class ScalpBotError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScalpBotError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Transport failure (DNS, reset, timeout) that outlived every retry.
 */
export class ConnectionError extends ScalpBotError {
    constructor(message: string, readonly endpoint: string) {
        super(message);
        this.name = 'ConnectionError';
    }
}

export type TransportError = ConnectionError;

/**
 * HTTP 429 that outlived every retry.
 */
export class RateLimitError extends ScalpBotError {
    constructor(message: string, readonly endpoint: string) {
        super(message);
        this.name = 'RateLimitError';
    }
}

/**
 * Non-retryable HTTP failure, or a 5xx that outlived every retry.
 */
export class ApiError extends ScalpBotError {
    constructor(
        message: string,
        readonly httpStatus: number,
        readonly endpoint: string,
        readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

export class InsufficientBalanceError extends ScalpBotError {
    constructor(
        readonly currency: string,
        readonly required: string,
        readonly available: string
    ) {
        super(`Insufficient ${currency} balance: required ${required}, available ${available}`);
        this.name = 'InsufficientBalanceError';
    }
}

export class TradingError extends ScalpBotError {
    constructor(message: string, readonly pair: string, readonly positionId?: string) {
        super(message);
        this.name = 'TradingError';
    }
}

export class PersistenceError extends ScalpBotError {
    constructor(message: string, readonly file: string) {
        super(message);
        this.name = 'PersistenceError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
