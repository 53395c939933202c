// Configuration Constants for the Scalp Bot

export const BOT_CONFIG = {
    // Fill-wait poll schedule: fast at first, then backing off
    FILL_WAIT_SCHEDULE: [
        { untilMs: 10_000, intervalMs: 500 },     // 0.5s for the first 10s
        { untilMs: 30_000, intervalMs: 1_000 },   // 1s for the next 20s
    ] as const,
    FILL_WAIT_TAIL_INTERVAL_MS: 2_000,            // 2s thereafter

    // Gateway
    RATE_LIMIT_WINDOW_MS: 60 * 1000,
    RATE_LIMIT_WAIT_BUFFER_MS: 100,
    RATE_LIMITED_STATUS: 429,

    // Recovery
    RECOVERY_QUANTITY_TOLERANCE: '0.00001',

    // Persisted documents
    STORE_DOCUMENT_VERSION: '1.0',
    STALE_ORDER_MAX_AGE_HOURS: 24,
    MAINTENANCE_INTERVAL_MS: 24 * 60 * 60 * 1000,

    // Signal source
    PRICE_HISTORY_MAX_SAMPLES: 500,
    SCAN_COOLDOWN_MS: 5 * 60 * 1000,
};
