// Fixed engine constants. Tunables live in BotConfig (botConfig.ts).

export const ENGINE_CONSTANTS = {
    // Timing
    SCHEDULER_TICK_MS: 30 * 1000,           // session loop cadence
    ENTRY_RETRY_PAUSE_MS: 1000,             // pause between price-walk attempts

    // Price walk
    ENTRY_MAX_ATTEMPTS: 5,
    ENTRY_PRICE_STEP: 0.01,                 // $0.01 concession per attempt

    // Candidate selection
    OTM_FALLBACK_TOLERANCE: 0.20,           // ±20% of the OTM target
    SESSION_CANDIDATE_LIMIT: 3,
    SCAN_CANDIDATE_LIMIT: 5,

    // Connectivity
    CONNECT_RETRIES: 3,
    CONNECT_RETRY_DELAY_MS: 2000,
} as const;
