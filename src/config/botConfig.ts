/**
 * Bot Configuration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every tunable the decision pipeline consumes. Parsed ONCE from the environment
 * (dotenv is loaded by start.ts) and passed into each component's constructor.
 * No component reads process.env directly.
 *
 * Defaults are conservative: TRADING_DISABLED defaults to true, so a bare
 * checkout scans and simulates but never reaches the broker with an order.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface GatewayConfig {
    baseUrl: string;
    apiKey: string;
    accountId: string;
    timeoutMs: number;
}

export interface SupabaseConfig {
    url: string;
    serviceRoleKey: string;
}

export interface LoggingConfig {
    level: string;
    dir: string;
    maxBytes: number;
    backupCount: number;
}

export interface BotConfig {
    // Safety
    tradingDisabled: boolean;
    accountSize: number;
    riskPerTradePct: number;
    maxDailyLossPct: number;
    maxTradesPerDay: number;

    // Strategy
    underlyings: string[];
    dteMin: number;
    dteMax: number;
    deltaMin: number;
    deltaMax: number;
    spreadWidth: number;
    legMaxBidAsk: number;
    requireGreeks: boolean;
    otmTargetPct: number;

    // Exits
    tpCapturePct: number;
    slMultiple: number;
    timeExitDte: number;

    // Execution / scheduling
    entryWindowStart: string;
    entryWindowEnd: string;
    manageIntervalSeconds: number;
    entryMaxSlippage: number;

    // Environment
    timezone: string;
    gateway: GatewayConfig;
    supabase: SupabaseConfig | null;
    /** SQLite file used when Supabase is not configured; ':memory:' keeps records in process only. */
    dbPath: string;
    logging: LoggingConfig;
}

type Env = Record<string, string | undefined>;

// ═══════════════════════════════════════════════════════════════════════════════
// PARSERS
// ═══════════════════════════════════════════════════════════════════════════════

function readString(env: Env, key: string, fallback: string): string {
    const raw = env[key];
    return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function readNumber(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${key} must be a number, got "${raw}"`);
    }
    return value;
}

function readInteger(env: Env, key: string, fallback: number): number {
    const value = readNumber(env, key, fallback);
    if (!Number.isInteger(value)) {
        throw new ConfigError(`${key} must be an integer, got "${value}"`);
    }
    return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    return raw.trim().toLowerCase() === 'true';
}

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

function readTimeOfDay(env: Env, key: string, fallback: string): string {
    const value = readString(env, key, fallback);
    if (!TIME_OF_DAY.test(value)) {
        throw new ConfigError(`${key} must be HH:MM (24h), got "${value}"`);
    }
    return value;
}

function readSymbols(env: Env, key: string, fallback: string): string[] {
    return readString(env, key, fallback)
        .split(',')
        .map(s => s.trim().toUpperCase())
        .filter(s => s.length > 0);
}

function readTimezone(env: Env, key: string, fallback: string): string {
    const value = readString(env, key, fallback);
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: value });
    } catch {
        throw new ConfigError(`${key} is not a valid IANA timezone: "${value}"`);
    }
    return value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build a BotConfig from an environment map.
 *
 * @throws ConfigError on malformed values or inconsistent ranges
 */
export function loadBotConfig(env: Env = process.env): BotConfig {
    const supabaseUrl = readString(env, 'SUPABASE_URL', '');
    const supabaseKey = readString(env, 'SUPABASE_SERVICE_ROLE_KEY', '');

    const config: BotConfig = {
        tradingDisabled: readBoolean(env, 'TRADING_DISABLED', true),
        accountSize: readNumber(env, 'ACCOUNT_SIZE', 1000),
        riskPerTradePct: readNumber(env, 'RISK_PER_TRADE_PCT', 0.02),
        maxDailyLossPct: readNumber(env, 'MAX_DAILY_LOSS_PCT', 0.03),
        maxTradesPerDay: readInteger(env, 'MAX_TRADES_PER_DAY', 2),

        underlyings: readSymbols(env, 'UNDERLYINGS', 'SPY,QQQ'),
        dteMin: readInteger(env, 'DTE_MIN', 7),
        dteMax: readInteger(env, 'DTE_MAX', 21),
        deltaMin: readNumber(env, 'DELTA_MIN', 0.15),
        deltaMax: readNumber(env, 'DELTA_MAX', 0.25),
        spreadWidth: readNumber(env, 'SPREAD_WIDTH', 1.0),
        legMaxBidAsk: readNumber(env, 'LEG_MAX_BIDASK', 0.10),
        requireGreeks: readBoolean(env, 'REQUIRE_GREEKS', true),
        otmTargetPct: readNumber(env, 'OTM_TARGET_PCT', 0.04),

        tpCapturePct: readNumber(env, 'TP_CAPTURE_PCT', 0.50),
        slMultiple: readNumber(env, 'SL_MULTIPLE', 2.0),
        timeExitDte: readInteger(env, 'TIME_EXIT_DTE', 3),

        entryWindowStart: readTimeOfDay(env, 'ENTRY_WINDOW_START', '10:00'),
        entryWindowEnd: readTimeOfDay(env, 'ENTRY_WINDOW_END', '11:00'),
        manageIntervalSeconds: readInteger(env, 'MANAGE_INTERVAL_SECONDS', 300),
        entryMaxSlippage: readNumber(env, 'ENTRY_MAX_SLIPPAGE', 0.05),

        timezone: readTimezone(env, 'TIMEZONE', 'America/New_York'),
        gateway: {
            baseUrl: readString(env, 'GATEWAY_URL', 'http://127.0.0.1:5000'),
            apiKey: readString(env, 'GATEWAY_API_KEY', ''),
            accountId: readString(env, 'GATEWAY_ACCOUNT_ID', ''),
            timeoutMs: readInteger(env, 'GATEWAY_TIMEOUT_MS', 10000),
        },
        supabase: supabaseUrl && supabaseKey
            ? { url: supabaseUrl, serviceRoleKey: supabaseKey }
            : null,
        dbPath: readString(env, 'DB_PATH', './data/spread-pilot.db'),
        logging: {
            level: readString(env, 'LOG_LEVEL', 'info'),
            dir: readString(env, 'LOG_DIR', './logs'),
            maxBytes: readInteger(env, 'LOG_MAX_BYTES', 10485760),
            backupCount: readInteger(env, 'LOG_BACKUP_COUNT', 5),
        },
    };

    if (config.underlyings.length === 0) {
        throw new ConfigError('UNDERLYINGS must name at least one symbol');
    }
    if (config.dteMin > config.dteMax) {
        throw new ConfigError(`DTE_MIN (${config.dteMin}) exceeds DTE_MAX (${config.dteMax})`);
    }
    if (config.deltaMin > config.deltaMax) {
        throw new ConfigError(`DELTA_MIN (${config.deltaMin}) exceeds DELTA_MAX (${config.deltaMax})`);
    }
    if (config.accountSize <= 0) {
        throw new ConfigError('ACCOUNT_SIZE must be positive');
    }
    if (config.spreadWidth <= 0) {
        throw new ConfigError('SPREAD_WIDTH must be positive');
    }

    return Object.freeze(config);
}
