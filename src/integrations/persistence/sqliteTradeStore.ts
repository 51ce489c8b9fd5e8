/**
 * SQLite Trade Store - durable local TradeStore (better-sqlite3)
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Default store when Supabase is not configured. One file at DB_PATH holds the
 * same tables as sql/schema.sql, so trades, daily stats and the order audit
 * survive restarts and are shared by run / manage / report / export.
 *
 * RULES:
 * 1. NEVER swallow errors - every failed statement logs [DB-ERROR] and throws StoreError
 * 2. Always log [DB-WRITE] on success
 * 3. Rows are snake_case in the database, camelCase in the domain
 *
 * GREP-FRIENDLY LOGS:
 * - [DB-WRITE] - Successful database write
 * - [DB-ERROR] - Database operation failed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { emptyDailyStats, StoreError, TradeStore } from '../../storage/tradeStore';
import {
    DailyStats,
    DailyStatsPatch,
    FillRecord,
    NewFillRecord,
    NewOrderRecord,
    NewTrade,
    OrderRecord,
    Session,
    SessionMode,
    Trade,
    TradeClosePatch,
} from '../../types';
import { Clock, systemClock } from '../../utils/clock';
import { generateRecordId } from '../../utils/id';
import logger from '../../utils/logger';
import {
    DailyStatsRow,
    FillRow,
    OrderRow,
    SessionRow,
    toDailyStats,
    toFill,
    toOrder,
    toSession,
    toTrade,
    TradeRow,
} from './rows';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sessions (
    id          TEXT PRIMARY KEY,
    mode        TEXT NOT NULL CHECK (mode IN ('run', 'manage', 'scan')),
    started_at  TEXT NOT NULL,
    ended_at    TEXT,
    notes       TEXT
);

CREATE TABLE IF NOT EXISTS trades (
    id              TEXT PRIMARY KEY,
    session_id      TEXT REFERENCES sessions(id),
    symbol          TEXT NOT NULL,
    expiration      TEXT NOT NULL,
    short_strike    REAL NOT NULL,
    long_strike     REAL NOT NULL,
    quantity        INTEGER NOT NULL,
    credit          REAL NOT NULL,
    debit_to_close  REAL,
    pnl             REAL,
    status          TEXT NOT NULL DEFAULT 'open' CHECK (status IN ('open', 'closed', 'cancelled')),
    open_reason     TEXT,
    close_reason    TEXT,
    opened_at       TEXT NOT NULL,
    closed_at       TEXT,
    opened_day      TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_trades_symbol_status ON trades (symbol, status);
CREATE INDEX IF NOT EXISTS idx_trades_opened_day ON trades (opened_day);

CREATE TABLE IF NOT EXISTS orders (
    id               TEXT PRIMARY KEY,
    trade_id         TEXT REFERENCES trades(id),
    action           TEXT NOT NULL CHECK (action IN ('open', 'close')),
    order_type       TEXT NOT NULL DEFAULT 'limit',
    limit_price      REAL NOT NULL,
    quantity         INTEGER NOT NULL,
    status           TEXT NOT NULL CHECK (status IN ('submitted', 'filled', 'rejected')),
    broker_order_id  TEXT,
    created_at       TEXT NOT NULL,
    raw              TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_orders_trade_id ON orders (trade_id);

CREATE TABLE IF NOT EXISTS fills (
    id          TEXT PRIMARY KEY,
    order_id    TEXT NOT NULL REFERENCES orders(id),
    price       REAL NOT NULL,
    quantity    INTEGER NOT NULL,
    created_at  TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS daily_stats (
    day             TEXT PRIMARY KEY,
    realized_pnl    REAL NOT NULL DEFAULT 0,
    unrealized_pnl  REAL NOT NULL DEFAULT 0,
    trades_count    INTEGER NOT NULL DEFAULT 0,
    wins_count      INTEGER NOT NULL DEFAULT 0,
    losses_count    INTEGER NOT NULL DEFAULT 0
);
`;

function errorCode(err: unknown): string | undefined {
    return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function openDatabase(dbPath: string): Database.Database {
    try {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
        const db = new Database(dbPath);
        db.pragma('journal_mode = WAL');
        db.pragma('foreign_keys = ON');
        db.exec(SCHEMA);
        return db;
    } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        logger.error(`[DB-ERROR] ${JSON.stringify({ op: 'OPEN', dbPath, errorMessage: msg })}`);
        throw new StoreError(`Cannot open SQLite store at ${dbPath}: ${msg}`, 'OPEN', errorCode(err));
    }
}

export class SqliteTradeStore implements TradeStore {
    private readonly db: Database.Database;

    /**
     * Opens (creating if needed) the database file and its tables.
     *
     * @throws StoreError when the file cannot be opened
     */
    constructor(
        dbPath: string,
        private readonly clock: Clock = systemClock
    ) {
        this.db = openDatabase(dbPath);
        logger.info(`[DB] SQLite store at ${path.resolve(dbPath)}`);
    }

    private nowIso(): string {
        return this.clock.now().toISOString();
    }

    /** Run one statement, mapping driver errors to StoreError. */
    private exec<T>(table: string, op: string, id: string | undefined, fn: () => T): T {
        try {
            return fn();
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            const code = errorCode(err);
            logger.error(`[DB-ERROR] ${JSON.stringify({ table, op, id, errorMessage: msg, errorCode: code })}`);
            throw new StoreError(`${op} failed on ${table}: ${msg}`, op, code);
        }
    }

    private logWrite(table: string, op: string, id?: string): void {
        logger.info(`[DB-WRITE] ${JSON.stringify({ table, op, id })}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SESSIONS
    // ═══════════════════════════════════════════════════════════════════════════

    async createSession(mode: SessionMode, notes?: string): Promise<Session> {
        const row: SessionRow = {
            id: generateRecordId(),
            mode,
            started_at: this.nowIso(),
            ended_at: null,
            notes: notes ?? null,
        };
        this.exec('sessions', 'CREATE_SESSION', row.id, () =>
            this.db
                .prepare<SessionRow>(
                    'INSERT INTO sessions (id, mode, started_at, ended_at, notes) ' +
                    'VALUES (@id, @mode, @started_at, @ended_at, @notes)'
                )
                .run(row)
        );
        this.logWrite('sessions', 'CREATE_SESSION', row.id);
        return toSession(row);
    }

    async endSession(sessionId: string, notes?: string): Promise<void> {
        const endedAt = this.nowIso();
        const result = this.exec('sessions', 'END_SESSION', sessionId, () =>
            notes === undefined
                ? this.db.prepare<[string, string]>('UPDATE sessions SET ended_at = ? WHERE id = ?').run(endedAt, sessionId)
                : this.db
                    .prepare<[string, string, string]>('UPDATE sessions SET ended_at = ?, notes = ? WHERE id = ?')
                    .run(endedAt, notes, sessionId)
        );
        if (result.changes === 0) {
            throw new StoreError(`Session ${sessionId} not found`, 'END_SESSION');
        }
        this.logWrite('sessions', 'END_SESSION', sessionId);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TRADES
    // ═══════════════════════════════════════════════════════════════════════════

    async insertTrade(input: NewTrade): Promise<Trade> {
        const row: TradeRow = {
            id: generateRecordId(),
            session_id: input.sessionId,
            symbol: input.symbol,
            expiration: input.expiration,
            short_strike: input.shortStrike,
            long_strike: input.longStrike,
            quantity: input.quantity,
            credit: input.credit,
            debit_to_close: null,
            pnl: null,
            status: 'open',
            open_reason: input.openReason,
            close_reason: null,
            opened_at: this.nowIso(),
            closed_at: null,
            opened_day: input.openedDay,
        };
        this.exec('trades', 'OPEN_TRADE', row.id, () =>
            this.db
                .prepare<TradeRow>(
                    'INSERT INTO trades (id, session_id, symbol, expiration, short_strike, long_strike, quantity, ' +
                    'credit, debit_to_close, pnl, status, open_reason, close_reason, opened_at, closed_at, opened_day) ' +
                    'VALUES (@id, @session_id, @symbol, @expiration, @short_strike, @long_strike, @quantity, ' +
                    '@credit, @debit_to_close, @pnl, @status, @open_reason, @close_reason, @opened_at, @closed_at, @opened_day)'
                )
                .run(row)
        );
        this.logWrite('trades', 'OPEN_TRADE', row.id);
        return toTrade(row);
    }

    async closeTrade(tradeId: string, patch: TradeClosePatch): Promise<Trade> {
        const result = this.exec('trades', 'CLOSE_TRADE', tradeId, () =>
            this.db
                .prepare<[string, number, number, string, string, string]>(
                    'UPDATE trades SET status = ?, debit_to_close = ?, pnl = ?, close_reason = ?, closed_at = ? WHERE id = ?'
                )
                .run(patch.status, patch.debitToClose, patch.pnl, patch.closeReason, this.nowIso(), tradeId)
        );
        const updated = await this.getTrade(tradeId);
        if (result.changes === 0 || !updated) {
            throw new StoreError(`Trade ${tradeId} not found`, 'CLOSE_TRADE');
        }
        this.logWrite('trades', 'CLOSE_TRADE', tradeId);
        return updated;
    }

    async getTrade(tradeId: string): Promise<Trade | null> {
        const row = this.exec('trades', 'GET_TRADE', tradeId, () =>
            this.db.prepare<[string], TradeRow>('SELECT * FROM trades WHERE id = ?').get(tradeId)
        );
        return row ? toTrade(row) : null;
    }

    async getOpenTrades(symbol?: string): Promise<Trade[]> {
        const rows = this.exec('trades', 'GET_OPEN_TRADES', undefined, () =>
            symbol === undefined
                ? this.db
                    .prepare<[], TradeRow>("SELECT * FROM trades WHERE status = 'open' ORDER BY opened_at, rowid")
                    .all()
                : this.db
                    .prepare<[string], TradeRow>(
                        "SELECT * FROM trades WHERE status = 'open' AND symbol = ? ORDER BY opened_at, rowid"
                    )
                    .all(symbol)
        );
        return rows.map(toTrade);
    }

    async getTradesOpenedOn(day: string): Promise<Trade[]> {
        const rows = this.exec('trades', 'GET_TRADES_OPENED_ON', undefined, () =>
            this.db
                .prepare<[string], TradeRow>('SELECT * FROM trades WHERE opened_day = ? ORDER BY opened_at, rowid')
                .all(day)
        );
        return rows.map(toTrade);
    }

    async listTrades(): Promise<Trade[]> {
        const rows = this.exec('trades', 'LIST_TRADES', undefined, () =>
            this.db.prepare<[], TradeRow>('SELECT * FROM trades ORDER BY opened_at, rowid').all()
        );
        return rows.map(toTrade);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ORDERS + FILLS
    // ═══════════════════════════════════════════════════════════════════════════

    async insertOrder(input: NewOrderRecord): Promise<OrderRecord> {
        const row: OrderRow = {
            id: generateRecordId(),
            trade_id: input.tradeId,
            action: input.action,
            order_type: input.orderType,
            limit_price: input.limitPrice,
            quantity: input.quantity,
            status: input.status,
            broker_order_id: input.brokerOrderId,
            created_at: this.nowIso(),
            raw: input.raw,
        };
        this.exec('orders', 'INSERT_ORDER', row.id, () =>
            this.db
                .prepare<OrderRow>(
                    'INSERT INTO orders (id, trade_id, action, order_type, limit_price, quantity, status, ' +
                    'broker_order_id, created_at, raw) VALUES (@id, @trade_id, @action, @order_type, ' +
                    '@limit_price, @quantity, @status, @broker_order_id, @created_at, @raw)'
                )
                .run(row)
        );
        this.logWrite('orders', 'INSERT_ORDER', row.id);
        return toOrder(row);
    }

    async linkOrderToTrade(orderId: string, tradeId: string): Promise<void> {
        const result = this.exec('orders', 'LINK_ORDER', orderId, () =>
            this.db.prepare<[string, string]>('UPDATE orders SET trade_id = ? WHERE id = ?').run(tradeId, orderId)
        );
        if (result.changes === 0) {
            throw new StoreError(`Order ${orderId} not found`, 'LINK_ORDER');
        }
        this.logWrite('orders', 'LINK_ORDER', orderId);
    }

    async listOrders(): Promise<OrderRecord[]> {
        const rows = this.exec('orders', 'LIST_ORDERS', undefined, () =>
            this.db.prepare<[], OrderRow>('SELECT * FROM orders ORDER BY created_at, rowid').all()
        );
        return rows.map(toOrder);
    }

    async insertFill(input: NewFillRecord): Promise<FillRecord> {
        const row: FillRow = {
            id: generateRecordId(),
            order_id: input.orderId,
            price: input.price,
            quantity: input.quantity,
            created_at: this.nowIso(),
        };
        this.exec('fills', 'INSERT_FILL', row.id, () =>
            this.db
                .prepare<FillRow>(
                    'INSERT INTO fills (id, order_id, price, quantity, created_at) ' +
                    'VALUES (@id, @order_id, @price, @quantity, @created_at)'
                )
                .run(row)
        );
        this.logWrite('fills', 'INSERT_FILL', row.id);
        return toFill(row);
    }

    async listFills(): Promise<FillRecord[]> {
        const rows = this.exec('fills', 'LIST_FILLS', undefined, () =>
            this.db.prepare<[], FillRow>('SELECT * FROM fills ORDER BY created_at, rowid').all()
        );
        return rows.map(toFill);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DAILY STATS
    // ═══════════════════════════════════════════════════════════════════════════

    private readDailyStats(day: string): DailyStats | null {
        const row = this.exec('daily_stats', 'GET_DAILY_STATS', day, () =>
            this.db.prepare<[string], DailyStatsRow>('SELECT * FROM daily_stats WHERE day = ?').get(day)
        );
        return row ? toDailyStats(row) : null;
    }

    private writeDailyStats(op: string, stats: DailyStats): void {
        const row: DailyStatsRow = {
            day: stats.day,
            realized_pnl: stats.realizedPnl,
            unrealized_pnl: stats.unrealizedPnl,
            trades_count: stats.tradesCount,
            wins_count: stats.winsCount,
            losses_count: stats.lossesCount,
        };
        this.exec('daily_stats', op, stats.day, () =>
            this.db
                .prepare<DailyStatsRow>(
                    'INSERT INTO daily_stats (day, realized_pnl, unrealized_pnl, trades_count, wins_count, losses_count) ' +
                    'VALUES (@day, @realized_pnl, @unrealized_pnl, @trades_count, @wins_count, @losses_count) ' +
                    'ON CONFLICT(day) DO UPDATE SET realized_pnl = excluded.realized_pnl, ' +
                    'unrealized_pnl = excluded.unrealized_pnl, trades_count = excluded.trades_count, ' +
                    'wins_count = excluded.wins_count, losses_count = excluded.losses_count'
                )
                .run(row)
        );
        this.logWrite('daily_stats', op, stats.day);
    }

    async getDailyStats(day: string): Promise<DailyStats> {
        const existing = this.readDailyStats(day);
        if (existing) {
            return existing;
        }
        const fresh = emptyDailyStats(day);
        this.writeDailyStats('CREATE_DAILY_STATS', fresh);
        return fresh;
    }

    async updateDailyStats(day: string, patch: DailyStatsPatch): Promise<DailyStats> {
        const current = this.readDailyStats(day) ?? emptyDailyStats(day);
        const next: DailyStats = { ...current, ...patch, day };
        this.writeDailyStats('UPDATE_DAILY_STATS', next);
        return next;
    }
}
