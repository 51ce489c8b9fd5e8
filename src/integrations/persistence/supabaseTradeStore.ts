/**
 * Supabase Trade Store - TradeStore over Postgres (see sql/schema.sql)
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RULES:
 * 1. NEVER swallow errors - every failed write logs [DB-ERROR] and throws StoreError
 * 2. Always log [DB-WRITE] on success
 * 3. All operations are awaited - no fire-and-forget
 * 4. Rows are snake_case in the database, camelCase in the domain
 *
 * GREP-FRIENDLY LOGS:
 * - [DB-WRITE] - Successful database write
 * - [DB-ERROR] - Database operation failed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SupabaseClient } from '@supabase/supabase-js';
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
    dailyStatsPatchToRow,
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

interface PostgrestErrorLike {
    message: string;
    code?: string;
    details?: string;
    hint?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class SupabaseTradeStore implements TradeStore {
    constructor(
        private readonly client: SupabaseClient,
        private readonly clock: Clock = systemClock
    ) {}

    private fail(table: string, op: string, error: PostgrestErrorLike, id?: string): never {
        logger.error(`[DB-ERROR] ${JSON.stringify({
            table,
            op,
            id,
            errorMessage: error.message,
            errorCode: error.code,
            errorDetails: error.details,
            errorHint: error.hint,
        })}`);
        throw new StoreError(`${op} failed on ${table}: ${error.message}`, op, error.code);
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
            started_at: this.clock.now().toISOString(),
            ended_at: null,
            notes: notes ?? null,
        };
        const { data, error } = await this.client.from('sessions').insert(row).select('*').single();
        if (error) this.fail('sessions', 'CREATE_SESSION', error);
        this.logWrite('sessions', 'CREATE_SESSION', row.id);
        const inserted: SessionRow = data ?? row;
        return toSession(inserted);
    }

    async endSession(sessionId: string, notes?: string): Promise<void> {
        const patch: Partial<SessionRow> = { ended_at: this.clock.now().toISOString() };
        if (notes !== undefined) patch.notes = notes;
        const { error } = await this.client.from('sessions').update(patch).eq('id', sessionId);
        if (error) this.fail('sessions', 'END_SESSION', error, sessionId);
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
            opened_at: this.clock.now().toISOString(),
            closed_at: null,
            opened_day: input.openedDay,
        };
        const { data, error } = await this.client.from('trades').insert(row).select('*').single();
        if (error) this.fail('trades', 'OPEN_TRADE', error, row.id);
        if (!data) this.fail('trades', 'OPEN_TRADE', { message: 'Insert succeeded but no data returned' }, row.id);
        this.logWrite('trades', 'OPEN_TRADE', row.id);
        const inserted: TradeRow = data;
        return toTrade(inserted);
    }

    async closeTrade(tradeId: string, patch: TradeClosePatch): Promise<Trade> {
        const update: Partial<TradeRow> = {
            status: patch.status,
            debit_to_close: patch.debitToClose,
            pnl: patch.pnl,
            close_reason: patch.closeReason,
            closed_at: this.clock.now().toISOString(),
        };
        const { data, error } = await this.client
            .from('trades')
            .update(update)
            .eq('id', tradeId)
            .select('*')
            .maybeSingle();
        if (error) this.fail('trades', 'CLOSE_TRADE', error, tradeId);
        if (!data) this.fail('trades', 'CLOSE_TRADE', { message: 'Trade not found' }, tradeId);
        this.logWrite('trades', 'CLOSE_TRADE', tradeId);
        const updated: TradeRow = data;
        return toTrade(updated);
    }

    async getTrade(tradeId: string): Promise<Trade | null> {
        const { data, error } = await this.client.from('trades').select('*').eq('id', tradeId).maybeSingle();
        if (error) this.fail('trades', 'GET_TRADE', error, tradeId);
        if (!data) return null;
        const row: TradeRow = data;
        return toTrade(row);
    }

    async getOpenTrades(symbol?: string): Promise<Trade[]> {
        let query = this.client.from('trades').select('*').eq('status', 'open');
        if (symbol !== undefined) {
            query = query.eq('symbol', symbol);
        }
        const { data, error } = await query.order('opened_at', { ascending: true });
        if (error) this.fail('trades', 'GET_OPEN_TRADES', error);
        const rows: TradeRow[] = data ?? [];
        return rows.map(toTrade);
    }

    async getTradesOpenedOn(day: string): Promise<Trade[]> {
        const { data, error } = await this.client
            .from('trades')
            .select('*')
            .eq('opened_day', day)
            .order('opened_at', { ascending: true });
        if (error) this.fail('trades', 'GET_TRADES_OPENED_ON', error);
        const rows: TradeRow[] = data ?? [];
        return rows.map(toTrade);
    }

    async listTrades(): Promise<Trade[]> {
        const { data, error } = await this.client
            .from('trades')
            .select('*')
            .order('opened_at', { ascending: true });
        if (error) this.fail('trades', 'LIST_TRADES', error);
        const rows: TradeRow[] = data ?? [];
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
            created_at: this.clock.now().toISOString(),
            raw: input.raw,
        };
        const { error } = await this.client.from('orders').insert(row);
        if (error) this.fail('orders', 'INSERT_ORDER', error, row.id);
        this.logWrite('orders', 'INSERT_ORDER', row.id);
        return toOrder(row);
    }

    async linkOrderToTrade(orderId: string, tradeId: string): Promise<void> {
        const { error } = await this.client.from('orders').update({ trade_id: tradeId }).eq('id', orderId);
        if (error) this.fail('orders', 'LINK_ORDER', error, orderId);
        this.logWrite('orders', 'LINK_ORDER', orderId);
    }

    async listOrders(): Promise<OrderRecord[]> {
        const { data, error } = await this.client
            .from('orders')
            .select('*')
            .order('created_at', { ascending: true });
        if (error) this.fail('orders', 'LIST_ORDERS', error);
        const rows: OrderRow[] = data ?? [];
        return rows.map(toOrder);
    }

    async insertFill(input: NewFillRecord): Promise<FillRecord> {
        const row: FillRow = {
            id: generateRecordId(),
            order_id: input.orderId,
            price: input.price,
            quantity: input.quantity,
            created_at: this.clock.now().toISOString(),
        };
        const { error } = await this.client.from('fills').insert(row);
        if (error) this.fail('fills', 'INSERT_FILL', error, row.id);
        this.logWrite('fills', 'INSERT_FILL', row.id);
        return toFill(row);
    }

    async listFills(): Promise<FillRecord[]> {
        const { data, error } = await this.client
            .from('fills')
            .select('*')
            .order('created_at', { ascending: true });
        if (error) this.fail('fills', 'LIST_FILLS', error);
        const rows: FillRow[] = data ?? [];
        return rows.map(toFill);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DAILY STATS
    // ═══════════════════════════════════════════════════════════════════════════

    async getDailyStats(day: string): Promise<DailyStats> {
        const { data, error } = await this.client
            .from('daily_stats')
            .select('*')
            .eq('day', day)
            .maybeSingle();
        if (error) this.fail('daily_stats', 'GET_DAILY_STATS', error, day);
        if (data) {
            const row: DailyStatsRow = data;
            return toDailyStats(row);
        }

        const fresh = emptyDailyStats(day);
        const { error: insertError } = await this.client.from('daily_stats').insert({
            day,
            ...dailyStatsPatchToRow(fresh),
        });
        // 23505 = unique violation: another writer created the row first
        if (insertError && insertError.code !== '23505') {
            this.fail('daily_stats', 'CREATE_DAILY_STATS', insertError, day);
        }
        if (!insertError) this.logWrite('daily_stats', 'CREATE_DAILY_STATS', day);
        return fresh;
    }

    async updateDailyStats(day: string, patch: DailyStatsPatch): Promise<DailyStats> {
        const { data, error } = await this.client
            .from('daily_stats')
            .upsert({ day, ...dailyStatsPatchToRow(patch) }, { onConflict: 'day' })
            .select('*')
            .single();
        if (error) this.fail('daily_stats', 'UPDATE_DAILY_STATS', error, day);
        if (!data) this.fail('daily_stats', 'UPDATE_DAILY_STATS', { message: 'Upsert returned no data' }, day);
        this.logWrite('daily_stats', 'UPDATE_DAILY_STATS', day);
        const row: DailyStatsRow = data;
        return toDailyStats(row);
    }
}
