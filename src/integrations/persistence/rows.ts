/**
 * Row shapes shared by the SQL-backed stores. Rows are snake_case; numeric
 * columns may come back as strings from Postgres, so mappers coerce them.
 */

import {
    DailyStats,
    DailyStatsPatch,
    FillRecord,
    OrderRecord,
    Session,
    SessionMode,
    Trade,
} from '../../types';

// ═══════════════════════════════════════════════════════════════════════════════
// ROW TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface SessionRow {
    id: string;
    mode: SessionMode;
    started_at: string;
    ended_at: string | null;
    notes: string | null;
}

export interface TradeRow {
    id: string;
    session_id: string | null;
    symbol: string;
    expiration: string;
    short_strike: number;
    long_strike: number;
    quantity: number;
    credit: number;
    debit_to_close: number | null;
    pnl: number | null;
    status: Trade['status'];
    open_reason: string | null;
    close_reason: string | null;
    opened_at: string;
    closed_at: string | null;
    opened_day: string;
}

export interface OrderRow {
    id: string;
    trade_id: string | null;
    action: OrderRecord['action'];
    order_type: 'limit';
    limit_price: number;
    quantity: number;
    status: OrderRecord['status'];
    broker_order_id: string | null;
    created_at: string;
    raw: string;
}

export interface FillRow {
    id: string;
    order_id: string;
    price: number;
    quantity: number;
    created_at: string;
}

export interface DailyStatsRow {
    day: string;
    realized_pnl: number;
    unrealized_pnl: number;
    trades_count: number;
    wins_count: number;
    losses_count: number;
}


// ═══════════════════════════════════════════════════════════════════════════════
// MAPPERS
// ═══════════════════════════════════════════════════════════════════════════════

export const toSession = (r: SessionRow): Session => ({
    id: r.id,
    mode: r.mode,
    startedAt: r.started_at,
    endedAt: r.ended_at,
    notes: r.notes,
});

export const toTrade = (r: TradeRow): Trade => ({
    id: r.id,
    sessionId: r.session_id,
    symbol: r.symbol,
    expiration: r.expiration,
    shortStrike: Number(r.short_strike),
    longStrike: Number(r.long_strike),
    quantity: r.quantity,
    credit: Number(r.credit),
    debitToClose: r.debit_to_close === null ? null : Number(r.debit_to_close),
    pnl: r.pnl === null ? null : Number(r.pnl),
    status: r.status,
    openReason: r.open_reason,
    closeReason: r.close_reason,
    openedAt: r.opened_at,
    closedAt: r.closed_at,
    openedDay: r.opened_day,
});

export const toOrder = (r: OrderRow): OrderRecord => ({
    id: r.id,
    tradeId: r.trade_id,
    action: r.action,
    orderType: r.order_type,
    limitPrice: Number(r.limit_price),
    quantity: r.quantity,
    status: r.status,
    brokerOrderId: r.broker_order_id,
    createdAt: r.created_at,
    raw: r.raw,
});

export const toFill = (r: FillRow): FillRecord => ({
    id: r.id,
    orderId: r.order_id,
    price: Number(r.price),
    quantity: r.quantity,
    createdAt: r.created_at,
});

export const toDailyStats = (r: DailyStatsRow): DailyStats => ({
    day: r.day,
    realizedPnl: Number(r.realized_pnl),
    unrealizedPnl: Number(r.unrealized_pnl),
    tradesCount: r.trades_count,
    winsCount: r.wins_count,
    lossesCount: r.losses_count,
});

export function dailyStatsPatchToRow(patch: DailyStatsPatch): Partial<DailyStatsRow> {
    const row: Partial<DailyStatsRow> = {};
    if (patch.realizedPnl !== undefined) row.realized_pnl = patch.realizedPnl;
    if (patch.unrealizedPnl !== undefined) row.unrealized_pnl = patch.unrealizedPnl;
    if (patch.tradesCount !== undefined) row.trades_count = patch.tradesCount;
    if (patch.winsCount !== undefined) row.wins_count = patch.winsCount;
    if (patch.lossesCount !== undefined) row.losses_count = patch.lossesCount;
    return row;
}
