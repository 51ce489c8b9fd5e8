/**
 * Trade Store - durable record of sessions, trades, orders, fills and daily stats.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * RULES:
 * 1. Writes THROW StoreError on failure - callers decide how to degrade
 * 2. Trades are never deleted; close is an update
 * 3. Daily stats rows are created lazily on first read for a day
 * 4. "Opened today" is answered by the openedDay column (market calendar day)
 * ═══════════════════════════════════════════════════════════════════════════════
 */

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
} from '../types';

export class StoreError extends Error {
    constructor(
        message: string,
        readonly op: string,
        readonly code?: string
    ) {
        super(message);
        this.name = 'StoreError';
    }
}

export interface TradeStore {
    // Sessions
    createSession(mode: SessionMode, notes?: string): Promise<Session>;
    endSession(sessionId: string, notes?: string): Promise<void>;

    // Trades
    insertTrade(trade: NewTrade): Promise<Trade>;
    closeTrade(tradeId: string, patch: TradeClosePatch): Promise<Trade>;
    getTrade(tradeId: string): Promise<Trade | null>;
    getOpenTrades(symbol?: string): Promise<Trade[]>;
    getTradesOpenedOn(day: string): Promise<Trade[]>;
    listTrades(): Promise<Trade[]>;

    // Orders + fills
    insertOrder(order: NewOrderRecord): Promise<OrderRecord>;
    linkOrderToTrade(orderId: string, tradeId: string): Promise<void>;
    listOrders(): Promise<OrderRecord[]>;
    insertFill(fill: NewFillRecord): Promise<FillRecord>;
    listFills(): Promise<FillRecord[]>;

    // Daily stats
    getDailyStats(day: string): Promise<DailyStats>;
    updateDailyStats(day: string, patch: DailyStatsPatch): Promise<DailyStats>;
}

export function emptyDailyStats(day: string): DailyStats {
    return {
        day,
        realizedPnl: 0,
        unrealizedPnl: 0,
        tradesCount: 0,
        winsCount: 0,
        lossesCount: 0,
    };
}
