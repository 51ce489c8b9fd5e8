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
import { Clock, systemClock } from '../utils/clock';
import { generateRecordId } from '../utils/id';
import { emptyDailyStats, StoreError, TradeStore } from './tradeStore';

/**
 * In-process TradeStore. Selected with DB_PATH=:memory: and used as the
 * store behind most tests. Rows are copied in and out so callers never alias
 * stored state.
 */
export class MemoryTradeStore implements TradeStore {
    private readonly sessions = new Map<string, Session>();
    private readonly trades = new Map<string, Trade>();
    private readonly orders = new Map<string, OrderRecord>();
    private readonly fills = new Map<string, FillRecord>();
    private readonly dailyStats = new Map<string, DailyStats>();

    constructor(private readonly clock: Clock = systemClock) {}

    private nowIso(): string {
        return this.clock.now().toISOString();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // SESSIONS
    // ═══════════════════════════════════════════════════════════════════════════

    async createSession(mode: SessionMode, notes?: string): Promise<Session> {
        const session: Session = {
            id: generateRecordId(),
            mode,
            startedAt: this.nowIso(),
            endedAt: null,
            notes: notes ?? null,
        };
        this.sessions.set(session.id, session);
        return { ...session };
    }

    async endSession(sessionId: string, notes?: string): Promise<void> {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new StoreError(`Session ${sessionId} not found`, 'END_SESSION');
        }
        session.endedAt = this.nowIso();
        if (notes !== undefined) session.notes = notes;
    }

    getSession(sessionId: string): Session | null {
        const session = this.sessions.get(sessionId);
        return session ? { ...session } : null;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TRADES
    // ═══════════════════════════════════════════════════════════════════════════

    async insertTrade(input: NewTrade): Promise<Trade> {
        const trade: Trade = {
            ...input,
            id: generateRecordId(),
            debitToClose: null,
            pnl: null,
            status: 'open',
            closeReason: null,
            openedAt: this.nowIso(),
            closedAt: null,
        };
        this.trades.set(trade.id, trade);
        return { ...trade };
    }

    async closeTrade(tradeId: string, patch: TradeClosePatch): Promise<Trade> {
        const trade = this.trades.get(tradeId);
        if (!trade) {
            throw new StoreError(`Trade ${tradeId} not found`, 'CLOSE_TRADE');
        }
        Object.assign(trade, patch, { closedAt: this.nowIso() });
        return { ...trade };
    }

    async getTrade(tradeId: string): Promise<Trade | null> {
        const trade = this.trades.get(tradeId);
        return trade ? { ...trade } : null;
    }

    async getOpenTrades(symbol?: string): Promise<Trade[]> {
        return [...this.trades.values()]
            .filter(t => t.status === 'open' && (symbol === undefined || t.symbol === symbol))
            .map(t => ({ ...t }));
    }

    async getTradesOpenedOn(day: string): Promise<Trade[]> {
        return [...this.trades.values()]
            .filter(t => t.openedDay === day)
            .map(t => ({ ...t }));
    }

    async listTrades(): Promise<Trade[]> {
        return [...this.trades.values()].map(t => ({ ...t }));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ORDERS + FILLS
    // ═══════════════════════════════════════════════════════════════════════════

    async insertOrder(input: NewOrderRecord): Promise<OrderRecord> {
        const order: OrderRecord = { ...input, id: generateRecordId(), createdAt: this.nowIso() };
        this.orders.set(order.id, order);
        return { ...order };
    }

    async linkOrderToTrade(orderId: string, tradeId: string): Promise<void> {
        const order = this.orders.get(orderId);
        if (!order) {
            throw new StoreError(`Order ${orderId} not found`, 'LINK_ORDER');
        }
        order.tradeId = tradeId;
    }

    async listOrders(): Promise<OrderRecord[]> {
        return [...this.orders.values()].map(o => ({ ...o }));
    }

    async insertFill(input: NewFillRecord): Promise<FillRecord> {
        const fill: FillRecord = { ...input, id: generateRecordId(), createdAt: this.nowIso() };
        this.fills.set(fill.id, fill);
        return { ...fill };
    }

    async listFills(): Promise<FillRecord[]> {
        return [...this.fills.values()].map(f => ({ ...f }));
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // DAILY STATS
    // ═══════════════════════════════════════════════════════════════════════════

    async getDailyStats(day: string): Promise<DailyStats> {
        let stats = this.dailyStats.get(day);
        if (!stats) {
            stats = emptyDailyStats(day);
            this.dailyStats.set(day, stats);
        }
        return { ...stats };
    }

    async updateDailyStats(day: string, patch: DailyStatsPatch): Promise<DailyStats> {
        const current = this.dailyStats.get(day) ?? emptyDailyStats(day);
        const next: DailyStats = { ...current, ...patch, day };
        this.dailyStats.set(day, next);
        return { ...next };
    }
}
