/**
 * Shared domain types for the put credit spread engine.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Prices are per-share option premiums in dollars (a 0.50 credit is $0.50).
 * Expirations are broker chain codes in YYYYMMDD form.
 * Calendar days are market-timezone strings in YYYY-MM-DD form.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

export type OptionRight = 'P' | 'C';

export interface UnderlyingQuote {
    symbol: string;
    bid: number | null;
    ask: number | null;
    last: number | null;
}

export interface OptionQuote {
    symbol: string;
    expiration: string;
    strike: number;
    right: OptionRight;
    bid: number | null;
    ask: number | null;
    delta: number | null;
    hasGreeks: boolean;
}

export interface OptionChain {
    symbol: string;
    expirations: string[];
    strikesByExpiration: Record<string, number[]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORDERS
// ═══════════════════════════════════════════════════════════════════════════════

export type OrderSide = 'BUY' | 'SELL';

export interface ComboLeg {
    strike: number;
    right: OptionRight;
    action: OrderSide;
    ratio: number;
}

/**
 * Multi-leg limit order. Opening a put credit spread is a SELL of the combo
 * (sell short put, buy long put); closing is a BUY (buy back short, sell long).
 */
export interface ComboOrderRequest {
    symbol: string;
    expiration: string;
    legs: ComboLeg[];
    side: OrderSide;
    quantity: number;
    limitPrice: number;
    timeInForce: 'DAY';
}

/** Broker acknowledgement. Acceptance, not a confirmed fill. */
export interface OrderHandle {
    brokerOrderId: string;
    status: 'submitted' | 'filled';
    filledQuantity?: number;
    avgFillPrice?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CANDIDATES
// ═══════════════════════════════════════════════════════════════════════════════

export type SelectionMethod = 'delta' | 'otm_fallback';

export interface SpreadCandidate {
    symbol: string;
    expiration: string;
    dte: number;
    shortStrike: number;
    longStrike: number;
    shortDelta: number | null;
    credit: number;
    maxLoss: number;
    shortBid: number;
    shortAsk: number;
    longBid: number;
    longAsk: number;
    shortBidAskSpread: number;
    longBidAskSpread: number;
    hasGreeks: boolean;
    selectionMethod: SelectionMethod;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

export type TradeStatus = 'open' | 'closed' | 'cancelled';

export type ExitReason = 'take_profit' | 'stop_loss' | 'time_exit';

export interface Trade {
    id: string;
    sessionId: string | null;
    symbol: string;
    expiration: string;
    shortStrike: number;
    longStrike: number;
    quantity: number;
    credit: number;
    debitToClose: number | null;
    pnl: number | null;
    status: TradeStatus;
    openReason: string | null;
    closeReason: string | null;
    openedAt: string;
    closedAt: string | null;
    openedDay: string;
}

export type NewTrade = Pick<
    Trade,
    'sessionId' | 'symbol' | 'expiration' | 'shortStrike' | 'longStrike' | 'quantity' | 'credit' | 'openReason' | 'openedDay'
>;

export interface TradeClosePatch {
    status: 'closed';
    debitToClose: number;
    pnl: number;
    closeReason: ExitReason;
}

export interface DailyStats {
    day: string;
    realizedPnl: number;
    unrealizedPnl: number;
    tradesCount: number;
    winsCount: number;
    lossesCount: number;
}

export type DailyStatsPatch = Partial<Omit<DailyStats, 'day'>>;

export type SessionMode = 'run' | 'manage' | 'scan';

export interface Session {
    id: string;
    mode: SessionMode;
    startedAt: string;
    endedAt: string | null;
    notes: string | null;
}

export type OrderAction = 'open' | 'close';

export type OrderRecordStatus = 'submitted' | 'filled' | 'rejected';

export interface OrderRecord {
    id: string;
    tradeId: string | null;
    action: OrderAction;
    orderType: 'limit';
    limitPrice: number;
    quantity: number;
    status: OrderRecordStatus;
    brokerOrderId: string | null;
    createdAt: string;
    raw: string;
}

export type NewOrderRecord = Omit<OrderRecord, 'id' | 'createdAt'>;

export interface FillRecord {
    id: string;
    orderId: string;
    price: number;
    quantity: number;
    createdAt: string;
}

export type NewFillRecord = Omit<FillRecord, 'id' | 'createdAt'>;
