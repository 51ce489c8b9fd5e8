/**
 * Trade Lifecycle - exit rules and close accounting for open spreads
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FSM per trade:
 *   OPEN → { TAKE_PROFIT | STOP_LOSS | TIME_EXIT } → CLOSED
 *
 * Exit checks, first match wins:
 * 1. take_profit  currentDebit ≤ credit × tpCapturePct
 * 2. stop_loss    currentDebit ≥ credit × slMultiple
 * 3. time_exit    DTE ≤ timeExitDte
 *
 * currentDebit = shortAsk − longBid (cost to buy the spread back).
 *
 * RULES:
 * - Closed / cancelled trades are never re-evaluated
 * - Missing leg bid/ask ⇒ no decision, the trade stays open
 * - The exit decision is authoritative for local state: a rejected close order
 *   is logged and the trade is still marked closed
 * - A close order the broker accepted is never sent twice: if persisting the
 *   close fails, later passes retry the persist with the same debit and P&L
 *
 * GREP-FRIENDLY LOGS:
 * - [LIFECYCLE]
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BotConfig } from '../config/botConfig';
import { ExecutionController } from '../engine/executionController';
import { TradeStore } from '../storage/tradeStore';
import { ExitReason, Trade } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { daysToExpiration } from '../utils/marketTime';
import { spreadDebit, spreadPnl, toBigNumber } from '../utils/math';
import logger from '../utils/logger';
import { CandidateGenerator } from './candidateGenerator';
import { RiskGate } from './riskGate';

export interface ManageSummary {
    checked: number;
    closed: number;
}

/** Exit already sent to the broker, waiting to be persisted. */
interface PendingClose {
    reason: ExitReason;
    debitToClose: number;
    pnl: number;
    orderRecordId: string | null;
}

export class PositionLifecycleManager {
    private readonly acceptedCloses = new Map<string, PendingClose>();

    constructor(
        private readonly config: BotConfig,
        private readonly generator: CandidateGenerator,
        private readonly execution: ExecutionController,
        private readonly riskGate: RiskGate,
        private readonly store: TradeStore,
        private readonly clock: Clock = systemClock
    ) {}

    /** Current cost to close, or null when either leg lacks a usable bid/ask. */
    async currentDebit(trade: Trade): Promise<number | null> {
        const legs = await this.generator.fetchSpreadQuotes(
            trade.symbol,
            trade.expiration,
            trade.shortStrike,
            trade.longStrike
        );
        if (!legs) {
            return null;
        }
        return spreadDebit(legs.short.ask, legs.long.bid);
    }

    async checkExitReason(trade: Trade): Promise<ExitReason | null> {
        if (trade.status !== 'open') {
            return null;
        }

        try {
            const debit = await this.currentDebit(trade);
            if (debit === null) {
                logger.warn(`[LIFECYCLE] Missing bid/ask for trade ${trade.id} (${trade.symbol})`);
                return null;
            }

            const credit = toBigNumber(trade.credit);
            if (credit.times(this.config.tpCapturePct).gte(debit)) {
                return 'take_profit';
            }
            if (credit.times(this.config.slMultiple).lte(debit)) {
                return 'stop_loss';
            }

            const dte = daysToExpiration(trade.expiration, this.clock.now(), this.config.timezone);
            if (dte <= this.config.timeExitDte) {
                return 'time_exit';
            }

            return null;
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[LIFECYCLE] Exit check failed for trade ${trade.id}: ${msg}`);
            return null;
        }
    }

    async closeTrade(trade: Trade, reason: ExitReason): Promise<boolean> {
        if (trade.status !== 'open') {
            return false;
        }

        const pending = this.acceptedCloses.get(trade.id);
        if (pending) {
            logger.warn(`[LIFECYCLE] Close order for trade ${trade.id} already accepted; retrying persist only`);
            return this.finalizeClose(trade, pending);
        }

        let debitToClose: number | null;
        try {
            debitToClose = await this.currentDebit(trade);
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[LIFECYCLE] Quote fetch failed while closing trade ${trade.id}: ${msg}`);
            return false;
        }
        if (debitToClose === null) {
            logger.error(`[LIFECYCLE] Cannot get quotes to close trade ${trade.id}`);
            return false;
        }

        const placed = await this.execution.closeSpread(
            {
                symbol: trade.symbol,
                expiration: trade.expiration,
                shortStrike: trade.shortStrike,
                longStrike: trade.longStrike,
                quantity: trade.quantity,
            },
            debitToClose
        );
        if (!placed) {
            logger.warn(`[LIFECYCLE] No close order placed for trade ${trade.id}; closing locally`);
        }

        const close: PendingClose = {
            reason,
            debitToClose,
            pnl: spreadPnl(trade.credit, debitToClose, trade.quantity),
            orderRecordId: placed ? placed.orderRecordId : null,
        };
        if (placed) {
            this.acceptedCloses.set(trade.id, close);
        }
        return this.finalizeClose(trade, close);
    }

    private async finalizeClose(trade: Trade, close: PendingClose): Promise<boolean> {
        const { reason, debitToClose, pnl } = close;

        try {
            await this.store.closeTrade(trade.id, {
                status: 'closed',
                debitToClose,
                pnl,
                closeReason: reason,
            });
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[LIFECYCLE] Failed to persist close of trade ${trade.id}: ${msg}`);
            return false;
        }
        this.acceptedCloses.delete(trade.id);

        await this.completeClose(trade, close);
        return true;
    }

    /** Stats, order link and exit log for a close that is persisted. */
    private async completeClose(trade: Trade, close: PendingClose): Promise<void> {
        const { reason, debitToClose, pnl, orderRecordId } = close;

        await this.riskGate.recordTradeClosed(pnl);

        if (orderRecordId) {
            try {
                await this.store.linkOrderToTrade(orderRecordId, trade.id);
            } catch (err: unknown) {
                const msg = err instanceof Error ? err.message : String(err);
                logger.error(`[LIFECYCLE] Failed to link close order to trade ${trade.id}: ${msg}`);
            }
        }

        logger.info(
            `[LIFECYCLE] EXIT ${trade.symbol} ${trade.expiration} ${trade.shortStrike}/${trade.longStrike}P ` +
            `reason=${reason} debit=${debitToClose.toFixed(2)} pnl=${pnl.toFixed(2)}`
        );
    }

    /**
     * A close write can commit even though the store reported an error. Such a
     * trade no longer shows up as open, so its pending close is settled here.
     */
    private async settleCommittedCloses(openIds: Set<string>): Promise<number> {
        let settled = 0;
        for (const [tradeId, close] of this.acceptedCloses) {
            if (openIds.has(tradeId)) continue;

            let stored: Trade | null;
            try {
                stored = await this.store.getTrade(tradeId);
            } catch (err: unknown) {
                const msg = err instanceof Error ? err.message : String(err);
                logger.error(`[LIFECYCLE] Cannot re-read trade ${tradeId} with a pending close: ${msg}`);
                continue;
            }
            if (!stored || stored.status === 'open') continue;

            logger.warn(`[LIFECYCLE] Close of trade ${tradeId} was persisted despite an error; settling`);
            this.acceptedCloses.delete(tradeId);
            await this.completeClose(stored, close);
            settled++;
        }
        return settled;
    }

    async manageOpenTrades(): Promise<ManageSummary> {
        let openTrades: Trade[];
        try {
            openTrades = await this.store.getOpenTrades();
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[LIFECYCLE] Cannot load open trades: ${msg}`);
            return { checked: 0, closed: 0 };
        }

        logger.info(`[LIFECYCLE] Managing ${openTrades.length} open trade(s)`);

        let closed = await this.settleCommittedCloses(new Set(openTrades.map(t => t.id)));
        for (const trade of openTrades) {
            const pending = this.acceptedCloses.get(trade.id);
            const reason = pending ? pending.reason : await this.checkExitReason(trade);
            if (reason) {
                logger.info(`[LIFECYCLE] Trade ${trade.id} (${trade.symbol}) hit ${reason}`);
                if (await this.closeTrade(trade, reason)) {
                    closed++;
                }
            }
        }
        return { checked: openTrades.length, closed };
    }
}
