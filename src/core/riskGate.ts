/**
 * Risk Gate - may a new position be opened, and how large
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * CHECK ORDER (first failure wins):
 * 1. Trading disabled switch
 * 2. Daily loss: |min(0, realized + unrealized)| / accountSize ≥ maxDailyLossPct
 * 3. Trades opened today ≥ maxTradesPerDay
 *
 * RULES:
 * - The ONLY writer of DailyStats (recordTradeOpened / recordTradeClosed)
 * - Each stats update is read-modify-write inside one call
 * - Store failures block entry; they never throw out of the gate
 *
 * GREP-FRIENDLY LOGS:
 * - [RISK-GATE]
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BotConfig } from '../config/botConfig';
import { TradeStore } from '../storage/tradeStore';
import { Clock, systemClock } from '../utils/clock';
import { marketDay } from '../utils/marketTime';
import { formatPct, toBigNumber } from '../utils/math';
import logger from '../utils/logger';

export interface RiskDecision {
    allowed: boolean;
    reason: string;
}

export class RiskGate {
    constructor(
        private readonly config: BotConfig,
        private readonly store: TradeStore,
        private readonly clock: Clock = systemClock
    ) {}

    private today(): string {
        return marketDay(this.clock.now(), this.config.timezone);
    }

    async canOpenNewTrade(): Promise<RiskDecision> {
        if (this.config.tradingDisabled) {
            return { allowed: false, reason: 'Trading is disabled (TRADING_DISABLED=true)' };
        }

        try {
            const stats = await this.store.getDailyStats(this.today());

            const total = stats.realizedPnl + stats.unrealizedPnl;
            const lossPct = Math.abs(Math.min(0, total)) / this.config.accountSize;
            if (lossPct >= this.config.maxDailyLossPct) {
                logger.warn(
                    `[RISK-GATE] Daily loss limit exceeded: ${formatPct(lossPct)} >= ${formatPct(this.config.maxDailyLossPct)}`
                );
                return { allowed: false, reason: `Daily loss limit exceeded (${formatPct(lossPct)})` };
            }

            if (stats.tradesCount >= this.config.maxTradesPerDay) {
                return {
                    allowed: false,
                    reason: `Max trades per day reached (${stats.tradesCount}/${this.config.maxTradesPerDay})`,
                };
            }

            return { allowed: true, reason: 'OK' };
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[RISK-GATE] Cannot read daily stats: ${msg}`);
            return { allowed: false, reason: `Daily stats unavailable: ${msg}` };
        }
    }

    /** True when an open trade exists for the symbol. A store failure counts as "open". */
    async hasOpenTradeForSymbol(symbol: string): Promise<boolean> {
        try {
            const open = await this.store.getOpenTrades(symbol);
            return open.length > 0;
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[RISK-GATE] Cannot read open trades for ${symbol}: ${msg}`);
            return true;
        }
    }

    /**
     * Contracts to trade for a given max loss per contract.
     * Never less than 1 for a valid candidate, even when one contract exceeds the budget.
     */
    calculatePositionSize(maxLossPerContract: number): number {
        if (!(maxLossPerContract > 0)) {
            return 0;
        }
        const maxRisk = toBigNumber(this.config.accountSize).times(this.config.riskPerTradePct);
        const size = maxRisk.dividedToIntegerBy(maxLossPerContract).toNumber();
        return Math.max(1, size);
    }

    async recordTradeOpened(): Promise<boolean> {
        const day = this.today();
        try {
            const stats = await this.store.getDailyStats(day);
            await this.store.updateDailyStats(day, { tradesCount: stats.tradesCount + 1 });
            logger.info(`[RISK-GATE] ${day} trades_count=${stats.tradesCount + 1}`);
            return true;
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[RISK-GATE] Failed to record trade open for ${day}: ${msg}`);
            return false;
        }
    }

    async recordTradeClosed(pnl: number): Promise<boolean> {
        const day = this.today();
        try {
            const stats = await this.store.getDailyStats(day);
            const realizedPnl = toBigNumber(stats.realizedPnl).plus(pnl).toNumber();
            await this.store.updateDailyStats(day, {
                realizedPnl,
                winsCount: stats.winsCount + (pnl > 0 ? 1 : 0),
                lossesCount: stats.lossesCount + (pnl < 0 ? 1 : 0),
            });
            logger.info(`[RISK-GATE] ${day} realized_pnl=${realizedPnl.toFixed(2)} (trade pnl ${pnl.toFixed(2)})`);
            return true;
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[RISK-GATE] Failed to record trade close for ${day}: ${msg}`);
            return false;
        }
    }
}
