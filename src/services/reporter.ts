/**
 * Daily report: P&L, win rate, counts, today's trades and open positions.
 * Read-only over the store.
 */

import { BotConfig } from '../config/botConfig';
import { TradeStore } from '../storage/tradeStore';
import { Trade } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { daysToExpiration, marketDay } from '../utils/marketTime';

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

const money = (value: number): string => {
    return value < 0 ? `-$${Math.abs(value).toFixed(2)}` : `$${value.toFixed(2)}`;
};

const strikes = (t: Trade): string => `${t.shortStrike}/${t.longStrike}`;

export async function generateDailyReport(
    config: BotConfig,
    store: TradeStore,
    clock: Clock = systemClock
): Promise<string> {
    const now = clock.now();
    const today = marketDay(now, config.timezone);

    const stats = await store.getDailyStats(today);
    const todaysTrades = await store.getTradesOpenedOn(today);
    const openTrades = await store.getOpenTrades();

    const totalPnl = stats.realizedPnl + stats.unrealizedPnl;
    const decided = stats.winsCount + stats.lossesCount;
    const winRate = decided > 0 ? stats.winsCount / decided : 0;

    const lines: string[] = [
        '',
        RULE,
        'DAILY REPORT',
        RULE,
        `Date: ${today}`,
        '',
        'Performance:',
        `  Realized P/L: ${money(stats.realizedPnl)}`,
        `  Unrealized P/L: ${money(stats.unrealizedPnl)}`,
        `  Total P/L: ${money(totalPnl)}`,
        `  Win Rate: ${(winRate * 100).toFixed(1)}%`,
        '',
        'Trades:',
        `  Opened Today: ${stats.tradesCount}`,
        `  Wins: ${stats.winsCount}`,
        `  Losses: ${stats.lossesCount}`,
        `  Open Positions: ${openTrades.length}`,
    ];

    if (todaysTrades.length > 0) {
        lines.push('', "Today's Trades:", DIVIDER);
        lines.push(`${'Symbol'.padEnd(8)} ${'Exp'.padEnd(12)} ${'Strikes'.padEnd(20)} ${'Status'.padEnd(10)} P/L`);
        lines.push(DIVIDER);
        for (const t of todaysTrades) {
            const pnl = t.pnl === null ? 'N/A' : money(t.pnl);
            lines.push(`${t.symbol.padEnd(8)} ${t.expiration.padEnd(12)} ${strikes(t).padEnd(20)} ${t.status.padEnd(10)} ${pnl}`);
        }
    }

    if (openTrades.length > 0) {
        lines.push('', 'Open Positions:', DIVIDER);
        lines.push(`${'Symbol'.padEnd(8)} ${'Exp'.padEnd(12)} ${'Strikes'.padEnd(20)} ${'Credit'.padEnd(10)} DTE`);
        lines.push(DIVIDER);
        for (const t of openTrades) {
            let dte: string;
            try {
                dte = String(daysToExpiration(t.expiration, now, config.timezone));
            } catch {
                dte = 'n/a';
            }
            lines.push(`${t.symbol.padEnd(8)} ${t.expiration.padEnd(12)} ${strikes(t).padEnd(20)} ${money(t.credit).padEnd(10)} ${dte}`);
        }
    }

    lines.push('', RULE);
    return lines.join('\n');
}
