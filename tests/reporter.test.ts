/**
 * Daily Report Tests
 */

import { generateDailyReport } from '../src/services/reporter';
import { MemoryTradeStore } from '../src/storage/memoryTradeStore';
import { NewTrade } from '../src/types';
import { ManualClock } from '../src/utils/clock';
import { createTestConfig, SESSION_START } from './helpers/testConfig';

const TODAY = '2026-03-16';

function createNewTrade(partial: Partial<NewTrade> = {}): NewTrade {
    return {
        sessionId: null,
        symbol: 'SPY',
        expiration: '20260327',
        shortStrike: 480,
        longStrike: 479,
        quantity: 40,
        credit: 0.5,
        openReason: null,
        openedDay: TODAY,
        ...partial,
    };
}

describe('generateDailyReport', () => {
    let clock: ManualClock;
    let store: MemoryTradeStore;

    beforeEach(() => {
        clock = new ManualClock(SESSION_START);
        store = new MemoryTradeStore(clock);
    });

    test('summarizes P&L, counts and both tables', async () => {
        const closed = await store.insertTrade(createNewTrade());
        await store.closeTrade(closed.id, { status: 'closed', debitToClose: 0.3, pnl: 8, closeReason: 'take_profit' });
        await store.insertTrade(createNewTrade({
            symbol: 'QQQ', expiration: '20260402', shortStrike: 400, longStrike: 399, credit: 0.42,
        }));
        await store.insertTrade(createNewTrade({
            symbol: 'IWM', expiration: 'bogus', shortStrike: 200, longStrike: 199, credit: 0.3, openedDay: '2026-03-13',
        }));
        await store.updateDailyStats(TODAY, { realizedPnl: 8, unrealizedPnl: -2.5, tradesCount: 2, winsCount: 1 });

        const lines = (await generateDailyReport(createTestConfig(), store, clock)).split('\n');

        expect(lines).toContain(`Date: ${TODAY}`);
        expect(lines).toContain('  Realized P/L: $8.00');
        expect(lines).toContain('  Unrealized P/L: -$2.50');
        expect(lines).toContain('  Total P/L: $5.50');
        expect(lines).toContain('  Win Rate: 100.0%');
        expect(lines).toContain('  Opened Today: 2');
        expect(lines).toContain('  Wins: 1');
        expect(lines).toContain('  Losses: 0');
        expect(lines).toContain('  Open Positions: 2');

        const todays = lines.indexOf("Today's Trades:");
        expect(lines.slice(todays + 4, todays + 6)).toEqual([
            'SPY      20260327     480/479              closed     $8.00',
            'QQQ      20260402     400/399              open       N/A',
        ]);

        const open = lines.indexOf('Open Positions:');
        expect(lines[open + 2]).toBe('Symbol   Exp          Strikes              Credit     DTE');
        expect(lines.slice(open + 4, open + 6)).toEqual([
            'QQQ      20260402     400/399              $0.42      17',
            'IWM      bogus        200/199              $0.30      n/a',
        ]);
    });

    test('an empty day reports zeros and no tables', async () => {
        const report = await generateDailyReport(createTestConfig(), store, clock);
        const lines = report.split('\n');

        expect(lines).toContain('  Realized P/L: $0.00');
        expect(lines).toContain('  Win Rate: 0.0%');
        expect(lines).toContain('  Open Positions: 0');
        expect(lines).not.toContain("Today's Trades:");
        expect(lines).not.toContain('Open Positions:');
    });

    test('win rate counts decided trades only', async () => {
        await store.updateDailyStats(TODAY, { realizedPnl: -12.5, tradesCount: 3, winsCount: 1, lossesCount: 2 });

        const lines = (await generateDailyReport(createTestConfig(), store, clock)).split('\n');

        expect(lines).toContain('  Realized P/L: -$12.50');
        expect(lines).toContain('  Win Rate: 33.3%');
    });
});
