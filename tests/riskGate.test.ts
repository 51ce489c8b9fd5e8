/**
 * Risk Gate Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. Position sizing floors to whole contracts with a minimum of one
 *   2. Gate order: disabled → daily loss → max trades
 *   3. Stats bookkeeping (trades, wins, losses, realized P&L)
 *   4. Store failures block entry instead of throwing
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { RiskGate } from '../src/core/riskGate';
import { MemoryTradeStore } from '../src/storage/memoryTradeStore';
import { StoreError } from '../src/storage/tradeStore';
import { ManualClock } from '../src/utils/clock';
import { createTestConfig, SESSION_START } from './helpers/testConfig';
import { BotConfig } from '../src/config/botConfig';

const TODAY = '2026-03-16';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function createGate(overrides: Partial<BotConfig> = {}): { gate: RiskGate; store: MemoryTradeStore; clock: ManualClock } {
    const clock = new ManualClock(SESSION_START);
    const store = new MemoryTradeStore(clock);
    const gate = new RiskGate(createTestConfig(overrides), store, clock);
    return { gate, store, clock };
}

describe('RiskGate', () => {
    describe('calculatePositionSize', () => {
        const { gate } = createGate({ accountSize: 1000, riskPerTradePct: 0.02 });

        test.each([
            [5, 4],
            [0.5, 40],
            [0.85, 23],
            [20, 1],
            [25, 1],
        ])('max loss %p per share → %p contracts', (maxLoss, expected) => {
            expect(gate.calculatePositionSize(maxLoss)).toBe(expected);
        });

        test('non-positive max loss sizes to zero', () => {
            expect(gate.calculatePositionSize(0)).toBe(0);
            expect(gate.calculatePositionSize(-1)).toBe(0);
            expect(gate.calculatePositionSize(NaN)).toBe(0);
        });
    });

    describe('canOpenNewTrade', () => {
        test('allows a fresh day', async () => {
            const { gate } = createGate();
            expect(await gate.canOpenNewTrade()).toEqual({ allowed: true, reason: 'OK' });
        });

        test('blocks everything while trading is disabled', async () => {
            const { gate } = createGate({ tradingDisabled: true });
            expect(await gate.canOpenNewTrade()).toEqual({
                allowed: false,
                reason: 'Trading is disabled (TRADING_DISABLED=true)',
            });
        });

        test('blocks at exactly the daily loss limit', async () => {
            const { gate, store } = createGate();
            await store.updateDailyStats(TODAY, { realizedPnl: -30 });

            expect(await gate.canOpenNewTrade()).toEqual({
                allowed: false,
                reason: 'Daily loss limit exceeded (3.00%)',
            });
        });

        test('allows just under the daily loss limit', async () => {
            const { gate, store } = createGate();
            await store.updateDailyStats(TODAY, { realizedPnl: -29.99 });

            expect((await gate.canOpenNewTrade()).allowed).toBe(true);
        });

        test('counts unrealized P&L toward the daily loss', async () => {
            const { gate, store } = createGate();
            await store.updateDailyStats(TODAY, { realizedPnl: 10, unrealizedPnl: -45 });

            expect(await gate.canOpenNewTrade()).toEqual({
                allowed: false,
                reason: 'Daily loss limit exceeded (3.50%)',
            });
        });

        test('blocks once the daily trade count is reached', async () => {
            const { gate, store } = createGate({ maxTradesPerDay: 2 });
            await store.updateDailyStats(TODAY, { tradesCount: 2 });

            expect(await gate.canOpenNewTrade()).toEqual({
                allowed: false,
                reason: 'Max trades per day reached (2/2)',
            });
        });

        test('a store failure blocks entry', async () => {
            const { gate, store } = createGate();
            jest.spyOn(store, 'getDailyStats').mockRejectedValue(new StoreError('connection reset', 'GET_DAILY_STATS'));

            expect(await gate.canOpenNewTrade()).toEqual({
                allowed: false,
                reason: 'Daily stats unavailable: connection reset',
            });
        });
    });

    describe('hasOpenTradeForSymbol', () => {
        test('reports open trades per symbol', async () => {
            const { gate, store } = createGate();
            await store.insertTrade({
                sessionId: null,
                symbol: 'SPY',
                expiration: '20260327',
                shortStrike: 480,
                longStrike: 479,
                quantity: 1,
                credit: 0.5,
                openReason: null,
                openedDay: TODAY,
            });

            expect(await gate.hasOpenTradeForSymbol('SPY')).toBe(true);
            expect(await gate.hasOpenTradeForSymbol('QQQ')).toBe(false);
        });

        test('a store failure counts as an open trade', async () => {
            const { gate, store } = createGate();
            jest.spyOn(store, 'getOpenTrades').mockRejectedValue(new StoreError('timeout', 'GET_OPEN_TRADES'));

            expect(await gate.hasOpenTradeForSymbol('SPY')).toBe(true);
        });
    });

    describe('stats bookkeeping', () => {
        test('recordTradeOpened increments the market-day count', async () => {
            const { gate, store } = createGate();

            expect(await gate.recordTradeOpened()).toBe(true);
            await gate.recordTradeOpened();

            expect((await store.getDailyStats(TODAY)).tradesCount).toBe(2);
        });

        test('late-evening activity lands on the market day, not the UTC day', async () => {
            const { gate, store, clock } = createGate();
            // 23:30 EDT Monday
            clock.set(new Date('2026-03-17T03:30:00Z'));

            await gate.recordTradeOpened();

            expect((await store.getDailyStats('2026-03-16')).tradesCount).toBe(1);
            expect((await store.getDailyStats('2026-03-17')).tradesCount).toBe(0);
        });

        test('recordTradeClosed classifies wins, losses and scratches', async () => {
            const { gate, store } = createGate();
            await gate.recordTradeOpened();
            await gate.recordTradeOpened();
            await gate.recordTradeOpened();

            await gate.recordTradeClosed(8);
            await gate.recordTradeClosed(-2.2);
            await gate.recordTradeClosed(0);

            const stats = await store.getDailyStats(TODAY);
            expect(stats.realizedPnl).toBe(5.8);
            expect(stats.winsCount).toBe(1);
            expect(stats.lossesCount).toBe(1);
            expect(stats.winsCount + stats.lossesCount).toBeLessThanOrEqual(stats.tradesCount);
        });

        test('a store failure is reported, not thrown', async () => {
            const { gate, store } = createGate();
            jest.spyOn(store, 'updateDailyStats').mockRejectedValue(new StoreError('read only', 'UPDATE_DAILY_STATS'));

            expect(await gate.recordTradeOpened()).toBe(false);
            expect(await gate.recordTradeClosed(1)).toBe(false);
        });
    });
});
