/**
 * Trade Lifecycle Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Exit rules for a 1.00 credit with TP 50% and SL 2x:
 *   debit ≤ 0.50 → take_profit, debit ≥ 2.00 → stop_loss, DTE ≤ 3 → time_exit
 * Session clock: Monday 2026-03-16 10:00 ET.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BotConfig } from '../src/config/botConfig';
import { CandidateGenerator } from '../src/core/candidateGenerator';
import { RiskGate } from '../src/core/riskGate';
import { PositionLifecycleManager } from '../src/core/tradeLifecycle';
import { ExecutionController } from '../src/engine/executionController';
import { MemoryTradeStore } from '../src/storage/memoryTradeStore';
import { StoreError } from '../src/storage/tradeStore';
import { NewTrade, Trade } from '../src/types';
import { ManualClock } from '../src/utils/clock';
import { FakeBroker } from './helpers/fakeBroker';
import { createTestConfig, SESSION_START } from './helpers/testConfig';

const TODAY = '2026-03-16';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

interface Harness {
    broker: FakeBroker;
    store: MemoryTradeStore;
    lifecycle: PositionLifecycleManager;
}

function createHarness(overrides: Partial<BotConfig> = {}): Harness {
    const config = createTestConfig(overrides);
    const broker = new FakeBroker();
    const clock = new ManualClock(SESSION_START);
    const store = new MemoryTradeStore(clock);
    const generator = new CandidateGenerator(config, broker, clock);
    const execution = new ExecutionController(config, broker, store, clock);
    const riskGate = new RiskGate(config, store, clock);
    const lifecycle = new PositionLifecycleManager(config, generator, execution, riskGate, store, clock);
    return { broker, store, lifecycle };
}

function openTrade(store: MemoryTradeStore, partial: Partial<NewTrade> = {}): Promise<Trade> {
    return store.insertTrade({
        sessionId: null,
        symbol: 'SPY',
        expiration: '20260327',
        shortStrike: 480,
        longStrike: 479,
        quantity: 2,
        credit: 1.0,
        openReason: 'Delta: -0.2, Method: delta',
        openedDay: TODAY,
        ...partial,
    });
}

/** Quote the two legs so that shortAsk − longBid equals the wanted debit. */
function quoteLegs(broker: FakeBroker, expiration: string, shortAsk: number, longBid: number): void {
    broker
        .setPut('SPY', expiration, 480, shortAsk - 0.05, shortAsk, -0.2)
        .setPut('SPY', expiration, 479, longBid, longBid + 0.05, -0.17);
}

describe('PositionLifecycleManager.checkExitReason', () => {
    test('take profit when the debit falls to the capture level', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);

        expect(await lifecycle.currentDebit(trade)).toBe(0.45);
        expect(await lifecycle.checkExitReason(trade)).toBe('take_profit');
    });

    test('take profit is inclusive at exactly credit × capture', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.7, 0.2);

        expect(await lifecycle.checkExitReason(trade)).toBe('take_profit');
    });

    test('stop loss when the debit reaches the multiple', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 2.4, 0.3);

        expect(await lifecycle.currentDebit(trade)).toBe(2.1);
        expect(await lifecycle.checkExitReason(trade)).toBe('stop_loss');
    });

    test('time exit close to expiration', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store, { expiration: '20260319' });
        quoteLegs(broker, '20260319', 1.2, 0.2);

        expect(await lifecycle.checkExitReason(trade)).toBe('time_exit');
    });

    test('holds when no rule matches', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 1.2, 0.2);

        expect(await lifecycle.checkExitReason(trade)).toBeNull();
    });

    test('holds when a leg has no bid', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        broker
            .setPut('SPY', '20260327', 480, 0.55, 0.6, -0.2)
            .setPut('SPY', '20260327', 479, null, 0.2, -0.17);

        expect(await lifecycle.currentDebit(trade)).toBeNull();
        expect(await lifecycle.checkExitReason(trade)).toBeNull();
    });

    test('never re-evaluates a closed trade', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);

        expect(await lifecycle.checkExitReason({ ...trade, status: 'closed' })).toBeNull();
    });

    test('values the debit as short ask minus long bid', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 1.5, 0.2);

        expect(await lifecycle.currentDebit(trade)).toBe(1.3);
    });
});

describe('PositionLifecycleManager.closeTrade', () => {
    test('persists the close and books the P&L', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);

        expect(await lifecycle.closeTrade(trade, 'take_profit')).toBe(true);

        expect(await store.getTrade(trade.id)).toMatchObject({
            status: 'closed',
            debitToClose: 0.45,
            pnl: 1.1,
            closeReason: 'take_profit',
        });
        expect(await store.getDailyStats(TODAY)).toMatchObject({ realizedPnl: 1.1, winsCount: 1, lossesCount: 0 });

        const [order] = await store.listOrders();
        expect(order).toMatchObject({ action: 'close', tradeId: trade.id, limitPrice: 0.45 });
    });

    test('a loss increments the loss count', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 2.4, 0.3);

        await lifecycle.closeTrade(trade, 'stop_loss');

        expect(await store.getDailyStats(TODAY)).toMatchObject({ realizedPnl: -2.2, winsCount: 0, lossesCount: 1 });
    });

    test('closes locally when the broker rejects the exit', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);
        broker.rejectNext(1);

        expect(await lifecycle.closeTrade(trade, 'take_profit')).toBe(true);
        expect((await store.getTrade(trade.id))?.status).toBe('closed');
    });

    test('closes locally without an order while trading is disabled', async () => {
        const { broker, store, lifecycle } = createHarness({ tradingDisabled: true });
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);

        expect(await lifecycle.closeTrade(trade, 'take_profit')).toBe(true);
        expect(broker.submitted).toEqual([]);
        expect((await store.getTrade(trade.id))?.pnl).toBe(1.1);
    });

    test('leaves the trade open when quotes are missing', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);

        expect(await lifecycle.closeTrade(trade, 'time_exit')).toBe(false);
        expect((await store.getTrade(trade.id))?.status).toBe('open');
        expect(broker.submitted).toEqual([]);
        expect((await store.getDailyStats(TODAY)).realizedPnl).toBe(0);
    });

    test('books no P&L when the close cannot be persisted', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);
        jest.spyOn(store, 'closeTrade').mockRejectedValue(new StoreError('write failed', 'CLOSE_TRADE'));

        expect(await lifecycle.closeTrade(trade, 'take_profit')).toBe(false);
        expect(await store.getDailyStats(TODAY)).toMatchObject({ realizedPnl: 0, winsCount: 0 });
    });

    test('an accepted close order is not resubmitted after a failed persist', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);
        jest.spyOn(store, 'closeTrade').mockRejectedValueOnce(new StoreError('write failed', 'CLOSE_TRADE'));

        expect(await lifecycle.manageOpenTrades()).toEqual({ checked: 1, closed: 0 });

        // Quotes move back out of the take-profit zone before the next pass.
        quoteLegs(broker, '20260327', 1.2, 0.2);

        expect(await lifecycle.manageOpenTrades()).toEqual({ checked: 1, closed: 1 });
        expect(broker.submitted).toHaveLength(1);
        expect(broker.submitted[0]).toMatchObject({ side: 'BUY', limitPrice: 0.45 });
        expect(await store.getTrade(trade.id)).toMatchObject({
            status: 'closed',
            debitToClose: 0.45,
            pnl: 1.1,
            closeReason: 'take_profit',
        });
        expect(await store.getDailyStats(TODAY)).toMatchObject({ realizedPnl: 1.1, winsCount: 1 });

        const orders = await store.listOrders();
        expect(orders.map(o => [o.action, o.tradeId])).toEqual([['close', trade.id]]);
    });

    test('settles a close that was written despite a store error', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);
        const writeClose = store.closeTrade.bind(store);
        jest.spyOn(store, 'closeTrade').mockImplementationOnce(async (tradeId, patch) => {
            await writeClose(tradeId, patch);
            throw new StoreError('response lost', 'CLOSE_TRADE');
        });

        expect(await lifecycle.manageOpenTrades()).toEqual({ checked: 1, closed: 0 });
        expect(await store.getDailyStats(TODAY)).toMatchObject({ realizedPnl: 0, winsCount: 0 });

        expect(await lifecycle.manageOpenTrades()).toEqual({ checked: 0, closed: 1 });
        expect(await store.getDailyStats(TODAY)).toMatchObject({ realizedPnl: 1.1, winsCount: 1 });
        expect(broker.submitted).toHaveLength(1);
        expect((await store.listOrders())[0].tradeId).toBe(trade.id);

        expect(await lifecycle.manageOpenTrades()).toEqual({ checked: 0, closed: 0 });
        expect((await store.getDailyStats(TODAY)).winsCount).toBe(1);
    });

    test('a rejected close order is retried from fresh quotes', async () => {
        const { broker, store, lifecycle } = createHarness();
        const trade = await openTrade(store);
        quoteLegs(broker, '20260327', 0.6, 0.15);
        broker.rejectNext(1);
        jest.spyOn(store, 'closeTrade').mockRejectedValueOnce(new StoreError('write failed', 'CLOSE_TRADE'));

        expect(await lifecycle.closeTrade(trade, 'take_profit')).toBe(false);

        quoteLegs(broker, '20260327', 0.55, 0.15);

        expect(await lifecycle.closeTrade(trade, 'take_profit')).toBe(true);
        expect(broker.submitted.map(o => o.limitPrice)).toEqual([0.45, 0.4]);
        expect((await store.getTrade(trade.id))?.debitToClose).toBe(0.4);
    });
});

describe('PositionLifecycleManager.manageOpenTrades', () => {
    test('checks every open trade and closes the ones that hit a rule', async () => {
        const { broker, store, lifecycle } = createHarness();
        const exiting = await openTrade(store);
        const holding = await openTrade(store, { expiration: '20260402' });
        quoteLegs(broker, '20260327', 0.6, 0.15);
        quoteLegs(broker, '20260402', 1.2, 0.2);

        expect(await lifecycle.manageOpenTrades()).toEqual({ checked: 2, closed: 1 });
        expect((await store.getTrade(exiting.id))?.status).toBe('closed');
        expect((await store.getTrade(holding.id))?.status).toBe('open');
    });

    test('reports nothing when the store cannot be read', async () => {
        const { store, lifecycle } = createHarness();
        jest.spyOn(store, 'getOpenTrades').mockRejectedValue(new StoreError('timeout', 'GET_OPEN_TRADES'));

        expect(await lifecycle.manageOpenTrades()).toEqual({ checked: 0, closed: 0 });
    });
});
