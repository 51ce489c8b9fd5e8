/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SESSION SCHEDULER - THE SOLE RUNTIME ORCHESTRATOR
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Bounded trading session:
 *   every tick (30s) until start + duration:
 *     1. management pass when manageIntervalSeconds have elapsed
 *     2. inside [entryWindowStart, entryWindowEnd], for each underlying in order:
 *        gate → one open trade per symbol → top 3 candidates → first sized
 *        candidate gets ONE openSpread at the mid credit
 *   then a final unconditional management pass and the session is closed.
 *
 * Manage-only mode loops management passes until stop() is called.
 *
 * ARCHITECTURAL RULES:
 * 1. NO module-level mutable state - everything is an instance property
 * 2. Every collaborator call is awaited in sequence (no parallel symbols/trades)
 * 3. Management always precedes entry within a tick
 * 4. stop() interrupts the current sleep; the final pass and session close still run
 *
 * GREP-FRIENDLY LOGS:
 * - [SESSION]
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BotConfig } from '../config/botConfig';
import { ENGINE_CONSTANTS } from '../config/constants';
import { CandidateGenerator } from '../core/candidateGenerator';
import { RiskGate } from '../core/riskGate';
import { PositionLifecycleManager } from '../core/tradeLifecycle';
import { ExecutionController } from '../engine/executionController';
import { BrokerConnection } from '../integrations/broker/types';
import { TradeStore } from '../storage/tradeStore';
import { SessionMode, SpreadCandidate } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { isInEntryWindow, marketDay } from '../utils/marketTime';
import { midCredit } from '../utils/math';
import logger from '../utils/logger';

export interface SessionSchedulerDeps {
    config: BotConfig;
    generator: CandidateGenerator;
    riskGate: RiskGate;
    execution: ExecutionController;
    lifecycle: PositionLifecycleManager;
    store: TradeStore;
    clock?: Clock;
    /** When present and not yet connected, connected (bounded retry) before and disconnected after each session. */
    connection?: BrokerConnection | null;
}

export interface SessionSummary {
    sessionId: string | null;
    mode: SessionMode;
    ticks: number;
    managePasses: number;
    entriesOpened: number;
    tradesClosed: number;
}

export class SessionScheduler {
    private readonly config: BotConfig;
    private readonly generator: CandidateGenerator;
    private readonly riskGate: RiskGate;
    private readonly execution: ExecutionController;
    private readonly lifecycle: PositionLifecycleManager;
    private readonly store: TradeStore;
    private readonly clock: Clock;
    private readonly connection: BrokerConnection | null;

    private isRunning: boolean = false;
    private stopRequested: boolean = false;
    private abortController: AbortController | null = null;

    constructor(deps: SessionSchedulerDeps) {
        this.config = deps.config;
        this.generator = deps.generator;
        this.riskGate = deps.riskGate;
        this.execution = deps.execution;
        this.lifecycle = deps.lifecycle;
        this.store = deps.store;
        this.clock = deps.clock ?? systemClock;
        this.connection = deps.connection ?? null;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PUBLIC API
    // ═══════════════════════════════════════════════════════════════════════════

    /** Request a graceful stop. The running session finishes its shutdown steps. */
    stop(): void {
        if (!this.isRunning) {
            logger.info('[SESSION] Not running, ignoring stop()');
            return;
        }
        logger.info('[SESSION] Stop requested');
        this.stopRequested = true;
        this.abortController?.abort();
    }

    isSessionRunning(): boolean {
        return this.isRunning;
    }

    async runSession(durationMinutes: number): Promise<SessionSummary | null> {
        return this.guarded('run', async summary => {
            const startMs = this.clock.now().getTime();
            const endMs = startMs + durationMinutes * 60 * 1000;
            let lastManageMs = startMs;

            logger.info(
                `[SESSION] Started for ${durationMinutes} min; entry window ` +
                `${this.config.entryWindowStart}-${this.config.entryWindowEnd} ${this.config.timezone}`
            );

            while (!this.stopRequested && this.clock.now().getTime() < endMs) {
                const now = this.clock.now();
                summary.ticks++;

                if ((now.getTime() - lastManageMs) / 1000 >= this.config.manageIntervalSeconds) {
                    const result = await this.lifecycle.manageOpenTrades();
                    summary.managePasses++;
                    summary.tradesClosed += result.closed;
                    lastManageMs = now.getTime();
                }

                if (isInEntryWindow(now, this.config.timezone, this.config.entryWindowStart, this.config.entryWindowEnd)) {
                    summary.entriesOpened += await this.runEntryPass(summary.sessionId);
                }

                await this.clock.sleep(ENGINE_CONSTANTS.SCHEDULER_TICK_MS, this.abortController?.signal);
            }

            logger.info('[SESSION] Session ending - final management pass');
            const final = await this.lifecycle.manageOpenTrades();
            summary.managePasses++;
            summary.tradesClosed += final.closed;
        }, `Session duration: ${durationMinutes} minutes`);
    }

    async runManageOnly(): Promise<SessionSummary | null> {
        return this.guarded('manage', async summary => {
            logger.info(`[SESSION] Management-only mode, every ${this.config.manageIntervalSeconds}s until stopped`);

            while (!this.stopRequested) {
                summary.ticks++;
                const result = await this.lifecycle.manageOpenTrades();
                summary.managePasses++;
                summary.tradesClosed += result.closed;
                await this.clock.sleep(this.config.manageIntervalSeconds * 1000, this.abortController?.signal);
            }
        }, 'Management-only mode');
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Shared session frame: single-run guard, connectivity, session record,
     * and the session close that always runs once the body returns.
     */
    private async guarded(
        mode: SessionMode,
        body: (summary: SessionSummary) => Promise<void>,
        notes: string
    ): Promise<SessionSummary | null> {
        if (this.isRunning) {
            logger.warn('[SESSION] Already running, ignoring start');
            return null;
        }
        this.isRunning = true;
        this.stopRequested = false;
        this.abortController = new AbortController();

        // A gateway the caller already connected is left connected afterwards.
        const ownsConnection = this.connection !== null && !this.connection.isConnected();

        try {
            if (this.connection && ownsConnection) {
                const connected = await this.connection.connect(
                    ENGINE_CONSTANTS.CONNECT_RETRIES,
                    ENGINE_CONSTANTS.CONNECT_RETRY_DELAY_MS
                );
                if (!connected) {
                    logger.error('[SESSION] Failed to connect to broker gateway - session not started');
                    return null;
                }
            }

            const summary: SessionSummary = {
                sessionId: await this.openSessionRecord(mode, notes),
                mode,
                ticks: 0,
                managePasses: 0,
                entriesOpened: 0,
                tradesClosed: 0,
            };

            try {
                await body(summary);
            } finally {
                await this.closeSessionRecord(summary.sessionId);
            }

            logger.info(
                `[SESSION] Completed: ticks=${summary.ticks} manage=${summary.managePasses} ` +
                `opened=${summary.entriesOpened} closed=${summary.tradesClosed}`
            );
            return summary;
        } finally {
            if (this.connection && ownsConnection) {
                await this.connection.disconnect();
            }
            this.isRunning = false;
            this.abortController = null;
        }
    }

    private async openSessionRecord(mode: SessionMode, notes: string): Promise<string | null> {
        try {
            const session = await this.store.createSession(mode, notes);
            return session.id;
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[SESSION] Could not create session record, continuing without one: ${msg}`);
            return null;
        }
    }

    private async closeSessionRecord(sessionId: string | null): Promise<void> {
        if (!sessionId) return;
        try {
            await this.store.endSession(sessionId);
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[SESSION] Could not close session record ${sessionId}: ${msg}`);
        }
    }

    /** One pass over the underlyings. Returns the number of trades opened. */
    private async runEntryPass(sessionId: string | null): Promise<number> {
        let opened = 0;

        for (const symbol of this.config.underlyings) {
            if (this.stopRequested) break;

            const decision = await this.riskGate.canOpenNewTrade();
            if (!decision.allowed) {
                logger.info(`[SESSION] Cannot open new trade: ${decision.reason}`);
                continue;
            }

            if (await this.riskGate.hasOpenTradeForSymbol(symbol)) {
                logger.info(`[SESSION] Already have open trade for ${symbol}`);
                continue;
            }

            const candidates = await this.generator.getTopCandidates(symbol, ENGINE_CONSTANTS.SESSION_CANDIDATE_LIMIT);
            if (candidates.length === 0) {
                logger.info(`[SESSION] No candidates found for ${symbol}`);
                continue;
            }

            for (const candidate of candidates) {
                const quantity = this.riskGate.calculatePositionSize(candidate.maxLoss);
                if (quantity <= 0) {
                    logger.warn(`[SESSION] Invalid position size for ${symbol} (max loss ${candidate.maxLoss})`);
                    continue;
                }

                if (await this.attemptEntry(sessionId, candidate, quantity)) {
                    opened++;
                }
                // At most one entry attempt per symbol per cycle.
                break;
            }
        }

        return opened;
    }

    private async attemptEntry(sessionId: string | null, candidate: SpreadCandidate, quantity: number): Promise<boolean> {
        const { symbol, expiration, shortStrike, longStrike } = candidate;
        const targetCredit = midCredit(candidate.shortBid, candidate.shortAsk, candidate.longBid, candidate.longAsk);

        logger.info(
            `[SESSION] Attempting ENTRY: ${symbol} ${expiration} ${shortStrike}/${longStrike}P ` +
            `qty=${quantity} credit=${targetCredit.toFixed(2)}`
        );

        const placed = await this.execution.openSpread(
            { symbol, expiration, shortStrike, longStrike, quantity },
            targetCredit
        );
        if (!placed) {
            return false;
        }

        try {
            const trade = await this.store.insertTrade({
                sessionId,
                symbol,
                expiration,
                shortStrike,
                longStrike,
                quantity,
                credit: targetCredit,
                openReason: `Delta: ${candidate.shortDelta ?? 'n/a'}, Method: ${candidate.selectionMethod}`,
                openedDay: marketDay(this.clock.now(), this.config.timezone),
            });
            if (placed.orderRecordId) {
                await this.store.linkOrderToTrade(placed.orderRecordId, trade.id);
            }
            logger.info(`[SESSION] ENTRY opened trade ${trade.id} (${symbol} x${quantity})`);
        } catch (err: unknown) {
            // The broker accepted the order; the daily count still has to reflect it.
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[SESSION] ENTRY accepted by broker but trade not persisted for ${symbol}: ${msg}`);
        }

        await this.riskGate.recordTradeOpened();
        return true;
    }
}
