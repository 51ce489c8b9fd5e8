/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP - COMPONENT FACTORY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Builds the decision pipeline from one BotConfig. NO RUNTIME LOOPS in this file.
 *
 * RULES:
 * 1. Config is loaded by the caller and passed in; nothing here reads process.env
 * 2. Every component receives its collaborators through its constructor
 * 3. Tests pass their own gateway / store / clock through BootstrapOverrides
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { BotConfig } from './config/botConfig';
import { CandidateGenerator } from './core/candidateGenerator';
import { RiskGate } from './core/riskGate';
import { PositionLifecycleManager } from './core/tradeLifecycle';
import { ExecutionController } from './engine/executionController';
import { GatewayClient } from './integrations/broker/gatewayClient';
import { BrokerGateway } from './integrations/broker/types';
import { createSupabaseClient } from './integrations/supabaseClient';
import { SessionScheduler } from './runtime/sessionScheduler';
import { createTradeStore } from './storage/createStore';
import { TradeStore } from './storage/tradeStore';
import { Clock, systemClock } from './utils/clock';

export interface BootstrapOverrides {
    gateway?: BrokerGateway;
    store?: TradeStore;
    clock?: Clock;
    supabase?: SupabaseClient | null;
}

export interface AppContext {
    config: BotConfig;
    clock: Clock;
    supabase: SupabaseClient | null;
    gateway: BrokerGateway;
    store: TradeStore;
    generator: CandidateGenerator;
    riskGate: RiskGate;
    execution: ExecutionController;
    lifecycle: PositionLifecycleManager;
    scheduler: SessionScheduler;
}

export function bootstrap(config: BotConfig, overrides: BootstrapOverrides = {}): AppContext {
    const clock = overrides.clock ?? systemClock;
    const supabase = overrides.supabase !== undefined ? overrides.supabase : createSupabaseClient(config.supabase);
    const gateway = overrides.gateway ?? new GatewayClient(config.gateway, { clock });
    const store = overrides.store ?? createTradeStore(supabase, config.dbPath, clock);

    const generator = new CandidateGenerator(config, gateway, clock);
    const riskGate = new RiskGate(config, store, clock);
    const execution = new ExecutionController(config, gateway, store, clock);
    const lifecycle = new PositionLifecycleManager(config, generator, execution, riskGate, store, clock);
    const scheduler = new SessionScheduler({
        config,
        generator,
        riskGate,
        execution,
        lifecycle,
        store,
        clock,
        connection: gateway,
    });

    return { config, clock, supabase, gateway, store, generator, riskGate, execution, lifecycle, scheduler };
}
