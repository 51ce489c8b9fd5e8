/**
 * Broker Gateway Client - REST adapter over the local broker gateway
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Implements MarketDataBroker + BrokerConnection over HTTP (axios).
 *
 * RULES:
 * 1. Every failure (network, non-2xx, malformed body) becomes null / false / []
 * 2. Nothing here makes trading decisions
 * 3. Prices that are missing, non-finite or ≤ 0 are reported as null
 *
 * GREP-FRIENDLY LOGS:
 * - [GATEWAY] - connectivity, quote and order traffic
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import axios, { AxiosInstance } from 'axios';
import { GatewayConfig } from '../../config/botConfig';
import {
    ComboOrderRequest,
    OptionChain,
    OptionQuote,
    OptionRight,
    OrderHandle,
    UnderlyingQuote,
} from '../../types';
import { Clock, systemClock } from '../../utils/clock';
import { isUsablePrice } from '../../utils/math';
import logger from '../../utils/logger';
import { BrokerAccount, BrokerGateway } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// WIRE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface GatewayQuote {
    symbol?: string;
    bid?: number | null;
    ask?: number | null;
    last?: number | null;
}

interface GatewayChain {
    symbol?: string;
    expirations?: string[];
    strikes?: Record<string, number[]>;
}

interface GatewayOptionQuote {
    bid?: number | null;
    ask?: number | null;
    delta?: number | null;
}

interface GatewayAccounts {
    accounts?: Array<{ id?: string; paper?: boolean }>;
}

interface GatewayOrderAck {
    orderId?: string | number;
    status?: string;
    filledQuantity?: number;
    avgFillPrice?: number;
}

export interface GatewayClientOptions {
    /** Pre-built axios instance (tests pass one with a custom adapter). */
    http?: AxiosInstance;
    clock?: Clock;
}

function priceOrNull(value: number | null | undefined): number | null {
    return isUsablePrice(value) ? value : null;
}

function describeError(err: unknown): string {
    if (axios.isAxiosError(err)) {
        const status = err.response?.status;
        return status ? `HTTP ${status}: ${err.message}` : err.message;
    }
    return err instanceof Error ? err.message : String(err);
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export class GatewayClient implements BrokerGateway {
    private readonly http: AxiosInstance;
    private readonly clock: Clock;
    private connected = false;

    constructor(private readonly config: GatewayConfig, options: GatewayClientOptions = {}) {
        this.http = options.http ?? axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: {
                'Accept': 'application/json',
                ...(config.apiKey ? { 'X-API-KEY': config.apiKey } : {}),
            },
        });
        this.clock = options.clock ?? systemClock;
    }

    async connect(retries: number, retryDelayMs: number): Promise<boolean> {
        for (let attempt = 1; attempt <= retries; attempt++) {
            try {
                logger.info(`[GATEWAY] Connecting to ${this.config.baseUrl} (attempt ${attempt}/${retries})`);
                await this.http.get('/v1/health');
                this.connected = true;
                logger.info('[GATEWAY] Connected');
                return true;
            } catch (err: unknown) {
                logger.warn(`[GATEWAY] Connection attempt ${attempt} failed: ${describeError(err)}`);
                if (attempt < retries) {
                    await this.clock.sleep(retryDelayMs);
                }
            }
        }
        logger.error('[GATEWAY] Failed to connect after all retries');
        this.connected = false;
        return false;
    }

    async disconnect(): Promise<void> {
        if (this.connected) {
            this.connected = false;
            logger.info('[GATEWAY] Disconnected');
        }
    }

    isConnected(): boolean {
        return this.connected;
    }

    async listAccounts(): Promise<BrokerAccount[]> {
        try {
            const { data } = await this.http.get<GatewayAccounts>('/v1/accounts');
            return (data.accounts ?? [])
                .filter((a): a is { id: string; paper?: boolean } => typeof a.id === 'string' && a.id.length > 0)
                .map(a => ({ accountId: a.id, paper: a.paper === true }));
        } catch (err: unknown) {
            logger.error(`[GATEWAY] Error listing accounts: ${describeError(err)}`);
            return [];
        }
    }

    async getUnderlyingQuote(symbol: string): Promise<UnderlyingQuote | null> {
        try {
            const { data } = await this.http.get<GatewayQuote>(`/v1/quotes/${encodeURIComponent(symbol)}`);
            return {
                symbol,
                bid: priceOrNull(data.bid),
                ask: priceOrNull(data.ask),
                last: priceOrNull(data.last),
            };
        } catch (err: unknown) {
            logger.error(`[GATEWAY] Error getting quote for ${symbol}: ${describeError(err)}`);
            return null;
        }
    }

    async getOptionChain(symbol: string): Promise<OptionChain | null> {
        try {
            const { data } = await this.http.get<GatewayChain>(`/v1/chains/${encodeURIComponent(symbol)}`);
            const expirations = [...(data.expirations ?? [])].sort();
            if (expirations.length === 0) {
                logger.warn(`[GATEWAY] No expirations listed for ${symbol}`);
                return null;
            }

            const strikesByExpiration: Record<string, number[]> = {};
            for (const exp of expirations) {
                const strikes = data.strikes?.[exp] ?? [];
                strikesByExpiration[exp] = strikes
                    .filter(s => Number.isFinite(s))
                    .sort((a, b) => a - b);
            }

            return { symbol, expirations, strikesByExpiration };
        } catch (err: unknown) {
            logger.error(`[GATEWAY] Error getting option chain for ${symbol}: ${describeError(err)}`);
            return null;
        }
    }

    async getOptionQuote(
        symbol: string,
        expiration: string,
        strike: number,
        right: OptionRight
    ): Promise<OptionQuote | null> {
        try {
            const { data } = await this.http.get<GatewayOptionQuote>('/v1/options/quote', {
                params: { symbol, expiration, strike, right },
            });
            const delta = typeof data.delta === 'number' && Number.isFinite(data.delta) ? data.delta : null;
            return {
                symbol,
                expiration,
                strike,
                right,
                bid: priceOrNull(data.bid),
                ask: priceOrNull(data.ask),
                delta,
                hasGreeks: delta !== null,
            };
        } catch (err: unknown) {
            logger.error(
                `[GATEWAY] Error getting option quote for ${symbol} ${expiration} ${strike}${right}: ${describeError(err)}`
            );
            return null;
        }
    }

    async submitOrder(order: ComboOrderRequest): Promise<OrderHandle | null> {
        if (!this.config.accountId) {
            logger.error('[GATEWAY] Cannot submit order: GATEWAY_ACCOUNT_ID is not set');
            return null;
        }

        try {
            const { data } = await this.http.post<GatewayOrderAck>(
                `/v1/accounts/${encodeURIComponent(this.config.accountId)}/orders`,
                {
                    symbol: order.symbol,
                    expiration: order.expiration,
                    legs: order.legs,
                    side: order.side,
                    quantity: order.quantity,
                    orderType: 'LMT',
                    limitPrice: order.limitPrice,
                    tif: order.timeInForce,
                }
            );

            if (data.orderId === undefined || data.orderId === '') {
                logger.error(`[GATEWAY] Order acknowledgement without id for ${order.symbol}`);
                return null;
            }

            const handle: OrderHandle = {
                brokerOrderId: String(data.orderId),
                status: data.status === 'filled' ? 'filled' : 'submitted',
            };
            if (typeof data.filledQuantity === 'number') handle.filledQuantity = data.filledQuantity;
            if (typeof data.avgFillPrice === 'number') handle.avgFillPrice = data.avgFillPrice;

            logger.info(
                `[GATEWAY] Order ${handle.brokerOrderId} ${handle.status}: ${order.side} ${order.quantity}x ` +
                `${order.symbol} ${order.expiration} @ ${order.limitPrice.toFixed(2)}`
            );
            return handle;
        } catch (err: unknown) {
            logger.error(`[GATEWAY] Order rejected for ${order.symbol}: ${describeError(err)}`);
            return null;
        }
    }
}
