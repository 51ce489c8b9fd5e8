/**
 * Execution Controller - decisions → combo limit orders
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENTRY (openSpread): one SELL combo, price walk
 * - attempt n submits at exactly targetCredit − adjustment, adjustment starts at 0
 * - adjustment grows by $0.01 after every rejected attempt
 * - abort before submitting when the limit would be ≤ 0
 * - abort the walk once adjustment > entryMaxSlippage
 * - at most ENTRY_MAX_ATTEMPTS submissions, fixed pause between them
 * - first broker acceptance wins (acceptance, not a confirmed fill)
 *
 * EXIT (closeSpread): one BUY combo at the supplied debit, single shot.
 *
 * Both are no-ops returning null while TRADING_DISABLED is set.
 * Every submission is recorded as an OrderRecord; fills reported in the
 * acknowledgement are recorded as FillRecords.
 *
 * GREP-FRIENDLY LOGS:
 * - [EXEC]
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BotConfig } from '../config/botConfig';
import { ENGINE_CONSTANTS } from '../config/constants';
import { MarketDataBroker } from '../integrations/broker/types';
import { TradeStore } from '../storage/tradeStore';
import { ComboLeg, ComboOrderRequest, OrderAction, OrderHandle, OrderSide } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { roundCents, toBigNumber } from '../utils/math';
import logger from '../utils/logger';

export interface PlacedOrder {
    handle: OrderHandle;
    /** OrderRecord id, null when the audit write failed. */
    orderRecordId: string | null;
    limitPrice: number;
    quantity: number;
}

export interface SpreadOrderParams {
    symbol: string;
    expiration: string;
    shortStrike: number;
    longStrike: number;
    quantity: number;
}

function buildLegs(side: OrderSide, shortStrike: number, longStrike: number): ComboLeg[] {
    // Opening sells the short put and buys the long put; closing reverses both.
    const shortAction: OrderSide = side === 'SELL' ? 'SELL' : 'BUY';
    const longAction: OrderSide = side === 'SELL' ? 'BUY' : 'SELL';
    return [
        { strike: shortStrike, right: 'P', action: shortAction, ratio: 1 },
        { strike: longStrike, right: 'P', action: longAction, ratio: 1 },
    ];
}

export class ExecutionController {
    constructor(
        private readonly config: BotConfig,
        private readonly broker: MarketDataBroker,
        private readonly store: TradeStore,
        private readonly clock: Clock = systemClock
    ) {}

    async openSpread(params: SpreadOrderParams, targetCredit: number): Promise<PlacedOrder | null> {
        const { symbol, expiration, shortStrike, longStrike, quantity } = params;

        if (this.config.tradingDisabled) {
            logger.warn(`[EXEC] Trading is disabled - entry order not placed for ${symbol}`);
            return null;
        }

        const target = toBigNumber(targetCredit);
        let adjustment = toBigNumber(0);

        for (let attempt = 1; attempt <= ENGINE_CONSTANTS.ENTRY_MAX_ATTEMPTS; attempt++) {
            const limitPrice = target.minus(adjustment).toNumber();
            if (limitPrice <= 0) {
                logger.warn(`[EXEC] Limit price too low for ${symbol}: ${limitPrice}`);
                break;
            }

            logger.info(
                `[EXEC] ENTRY attempt ${attempt}: ${symbol} ${expiration} ${shortStrike}/${longStrike}P ` +
                `x${quantity} @ ${limitPrice} (adjustment ${adjustment.toFixed(2)})`
            );

            const placed = await this.submit('open', this.buildOrder(params, 'SELL', limitPrice));
            if (placed) {
                return placed;
            }

            adjustment = adjustment.plus(ENGINE_CONSTANTS.ENTRY_PRICE_STEP);
            if (adjustment.gt(this.config.entryMaxSlippage)) {
                logger.warn(`[EXEC] Max slippage exceeded for ${symbol}, abandoning entry`);
                break;
            }
            if (attempt < ENGINE_CONSTANTS.ENTRY_MAX_ATTEMPTS) {
                await this.clock.sleep(ENGINE_CONSTANTS.ENTRY_RETRY_PAUSE_MS);
            }
        }

        logger.error(`[EXEC] Failed to place entry order for ${symbol} after all attempts`);
        return null;
    }

    async closeSpread(params: SpreadOrderParams, targetDebit: number): Promise<PlacedOrder | null> {
        const { symbol, expiration, shortStrike, longStrike, quantity } = params;

        if (this.config.tradingDisabled) {
            logger.warn(`[EXEC] Trading is disabled - exit order not placed for ${symbol}`);
            return null;
        }

        const limitPrice = roundCents(targetDebit);
        logger.info(
            `[EXEC] EXIT order: ${symbol} ${expiration} ${shortStrike}/${longStrike}P x${quantity} @ ${limitPrice.toFixed(2)}`
        );
        const placed = await this.submit('close', this.buildOrder(params, 'BUY', limitPrice));
        if (!placed) {
            logger.error(`[EXEC] Exit order not accepted for ${symbol}`);
        }
        return placed;
    }

    private buildOrder(params: SpreadOrderParams, side: OrderSide, limitPrice: number): ComboOrderRequest {
        return {
            symbol: params.symbol,
            expiration: params.expiration,
            legs: buildLegs(side, params.shortStrike, params.longStrike),
            side,
            quantity: params.quantity,
            limitPrice,
            timeInForce: 'DAY',
        };
    }

    private async submit(action: OrderAction, order: ComboOrderRequest): Promise<PlacedOrder | null> {
        const handle = await this.broker.submitOrder(order);
        const orderRecordId = await this.recordOrder(action, order, handle);
        if (!handle) {
            return null;
        }
        return {
            handle,
            orderRecordId,
            limitPrice: order.limitPrice,
            quantity: order.quantity,
        };
    }

    private async recordOrder(
        action: OrderAction,
        order: ComboOrderRequest,
        handle: OrderHandle | null
    ): Promise<string | null> {
        try {
            const record = await this.store.insertOrder({
                tradeId: null,
                action,
                orderType: 'limit',
                limitPrice: order.limitPrice,
                quantity: order.quantity,
                status: handle ? handle.status : 'rejected',
                brokerOrderId: handle ? handle.brokerOrderId : null,
                raw: JSON.stringify(order),
            });

            if (handle && handle.status === 'filled') {
                await this.store.insertFill({
                    orderId: record.id,
                    price: handle.avgFillPrice ?? order.limitPrice,
                    quantity: handle.filledQuantity ?? order.quantity,
                });
            }
            return record.id;
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[EXEC] Failed to record ${action} order for ${order.symbol}: ${msg}`);
            return null;
        }
    }
}
