/**
 * Candidate Generator - option chain → ranked put credit spreads
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * For every listed strike of every expiration inside [dteMin, dteMax], pair it
 * with the strike exactly spreadWidth below and keep the pair when both legs are
 * liquid, the short leg passes the delta screen (or the OTM fallback), and the
 * spread pays a positive credit.
 *
 * INVARIANTS:
 * - longStrike === shortStrike − spreadWidth (listed strike, no interpolation)
 * - credit > 0
 * - output is sorted by credit descending; ties keep chain order
 * - nothing throws out of findCandidates / getTopCandidates
 *
 * GREP-FRIENDLY LOGS:
 * - [SCANNER]
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BotConfig } from '../config/botConfig';
import { ENGINE_CONSTANTS } from '../config/constants';
import { MarketDataBroker } from '../integrations/broker/types';
import { OptionQuote, SelectionMethod, SpreadCandidate, UnderlyingQuote } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { daysToExpiration } from '../utils/marketTime';
import { isUsablePrice, roundCents, spreadCredit, toBigNumber } from '../utils/math';
import logger from '../utils/logger';

const STRIKE_EPSILON = 1e-6;

/** A leg quote with both sides usable. */
export interface LiquidQuote extends OptionQuote {
    bid: number;
    ask: number;
}

export interface SpreadLegQuotes {
    short: LiquidQuote;
    long: LiquidQuote;
}

function isLiquid(quote: OptionQuote | null): quote is LiquidQuote {
    return quote !== null && isUsablePrice(quote.bid) && isUsablePrice(quote.ask);
}

/** Underlying price: first usable of bid, ask, last. */
export function underlyingPrice(quote: UnderlyingQuote | null): number | null {
    if (!quote) return null;
    if (isUsablePrice(quote.bid)) return quote.bid;
    if (isUsablePrice(quote.ask)) return quote.ask;
    if (isUsablePrice(quote.last)) return quote.last;
    return null;
}

function findListedStrike(strikes: number[], target: number): number | null {
    const match = strikes.find(s => Math.abs(s - target) < STRIKE_EPSILON);
    return match === undefined ? null : match;
}

export class CandidateGenerator {
    constructor(
        private readonly config: BotConfig,
        private readonly broker: MarketDataBroker,
        private readonly clock: Clock = systemClock
    ) {}

    /**
     * Fetch both put legs of a spread. Null unless both have a usable bid and ask.
     * Shared with the lifecycle manager for exit valuation.
     */
    async fetchSpreadQuotes(
        symbol: string,
        expiration: string,
        shortStrike: number,
        longStrike: number
    ): Promise<SpreadLegQuotes | null> {
        const shortQuote = await this.broker.getOptionQuote(symbol, expiration, shortStrike, 'P');
        const longQuote = await this.broker.getOptionQuote(symbol, expiration, longStrike, 'P');
        if (!isLiquid(shortQuote) || !isLiquid(longQuote)) {
            return null;
        }
        return { short: shortQuote, long: longQuote };
    }

    async findCandidates(symbol: string): Promise<SpreadCandidate[]> {
        try {
            return await this.scanSymbol(symbol);
        } catch (err: unknown) {
            const msg = err instanceof Error ? err.message : String(err);
            logger.error(`[SCANNER] Scan failed for ${symbol}: ${msg}`);
            return [];
        }
    }

    async getTopCandidates(symbol: string, limit: number): Promise<SpreadCandidate[]> {
        const candidates = await this.findCandidates(symbol);
        return candidates.slice(0, limit);
    }

    private async scanSymbol(symbol: string): Promise<SpreadCandidate[]> {
        const price = underlyingPrice(await this.broker.getUnderlyingQuote(symbol));
        if (price === null) {
            logger.warn(`[SCANNER] Cannot determine price for ${symbol}`);
            return [];
        }

        const chain = await this.broker.getOptionChain(symbol);
        if (!chain) {
            logger.warn(`[SCANNER] No option chain for ${symbol}`);
            return [];
        }

        const now = this.clock.now();
        const candidates: SpreadCandidate[] = [];

        for (const expiration of chain.expirations) {
            try {
                const dte = daysToExpiration(expiration, now, this.config.timezone);
                if (dte < this.config.dteMin || dte > this.config.dteMax) {
                    continue;
                }
                const strikes = chain.strikesByExpiration[expiration] ?? [];
                for (const shortStrike of strikes) {
                    const candidate = await this.evaluatePair(symbol, expiration, dte, shortStrike, strikes, price);
                    if (candidate) {
                        candidates.push(candidate);
                    }
                }
            } catch (err: unknown) {
                const msg = err instanceof Error ? err.message : String(err);
                logger.error(`[SCANNER] Error processing expiration ${expiration} for ${symbol}: ${msg}`);
            }
        }

        // Array.prototype.sort is stable: equal credits keep chain order.
        candidates.sort((a, b) => b.credit - a.credit);

        logger.info(`[SCANNER] ${symbol}: ${candidates.length} candidate(s) @ underlying ${price}`);
        return candidates;
    }

    private async evaluatePair(
        symbol: string,
        expiration: string,
        dte: number,
        shortStrike: number,
        strikes: number[],
        price: number
    ): Promise<SpreadCandidate | null> {
        const { spreadWidth, legMaxBidAsk, deltaMin, deltaMax, requireGreeks, otmTargetPct } = this.config;

        const longStrike = findListedStrike(strikes, toBigNumber(shortStrike).minus(spreadWidth).toNumber());
        if (longStrike === null) return null;

        const legs = await this.fetchSpreadQuotes(symbol, expiration, shortStrike, longStrike);
        if (!legs) return null;

        const shortSpread = roundCents(toBigNumber(legs.short.ask).minus(legs.short.bid).toNumber());
        const longSpread = roundCents(toBigNumber(legs.long.ask).minus(legs.long.bid).toNumber());
        if (shortSpread > legMaxBidAsk || longSpread > legMaxBidAsk) return null;

        const shortDelta = legs.short.hasGreeks ? legs.short.delta : null;
        let selectionMethod: SelectionMethod = 'delta';

        if (shortDelta !== null) {
            const absDelta = Math.abs(shortDelta);
            if (absDelta < deltaMin || absDelta > deltaMax) return null;
        } else {
            if (requireGreeks) return null;

            const otmPct = (price - shortStrike) / price;
            const lower = otmTargetPct * (1 - ENGINE_CONSTANTS.OTM_FALLBACK_TOLERANCE);
            const upper = otmTargetPct * (1 + ENGINE_CONSTANTS.OTM_FALLBACK_TOLERANCE);
            if (otmPct < lower || otmPct > upper) return null;

            selectionMethod = 'otm_fallback';
            logger.info(
                `[SCANNER] OTM fallback for ${symbol} ${expiration} ${shortStrike}: ${(otmPct * 100).toFixed(2)}%`
            );
        }

        const credit = spreadCredit(legs.short.bid, legs.long.ask);
        if (credit <= 0) return null;

        return {
            symbol,
            expiration,
            dte,
            shortStrike,
            longStrike,
            shortDelta,
            credit,
            maxLoss: roundCents(toBigNumber(spreadWidth).minus(credit).toNumber()),
            shortBid: legs.short.bid,
            shortAsk: legs.short.ask,
            longBid: legs.long.bid,
            longAsk: legs.long.ask,
            shortBidAskSpread: shortSpread,
            longBidAskSpread: longSpread,
            hasGreeks: legs.short.hasGreeks,
            selectionMethod,
        };
    }
}
