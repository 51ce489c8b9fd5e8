import { BrokerAccount, BrokerGateway } from '../../src/integrations/broker/types';
import {
    ComboOrderRequest,
    OptionChain,
    OptionQuote,
    OptionRight,
    OrderHandle,
    UnderlyingQuote,
} from '../../src/types';

const quoteKey = (symbol: string, expiration: string, strike: number, right: OptionRight): string =>
    `${symbol}|${expiration}|${strike}|${right}`;

/**
 * Scripted in-process broker. Quotes and chains are set by the test; orders are
 * accepted unless a response is queued in `orderResponses`.
 */
export class FakeBroker implements BrokerGateway {
    readonly submitted: ComboOrderRequest[] = [];
    readonly orderResponses: Array<OrderHandle | null> = [];
    readonly quoteRequests: string[] = [];
    accounts: BrokerAccount[] = [{ accountId: 'DU000001', paper: true }];
    connectResult = true;
    connectCalls = 0;
    disconnectCalls = 0;
    /** Expirations whose option quote requests throw. */
    readonly throwingExpirations = new Set<string>();

    private readonly underlyings = new Map<string, UnderlyingQuote>();
    private readonly chains = new Map<string, OptionChain>();
    private readonly quotes = new Map<string, OptionQuote>();
    private orderSeq = 0;
    private connected = false;

    setUnderlying(symbol: string, bid: number | null, ask: number | null, last: number | null): this {
        this.underlyings.set(symbol, { symbol, bid, ask, last });
        return this;
    }

    setChain(symbol: string, strikesByExpiration: Record<string, number[]>): this {
        this.chains.set(symbol, {
            symbol,
            expirations: Object.keys(strikesByExpiration),
            strikesByExpiration,
        });
        return this;
    }

    /** Put quote. A delta of null means the gateway reported no Greeks. */
    setPut(
        symbol: string,
        expiration: string,
        strike: number,
        bid: number | null,
        ask: number | null,
        delta: number | null = null
    ): this {
        this.quotes.set(quoteKey(symbol, expiration, strike, 'P'), {
            symbol,
            expiration,
            strike,
            right: 'P',
            bid,
            ask,
            delta,
            hasGreeks: delta !== null,
        });
        return this;
    }

    async connect(): Promise<boolean> {
        this.connectCalls++;
        this.connected = this.connectResult;
        return this.connectResult;
    }

    async disconnect(): Promise<void> {
        this.disconnectCalls++;
        this.connected = false;
    }

    isConnected(): boolean {
        return this.connected;
    }

    async listAccounts(): Promise<BrokerAccount[]> {
        return this.accounts;
    }

    async getUnderlyingQuote(symbol: string): Promise<UnderlyingQuote | null> {
        return this.underlyings.get(symbol) ?? null;
    }

    async getOptionChain(symbol: string): Promise<OptionChain | null> {
        return this.chains.get(symbol) ?? null;
    }

    async getOptionQuote(
        symbol: string,
        expiration: string,
        strike: number,
        right: OptionRight
    ): Promise<OptionQuote | null> {
        if (this.throwingExpirations.has(expiration)) {
            throw new Error(`quote feed down for ${expiration}`);
        }
        const key = quoteKey(symbol, expiration, strike, right);
        this.quoteRequests.push(key);
        const quote = this.quotes.get(key);
        return quote ? { ...quote } : null;
    }

    async submitOrder(order: ComboOrderRequest): Promise<OrderHandle | null> {
        this.submitted.push(order);
        if (this.orderResponses.length > 0) {
            return this.orderResponses.shift() ?? null;
        }
        this.orderSeq++;
        return { brokerOrderId: `ord-${this.orderSeq}`, status: 'submitted' };
    }

    /** Reject the next `count` orders. */
    rejectNext(count: number): this {
        for (let i = 0; i < count; i++) this.orderResponses.push(null);
        return this;
    }
}
