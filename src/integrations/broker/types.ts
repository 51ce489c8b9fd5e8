import {
    ComboOrderRequest,
    OptionChain,
    OptionQuote,
    OptionRight,
    OrderHandle,
    UnderlyingQuote,
} from '../../types';

/**
 * Market data + order submission capability consumed by the decision pipeline.
 * Every method reports "no data" or a rejected order as null. None of them throw.
 */
export interface MarketDataBroker {
    getUnderlyingQuote(symbol: string): Promise<UnderlyingQuote | null>;
    getOptionChain(symbol: string): Promise<OptionChain | null>;
    getOptionQuote(
        symbol: string,
        expiration: string,
        strike: number,
        right: OptionRight
    ): Promise<OptionQuote | null>;
    submitOrder(order: ComboOrderRequest): Promise<OrderHandle | null>;
}

export interface BrokerAccount {
    accountId: string;
    paper: boolean;
}

export interface BrokerConnection {
    /** Bounded connect-retry against the gateway. */
    connect(retries: number, retryDelayMs: number): Promise<boolean>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
    listAccounts(): Promise<BrokerAccount[]>;
}

export type BrokerGateway = MarketDataBroker & BrokerConnection;
