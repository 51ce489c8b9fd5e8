import BigNumber from 'bignumber.js';

export const toBigNumber = (value: string | number): BigNumber => {
    return new BigNumber(value);
};

/**
 * Round a dollar amount to whole cents (half-up).
 * Quote arithmetic like 0.80 - 0.30 must compare and divide as 0.50, not 0.5000000000000001.
 */
export const roundCents = (value: number): number => {
    return toBigNumber(value).decimalPlaces(2, BigNumber.ROUND_HALF_UP).toNumber();
};

/** Net credit received for selling the spread: short bid − long ask. */
export const spreadCredit = (shortBid: number, longAsk: number): number => {
    return roundCents(toBigNumber(shortBid).minus(longAsk).toNumber());
};

/** Debit to buy the spread back: short ask − long bid. */
export const spreadDebit = (shortAsk: number, longBid: number): number => {
    return roundCents(toBigNumber(shortAsk).minus(longBid).toNumber());
};

/** Mid-price credit: short mid − long mid. */
export const midCredit = (
    shortBid: number,
    shortAsk: number,
    longBid: number,
    longAsk: number
): number => {
    const shortMid = toBigNumber(shortBid).plus(shortAsk).dividedBy(2);
    const longMid = toBigNumber(longBid).plus(longAsk).dividedBy(2);
    return shortMid.minus(longMid).toNumber();
};

/** Realized P&L of a closed spread: (credit − debit) × contracts. */
export const spreadPnl = (credit: number, debitToClose: number, quantity: number): number => {
    return toBigNumber(credit).minus(debitToClose).times(quantity).toNumber();
};

export const formatPct = (ratio: number): string => {
    return `${(ratio * 100).toFixed(2)}%`;
};

export const isUsablePrice = (value: number | null | undefined): value is number => {
    return typeof value === 'number' && Number.isFinite(value) && value > 0;
};
