/**
 * Doctor - gateway diagnostics before a trading session.
 *
 * Checks, in order: connectivity, account (paper flag), underlying quote,
 * option chain, option quote, Greeks. Critical = connection, account,
 * market data, option chain. Missing Greeks is a warning only.
 */

import { BotConfig } from '../config/botConfig';
import { ENGINE_CONSTANTS } from '../config/constants';
import { underlyingPrice } from '../core/candidateGenerator';
import { BrokerAccount, BrokerGateway } from '../integrations/broker/types';
import { isUsablePrice } from '../utils/math';
import logger from '../utils/logger';

export interface DoctorReport {
    connection: boolean;
    accountId: string | null;
    isPaper: boolean;
    marketData: boolean;
    optionsChain: boolean;
    optionQuote: boolean;
    greeksAvailable: boolean;
    errors: string[];
    warnings: string[];
}

export function allCriticalPassed(report: DoctorReport): boolean {
    return report.connection && report.accountId !== null && report.marketData && report.optionsChain;
}

function pickAccount(accounts: BrokerAccount[], configured: string): BrokerAccount | null {
    if (accounts.length === 0) return null;
    if (configured) {
        const match = accounts.find(a => a.accountId === configured);
        if (match) return match;
    }
    return accounts.find(a => a.paper) ?? accounts[0];
}

export async function runDoctor(
    config: BotConfig,
    gateway: BrokerGateway,
    symbol: string = config.underlyings[0]
): Promise<DoctorReport> {
    const report: DoctorReport = {
        connection: false,
        accountId: null,
        isPaper: false,
        marketData: false,
        optionsChain: false,
        optionQuote: false,
        greeksAvailable: false,
        errors: [],
        warnings: [],
    };

    logger.info('[DOCTOR] Starting diagnostics');

    report.connection = await gateway.connect(ENGINE_CONSTANTS.CONNECT_RETRIES, ENGINE_CONSTANTS.CONNECT_RETRY_DELAY_MS);
    if (!report.connection) {
        report.errors.push(`Failed to connect to broker gateway at ${config.gateway.baseUrl}`);
        return report;
    }

    try {
        // Account
        const accounts = await gateway.listAccounts();
        const account = pickAccount(accounts, config.gateway.accountId);
        if (account) {
            report.accountId = account.accountId;
            report.isPaper = account.paper;
            if (!account.paper) {
                report.warnings.push(`Account ${account.accountId} is not a paper account`);
            }
            if (config.gateway.accountId && config.gateway.accountId !== account.accountId) {
                report.warnings.push(`Configured account ${config.gateway.accountId} not found`);
            }
        } else {
            report.errors.push('No account found');
        }

        // Underlying quote
        const quote = await gateway.getUnderlyingQuote(symbol);
        if (quote && isUsablePrice(quote.bid) && isUsablePrice(quote.ask)) {
            report.marketData = true;
        } else if (quote) {
            report.warnings.push(`${symbol} quote is missing bid/ask (delayed market data?)`);
        } else {
            report.errors.push(`Failed to get ${symbol} quote`);
        }

        // Option chain
        const chain = await gateway.getOptionChain(symbol);
        if (chain && chain.expirations.length > 0) {
            report.optionsChain = true;
        } else {
            report.errors.push(`Failed to get ${symbol} option chain (missing options permissions?)`);
            return report;
        }

        // Option quote + Greeks on the strike nearest the underlying
        const price = underlyingPrice(quote);
        const expiration = chain.expirations[0];
        const strikes = chain.strikesByExpiration[expiration] ?? [];
        if (price === null || strikes.length === 0) {
            report.warnings.push(`Cannot test option quote for ${symbol} ${expiration}`);
            return report;
        }

        const nearest = strikes.reduce((best, s) => (Math.abs(s - price) < Math.abs(best - price) ? s : best));
        const optionQuote = await gateway.getOptionQuote(symbol, expiration, nearest, 'P');
        if (!optionQuote) {
            report.errors.push(`Failed to get option quote for ${symbol} ${expiration} ${nearest}P`);
            return report;
        }

        report.optionQuote = isUsablePrice(optionQuote.bid) && isUsablePrice(optionQuote.ask);
        if (!report.optionQuote) {
            report.warnings.push('Option quote is missing bid/ask (delayed market data?)');
        }

        report.greeksAvailable = optionQuote.hasGreeks && optionQuote.delta !== null;
        if (!report.greeksAvailable) {
            report.warnings.push(
                config.requireGreeks
                    ? 'Greeks NOT available and REQUIRE_GREEKS=true - candidates will be rejected'
                    : 'Greeks NOT available - REQUIRE_GREEKS=false, OTM fallback will be used'
            );
        }

        return report;
    } finally {
        await gateway.disconnect();
    }
}

export function formatDoctorReport(report: DoctorReport): string {
    const mark = (ok: boolean): string => (ok ? 'OK' : 'FAIL');
    const lines = [
        '',
        '='.repeat(60),
        'Summary',
        '='.repeat(60),
        `Connection: ${mark(report.connection)}`,
        `Account: ${report.accountId ?? 'N/A'}`,
        `Paper Account: ${mark(report.isPaper)}`,
        `Market Data: ${mark(report.marketData)}`,
        `Options Chain: ${mark(report.optionsChain)}`,
        `Option Quote: ${mark(report.optionQuote)}`,
        `Greeks Available: ${mark(report.greeksAvailable)}`,
    ];

    if (report.warnings.length > 0) {
        lines.push('', 'Warnings:', ...report.warnings.map(w => `  - ${w}`));
    }
    if (report.errors.length > 0) {
        lines.push('', 'Errors:', ...report.errors.map(e => `  - ${e}`));
    }

    lines.push('', allCriticalPassed(report) ? 'All critical checks passed' : 'Some checks failed - review errors above');
    return lines.join('\n');
}
