/**
 * Scanner - read-only candidate scan across the configured underlyings.
 * Never places orders.
 */

import { BotConfig } from '../config/botConfig';
import { ENGINE_CONSTANTS } from '../config/constants';
import { CandidateGenerator } from '../core/candidateGenerator';
import { SpreadCandidate } from '../types';
import logger from '../utils/logger';

export type ScanResults = Map<string, SpreadCandidate[]>;

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

export async function scanAllSymbols(
    config: BotConfig,
    generator: CandidateGenerator,
    limit: number = ENGINE_CONSTANTS.SCAN_CANDIDATE_LIMIT
): Promise<ScanResults> {
    const results: ScanResults = new Map();
    for (const symbol of config.underlyings) {
        logger.info(`[SCANNER] Scanning ${symbol}...`);
        const candidates = await generator.getTopCandidates(symbol, limit);
        results.set(symbol, candidates);
        logger.info(`[SCANNER] Found ${candidates.length} candidate(s) for ${symbol}`);
    }
    return results;
}

export function formatCandidateRow(c: SpreadCandidate): string {
    const delta = c.shortDelta !== null ? c.shortDelta.toFixed(3) : 'N/A';
    return [
        c.expiration.padEnd(12),
        String(c.dte).padEnd(5),
        c.shortStrike.toFixed(2).padEnd(8),
        c.longStrike.toFixed(2).padEnd(8),
        delta.padEnd(8),
        `$${c.credit.toFixed(2)}`.padEnd(8),
        `$${c.maxLoss.toFixed(2)}`.padEnd(10),
        c.selectionMethod,
    ].join(' ');
}

export function formatScanResults(results: ScanResults): string {
    const lines: string[] = ['', RULE, 'SCAN RESULTS - Put Credit Spread Candidates', RULE];

    for (const [symbol, candidates] of results) {
        if (candidates.length === 0) {
            lines.push('', `${symbol}: No candidates found`);
            continue;
        }
        lines.push('', `${symbol}: ${candidates.length} candidates`, DIVIDER);
        lines.push([
            'Exp'.padEnd(12),
            'DTE'.padEnd(5),
            'Short'.padEnd(8),
            'Long'.padEnd(8),
            'Delta'.padEnd(8),
            'Credit'.padEnd(8),
            'Max Loss'.padEnd(10),
            'Method',
        ].join(' '));
        lines.push(DIVIDER);
        for (const c of candidates) {
            lines.push(formatCandidateRow(c));
        }
    }

    lines.push('', RULE);
    return lines.join('\n');
}
