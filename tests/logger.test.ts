/**
 * Critical log routing: which lines are mirrored to bot_logs.
 */

import { isCriticalLogLine } from '../src/utils/logger';

describe('isCriticalLogLine', () => {
    test('warnings and errors are always critical', () => {
        expect(isCriticalLogLine('warn', '[SCANNER] Cannot determine price for SPY')).toBe(true);
        expect(isCriticalLogLine('error', '[GATEWAY] Order rejected for SPY')).toBe(true);
    });

    test('info lines are critical only when tagged', () => {
        expect(isCriticalLogLine('info', '[LIFECYCLE] EXIT SPY 20260327 480/479P')).toBe(true);
        expect(isCriticalLogLine('info', '[SESSION] Stop requested')).toBe(true);
        expect(isCriticalLogLine('info', '[RISK-GATE] 2026-03-16 trades_count=1')).toBe(true);
        expect(isCriticalLogLine('info', '[SCANNER] SPY: 3 candidate(s) @ underlying 500')).toBe(false);
    });
});
