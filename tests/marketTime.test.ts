/**
 * Market Time Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Calendar day, time of day and DTE are all evaluated in America/New_York.
 * 2026 DST starts Sunday 2026-03-08 at 02:00 local (07:00Z).
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    daysToExpiration,
    isInEntryWindow,
    marketDay,
    marketSecondsOfDay,
    parseExpiration,
    parseTimeOfDay,
} from '../src/utils/marketTime';

const TZ = 'America/New_York';

describe('marketDay', () => {
    test('uses the market-local date, not the UTC date', () => {
        // 23:30 EDT on Monday is already Tuesday in UTC
        expect(marketDay(new Date('2026-03-17T03:30:00Z'), TZ)).toBe('2026-03-16');
        expect(marketDay(new Date('2026-03-17T04:30:00Z'), TZ)).toBe('2026-03-17');
    });

    test('follows the DST offset change', () => {
        // 00:30 EST (UTC-5) before the switch
        expect(marketDay(new Date('2026-03-08T05:30:00Z'), TZ)).toBe('2026-03-08');
        // 23:30 EST on the 7th
        expect(marketDay(new Date('2026-03-08T04:30:00Z'), TZ)).toBe('2026-03-07');
    });
});

describe('marketSecondsOfDay', () => {
    test('10:00 EDT is 36000 seconds', () => {
        expect(marketSecondsOfDay(new Date('2026-03-16T14:00:00Z'), TZ)).toBe(36000);
    });

    test('10:00 EST in winter is 15:00Z', () => {
        expect(marketSecondsOfDay(new Date('2026-01-12T15:00:00Z'), TZ)).toBe(36000);
    });
});

describe('parseTimeOfDay', () => {
    test('parses HH:MM', () => {
        expect(parseTimeOfDay('10:00')).toBe(36000);
        expect(parseTimeOfDay('9:30')).toBe(34200);
    });

    test('rejects malformed values', () => {
        expect(() => parseTimeOfDay('25:00')).toThrow('Invalid time of day');
        expect(() => parseTimeOfDay('10')).toThrow('Invalid time of day');
    });
});

describe('isInEntryWindow', () => {
    const inWindow = (iso: string): boolean => isInEntryWindow(new Date(iso), TZ, '10:00', '11:00');

    test('is inclusive at both ends', () => {
        expect(inWindow('2026-03-16T14:00:00Z')).toBe(true);
        expect(inWindow('2026-03-16T15:00:00Z')).toBe(true);
    });

    test('excludes times just outside', () => {
        expect(inWindow('2026-03-16T13:59:59Z')).toBe(false);
        expect(inWindow('2026-03-16T15:00:01Z')).toBe(false);
    });
});

describe('parseExpiration', () => {
    test('accepts chain and dashed forms', () => {
        expect(parseExpiration('20260327')).toEqual({ year: 2026, month: 3, day: 27 });
        expect(parseExpiration('2026-03-27')).toEqual({ year: 2026, month: 3, day: 27 });
    });

    test('rejects malformed and impossible dates', () => {
        expect(() => parseExpiration('bogus')).toThrow('Invalid expiration format: bogus');
        expect(() => parseExpiration('20260230')).toThrow('Invalid expiration date: 20260230');
        expect(() => parseExpiration('20261345')).toThrow('Invalid expiration date: 20261345');
    });
});

describe('daysToExpiration', () => {
    test('counts calendar days in the market timezone', () => {
        expect(daysToExpiration('20260327', new Date('2026-03-16T14:00:00Z'), TZ)).toBe(11);
        expect(daysToExpiration('20260319', new Date('2026-03-16T14:00:00Z'), TZ)).toBe(3);
    });

    test('does not change until the market-local date changes', () => {
        // 23:59 EDT Monday
        expect(daysToExpiration('20260327', new Date('2026-03-17T03:59:00Z'), TZ)).toBe(11);
        // 00:01 EDT Tuesday
        expect(daysToExpiration('20260327', new Date('2026-03-17T04:01:00Z'), TZ)).toBe(10);
    });

    test('is zero on expiration day and negative after it', () => {
        expect(daysToExpiration('20260316', new Date('2026-03-16T19:00:00Z'), TZ)).toBe(0);
        expect(daysToExpiration('20260313', new Date('2026-03-16T19:00:00Z'), TZ)).toBe(-3);
    });

    test('spans the DST change without drifting', () => {
        // Friday 2026-03-06 10:00 EST → Friday 2026-03-13
        expect(daysToExpiration('20260313', new Date('2026-03-06T15:00:00Z'), TZ)).toBe(7);
    });
});
