/**
 * Market-timezone calendar helpers.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every "which day" and "what time of day" question goes through here.
 * DTE is calendar-date subtraction in the market timezone, not elapsed hours:
 * at 15:59 ET on Monday a Friday expiration is 4 DTE, and it is still 4 DTE at
 * 00:01 ET on Monday.
 * formatToParts is DST-safe; toISOString()/toLocaleDateString() are not used.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface MarketClockParts {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let fmt = formatterCache.get(timeZone);
    if (!fmt) {
        fmt = new Intl.DateTimeFormat('en-CA', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
            hourCycle: 'h23',
        });
        formatterCache.set(timeZone, fmt);
    }
    return fmt;
}

export function getMarketParts(instant: Date, timeZone: string): MarketClockParts {
    if (isNaN(instant.getTime())) throw new Error('[market-time] Invalid Date input');

    const map: Record<string, string> = {};
    for (const p of formatterFor(timeZone).formatToParts(instant)) map[p.type] = p.value;

    return {
        year: Number(map.year),
        month: Number(map.month),
        day: Number(map.day),
        hour: Number(map.hour ?? '0'),
        minute: Number(map.minute ?? '0'),
        second: Number(map.second ?? '0'),
    };
}

/** Market calendar day as "YYYY-MM-DD". */
export function marketDay(instant: Date, timeZone: string): string {
    const p = getMarketParts(instant, timeZone);
    const yyyy = String(p.year).padStart(4, '0');
    const mm = String(p.month).padStart(2, '0');
    const dd = String(p.day).padStart(2, '0');
    return `${yyyy}-${mm}-${dd}`;
}

/** Seconds since local midnight in the market timezone. */
export function marketSecondsOfDay(instant: Date, timeZone: string): number {
    const p = getMarketParts(instant, timeZone);
    return p.hour * 3600 + p.minute * 60 + p.second;
}

/** "HH:MM" → seconds since midnight. */
export function parseTimeOfDay(value: string): number {
    const match = /^(\d{1,2}):(\d{2})$/.exec(value);
    if (!match) throw new Error(`[market-time] Invalid time of day "${value}"`);
    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (hour > 23 || minute > 59) throw new Error(`[market-time] Invalid time of day "${value}"`);
    return hour * 3600 + minute * 60;
}

/**
 * Inclusive window check on market-local time of day.
 * With an 11:00 end, 11:00:00 is inside and 11:00:01 is not.
 */
export function isInEntryWindow(
    instant: Date,
    timeZone: string,
    windowStart: string,
    windowEnd: string
): boolean {
    const now = marketSecondsOfDay(instant, timeZone);
    return parseTimeOfDay(windowStart) <= now && now <= parseTimeOfDay(windowEnd);
}

/**
 * Parse a broker expiration code. Accepts YYYYMMDD (chain form) and YYYY-MM-DD.
 * @throws Error on malformed or impossible dates
 */
export function parseExpiration(code: string): { year: number; month: number; day: number } {
    const match = /^(\d{4})-?(\d{2})-?(\d{2})$/.exec(code.trim());
    if (!match) throw new Error(`Invalid expiration format: ${code}`);

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const check = new Date(Date.UTC(year, month - 1, day));
    if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
        throw new Error(`Invalid expiration date: ${code}`);
    }
    return { year, month, day };
}

/** Integer calendar days from the market-local date of `instant` to the expiration date. */
export function daysToExpiration(expiration: string, instant: Date, timeZone: string): number {
    const exp = parseExpiration(expiration);
    const today = getMarketParts(instant, timeZone);
    const expUtc = Date.UTC(exp.year, exp.month - 1, exp.day);
    const todayUtc = Date.UTC(today.year, today.month - 1, today.day);
    return Math.round((expUtc - todayUtc) / MS_PER_DAY);
}
