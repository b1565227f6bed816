/**
 * Date Parsing Utilities
 */

import { ONE_DAY_MS, TIMESTAMP_REGEX } from './constants';

// ============================================================================
// TRANSCRIPT TIMESTAMPS
// ============================================================================

/**
 * Expands a two digit year the way "%y" does: 69-99 are 19xx, 00-68 are 20xx
 */
export function expandTwoDigitYear(year: number): number {
    return year >= 69 ? 1900 + year : 2000 + year;
}

/**
 * Parses "M/D/YY, H:MM" (24h, zero padding optional). Transcript times carry no
 * zone, so the wall-clock fields are stored as UTC and read back with the UTC getters.
 * Returns undefined for anything outside the fixed layout or calendar.
 */
export function parseTimestamp(stamp: string): Date | undefined {
    const match = TIMESTAMP_REGEX.exec(stamp);
    if (!match) {
        return undefined;
    }

    const [, monthStr, dayStr, yearStr, hourStr, minuteStr] = match;
    const month = parseInt(monthStr, 10);
    const day = parseInt(dayStr, 10);
    const year = expandTwoDigitYear(parseInt(yearStr, 10));
    const hour = parseInt(hourStr, 10);
    const minute = parseInt(minuteStr, 10);

    if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59) {
        return undefined;
    }

    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, 0, 0));

    // Reject rollover such as 2/30 becoming 3/2
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return undefined;
    }

    return date;
}

// ============================================================================
// BUCKET KEYS
// ============================================================================

/**
 * Calendar date of a transcript timestamp as "YYYY-MM-DD"
 */
export function toDayKey(date: Date): string {
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${date.getUTCFullYear()}-${month}-${day}`;
}

/**
 * Hour of day (0-23) of a transcript timestamp
 */
export function toHourKey(date: Date): number {
    return date.getUTCHours();
}

function dayKeyToUtc(key: string): number {
    const [year, month, day] = key.split('-').map(part => parseInt(part, 10));
    return Date.UTC(year, month - 1, day);
}

/**
 * Whole days from `from` to `to`; negative when `to` is earlier
 */
export function daysBetween(from: string, to: string): number {
    return Math.round((dayKeyToUtc(to) - dayKeyToUtc(from)) / ONE_DAY_MS);
}
