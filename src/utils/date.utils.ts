/**
 * Date and Time-of-Day Utilities
 */

import { format, getISODay, isValid, parse, startOfISOWeek } from 'date-fns';
import { RECORD_DATETIME_FORMAT, WEEK_KEY_FORMAT } from './constants';

// ============================================================================
// TIME OF DAY
// ============================================================================

const TIME_OF_DAY_REGEX = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parses "HH:MM" or "HH:MM:SS" into seconds since midnight.
 * Returns null for anything that is not a valid clock time.
 */
export function parseTimeOfDay(value: string): number | null {
    const match = TIME_OF_DAY_REGEX.exec(value.trim());
    if (!match) return null;

    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    const seconds = match[3] ? parseInt(match[3], 10) : 0;
    if (hours > 23 || minutes > 59 || seconds > 59) return null;

    return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Local time of day of a date, in (fractional) seconds since midnight
 */
export function secondsOfDay(date: Date): number {
    return date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds() + date.getMilliseconds() / 1000;
}

/**
 * Night-window predicate. A window whose start is after its end wraps past
 * midnight: a time is nocturnal unless strictly inside (end, start).
 * Otherwise it is nocturnal only strictly inside (start, end).
 */
export function isInNightWindow(date: Date, nightStartSec: number, nightEndSec: number): boolean {
    const t = secondsOfDay(date);
    if (nightStartSec < nightEndSec) {
        return nightStartSec < t && t < nightEndSec;
    }
    return !(nightEndSec < t && t < nightStartSec);
}

// ============================================================================
// CALENDAR KEYS
// ============================================================================

/**
 * ISO weekday, 1 = Monday ... 7 = Sunday
 */
export function isoWeekday(date: Date): number {
    return getISODay(date);
}

/**
 * Local date of the Monday starting the ISO week that contains the date
 */
export function weekKey(date: Date): string {
    return format(startOfISOWeek(date), WEEK_KEY_FORMAT);
}

/**
 * Local calendar day, e.g. "2014-03-02"
 */
export function dayKey(date: Date): string {
    return format(date, WEEK_KEY_FORMAT);
}

export function toEpochSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parses a record timestamp in "yyyy-MM-dd HH:mm:ss" local time
 */
export function parseRecordDatetime(value: string): Date | null {
    const parsed = parse(value.trim(), RECORD_DATETIME_FORMAT, new Date());
    return isValid(parsed) ? parsed : null;
}

/**
 * Formats a date the way record files write them
 */
export function formatRecordDatetime(date: Date): string {
    return format(date, RECORD_DATETIME_FORMAT);
}
