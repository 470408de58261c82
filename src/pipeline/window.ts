/**
 * Work Windows
 *
 * A work window is the span of recordings a run covers. Guarded stages derive
 * their duplicate key from it, so the same window always yields the same key.
 */

import * as Logging from '../logging';
import type { WorkWindow } from '../stage/types';
import type { DuplicateGuardKey } from '../ledger/types';

const pad = (n: number) => n.toString().padStart(2, '0');

export const formatDate = (date: Date): string =>
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const startOfDay = (date: Date): Date =>
    new Date(date.getFullYear(), date.getMonth(), date.getDate(), 0, 0, 0, 0);

export const endOfDay = (date: Date): Date =>
    new Date(date.getFullYear(), date.getMonth(), date.getDate(), 23, 59, 59, 999);

export const dayWindow = (date: Date): WorkWindow => ({
    start: startOfDay(date),
    end: endOfDay(date),
});

/** Parses a YYYYMMDD integer into a local date, or null when it is not a real date */
export const parseDateInt = (value: number): Date | null => {
    if (!Number.isInteger(value) || value < 10000101 || value > 99991231) {
        return null;
    }
    const year = Math.floor(value / 10000);
    const month = Math.floor(value / 100) % 100;
    const day = value % 100;
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
        return null;
    }
    return date;
};

/**
 * Builds the window from a configured date range: none means the day of
 * `now`, one date means that day, two dates mean start through end (whole
 * days). An invalid range falls back to the day of `now`.
 */
export const fromDateRange = (range: number[], now: Date): WorkWindow => {
    const logger = Logging.getLogger();

    if (range.length === 0) {
        return dayWindow(now);
    }

    const start = parseDateInt(range[0]);
    const end = range.length >= 2 ? parseDateInt(range[1]) : start;
    if (!start || !end) {
        logger.warn('Invalid date range %j, falling back to %s', range, formatDate(now));
        return dayWindow(now);
    }
    if (end.getTime() < start.getTime()) {
        logger.warn('Date range %j ends before it starts, falling back to %s', range, formatDate(now));
        return dayWindow(now);
    }

    return { start: startOfDay(start), end: endOfDay(end) };
};

export const isSingleDay = (window: WorkWindow): boolean =>
    formatDate(window.start) === formatDate(window.end);

export const describeWindow = (window: WorkWindow): string =>
    isSingleDay(window)
        ? formatDate(window.start)
        : `${formatDate(window.start)} to ${formatDate(window.end)}`;

/** File-name friendly form of the window: `2026-10-19` or `2026-10-01..2026-10-19` */
export const label = (window: WorkWindow): string =>
    isSingleDay(window)
        ? formatDate(window.start)
        : `${formatDate(window.start)}..${formatDate(window.end)}`;

export const windowKey = (prefix: string, window: WorkWindow): DuplicateGuardKey =>
    `${prefix}:${label(window)}`;

export const contains = (window: WorkWindow, date: Date): boolean =>
    date.getTime() >= window.start.getTime() && date.getTime() <= window.end.getTime();
