import { TZDate } from '@date-fns/tz';
import { differenceInCalendarDays, format, isValid, parseISO, subDays } from 'date-fns';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Parses a calendar date written as YYYY-MM-DD.
 * Returns null for anything else, including impossible dates like 2026-02-30.
 */
export function parseIsoDate(value: unknown): null | string {
    if (typeof value !== 'string') return null;

    const trimmed = value.trim();
    if (!ISO_DATE_PATTERN.test(trimmed)) return null;

    const parsed = parseISO(trimmed);
    if (!isValid(parsed) || format(parsed, ISO_DATE_FORMAT) !== trimmed) return null;

    return trimmed;
}

export function toIsoDate(date: Date): string {
    return format(date, ISO_DATE_FORMAT);
}

export function subtractDaysFromIsoDate(isoDate: string, days: number): string {
    return toIsoDate(subDays(parseISO(isoDate), days));
}

export function daysBetweenIsoDates(from: string, to: string): number {
    return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function isNewYearsDay(isoDate: string): boolean {
    return isoDate.endsWith('-01-01');
}

/**
 * Current calendar date as seen from the given IANA time zone
 */
export function todayIn(timeZone: string): string {
    return format(new TZDate(Date.now(), timeZone), ISO_DATE_FORMAT);
}
