import { isNewYearsDay } from '../../shared/date/calendar-date.js';

const AGGREGATE_COUNT_THRESHOLD = 3;

const ROUNDUP_PATTERNS: RegExp[] = [
    /dall['’]inizio dell['’]anno/i,
    /dall['’]inizio del \d{4}/i,
    /da inizio anno/i,
    /nel corso del(l['’]anno| \d{4})/i,
    /(?<!\p{L})(sono|è) (salit[oi]|arrivat[oi]) a \d+/iu,
    /\b(in|il) totale\b/i,
    /\btotale (di|dei|delle)\b/i,
    /\bcomplessivamente\b/i,
    /\bin tutto (il \d{4}|l['’]anno|\d+)/i,
    /\bdati annuali\b/i,
    /\bbilancio (annuale|del \d{4})\b/i,
    /\bsu base annua\b/i,
    /\byear[- ]to[- ]date\b/i,
    /\bso far this year\b/i,
    /\bcumulative\b/i,
    /\bannual (total|tally|figures)\b/i,
];

export type AggregateCandidate = {
    count?: number;
    description: string;
    eventDate?: string;
    facility?: string;
    flaggedAsAggregate?: boolean;
};

export function describesStatisticalRoundup(description: string): boolean {
    return ROUNDUP_PATTERNS.some((pattern) => pattern.test(description));
}

/**
 * Whether a record is a statistical roll-up rather than a single incident.
 *
 * True when the extractor flagged it, when the description reads like a tally,
 * when a count above three is dated on January 1st, or when a count above one
 * has no facility.
 */
export function isAggregateReport(candidate: AggregateCandidate): boolean {
    if (candidate.flaggedAsAggregate) return true;
    if (describesStatisticalRoundup(candidate.description)) return true;

    const count = candidate.count ?? 0;

    if (
        count > AGGREGATE_COUNT_THRESHOLD &&
        candidate.eventDate !== undefined &&
        isNewYearsDay(candidate.eventDate)
    ) {
        return true;
    }

    return candidate.facility === undefined && count > 1;
}
