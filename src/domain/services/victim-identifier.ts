const PERSON_REFERENCE =
    '(?:[Dd]etenut[oa]|[Rr]eclus[oa]|[Rr]agazz[oa]|[Gg]iovane|[Uu]omo|[Dd]onna|[Ss]ignor[ae]?|[Ii]nmate|[Pp]risoner)';
const OPTIONAL_AGE = '(?:\\s+di\\s+\\d{1,3}\\s+anni)?';
const CAPITALIZED_NAME = "(\\p{Lu}[\\p{Ll}'’]+(?:\\s+\\p{Lu}[\\p{Ll}'’]+){0,2})";

const NAMED_PERSON_PATTERN = new RegExp(
    `(?<!\\p{L})${PERSON_REFERENCE}${OPTIONAL_AGE},?\\s+${CAPITALIZED_NAME}`,
    'u',
);

const AGE_PATTERNS: RegExp[] = [
    /\b(\d{1,3})\s+anni\b/i,
    /\b(\d{1,3})[-\s]?enne\b/i,
    /\baged\s+(\d{1,3})\b/i,
    /\b(\d{1,3})-year-old\b/i,
];

export type VictimCandidate = {
    description: string;
    eventDate?: string;
    facility?: string;
};

export function extractVictimName(description: string): null | string {
    const match = NAMED_PERSON_PATTERN.exec(description);
    return match?.[1] ?? null;
}

export function extractVictimAge(description: string): null | number {
    for (const pattern of AGE_PATTERNS) {
        const match = pattern.exec(description);
        if (match?.[1]) return Number(match[1]);
    }

    return null;
}

/**
 * Best-effort identity of the person a fatality report is about.
 *
 * A person reference followed by a capitalized name identifies the victim by name
 * (plus age when one is given). Without a name, the date, facility and age are used
 * instead. Returns null when neither is available. Distinct people sharing a name and
 * age, or an unnamed incident on the same day in the same facility, collapse together;
 * differently phrased reports of one death may not.
 */
export function identifyVictim(candidate: VictimCandidate): null | string {
    const name = extractVictimName(candidate.description);
    const age = extractVictimAge(candidate.description);

    if (name) {
        return age === null ? `name:${name.toLowerCase()}` : `name:${name.toLowerCase()}|${age}`;
    }

    if (candidate.eventDate && candidate.facility) {
        return `incident:${candidate.eventDate}|${candidate.facility.toLowerCase()}|${age ?? '?'}`;
    }

    return null;
}
