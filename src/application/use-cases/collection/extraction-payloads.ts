import { z } from 'zod/v4';

// Shared
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

const FENCED_PAYLOAD_PATTERN = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/;

const optionalText = z
    .string()
    .nullish()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const optionalCount = z
    .number()
    .int()
    .min(0)
    .nullish()
    .transform((value) => value ?? undefined);

const recordList = z.array(z.unknown()).nullish().transform((value) => value ?? []);

/**
 * Story extraction: updates to tracked stories and newly detected ones
 */
export const storyExtractionSchema = z.object({
    new_stories: recordList,
    updated_stories: recordList,
});

export const storyUpdateRecordSchema = z.object({
    article_urls: z.array(z.string().min(1)).nullish().transform((value) => value ?? []),
    id: z.string().min(1),
    impact_score: z
        .number()
        .min(0)
        .max(1)
        .nullish()
        .transform((value) => value ?? undefined),
    new_keywords: z.array(z.string()).nullish().transform((value) => value ?? []),
    new_summary: z.string(),
});

export const newStoryRecordSchema = z.object({
    article_urls: z.array(z.string().min(1)).nullish().transform((value) => value ?? []),
    impact_score: z
        .number()
        .min(0)
        .max(1)
        .nullish()
        .transform((value) => value ?? 0.5),
    keywords: z.array(z.string()).nullish().transform((value) => value ?? []),
    summary: z.string().nullish().transform((value) => value ?? ''),
    topic: optionalText.transform((value) => value ?? 'Unknown'),
});

/**
 * Character extraction: new stances of known figures and newly tracked figures
 */
export const characterExtractionSchema = z.object({
    new_characters: recordList,
    updated_characters: recordList,
});

const positionRecordSchema = z.object({
    source_url: optionalText,
    stance: z.string().trim().min(1),
});

export const characterUpdateRecordSchema = z.object({
    name: z.string().trim().min(1),
    new_position: positionRecordSchema,
});

export const newCharacterRecordSchema = z.object({
    aliases: z.array(z.string().trim().min(1)).nullish().transform((value) => value ?? []),
    initial_position: positionRecordSchema.nullish(),
    name: z.string().trim().min(1),
    role: z.string().nullish().transform((value) => value ?? ''),
});

/**
 * Follow-up extraction: upcoming events and deadlines
 */
export const followUpExtractionSchema = z.object({
    followups: recordList,
});

export const followUpRecordSchema = z.object({
    event: z.string().trim().min(1),
    expected_date: z.string(),
    source_url: optionalText,
    story_id: optionalText,
});

/**
 * Event extraction: discrete incidents
 */
export const eventExtractionSchema = z.object({
    events: recordList,
});

export const eventRecordSchema = z.object({
    confidence: z
        .number()
        .min(0)
        .max(1)
        .nullish()
        .transform((value) => value ?? 1),
    count: optionalCount,
    description: z.string().nullish().transform((value) => value ?? ''),
    event_date: z.unknown(),
    event_type: z.string().trim().min(1),
    facility: optionalText,
    is_aggregate: z.boolean().nullish().transform((value) => value ?? false),
    region: optionalText,
    source_url: z.string().trim().min(1),
});

/**
 * Snapshot extraction: capacity readings
 */
export const snapshotExtractionSchema = z.object({
    snapshots: recordList,
});

export const snapshotRecordSchema = z.object({
    capacity: optionalCount,
    facility: z.string().trim().min(1),
    inmates: optionalCount,
    occupancy_rate: z
        .number()
        .min(0)
        .nullish()
        .transform((value) => value ?? undefined),
    region: optionalText,
    snapshot_date: z.unknown(),
    source_url: z.string().trim().min(1),
});

/**
 * Turns raw extractor output into JSON. Text answers may be wrapped in a
 * markdown code fence; malformed JSON throws.
 */
export function parseExtractionPayload(raw: unknown): unknown {
    if (typeof raw !== 'string') return raw;

    const trimmed = raw.trim();
    const fenced = FENCED_PAYLOAD_PATTERN.exec(trimmed);

    return JSON.parse(fenced?.[1] ?? trimmed);
}

/**
 * Validates records one by one, dropping the malformed ones with a warning
 */
export function validateRecords<TSchema extends z.ZodType>(
    records: unknown[],
    schema: TSchema,
    category: string,
    logger: LoggerPort,
): Array<z.output<TSchema>> {
    const valid: Array<z.output<TSchema>> = [];

    records.forEach((record, index) => {
        const result = schema.safeParse(record);

        if (result.success) {
            valid.push(result.data);
            return;
        }

        logger.warn('Skipping malformed extraction record', {
            category,
            index,
            issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    });

    return valid;
}
