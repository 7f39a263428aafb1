import { z } from 'zod/v4';

// Domain
import { PrisonEvent } from '../../../../domain/entities/prison-event.entity.js';

const prisonEventRowSchema = z.object({
    confidence: z.number(),
    count: z.number().nullable(),
    description: z.string(),
    event_date: z.string().nullable(),
    event_type: z.string(),
    extracted_at: z.string(),
    facility: z.string().nullable(),
    id: z.string(),
    is_aggregate: z.number(),
    region: z.string().nullable(),
    source_url: z.string(),
});

export type PrisonEventRow = z.infer<typeof prisonEventRowSchema>;

const eventCountRowSchema = z.object({
    count: z.number(),
    key: z.string().nullable(),
});

export class PrisonEventMapper {
    toCount(row: unknown): z.infer<typeof eventCountRowSchema> {
        return eventCountRowSchema.parse(row);
    }

    toDomain(row: unknown): PrisonEvent {
        const data = prisonEventRowSchema.parse(row);

        return new PrisonEvent({
            confidence: data.confidence,
            count: data.count ?? undefined,
            description: data.description,
            eventDate: data.event_date ?? undefined,
            eventType: data.event_type,
            extractedAt: new Date(data.extracted_at),
            facility: data.facility ?? undefined,
            id: data.id,
            isAggregate: data.is_aggregate === 1,
            region: data.region ?? undefined,
            sourceUrl: data.source_url,
        });
    }

    toRow(event: PrisonEvent): PrisonEventRow {
        return {
            confidence: event.confidence,
            count: event.count ?? null,
            description: event.description,
            event_date: event.eventDate ?? null,
            event_type: event.eventType,
            extracted_at: event.extractedAt.toISOString(),
            facility: event.facility ?? null,
            id: event.id,
            is_aggregate: event.isAggregate ? 1 : 0,
            region: event.region ?? null,
            source_url: event.sourceUrl,
        };
    }
}
