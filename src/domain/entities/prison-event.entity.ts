import { z } from 'zod/v4';

import { calendarDateSchema } from '../value-objects/calendar-date.vo.js';

export const prisonEventSchema = z.object({
    confidence: z.number().min(0).max(1).describe('Extractor confidence in the record'),
    count: z.number().int().min(0).optional().describe('Magnitude, e.g. number of people involved'),
    description: z.string(),
    eventDate: calendarDateSchema.optional(),
    eventType: z.string().trim().min(1).describe('Incident category such as suicide or protest'),
    extractedAt: z.date(),
    facility: z.string().min(1).optional().describe('Canonical facility name'),
    id: z.uuid(),
    isAggregate: z.boolean().describe('Statistical roll-up rather than a single incident'),
    region: z.string().min(1).optional(),
    sourceUrl: z.string().min(1),
});

export type PrisonEventProps = z.input<typeof prisonEventSchema>;

/**
 * @description A discrete incident extracted from an article
 */
export class PrisonEvent {
    public readonly confidence: number;
    public readonly count?: number;
    public readonly description: string;
    public readonly eventDate?: string;
    public readonly eventType: string;
    public readonly extractedAt: Date;
    public readonly facility?: string;
    public readonly id: string;
    public readonly isAggregate: boolean;
    public readonly region?: string;
    public readonly sourceUrl: string;

    public constructor(data: PrisonEventProps) {
        const result = prisonEventSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid prison event data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.id = validatedData.id;
        this.eventType = validatedData.eventType;
        this.eventDate = validatedData.eventDate;
        this.facility = validatedData.facility;
        this.region = validatedData.region;
        this.count = validatedData.count;
        this.description = validatedData.description;
        this.sourceUrl = validatedData.sourceUrl;
        this.confidence = validatedData.confidence;
        this.isAggregate = validatedData.isAggregate;
        this.extractedAt = validatedData.extractedAt;
    }

    public asAggregate(): PrisonEvent {
        return new PrisonEvent({ ...this.toProps(), isAggregate: true });
    }

    public withFacility(facility: string | undefined, region: string | undefined): PrisonEvent {
        return new PrisonEvent({ ...this.toProps(), facility, region });
    }

    private toProps(): PrisonEventProps {
        return {
            confidence: this.confidence,
            count: this.count,
            description: this.description,
            eventDate: this.eventDate,
            eventType: this.eventType,
            extractedAt: this.extractedAt,
            facility: this.facility,
            id: this.id,
            isAggregate: this.isAggregate,
            region: this.region,
            sourceUrl: this.sourceUrl,
        };
    }
}
