import { z } from 'zod/v4';

import { calendarDateSchema } from '../value-objects/calendar-date.vo.js';

export const facilitySnapshotSchema = z.object({
    capacity: z.number().int().min(0).optional(),
    extractedAt: z.date(),
    facility: z.string().min(1).describe('Canonical facility name'),
    id: z.uuid(),
    inmates: z.number().int().min(0).optional(),
    occupancyRate: z.number().min(0).optional().describe('Inmates over capacity, as a percentage'),
    region: z.string().min(1).optional(),
    snapshotDate: calendarDateSchema,
    sourceUrl: z.string().min(1),
});

export type FacilitySnapshotProps = z.input<typeof facilitySnapshotSchema>;

/**
 * @description A point-in-time capacity reading for one facility
 */
export class FacilitySnapshot {
    public readonly capacity?: number;
    public readonly extractedAt: Date;
    public readonly facility: string;
    public readonly id: string;
    public readonly inmates?: number;
    public readonly occupancyRate?: number;
    public readonly region?: string;
    public readonly snapshotDate: string;
    public readonly sourceUrl: string;

    public constructor(data: FacilitySnapshotProps) {
        const result = facilitySnapshotSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid facility snapshot data: ${result.error.message}`);
        }

        this.id = result.data.id;
        this.facility = result.data.facility;
        this.region = result.data.region;
        this.snapshotDate = result.data.snapshotDate;
        this.inmates = result.data.inmates;
        this.capacity = result.data.capacity;
        this.occupancyRate = result.data.occupancyRate;
        this.sourceUrl = result.data.sourceUrl;
        this.extractedAt = result.data.extractedAt;
    }

    public withFacility(facility: string, region: string | undefined): FacilitySnapshot {
        return new FacilitySnapshot({
            capacity: this.capacity,
            extractedAt: this.extractedAt,
            facility,
            id: this.id,
            inmates: this.inmates,
            occupancyRate: this.occupancyRate,
            region,
            snapshotDate: this.snapshotDate,
            sourceUrl: this.sourceUrl,
        });
    }
}
