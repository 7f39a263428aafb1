import { z } from 'zod/v4';

// Domain
import { FacilitySnapshot } from '../../../../domain/entities/facility-snapshot.entity.js';

const facilitySnapshotRowSchema = z.object({
    capacity: z.number().nullable(),
    extracted_at: z.string(),
    facility: z.string(),
    id: z.string(),
    inmates: z.number().nullable(),
    occupancy_rate: z.number().nullable(),
    region: z.string().nullable(),
    snapshot_date: z.string(),
    source_url: z.string(),
});

export type FacilitySnapshotRow = z.infer<typeof facilitySnapshotRowSchema>;

export class FacilitySnapshotMapper {
    toDomain(row: unknown): FacilitySnapshot {
        const data = facilitySnapshotRowSchema.parse(row);

        return new FacilitySnapshot({
            capacity: data.capacity ?? undefined,
            extractedAt: new Date(data.extracted_at),
            facility: data.facility,
            id: data.id,
            inmates: data.inmates ?? undefined,
            occupancyRate: data.occupancy_rate ?? undefined,
            region: data.region ?? undefined,
            snapshotDate: data.snapshot_date,
            sourceUrl: data.source_url,
        });
    }

    toRow(snapshot: FacilitySnapshot): FacilitySnapshotRow {
        return {
            capacity: snapshot.capacity ?? null,
            extracted_at: snapshot.extractedAt.toISOString(),
            facility: snapshot.facility,
            id: snapshot.id,
            inmates: snapshot.inmates ?? null,
            occupancy_rate: snapshot.occupancyRate ?? null,
            region: snapshot.region ?? null,
            snapshot_date: snapshot.snapshotDate,
            source_url: snapshot.sourceUrl,
        };
    }
}
