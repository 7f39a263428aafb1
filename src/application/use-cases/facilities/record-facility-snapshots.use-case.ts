import { randomUUID } from 'node:crypto';

// Domain
import { FacilitySnapshot } from '../../../domain/entities/facility-snapshot.entity.js';
import { type EventDeduplicator } from '../../../domain/services/event-deduplicator.js';
import { type FacilityNormalizer } from '../../../domain/services/facility-normalizer.js';

// Shared
import { parseIsoDate } from '../../../shared/date/calendar-date.js';
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type FacilitySnapshotRepositoryPort } from '../../ports/outbound/persistence/facility-snapshot-repository.port.js';

import {
    parseExtractionPayload,
    snapshotExtractionSchema,
    snapshotRecordSchema,
    validateRecords,
} from '../collection/extraction-payloads.js';

export type SnapshotRecordingCounters = {
    duplicates: number;
    inserted: number;
    received: number;
    skipped: number;
};

/**
 * Use case for storing facility capacity readings
 * @description Snapshots without a valid date are rejected rather than stored with a guessed one
 */
export class RecordFacilitySnapshotsUseCase {
    constructor(
        private readonly deduplicator: EventDeduplicator,
        private readonly facilityNormalizer: FacilityNormalizer,
        private readonly logger: LoggerPort,
        private readonly facilitySnapshotRepository: FacilitySnapshotRepositoryPort,
    ) {}

    public async execute(
        rawExtraction: unknown,
        counters: SnapshotRecordingCounters = createSnapshotRecordingCounters(),
    ): Promise<SnapshotRecordingCounters> {
        const payload = snapshotExtractionSchema.parse(parseExtractionPayload(rawExtraction));
        const records = validateRecords(
            payload.snapshots,
            snapshotRecordSchema,
            'snapshots',
            this.logger,
        );

        counters.received = payload.snapshots.length;
        counters.skipped = payload.snapshots.length - records.length;

        const extractedAt = new Date();
        const candidates: FacilitySnapshot[] = [];

        for (const record of records) {
            const snapshotDate = parseIsoDate(record.snapshot_date);

            if (!snapshotDate) {
                counters.skipped++;
                this.logger.warn('Skipping snapshot without a valid date', {
                    facility: record.facility,
                    sourceUrl: record.source_url,
                });
                continue;
            }

            const facility = this.facilityNormalizer.normalize(record.facility) ?? record.facility;

            candidates.push(
                new FacilitySnapshot({
                    capacity: record.capacity,
                    extractedAt,
                    facility,
                    id: randomUUID(),
                    inmates: record.inmates,
                    occupancyRate: record.occupancy_rate,
                    region: record.region ?? this.facilityNormalizer.regionOf(facility) ?? undefined,
                    snapshotDate,
                    sourceUrl: record.source_url,
                }),
            );
        }

        if (candidates.length === 0) {
            this.logger.info('No snapshots to record', { received: counters.received });
            return counters;
        }

        const existing = await this.facilitySnapshotRepository.findForDeduplication({
            snapshotDates: [...new Set(candidates.map((snapshot) => snapshot.snapshotDate))],
        });

        const accepted: FacilitySnapshot[] = [];

        for (const candidate of candidates) {
            if (this.deduplicator.isDuplicateSnapshot(candidate, [...existing, ...accepted])) {
                counters.duplicates++;
                continue;
            }

            accepted.push(candidate);
        }

        counters.inserted = await this.facilitySnapshotRepository.createMany(accepted);

        this.logger.info('Facility snapshots recorded', { ...counters });

        return counters;
    }
}

export function createSnapshotRecordingCounters(): SnapshotRecordingCounters {
    return { duplicates: 0, inserted: 0, received: 0, skipped: 0 };
}
