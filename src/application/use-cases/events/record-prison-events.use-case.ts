import { randomUUID } from 'node:crypto';

// Domain
import { PrisonEvent } from '../../../domain/entities/prison-event.entity.js';
import { isAggregateReport } from '../../../domain/services/aggregate-classifier.js';
import { type EventDeduplicator } from '../../../domain/services/event-deduplicator.js';
import { type FacilityNormalizer } from '../../../domain/services/facility-normalizer.js';

// Shared
import { parseIsoDate } from '../../../shared/date/calendar-date.js';
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type PrisonEventRepositoryPort } from '../../ports/outbound/persistence/prison-event-repository.port.js';

import {
    eventExtractionSchema,
    eventRecordSchema,
    parseExtractionPayload,
    validateRecords,
} from '../collection/extraction-payloads.js';

export type EventRecordingCounters = {
    aggregates: number;
    duplicates: number;
    inserted: number;
    received: number;
    skipped: number;
};

/**
 * Use case for storing extracted incidents
 * @description Normalizes facilities, flags statistical roll-ups and drops records already stored
 */
export class RecordPrisonEventsUseCase {
    constructor(
        private readonly deduplicator: EventDeduplicator,
        private readonly facilityNormalizer: FacilityNormalizer,
        private readonly logger: LoggerPort,
        private readonly prisonEventRepository: PrisonEventRepositoryPort,
    ) {}

    /**
     * @param rawExtraction - Extractor output, parsed or as text
     * @param counters - Updated in place so partial progress survives a failure
     */
    public async execute(
        rawExtraction: unknown,
        counters: EventRecordingCounters = createEventRecordingCounters(),
    ): Promise<EventRecordingCounters> {
        const payload = eventExtractionSchema.parse(parseExtractionPayload(rawExtraction));
        const records = validateRecords(payload.events, eventRecordSchema, 'events', this.logger);

        counters.received = payload.events.length;
        counters.skipped = payload.events.length - records.length;

        const extractedAt = new Date();
        const candidates = records.map((record) => {
            const facility = this.facilityNormalizer.normalize(record.facility) ?? undefined;
            const eventDate = parseIsoDate(record.event_date) ?? undefined;

            if (record.event_date != null && eventDate === undefined) {
                this.logger.warn('Unparseable event date, storing event as undated', {
                    eventDate: String(record.event_date),
                    sourceUrl: record.source_url,
                });
            }

            return new PrisonEvent({
                confidence: record.confidence,
                count: record.count,
                description: record.description,
                eventDate,
                eventType: record.event_type,
                extractedAt,
                facility,
                id: randomUUID(),
                isAggregate: isAggregateReport({
                    count: record.count,
                    description: record.description,
                    eventDate,
                    facility,
                    flaggedAsAggregate: record.is_aggregate,
                }),
                region:
                    record.region ??
                    this.facilityNormalizer.regionOf(facility ?? record.facility) ??
                    undefined,
                sourceUrl: record.source_url,
            });
        });

        if (candidates.length === 0) {
            this.logger.info('No events to record', { received: counters.received });
            return counters;
        }

        const existing = await this.prisonEventRepository.findForDeduplication({
            dates: unique(candidates.map((event) => event.eventDate)),
            sourceUrls: unique(candidates.map((event) => event.sourceUrl)),
        });

        const accepted: PrisonEvent[] = [];

        for (const candidate of candidates) {
            if (this.deduplicator.isDuplicateEvent(candidate, [...existing, ...accepted])) {
                counters.duplicates++;
                this.logger.debug('Dropping duplicate event', {
                    eventDate: candidate.eventDate,
                    eventType: candidate.eventType,
                    facility: candidate.facility,
                    sourceUrl: candidate.sourceUrl,
                });
                continue;
            }

            accepted.push(candidate);
        }

        counters.aggregates = accepted.filter((event) => event.isAggregate).length;
        counters.inserted = await this.prisonEventRepository.createMany(accepted);

        this.logger.info('Prison events recorded', { ...counters });

        return counters;
    }
}

export function createEventRecordingCounters(): EventRecordingCounters {
    return { aggregates: 0, duplicates: 0, inserted: 0, received: 0, skipped: 0 };
}

function unique(values: Array<string | undefined>): string[] {
    return [...new Set(values.filter((value): value is string => value !== undefined))];
}
