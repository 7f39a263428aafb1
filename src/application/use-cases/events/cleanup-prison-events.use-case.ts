// Domain
import { type PrisonEvent } from '../../../domain/entities/prison-event.entity.js';
import { isAggregateReport } from '../../../domain/services/aggregate-classifier.js';
import { type FacilityNormalizer } from '../../../domain/services/facility-normalizer.js';
import { identifyVictim } from '../../../domain/services/victim-identifier.js';

// Shared
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type PrisonEventRepositoryPort } from '../../ports/outbound/persistence/prison-event-repository.port.js';

const FATALITY_EVENT_TYPES = new Set(['death', 'suicide']);
const MAX_SAMPLE_DUPLICATES = 5;

export type DuplicateSample = {
    keepId: string;
    key: string;
    removeIds: string[];
};

export type CleanupReport = {
    afterCount: number;
    aggregatesMarked: number;
    beforeCount: number;
    dryRun: boolean;
    duplicatesRemoved: number;
    sampleDuplicates: DuplicateSample[];
    victimDuplicatesRemoved: number;
};

/**
 * Use case for repairing the stored incident table
 * @description Flags statistical roll-ups stored as incidents, then removes reports of
 * the same incident, keeping the most detailed description of each group. Fatalities
 * naming the same victim are then collapsed onto the earliest extracted report.
 */
export class CleanupPrisonEventsUseCase {
    constructor(
        private readonly facilityNormalizer: FacilityNormalizer,
        private readonly logger: LoggerPort,
        private readonly prisonEventRepository: PrisonEventRepositoryPort,
    ) {}

    public async execute(options: { dryRun: boolean }): Promise<CleanupReport> {
        const { dryRun } = options;

        try {
            this.logger.info('Starting prison event cleanup', { dryRun });

            const events = await this.prisonEventRepository.findAll();

            // Step 1: Flag roll-ups not marked yet
            const aggregateIds = new Set(
                events
                    .filter(
                        (event) =>
                            !event.isAggregate &&
                            isAggregateReport({
                                count: event.count,
                                description: event.description,
                                eventDate: event.eventDate,
                                facility: event.facility,
                            }),
                    )
                    .map((event) => event.id),
            );
            const incidents = events.filter(
                (event) => !event.isAggregate && !aggregateIds.has(event.id),
            );

            // Step 2: Same day, same facility, same type
            const sameIncidentGroups = groupBy(incidents, (event) => {
                const facility = this.canonicalFacility(event);
                if (!event.eventDate || !facility) return null;
                return `${event.eventDate}|${facility}|${event.eventType}`;
            });
            const samples: DuplicateSample[] = [];
            const removeIds = collectDuplicates(sameIncidentGroups, samples, byLongestDescription);

            // Step 3: Same victim across reports worded differently
            const fatalities = incidents.filter(
                (event) =>
                    FATALITY_EVENT_TYPES.has(event.eventType) &&
                    !removeIds.has(event.id) &&
                    (event.count ?? 1) <= 1,
            );
            const victimGroups = groupBy(fatalities, (event) =>
                identifyVictim({
                    description: event.description,
                    eventDate: event.eventDate,
                    facility: this.canonicalFacility(event),
                }),
            );
            const victimRemoveIds = collectDuplicates(victimGroups, samples, byEarliestExtraction);

            const toRemove = [...removeIds, ...victimRemoveIds];
            const report: CleanupReport = {
                afterCount: events.length - toRemove.length,
                aggregatesMarked: aggregateIds.size,
                beforeCount: events.length,
                dryRun,
                duplicatesRemoved: toRemove.length,
                sampleDuplicates: samples.slice(0, MAX_SAMPLE_DUPLICATES),
                victimDuplicatesRemoved: victimRemoveIds.size,
            };

            if (dryRun) {
                this.logger.info('Prison event cleanup dry run completed', { ...report });
                return report;
            }

            // Step 4: Apply
            if (aggregateIds.size > 0) {
                await this.prisonEventRepository.markAsAggregate([...aggregateIds]);
            }
            if (toRemove.length > 0) {
                await this.prisonEventRepository.deleteMany(toRemove);
            }

            this.logger.info('Prison event cleanup completed', { ...report });

            return report;
        } catch (error) {
            this.logger.error('Prison event cleanup encountered an error', { error });
            throw error;
        }
    }

    private canonicalFacility(event: PrisonEvent): string | undefined {
        if (!event.facility) return undefined;
        return this.facilityNormalizer.normalize(event.facility) ?? event.facility;
    }
}

type KeepOrder = (left: PrisonEvent, right: PrisonEvent) => number;

const byLongestDescription: KeepOrder = (left, right) =>
    right.description.length - left.description.length ||
    left.extractedAt.getTime() - right.extractedAt.getTime();

const byEarliestExtraction: KeepOrder = (left, right) =>
    left.extractedAt.getTime() - right.extractedAt.getTime();

function groupBy(
    events: PrisonEvent[],
    keyOf: (event: PrisonEvent) => null | string,
): Map<string, PrisonEvent[]> {
    const groups = new Map<string, PrisonEvent[]>();

    for (const event of events) {
        const key = keyOf(event);
        if (key === null) continue;
        groups.set(key, [...(groups.get(key) ?? []), event]);
    }

    return groups;
}

/**
 * Keeps the first event of each group under `keepOrder`; ties keep the stored order
 */
function collectDuplicates(
    groups: Map<string, PrisonEvent[]>,
    samples: DuplicateSample[],
    keepOrder: KeepOrder,
): Set<string> {
    const removeIds = new Set<string>();

    for (const [key, group] of groups) {
        if (group.length < 2) continue;

        const [keep, ...remove] = [...group].sort(keepOrder);
        if (!keep) continue;

        remove.forEach((event) => removeIds.add(event.id));
        samples.push({ keepId: keep.id, key, removeIds: remove.map((event) => event.id) });
    }

    return removeIds;
}
