// Domain
import { type FacilitySnapshot } from '../entities/facility-snapshot.entity.js';
import { type PrisonEvent } from '../entities/prison-event.entity.js';

import { type FacilityNormalizer } from './facility-normalizer.js';

export type EventCandidate = Pick<
    PrisonEvent,
    'eventDate' | 'eventType' | 'facility' | 'isAggregate' | 'sourceUrl'
>;

export type SnapshotCandidate = Pick<FacilitySnapshot, 'facility' | 'snapshotDate' | 'sourceUrl'>;

/**
 * Decides whether an extracted record describes something already stored.
 * Candidates are expected to carry an already normalized facility; stored records
 * are normalized again so rows written before a table change still compare.
 */
export class EventDeduplicator {
    constructor(private readonly normalizer: FacilityNormalizer) {}

    /**
     * Exact match on (source, type, date, facility), or the same incident reported
     * by another source: same type, date and normalized facility. The cross-source
     * check needs both a date and a facility, and never pairs an aggregate with an
     * individual incident.
     */
    isDuplicateEvent(candidate: EventCandidate, existing: readonly EventCandidate[]): boolean {
        return existing.some((stored) => {
            const storedFacility = this.normalizer.normalize(stored.facility) ?? undefined;

            if (stored.eventType !== candidate.eventType) return false;
            if (stored.eventDate !== candidate.eventDate) return false;
            if (storedFacility !== candidate.facility) return false;

            if (stored.sourceUrl === candidate.sourceUrl) return true;

            return (
                candidate.eventDate !== undefined &&
                candidate.facility !== undefined &&
                stored.isAggregate === candidate.isAggregate
            );
        });
    }

    isDuplicateSnapshot(
        candidate: SnapshotCandidate,
        existing: readonly SnapshotCandidate[],
    ): boolean {
        return existing.some(
            (stored) =>
                stored.snapshotDate === candidate.snapshotDate &&
                stored.sourceUrl === candidate.sourceUrl &&
                (this.normalizer.normalize(stored.facility) ?? stored.facility) ===
                    candidate.facility,
        );
    }
}
