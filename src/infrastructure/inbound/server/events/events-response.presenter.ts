// Domain
import { type FacilitySnapshot } from '../../../../domain/entities/facility-snapshot.entity.js';
import { type PrisonEvent } from '../../../../domain/entities/prison-event.entity.js';

type EventResponse = {
    confidence: number;
    count: null | number;
    description: string;
    eventDate: null | string;
    eventType: string;
    facility: null | string;
    id: string;
    isAggregate: boolean;
    region: null | string;
    sourceUrl: string;
};

type SnapshotResponse = {
    capacity: null | number;
    facility: string;
    inmates: null | number;
    occupancyRate: null | number;
    region: null | string;
    snapshotDate: string;
    sourceUrl: string;
};

type HttpListResponse<T> = {
    items: T[];
    total: number;
};

/**
 * Formats incidents and capacity readings for the HTTP API.
 * Absent values are sent as null.
 */
export class EventsResponsePresenter {
    presentEvents(events: PrisonEvent[]): HttpListResponse<EventResponse> {
        return {
            items: events.map((event) => ({
                confidence: event.confidence,
                count: event.count ?? null,
                description: event.description,
                eventDate: event.eventDate ?? null,
                eventType: event.eventType,
                facility: event.facility ?? null,
                id: event.id,
                isAggregate: event.isAggregate,
                region: event.region ?? null,
                sourceUrl: event.sourceUrl,
            })),
            total: events.length,
        };
    }

    presentSnapshots(snapshots: FacilitySnapshot[]): HttpListResponse<SnapshotResponse> {
        return {
            items: snapshots.map((snapshot) => ({
                capacity: snapshot.capacity ?? null,
                facility: snapshot.facility,
                inmates: snapshot.inmates ?? null,
                occupancyRate: snapshot.occupancyRate ?? null,
                region: snapshot.region ?? null,
                snapshotDate: snapshot.snapshotDate,
                sourceUrl: snapshot.sourceUrl,
            })),
            total: snapshots.length,
        };
    }
}
