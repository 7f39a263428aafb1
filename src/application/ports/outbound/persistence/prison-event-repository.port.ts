// Domain
import { type PrisonEvent } from '../../../../domain/entities/prison-event.entity.js';

export type FindEventsCriteria = {
    eventType?: string;
    facility?: string;
    includeAggregates?: boolean;
    limit?: number;
    region?: string;
};

export type EventCountDimension = 'eventType' | 'facility' | 'region';

export type EventCount = {
    count: number;
    key: null | string;
};

/**
 * Prison event repository port - stores extracted incidents
 */
export interface PrisonEventRepositoryPort {
    /**
     * Number of events grouped by one dimension, aggregates excluded
     */
    countBy(dimension: EventCountDimension): Promise<EventCount[]>;

    /**
     * Insert events; the store rejects a second row with the same composite key
     */
    createMany(events: PrisonEvent[]): Promise<number>;

    deleteMany(ids: string[]): Promise<number>;

    find(criteria: FindEventsCriteria): Promise<PrisonEvent[]>;

    findAll(): Promise<PrisonEvent[]>;

    /**
     * Stored events that could collide with candidates dated on the given days
     * or coming from the given sources
     */
    findForDeduplication(params: {
        dates: string[];
        sourceUrls: string[];
    }): Promise<PrisonEvent[]>;

    markAsAggregate(ids: string[]): Promise<number>;

    updateFacility(
        id: string,
        facility: string | undefined,
        region: string | undefined,
    ): Promise<void>;
}
