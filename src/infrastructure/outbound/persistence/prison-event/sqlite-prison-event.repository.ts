// Application
import {
    type EventCount,
    type EventCountDimension,
    type FindEventsCriteria,
    type PrisonEventRepositoryPort,
} from '../../../../application/ports/outbound/persistence/prison-event-repository.port.js';

// Domain
import { type PrisonEvent } from '../../../../domain/entities/prison-event.entity.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

import { type SqliteDatabase } from '../sqlite.database.js';

import { PrisonEventMapper } from './sqlite-prison-event.mapper.js';

const DIMENSION_COLUMNS: Record<EventCountDimension, string> = {
    eventType: 'event_type',
    facility: 'facility',
    region: 'region',
};

export class SqlitePrisonEventRepository implements PrisonEventRepositoryPort {
    private readonly mapper: PrisonEventMapper;

    constructor(
        private readonly database: SqliteDatabase,
        private readonly logger: LoggerPort,
    ) {
        this.mapper = new PrisonEventMapper();
    }

    async countBy(dimension: EventCountDimension): Promise<EventCount[]> {
        const column = DIMENSION_COLUMNS[dimension];
        const rows = this.database
            .getConnection()
            .prepare(
                `SELECT ${column} AS key, COUNT(*) AS count FROM prison_events
                 WHERE is_aggregate = 0
                 GROUP BY ${column}
                 ORDER BY count DESC, key`,
            )
            .all();

        return rows.map((row) => this.mapper.toCount(row));
    }

    async createMany(events: PrisonEvent[]): Promise<number> {
        if (events.length === 0) return 0;

        const connection = this.database.getConnection();
        const insert = connection.prepare(
            `INSERT OR IGNORE INTO prison_events
                (id, event_type, event_date, facility, region, count, description, source_url,
                 confidence, is_aggregate, extracted_at)
             VALUES
                (@id, @event_type, @event_date, @facility, @region, @count, @description,
                 @source_url, @confidence, @is_aggregate, @extracted_at)`,
        );

        const inserted = connection.transaction((rows: PrisonEvent[]) =>
            rows.reduce((total, event) => total + insert.run(this.mapper.toRow(event)).changes, 0),
        )(events);

        if (inserted < events.length) {
            this.logger.warn('Store rejected events already present', {
                rejected: events.length - inserted,
            });
        }

        return inserted;
    }

    async deleteMany(ids: string[]): Promise<number> {
        if (ids.length === 0) return 0;

        return this.database
            .getConnection()
            .prepare('DELETE FROM prison_events WHERE id IN (SELECT value FROM json_each(?))')
            .run(JSON.stringify(ids)).changes;
    }

    async find(criteria: FindEventsCriteria): Promise<PrisonEvent[]> {
        const conditions: string[] = [];
        const parameters: Record<string, number | string> = {};

        if (!criteria.includeAggregates) conditions.push('is_aggregate = 0');
        if (criteria.eventType) {
            conditions.push('event_type = @eventType');
            parameters.eventType = criteria.eventType;
        }
        if (criteria.facility) {
            conditions.push('facility = @facility');
            parameters.facility = criteria.facility;
        }
        if (criteria.region) {
            conditions.push('region = @region');
            parameters.region = criteria.region;
        }
        parameters.limit = criteria.limit ?? -1;

        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        const rows = this.database
            .getConnection()
            .prepare(
                `SELECT * FROM prison_events ${where}
                 ORDER BY event_date IS NULL, event_date DESC, extracted_at DESC
                 LIMIT @limit`,
            )
            .all(parameters);

        return rows.map((row) => this.mapper.toDomain(row));
    }

    async findAll(): Promise<PrisonEvent[]> {
        const rows = this.database
            .getConnection()
            .prepare('SELECT * FROM prison_events ORDER BY event_date, facility, event_type, id')
            .all();

        return rows.map((row) => this.mapper.toDomain(row));
    }

    async findForDeduplication(params: {
        dates: string[];
        sourceUrls: string[];
    }): Promise<PrisonEvent[]> {
        const rows = this.database
            .getConnection()
            .prepare(
                `SELECT * FROM prison_events
                 WHERE event_date IN (SELECT value FROM json_each(@dates))
                    OR source_url IN (SELECT value FROM json_each(@sourceUrls))`,
            )
            .all({
                dates: JSON.stringify(params.dates),
                sourceUrls: JSON.stringify(params.sourceUrls),
            });

        return rows.map((row) => this.mapper.toDomain(row));
    }

    async markAsAggregate(ids: string[]): Promise<number> {
        if (ids.length === 0) return 0;

        return this.database
            .getConnection()
            .prepare(
                `UPDATE prison_events SET is_aggregate = 1
                 WHERE is_aggregate = 0 AND id IN (SELECT value FROM json_each(?))`,
            )
            .run(JSON.stringify(ids)).changes;
    }

    async updateFacility(
        id: string,
        facility: string | undefined,
        region: string | undefined,
    ): Promise<void> {
        const result = this.database
            .getConnection()
            .prepare('UPDATE prison_events SET facility = ?, region = ? WHERE id = ?')
            .run(facility ?? null, region ?? null, id);

        if (result.changes === 0) {
            throw new Error(`Prison event not found: ${id}`);
        }
    }
}
