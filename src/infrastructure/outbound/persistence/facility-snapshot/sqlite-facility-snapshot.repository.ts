// Application
import { type FacilitySnapshotRepositoryPort } from '../../../../application/ports/outbound/persistence/facility-snapshot-repository.port.js';

// Domain
import { type FacilitySnapshot } from '../../../../domain/entities/facility-snapshot.entity.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

import { type SqliteDatabase } from '../sqlite.database.js';

import { FacilitySnapshotMapper } from './sqlite-facility-snapshot.mapper.js';

export class SqliteFacilitySnapshotRepository implements FacilitySnapshotRepositoryPort {
    private readonly mapper: FacilitySnapshotMapper;

    constructor(
        private readonly database: SqliteDatabase,
        private readonly logger: LoggerPort,
    ) {
        this.mapper = new FacilitySnapshotMapper();
    }

    async createMany(snapshots: FacilitySnapshot[]): Promise<number> {
        if (snapshots.length === 0) return 0;

        const connection = this.database.getConnection();
        const insert = connection.prepare(
            `INSERT OR IGNORE INTO facility_snapshots
                (id, facility, region, capacity, inmates, occupancy_rate, snapshot_date,
                 source_url, extracted_at)
             VALUES
                (@id, @facility, @region, @capacity, @inmates, @occupancy_rate, @snapshot_date,
                 @source_url, @extracted_at)`,
        );

        const inserted = connection.transaction((rows: FacilitySnapshot[]) =>
            rows.reduce(
                (total, snapshot) => total + insert.run(this.mapper.toRow(snapshot)).changes,
                0,
            ),
        )(snapshots);

        if (inserted < snapshots.length) {
            this.logger.warn('Store rejected snapshots already present', {
                rejected: snapshots.length - inserted,
            });
        }

        return inserted;
    }

    async findAll(): Promise<FacilitySnapshot[]> {
        const rows = this.database
            .getConnection()
            .prepare('SELECT * FROM facility_snapshots ORDER BY snapshot_date, facility, id')
            .all();

        return rows.map((row) => this.mapper.toDomain(row));
    }

    async findForDeduplication(params: { snapshotDates: string[] }): Promise<FacilitySnapshot[]> {
        const rows = this.database
            .getConnection()
            .prepare(
                `SELECT * FROM facility_snapshots
                 WHERE snapshot_date IN (SELECT value FROM json_each(?))`,
            )
            .all(JSON.stringify(params.snapshotDates));

        return rows.map((row) => this.mapper.toDomain(row));
    }

    async findLatestByFacility(): Promise<FacilitySnapshot[]> {
        const rows = this.database
            .getConnection()
            .prepare(
                `SELECT id, facility, region, capacity, inmates, occupancy_rate, snapshot_date,
                        source_url, extracted_at
                 FROM (
                    SELECT *, ROW_NUMBER() OVER (
                        PARTITION BY facility
                        ORDER BY snapshot_date DESC, extracted_at DESC
                    ) AS position
                    FROM facility_snapshots
                 )
                 WHERE position = 1
                 ORDER BY facility`,
            )
            .all();

        return rows.map((row) => this.mapper.toDomain(row));
    }

    async updateFacility(id: string, facility: string, region: string | undefined): Promise<void> {
        const result = this.database
            .getConnection()
            .prepare('UPDATE facility_snapshots SET facility = ?, region = ? WHERE id = ?')
            .run(facility, region ?? null, id);

        if (result.changes === 0) {
            throw new Error(`Facility snapshot not found: ${id}`);
        }
    }
}
