// Domain
import { type FacilityNormalizer } from '../../../domain/services/facility-normalizer.js';

// Shared
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type FacilitySnapshotRepositoryPort } from '../../ports/outbound/persistence/facility-snapshot-repository.port.js';
import { type PrisonEventRepositoryPort } from '../../ports/outbound/persistence/prison-event-repository.port.js';

export type RenormalizationCounters = {
    checked: number;
    failed: number;
    updated: number;
};

export type RenormalizationReport = {
    dryRun: boolean;
    events: RenormalizationCounters;
    snapshots: RenormalizationCounters;
};

type StoredLocation = {
    facility?: string;
    id: string;
    region?: string;
};

type LocationChange = {
    facility: string;
    id: string;
    region: string | undefined;
};

/**
 * Use case for rewriting stored facility names after the facility table changed
 * @description Also fills in regions that were missing. Rows are updated one at a time and a
 * failing row does not stop the others.
 */
export class NormalizeFacilitiesUseCase {
    constructor(
        private readonly facilityNormalizer: FacilityNormalizer,
        private readonly facilitySnapshotRepository: FacilitySnapshotRepositoryPort,
        private readonly logger: LoggerPort,
        private readonly prisonEventRepository: PrisonEventRepositoryPort,
    ) {}

    public async execute(options: { dryRun: boolean }): Promise<RenormalizationReport> {
        const { dryRun } = options;

        try {
            this.logger.info('Starting facility re-normalization', { dryRun });

            const [events, snapshots] = await Promise.all([
                this.prisonEventRepository.findAll(),
                this.facilitySnapshotRepository.findAll(),
            ]);

            const report: RenormalizationReport = {
                dryRun,
                events: await this.apply('events', events, dryRun, (change) =>
                    this.prisonEventRepository.updateFacility(
                        change.id,
                        change.facility,
                        change.region,
                    ),
                ),
                snapshots: await this.apply('snapshots', snapshots, dryRun, (change) =>
                    this.facilitySnapshotRepository.updateFacility(
                        change.id,
                        change.facility,
                        change.region,
                    ),
                ),
            };

            this.logger.info('Facility re-normalization completed', {
                dryRun,
                events: report.events,
                snapshots: report.snapshots,
            });

            return report;
        } catch (error) {
            this.logger.error('Facility re-normalization encountered an error', { error });
            throw error;
        }
    }

    private async apply(
        table: string,
        rows: StoredLocation[],
        dryRun: boolean,
        update: (change: LocationChange) => Promise<void>,
    ): Promise<RenormalizationCounters> {
        const counters: RenormalizationCounters = { checked: 0, failed: 0, updated: 0 };

        for (const row of rows) {
            if (!row.facility) continue;
            counters.checked++;

            const change = this.planChange(row, row.facility);
            if (!change) continue;

            if (dryRun) {
                counters.updated++;
                this.logger.debug('Would rewrite facility', {
                    from: row.facility,
                    id: row.id,
                    table,
                    to: change.facility,
                });
                continue;
            }

            try {
                await update(change);
                counters.updated++;
            } catch (error) {
                counters.failed++;
                this.logger.warn('Failed to rewrite facility', { error, id: row.id, table });
            }
        }

        return counters;
    }

    private planChange(row: StoredLocation, facility: string): LocationChange | null {
        const normalized = this.facilityNormalizer.normalize(facility) ?? facility;
        const region = row.region ?? this.facilityNormalizer.regionOf(normalized) ?? undefined;

        if (normalized === facility && region === row.region) return null;

        return { facility: normalized, id: row.id, region };
    }
}
