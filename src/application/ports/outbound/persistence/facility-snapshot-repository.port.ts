// Domain
import { type FacilitySnapshot } from '../../../../domain/entities/facility-snapshot.entity.js';

/**
 * Facility snapshot repository port - stores capacity readings
 */
export interface FacilitySnapshotRepositoryPort {
    createMany(snapshots: FacilitySnapshot[]): Promise<number>;

    findAll(): Promise<FacilitySnapshot[]>;

    /**
     * Stored snapshots that could collide with candidates dated on the given days
     */
    findForDeduplication(params: { snapshotDates: string[] }): Promise<FacilitySnapshot[]>;

    /**
     * Most recent snapshot of every facility
     */
    findLatestByFacility(): Promise<FacilitySnapshot[]>;

    updateFacility(id: string, facility: string, region: string | undefined): Promise<void>;
}
