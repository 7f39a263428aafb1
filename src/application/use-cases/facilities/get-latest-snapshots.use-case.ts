// Domain
import { type FacilitySnapshot } from '../../../domain/entities/facility-snapshot.entity.js';

// Ports
import { type FacilitySnapshotRepositoryPort } from '../../ports/outbound/persistence/facility-snapshot-repository.port.js';

/**
 * Latest capacity reading of each facility, most crowded first
 */
export class GetLatestSnapshotsUseCase {
    constructor(private readonly facilitySnapshotRepository: FacilitySnapshotRepositoryPort) {}

    async execute(): Promise<FacilitySnapshot[]> {
        const snapshots = await this.facilitySnapshotRepository.findLatestByFacility();

        return [...snapshots].sort(
            (left, right) => (right.occupancyRate ?? -1) - (left.occupancyRate ?? -1),
        );
    }
}
