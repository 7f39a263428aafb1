import { describe, expect, test } from 'vitest';
import { mock } from 'vitest-mock-extended';

// Domain
import { getMockFacilitySnapshot } from '../../../../domain/entities/__mocks__/facility-snapshots.mock.js';

// Ports
import { type FacilitySnapshotRepositoryPort } from '../../../ports/outbound/persistence/facility-snapshot-repository.port.js';

import { GetLatestSnapshotsUseCase } from '../get-latest-snapshots.use-case.js';

describe('GetLatestSnapshotsUseCase', () => {
    test('should list the most crowded facilities first', async () => {
        // Given
        const mockFacilitySnapshotRepository = mock<FacilitySnapshotRepositoryPort>();
        mockFacilitySnapshotRepository.findLatestByFacility.mockResolvedValue([
            getMockFacilitySnapshot({ facility: 'Asti', occupancyRate: undefined }),
            getMockFacilitySnapshot({ facility: 'Poggioreale (Napoli)', occupancyRate: 175 }),
            getMockFacilitySnapshot(),
        ]);
        const useCase = new GetLatestSnapshotsUseCase(mockFacilitySnapshotRepository);

        // When
        const snapshots = await useCase.execute();

        // Then
        expect(snapshots.map((snapshot) => snapshot.facility)).toEqual([
            'Canton Mombello (Brescia)',
            'Poggioreale (Napoli)',
            'Asti',
        ]);
    });
});
