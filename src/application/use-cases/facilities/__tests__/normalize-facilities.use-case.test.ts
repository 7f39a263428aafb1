import { beforeEach, describe, expect, test } from 'vitest';
import { type DeepMockProxy, mock } from 'vitest-mock-extended';

// Domain
import { getMockFacilitySnapshot } from '../../../../domain/entities/__mocks__/facility-snapshots.mock.js';
import { getMockPrisonEvent } from '../../../../domain/entities/__mocks__/prison-events.mock.js';
import { mockOfFacilityDirectory } from '../../../../domain/services/__mocks__/facility-directory.mock.js';
import { FacilityNormalizer } from '../../../../domain/services/facility-normalizer.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Ports
import { type FacilitySnapshotRepositoryPort } from '../../../ports/outbound/persistence/facility-snapshot-repository.port.js';
import { type PrisonEventRepositoryPort } from '../../../ports/outbound/persistence/prison-event-repository.port.js';

import { NormalizeFacilitiesUseCase } from '../normalize-facilities.use-case.js';

const id = (suffix: number): string => `00000000-0000-4000-8000-00000000000${suffix}`;

describe('NormalizeFacilitiesUseCase', () => {
    let useCase: NormalizeFacilitiesUseCase;
    let mockFacilitySnapshotRepository: DeepMockProxy<FacilitySnapshotRepositoryPort>;
    let mockLogger: DeepMockProxy<LoggerPort>;
    let mockPrisonEventRepository: DeepMockProxy<PrisonEventRepositoryPort>;

    beforeEach(() => {
        mockFacilitySnapshotRepository = mock<FacilitySnapshotRepositoryPort>();
        mockLogger = mock<LoggerPort>();
        mockPrisonEventRepository = mock<PrisonEventRepositoryPort>();

        mockPrisonEventRepository.findAll.mockResolvedValue([
            getMockPrisonEvent({ facility: 'Brescia Canton Mombello', id: id(1) }),
            getMockPrisonEvent({ id: id(2) }),
            getMockPrisonEvent({ facility: 'Cremona', id: id(3), region: undefined }),
            getMockPrisonEvent({ facility: undefined, id: id(4), region: undefined }),
        ]);
        mockFacilitySnapshotRepository.findAll.mockResolvedValue([
            getMockFacilitySnapshot({
                facility: 'casa circondariale di asti',
                id: id(5),
                region: undefined,
            }),
        ]);
        mockPrisonEventRepository.updateFacility.mockResolvedValue(undefined);
        mockFacilitySnapshotRepository.updateFacility.mockResolvedValue(undefined);

        useCase = new NormalizeFacilitiesUseCase(
            new FacilityNormalizer(mockOfFacilityDirectory()),
            mockFacilitySnapshotRepository,
            mockLogger,
            mockPrisonEventRepository,
        );
    });

    describe('execute', () => {
        test('should count the rows to rewrite without writing on a dry run', async () => {
            // When
            const report = await useCase.execute({ dryRun: true });

            // Then
            expect(report).toEqual({
                dryRun: true,
                events: { checked: 3, failed: 0, updated: 2 },
                snapshots: { checked: 1, failed: 0, updated: 1 },
            });
            expect(mockPrisonEventRepository.updateFacility).not.toHaveBeenCalled();
            expect(mockFacilitySnapshotRepository.updateFacility).not.toHaveBeenCalled();
        });

        test('should rewrite names and fill in missing regions', async () => {
            // When
            await useCase.execute({ dryRun: false });

            // Then
            expect(mockPrisonEventRepository.updateFacility).toHaveBeenCalledWith(
                id(1),
                'Canton Mombello (Brescia)',
                'Lombardia',
            );
            expect(mockPrisonEventRepository.updateFacility).toHaveBeenCalledWith(
                id(3),
                'Cremona',
                'Lombardia',
            );
            expect(mockPrisonEventRepository.updateFacility).toHaveBeenCalledTimes(2);
            expect(mockFacilitySnapshotRepository.updateFacility).toHaveBeenCalledWith(
                id(5),
                'Asti',
                'Piemonte',
            );
        });

        test('should carry on past a row that cannot be rewritten', async () => {
            // Given
            mockPrisonEventRepository.updateFacility.mockRejectedValueOnce(
                new Error('UNIQUE constraint failed'),
            );

            // When
            const report = await useCase.execute({ dryRun: false });

            // Then
            expect(report.events).toEqual({ checked: 3, failed: 1, updated: 1 });
            expect(report.snapshots).toEqual({ checked: 1, failed: 0, updated: 1 });
            expect(mockLogger.warn).toHaveBeenCalledWith('Failed to rewrite facility', {
                error: expect.any(Error),
                id: id(1),
                table: 'events',
            });
        });
    });
});
