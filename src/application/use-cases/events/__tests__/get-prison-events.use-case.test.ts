import { beforeEach, describe, expect, test } from 'vitest';
import { type DeepMockProxy, mock } from 'vitest-mock-extended';

// Domain
import { getMockPrisonEvent } from '../../../../domain/entities/__mocks__/prison-events.mock.js';
import { mockOfFacilityDirectory } from '../../../../domain/services/__mocks__/facility-directory.mock.js';
import { FacilityNormalizer } from '../../../../domain/services/facility-normalizer.js';

// Ports
import { type PrisonEventRepositoryPort } from '../../../ports/outbound/persistence/prison-event-repository.port.js';

import { GetEventStatisticsUseCase } from '../get-event-statistics.use-case.js';
import { GetPrisonEventsUseCase } from '../get-prison-events.use-case.js';

describe('GetPrisonEventsUseCase', () => {
    let useCase: GetPrisonEventsUseCase;
    let mockPrisonEventRepository: DeepMockProxy<PrisonEventRepositoryPort>;

    beforeEach(() => {
        mockPrisonEventRepository = mock<PrisonEventRepositoryPort>();
        mockPrisonEventRepository.find.mockResolvedValue([getMockPrisonEvent()]);

        useCase = new GetPrisonEventsUseCase(
            new FacilityNormalizer(mockOfFacilityDirectory()),
            mockPrisonEventRepository,
        );
    });

    test('should query by the canonical facility name and leave aggregates out', async () => {
        // When
        const events = await useCase.execute({ facility: 'carcere di brescia', limit: 20 });

        // Then
        expect(events).toHaveLength(1);
        expect(mockPrisonEventRepository.find).toHaveBeenCalledWith({
            eventType: undefined,
            facility: 'Canton Mombello (Brescia)',
            includeAggregates: false,
            limit: 20,
            region: undefined,
        });
    });

    test('should pass the other filters through', async () => {
        // When
        await useCase.execute({
            eventType: 'suicide',
            includeAggregates: true,
            limit: 5,
            region: 'Lazio',
        });

        // Then
        expect(mockPrisonEventRepository.find).toHaveBeenCalledWith({
            eventType: 'suicide',
            facility: undefined,
            includeAggregates: true,
            limit: 5,
            region: 'Lazio',
        });
    });
});

describe('GetEventStatisticsUseCase', () => {
    test('should count events along every dimension', async () => {
        // Given
        const mockPrisonEventRepository = mock<PrisonEventRepositoryPort>();
        mockPrisonEventRepository.countBy.mockImplementation(async (dimension) => [
            { count: 3, key: `${dimension}-a` },
            { count: 1, key: null },
        ]);
        const useCase = new GetEventStatisticsUseCase(mockPrisonEventRepository);

        // When
        const statistics = await useCase.execute();

        // Then
        expect(statistics).toEqual({
            byFacility: [
                { count: 3, key: 'facility-a' },
                { count: 1, key: null },
            ],
            byRegion: [
                { count: 3, key: 'region-a' },
                { count: 1, key: null },
            ],
            byType: [
                { count: 3, key: 'eventType-a' },
                { count: 1, key: null },
            ],
        });
    });
});
