import { describe, expect, test } from 'vitest';
import { mock } from 'vitest-mock-extended';

// Application
import { type CleanupPrisonEventsUseCase } from '../../../../application/use-cases/events/cleanup-prison-events.use-case.js';
import { type NormalizeFacilitiesUseCase } from '../../../../application/use-cases/facilities/normalize-facilities.use-case.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

import { EventCleanupTask } from '../events/event-cleanup.task.js';

describe('EventCleanupTask', () => {
    test('should re-normalize facilities before cleaning up events', async () => {
        // Given
        const calls: string[] = [];
        const mockNormalizeFacilities = mock<NormalizeFacilitiesUseCase>();
        const mockCleanupPrisonEvents = mock<CleanupPrisonEventsUseCase>();
        mockNormalizeFacilities.execute.mockImplementation(async () => {
            calls.push('normalize');
            return {
                dryRun: true,
                events: { checked: 0, failed: 0, updated: 0 },
                snapshots: { checked: 0, failed: 0, updated: 0 },
            };
        });
        mockCleanupPrisonEvents.execute.mockImplementation(async () => {
            calls.push('cleanup');
            return {
                afterCount: 0,
                aggregatesMarked: 0,
                beforeCount: 0,
                dryRun: true,
                duplicatesRemoved: 0,
                sampleDuplicates: [],
                victimDuplicatesRemoved: 0,
            };
        });
        const task = new EventCleanupTask(
            mockNormalizeFacilities,
            mockCleanupPrisonEvents,
            { dryRun: true, enabled: true, schedule: '0 3 * * 0' },
            mock<LoggerPort>(),
        );

        // When
        await task.execute();

        // Then
        expect(task.schedule).toBe('0 3 * * 0');
        expect(calls).toEqual(['normalize', 'cleanup']);
        expect(mockNormalizeFacilities.execute).toHaveBeenCalledWith({ dryRun: true });
        expect(mockCleanupPrisonEvents.execute).toHaveBeenCalledWith({ dryRun: true });
    });
});
