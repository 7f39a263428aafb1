// Configuration
import { type EventCleanupTaskConfig } from '../../../../application/ports/inbound/configuration.port.js';

// Application
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';
import { type CleanupPrisonEventsUseCase } from '../../../../application/use-cases/events/cleanup-prison-events.use-case.js';
import { type NormalizeFacilitiesUseCase } from '../../../../application/use-cases/facilities/normalize-facilities.use-case.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

export class EventCleanupTask implements TaskPort {
    public readonly executeOnStartup = false;
    public readonly name = 'event-cleanup';
    public readonly schedule: string;

    constructor(
        private readonly normalizeFacilities: NormalizeFacilitiesUseCase,
        private readonly cleanupPrisonEvents: CleanupPrisonEventsUseCase,
        private readonly taskConfig: EventCleanupTaskConfig,
        private readonly logger: LoggerPort,
    ) {
        this.schedule = taskConfig.schedule;
    }

    async execute(): Promise<void> {
        this.logger.info('Event cleanup task started', { dryRun: this.taskConfig.dryRun });

        try {
            // Step 1: Bring stored facility names in line with the current table
            await this.normalizeFacilities.execute({ dryRun: this.taskConfig.dryRun });

            // Step 2: Flag roll-ups and drop duplicate incidents
            await this.cleanupPrisonEvents.execute({ dryRun: this.taskConfig.dryRun });

            this.logger.info('Event cleanup execution finished');
        } catch (error) {
            this.logger.error('Event cleanup encountered an error', { error });
            throw error;
        }
    }
}
