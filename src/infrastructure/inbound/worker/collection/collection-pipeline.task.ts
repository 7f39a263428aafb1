// Configuration
import { type CollectionPipelineTaskConfig } from '../../../../application/ports/inbound/configuration.port.js';

// Application
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';
import { type ReconcileCollectionUseCase } from '../../../../application/use-cases/collection/reconcile-collection.use-case.js';

// Shared
import { todayIn } from '../../../../shared/date/calendar-date.js';
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

export class CollectionPipelineTask implements TaskPort {
    public readonly executeOnStartup: boolean;
    public readonly name = 'collection-pipeline';
    public readonly schedule: string;
    public readonly timezone: string;

    constructor(
        private readonly reconcileCollection: ReconcileCollectionUseCase,
        taskConfig: CollectionPipelineTaskConfig,
        private readonly logger: LoggerPort,
    ) {
        this.executeOnStartup = taskConfig.executeOnStartup;
        this.schedule = taskConfig.schedule;
        this.timezone = taskConfig.timezone;
    }

    async execute(): Promise<void> {
        this.logger.info('Collection pipeline task started');

        try {
            // The run date is the calendar day in the newsroom's time zone
            const runDate = todayIn(this.timezone);
            const report = await this.reconcileCollection.execute(runDate);

            if (!report) {
                this.logger.info('Collection pipeline found nothing to reconcile', { runDate });
                return;
            }

            this.logger.info('Collection pipeline execution finished', {
                articles: report.articles.total,
                runDate,
                stages: report.stages,
            });
        } catch (error) {
            this.logger.error('Collection pipeline encountered an error', { error });
            throw error;
        }
    }
}
