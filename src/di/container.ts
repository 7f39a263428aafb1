import { Container, Injectable } from '@snap/ts-inject';
import { default as nodeConfiguration } from 'config';

// Configuration
import type { ConfigurationPort } from '../application/ports/inbound/configuration.port.js';
import {
    type ConfigurationOverrides,
    NodeConfig,
} from '../infrastructure/inbound/configuration/node-config.js';

// Application
import type { ServerPort } from '../application/ports/inbound/server.port.js';
import type { TaskPort, WorkerPort } from '../application/ports/inbound/worker.port.js';
import type { FacilitySnapshotRepositoryPort } from '../application/ports/outbound/persistence/facility-snapshot-repository.port.js';
import type { NarrativeRepositoryPort } from '../application/ports/outbound/persistence/narrative-repository.port.js';
import type { PrisonEventRepositoryPort } from '../application/ports/outbound/persistence/prison-event-repository.port.js';
import type { CollectionProviderPort } from '../application/ports/outbound/providers/collection.port.js';
import { ReconcileCollectionUseCase } from '../application/use-cases/collection/reconcile-collection.use-case.js';
import { CleanupPrisonEventsUseCase } from '../application/use-cases/events/cleanup-prison-events.use-case.js';
import { GetEventStatisticsUseCase } from '../application/use-cases/events/get-event-statistics.use-case.js';
import { GetPrisonEventsUseCase } from '../application/use-cases/events/get-prison-events.use-case.js';
import { RecordPrisonEventsUseCase } from '../application/use-cases/events/record-prison-events.use-case.js';
import { GetLatestSnapshotsUseCase } from '../application/use-cases/facilities/get-latest-snapshots.use-case.js';
import { NormalizeFacilitiesUseCase } from '../application/use-cases/facilities/normalize-facilities.use-case.js';
import { RecordFacilitySnapshotsUseCase } from '../application/use-cases/facilities/record-facility-snapshots.use-case.js';
import { GetCharacterUseCase } from '../application/use-cases/narrative/get-character.use-case.js';
import { GetFollowUpsUseCase } from '../application/use-cases/narrative/get-follow-ups.use-case.js';
import { GetStoriesUseCase } from '../application/use-cases/narrative/get-stories.use-case.js';

// Domain
import { EventDeduplicator } from '../domain/services/event-deduplicator.js';
import { FacilityNormalizer } from '../domain/services/facility-normalizer.js';

// Infrastructure
import { EventsController } from '../infrastructure/inbound/server/events/events.controller.js';
import { HonoServer } from '../infrastructure/inbound/server/hono.server.js';
import { NarrativeController } from '../infrastructure/inbound/server/narrative/narrative.controller.js';
import { CollectionPipelineTask } from '../infrastructure/inbound/worker/collection/collection-pipeline.task.js';
import { EventCleanupTask } from '../infrastructure/inbound/worker/events/event-cleanup.task.js';
import { NodeCronAdapter } from '../infrastructure/inbound/worker/node-cron.adapter.js';
import { SqliteFacilitySnapshotRepository } from '../infrastructure/outbound/persistence/facility-snapshot/sqlite-facility-snapshot.repository.js';
import { JsonNarrativeRepository } from '../infrastructure/outbound/persistence/narrative/json-narrative.repository.js';
import { SqlitePrisonEventRepository } from '../infrastructure/outbound/persistence/prison-event/sqlite-prison-event.repository.js';
import { SqliteDatabase } from '../infrastructure/outbound/persistence/sqlite.database.js';
import { loadFacilityDirectory } from '../infrastructure/outbound/providers/facility-directory.loader.js';
import { FileCollectionProvider } from '../infrastructure/outbound/providers/file-collection.provider.js';

// Shared
import { type LoggerPort } from '../shared/logger/logger.port.js';
import { PinoLoggerAdapter } from '../shared/logger/pino-logger.adapter.js';

/**
 * Outbound adapters
 */
const databaseFactory = Injectable(
    'Database',
    ['Logger', 'Configuration'] as const,
    (logger: LoggerPort, config: ConfigurationPort) =>
        new SqliteDatabase(logger, config.getOutboundConfiguration().sqlite.databasePath),
);

const loggerFactory = Injectable(
    'Logger',
    ['Configuration'] as const,
    (config: ConfigurationPort): LoggerPort =>
        new PinoLoggerAdapter({
            level: config.getInboundConfiguration().logger.level,
            prettyPrint: config.getInboundConfiguration().logger.prettyPrint,
        }),
);

const collectionProviderFactory = Injectable(
    'CollectionProvider',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): CollectionProviderPort =>
        new FileCollectionProvider(
            config.getOutboundConfiguration().collections.inboxDirectory,
            logger,
        ),
);

/**
 * Domain services
 */
const facilityNormalizerFactory = Injectable(
    'FacilityNormalizer',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort) => {
        const directoryFile = config.getOutboundConfiguration().facilities.directoryFile;
        logger.info('Loading facility directory', { directoryFile });
        return new FacilityNormalizer(loadFacilityDirectory(directoryFile));
    },
);

const eventDeduplicatorFactory = Injectable(
    'EventDeduplicator',
    ['FacilityNormalizer'] as const,
    (normalizer: FacilityNormalizer) => new EventDeduplicator(normalizer),
);

/**
 * Repository adapters
 */
const narrativeRepositoryFactory = Injectable(
    'NarrativeRepository',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): NarrativeRepositoryPort => {
        const { contextFile, editorialTone } = config.getOutboundConfiguration().narrative;
        logger.info('Initializing Narrative repository', { contextFile });
        return new JsonNarrativeRepository(contextFile, editorialTone, logger);
    },
);

const prisonEventRepositoryFactory = Injectable(
    'PrisonEventRepository',
    ['Database', 'Logger'] as const,
    (db: SqliteDatabase, logger: LoggerPort): PrisonEventRepositoryPort =>
        new SqlitePrisonEventRepository(db, logger),
);

const facilitySnapshotRepositoryFactory = Injectable(
    'FacilitySnapshotRepository',
    ['Database', 'Logger'] as const,
    (db: SqliteDatabase, logger: LoggerPort): FacilitySnapshotRepositoryPort =>
        new SqliteFacilitySnapshotRepository(db, logger),
);

/**
 * Use case factories
 */
const recordPrisonEventsUseCaseFactory = Injectable(
    'RecordPrisonEvents',
    ['EventDeduplicator', 'FacilityNormalizer', 'Logger', 'PrisonEventRepository'] as const,
    (
        deduplicator: EventDeduplicator,
        normalizer: FacilityNormalizer,
        logger: LoggerPort,
        repository: PrisonEventRepositoryPort,
    ) => new RecordPrisonEventsUseCase(deduplicator, normalizer, logger, repository),
);

const recordFacilitySnapshotsUseCaseFactory = Injectable(
    'RecordFacilitySnapshots',
    ['EventDeduplicator', 'FacilityNormalizer', 'Logger', 'FacilitySnapshotRepository'] as const,
    (
        deduplicator: EventDeduplicator,
        normalizer: FacilityNormalizer,
        logger: LoggerPort,
        repository: FacilitySnapshotRepositoryPort,
    ) => new RecordFacilitySnapshotsUseCase(deduplicator, normalizer, logger, repository),
);

const reconcileCollectionUseCaseFactory = Injectable(
    'ReconcileCollection',
    [
        'CollectionProvider',
        'Configuration',
        'Logger',
        'NarrativeRepository',
        'RecordFacilitySnapshots',
        'RecordPrisonEvents',
    ] as const,
    (
        collectionProvider: CollectionProviderPort,
        config: ConfigurationPort,
        logger: LoggerPort,
        narrativeRepository: NarrativeRepositoryPort,
        recordFacilitySnapshots: RecordFacilitySnapshotsUseCase,
        recordPrisonEvents: RecordPrisonEventsUseCase,
    ) => {
        const { archiveAfterDays, minMatchScore } = config.getOutboundConfiguration().narrative;
        return new ReconcileCollectionUseCase(
            collectionProvider,
            logger,
            narrativeRepository,
            recordFacilitySnapshots,
            recordPrisonEvents,
            { archiveAfterDays, minMatchScore },
        );
    },
);

const cleanupPrisonEventsUseCaseFactory = Injectable(
    'CleanupPrisonEvents',
    ['FacilityNormalizer', 'Logger', 'PrisonEventRepository'] as const,
    (normalizer: FacilityNormalizer, logger: LoggerPort, repository: PrisonEventRepositoryPort) =>
        new CleanupPrisonEventsUseCase(normalizer, logger, repository),
);

const normalizeFacilitiesUseCaseFactory = Injectable(
    'NormalizeFacilities',
    [
        'FacilityNormalizer',
        'FacilitySnapshotRepository',
        'Logger',
        'PrisonEventRepository',
    ] as const,
    (
        normalizer: FacilityNormalizer,
        snapshotRepository: FacilitySnapshotRepositoryPort,
        logger: LoggerPort,
        eventRepository: PrisonEventRepositoryPort,
    ) => new NormalizeFacilitiesUseCase(normalizer, snapshotRepository, logger, eventRepository),
);

const readUseCasesFactory = Injectable(
    'ReadUseCases',
    [
        'FacilityNormalizer',
        'FacilitySnapshotRepository',
        'NarrativeRepository',
        'PrisonEventRepository',
    ] as const,
    (
        normalizer: FacilityNormalizer,
        snapshotRepository: FacilitySnapshotRepositoryPort,
        narrativeRepository: NarrativeRepositoryPort,
        eventRepository: PrisonEventRepositoryPort,
    ) => ({
        getCharacter: new GetCharacterUseCase(narrativeRepository),
        getEventStatistics: new GetEventStatisticsUseCase(eventRepository),
        getFollowUps: new GetFollowUpsUseCase(narrativeRepository),
        getLatestSnapshots: new GetLatestSnapshotsUseCase(snapshotRepository),
        getPrisonEvents: new GetPrisonEventsUseCase(normalizer, eventRepository),
        getStories: new GetStoriesUseCase(narrativeRepository),
    }),
);

/**
 * Controller factories
 */
const controllersFactory = Injectable(
    'Controllers',
    ['ReadUseCases'] as const,
    (useCases: ReturnType<typeof readUseCasesFactory>) => ({
        events: new EventsController(
            useCases.getPrisonEvents,
            useCases.getEventStatistics,
            useCases.getLatestSnapshots,
        ),
        narrative: new NarrativeController(
            useCases.getStories,
            useCases.getCharacter,
            useCases.getFollowUps,
        ),
    }),
);

/**
 * Task factories
 */
const tasksFactory = Injectable(
    'Tasks',
    [
        'ReconcileCollection',
        'NormalizeFacilities',
        'CleanupPrisonEvents',
        'Configuration',
        'Logger',
    ] as const,
    (
        reconcileCollection: ReconcileCollectionUseCase,
        normalizeFacilities: NormalizeFacilitiesUseCase,
        cleanupPrisonEvents: CleanupPrisonEventsUseCase,
        configuration: ConfigurationPort,
        logger: LoggerPort,
    ): TaskPort[] => {
        const tasks: TaskPort[] = [];
        const { collectionPipeline, eventCleanup } =
            configuration.getInboundConfiguration().tasks;

        if (collectionPipeline.enabled) {
            tasks.push(new CollectionPipelineTask(reconcileCollection, collectionPipeline, logger));
        }

        if (eventCleanup.enabled) {
            tasks.push(
                new EventCleanupTask(
                    normalizeFacilities,
                    cleanupPrisonEvents,
                    eventCleanup,
                    logger,
                ),
            );
        }

        return tasks;
    },
);

/**
 * Inbound adapters
 */
const configurationFactory = (overrides?: ContainerOverrides) =>
    Injectable('Configuration', () => new NodeConfig(nodeConfiguration, overrides));

const serverFactory = Injectable(
    'Server',
    ['Logger', 'Controllers'] as const,
    (logger: LoggerPort, controllers: ReturnType<typeof controllersFactory>): ServerPort => {
        logger.info('Initializing Server', { implementation: 'Hono' });
        return new HonoServer(logger, controllers.narrative, controllers.events);
    },
);

const workerFactory = Injectable(
    'Worker',
    ['Logger', 'Tasks'] as const,
    (logger: LoggerPort, tasks: TaskPort[]): WorkerPort => {
        logger.info('Initializing Worker', { implementation: 'NodeCron' });
        return new NodeCronAdapter(logger, tasks);
    },
);

/**
 * Container configuration
 */
export type ContainerOverrides = ConfigurationOverrides;

export const createContainer = (overrides?: ContainerOverrides) =>
    Container
        // Outbound adapters
        .provides(configurationFactory(overrides))
        .provides(loggerFactory)
        .provides(databaseFactory)
        .provides(collectionProviderFactory)
        // Domain services
        .provides(facilityNormalizerFactory)
        .provides(eventDeduplicatorFactory)
        // Repositories
        .provides(narrativeRepositoryFactory)
        .provides(prisonEventRepositoryFactory)
        .provides(facilitySnapshotRepositoryFactory)
        // Use cases
        .provides(recordPrisonEventsUseCaseFactory)
        .provides(recordFacilitySnapshotsUseCaseFactory)
        .provides(reconcileCollectionUseCaseFactory)
        .provides(cleanupPrisonEventsUseCaseFactory)
        .provides(normalizeFacilitiesUseCaseFactory)
        .provides(readUseCasesFactory)
        // Controllers and tasks
        .provides(controllersFactory)
        .provides(tasksFactory)
        // Inbound adapters
        .provides(serverFactory)
        .provides(workerFactory);
