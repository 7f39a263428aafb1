import { type LoggerLevel } from '../../../shared/logger/logger.port.js';

/**
 * Configuration port providing access to application settings
 */
export interface ConfigurationPort {
    /**
     * Get the inbound configuration
     */
    getInboundConfiguration(): InboundConfigurationPort;

    /**
     * Get the outbound configuration
     */
    getOutboundConfiguration(): OutboundConfigurationPort;
}

/**
 * Inbound configuration (defined by the user)
 */
export interface InboundConfigurationPort {
    env: 'development' | 'production' | 'test';
    http: {
        host: string;
        port: number;
    };
    logger: {
        level: LoggerLevel;
        prettyPrint: boolean;
    };
    tasks: TasksConfigurationPort;
}

/**
 * Outbound configuration (files and stores the service reads and writes)
 */
export interface OutboundConfigurationPort {
    collections: {
        inboxDirectory: string;
    };
    facilities: {
        directoryFile: string;
    };
    narrative: NarrativeConfigurationPort;
    sqlite: {
        databasePath: string;
    };
}

export interface NarrativeConfigurationPort {
    archiveAfterDays: number;
    contextFile: string;
    editorialTone: string;
    minMatchScore: number;
}

/**
 * Daily collection pipeline task configuration
 */
export interface CollectionPipelineTaskConfig {
    enabled: boolean;
    executeOnStartup: boolean;
    schedule: string;
    timezone: string;
}

/**
 * Weekly event cleanup task configuration
 */
export interface EventCleanupTaskConfig {
    dryRun: boolean;
    enabled: boolean;
    schedule: string;
}

/**
 * Tasks configuration
 */
export interface TasksConfigurationPort {
    collectionPipeline: CollectionPipelineTaskConfig;
    eventCleanup: EventCleanupTaskConfig;
}
