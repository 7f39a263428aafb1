import { z } from 'zod/v4';

// Configuration
import {
    type ConfigurationPort,
    type InboundConfigurationPort,
    type OutboundConfigurationPort,
} from '../../../application/ports/inbound/configuration.port.js';

// Shared
import { loggerLevelSchema } from '../../../shared/logger/logger.port.js';

const cronExpressionSchema = z.string().trim().min(9);

const configurationSchema = z.object({
    inbound: z.object({
        env: z.enum(['development', 'production', 'test']),
        http: z.object({
            host: z.string(),
            port: z.coerce.number().int().positive(),
        }),
        logger: z.object({
            level: loggerLevelSchema,
            prettyPrint: z.boolean(),
        }),
        tasks: z.object({
            collectionPipeline: z.object({
                enabled: z.boolean(),
                executeOnStartup: z.boolean().default(false),
                schedule: cronExpressionSchema,
                timezone: z.string().min(1).default('Europe/Rome'),
            }),
            eventCleanup: z.object({
                dryRun: z.boolean(),
                enabled: z.boolean(),
                schedule: cronExpressionSchema,
            }),
        }),
    }),
    outbound: z.object({
        collections: z.object({
            inboxDirectory: z.string().min(1),
        }),
        facilities: z.object({
            directoryFile: z.string().min(1),
        }),
        narrative: z.object({
            archiveAfterDays: z.coerce.number().int().positive(),
            contextFile: z.string().min(1),
            editorialTone: z.string().min(1),
            minMatchScore: z.coerce.number().min(0).max(1),
        }),
        sqlite: z.object({
            databasePath: z.string().min(1),
        }),
    }),
});

type Configuration = z.infer<typeof configurationSchema>;

export type ConfigurationOverrides = {
    databasePath?: string;
    inboxDirectory?: string;
    narrativeFile?: string;
};

/**
 * Node.js configuration loader backed by node-config
 */
export class NodeConfig implements ConfigurationPort {
    private readonly configuration: Configuration;

    constructor(configurationInput: unknown, overrides?: ConfigurationOverrides) {
        // Parse and validate first
        const parsed = configurationSchema.parse(configurationInput);

        // Apply overrides after parsing
        if (overrides?.databasePath) {
            parsed.outbound.sqlite.databasePath = overrides.databasePath;
        }
        if (overrides?.inboxDirectory) {
            parsed.outbound.collections.inboxDirectory = overrides.inboxDirectory;
        }
        if (overrides?.narrativeFile) {
            parsed.outbound.narrative.contextFile = overrides.narrativeFile;
        }

        this.configuration = parsed;
    }

    public getInboundConfiguration(): InboundConfigurationPort {
        return this.configuration.inbound;
    }

    public getOutboundConfiguration(): OutboundConfigurationPort {
        return this.configuration.outbound;
    }
}
