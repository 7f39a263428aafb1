import { type DestinationStream, type Logger, pino, stdSerializers } from 'pino';

import { type LogContext, type LoggerLevel, type LoggerPort } from './logger.port.js';

export type PinoLoggerConfiguration = {
    level: LoggerLevel;
    prettyPrint: boolean;
};

/**
 * Pino implementation of the logger port
 * Errors found in the context are serialized with pino's standard error serializer
 */
export class PinoLoggerAdapter implements LoggerPort {
    private readonly logger: Logger;

    constructor(configuration: PinoLoggerConfiguration, destination?: DestinationStream) {
        const options = {
            level: configuration.level,
            serializers: { error: stdSerializers.err },
        };

        if (destination) {
            this.logger = pino(options, destination);
        } else if (configuration.prettyPrint) {
            this.logger = pino({
                ...options,
                transport: {
                    options: { colorize: true, ignore: 'pid,hostname', translateTime: 'SYS:HH:MM:ss' },
                    target: 'pino-pretty',
                },
            });
        } else {
            this.logger = pino(options);
        }
    }

    debug(message: string, context?: LogContext): void {
        this.logger.debug(context ?? {}, message);
    }

    error(message: string, context?: LogContext): void {
        this.logger.error(context ?? {}, message);
    }

    info(message: string, context?: LogContext): void {
        this.logger.info(context ?? {}, message);
    }

    warn(message: string, context?: LogContext): void {
        this.logger.warn(context ?? {}, message);
    }
}
