import { z } from 'zod/v4';

export const loggerLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LoggerLevel = z.infer<typeof loggerLevelSchema>;

export type LogContext = Record<string, unknown>;

/**
 * Structured logger used across every layer
 */
export interface LoggerPort {
    debug(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
}
