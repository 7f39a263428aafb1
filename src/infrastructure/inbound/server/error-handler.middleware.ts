import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';

// Shared
import type { LoggerPort } from '../../../shared/logger/logger.port.js';

/**
 * Creates a global error handling middleware for Hono
 * Catches all unhandled errors and returns appropriate HTTP responses
 */
export const createErrorHandlerMiddleware = (logger: LoggerPort) => {
    return async (err: Error, c: Context) => {
        // Handle HTTP exceptions (like validation errors)
        if (err instanceof HTTPException) {
            logger.warn('Rejected HTTP request', {
                error: err.message,
                path: c.req.path,
                status: err.status,
            });
            return c.json({ error: err.message }, err.status);
        }

        logger.error('Unexpected error in HTTP handler', { error: err, path: c.req.path });

        // Handle all other errors as 500 Internal Server Error
        return c.json({ error: 'Internal server error' }, 500);
    };
};
