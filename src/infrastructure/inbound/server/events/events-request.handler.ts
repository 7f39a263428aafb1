import { z } from 'zod/v4';

import { parseOrReject } from '../request-validation.js';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 500;

/**
 * Raw HTTP query parameters of GET /events
 */
export interface GetEventsHttpQuery {
    facility?: string;
    includeAggregates?: string;
    limit?: string;
    region?: string;
    type?: string;
}

const optionalFilterSchema = z
    .string()
    .trim()
    .max(200)
    .optional()
    .transform((val) => (val ? val : undefined));

const getEventsParamsSchema = z
    .object({
        facility: optionalFilterSchema,
        includeAggregates: z
            .enum(['true', 'false'])
            .optional()
            .transform((val) => val === 'true'),
        limit: z
            .string()
            .optional()
            .transform((val) => (val === undefined ? DEFAULT_PAGE_SIZE : Number(val)))
            .pipe(z.number().int().min(1).max(MAX_PAGE_SIZE)),
        region: optionalFilterSchema,
        type: optionalFilterSchema,
    })
    .transform(({ type, ...rest }) => ({ ...rest, eventType: type }));

export type GetEventsHttpParams = z.infer<typeof getEventsParamsSchema>;

/**
 * Handles HTTP request validation for GET /events
 */
export class EventsRequestHandler {
    handle(rawQuery: GetEventsHttpQuery): GetEventsHttpParams {
        return parseOrReject(getEventsParamsSchema, rawQuery);
    }
}
