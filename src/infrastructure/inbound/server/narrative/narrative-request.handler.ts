import { z } from 'zod/v4';

// Domain
import { calendarDateSchema } from '../../../../domain/value-objects/calendar-date.vo.js';
import { storyStatusSchema } from '../../../../domain/value-objects/story-status.vo.js';

import { parseOrReject } from '../request-validation.js';

/**
 * Raw HTTP query parameters of GET /stories
 */
export interface GetStoriesHttpQuery {
    keyword?: string;
    status?: string;
}

/**
 * Raw HTTP query parameters of GET /followups
 */
export interface GetFollowUpsHttpQuery {
    dueBy?: string;
}

const getStoriesParamsSchema = z.object({
    keyword: z
        .string()
        .trim()
        .max(100)
        .optional()
        .transform((val) => (val ? val : undefined)),
    status: z
        .string()
        .optional()
        .transform((val) => val?.toLowerCase())
        .pipe(storyStatusSchema.optional()),
});

const getFollowUpsParamsSchema = z.object({
    dueBy: calendarDateSchema.optional(),
});

const nameParamSchema = z.string().trim().min(1).max(200);

export type GetStoriesHttpParams = z.infer<typeof getStoriesParamsSchema>;
export type GetFollowUpsHttpParams = z.infer<typeof getFollowUpsParamsSchema>;

/**
 * Handles HTTP request validation for the narrative endpoints
 * @throws HTTPException with 422 status for validation errors
 */
export class NarrativeRequestHandler {
    handleCharacterName(rawName: string): string {
        return parseOrReject(nameParamSchema, rawName);
    }

    handleGetFollowUps(rawQuery: GetFollowUpsHttpQuery): GetFollowUpsHttpParams {
        return parseOrReject(getFollowUpsParamsSchema, rawQuery);
    }

    handleGetStories(rawQuery: GetStoriesHttpQuery): GetStoriesHttpParams {
        return parseOrReject(getStoriesParamsSchema, rawQuery);
    }
}
