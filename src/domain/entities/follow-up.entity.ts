import { z } from 'zod/v4';

import { calendarDateSchema } from '../value-objects/calendar-date.vo.js';

export const followUpSchema = z.object({
    createdAt: calendarDateSchema.describe('Run date the follow-up was detected'),
    event: z.string().trim().min(1).describe('What is expected to happen'),
    expectedDate: calendarDateSchema,
    id: z.string().min(1),
    resolved: z.boolean().default(false),
    storyId: z
        .string()
        .min(1)
        .optional()
        .describe('Weak reference to a story thread; may point to nothing'),
});

export type FollowUpProps = z.input<typeof followUpSchema>;

const normalizeEvent = (event: string): string => event.trim().toLowerCase().replace(/\s+/g, ' ');

/**
 * @description An expected future event or deadline worth a reminder
 */
export class FollowUp {
    public readonly createdAt: string;
    public readonly event: string;
    public readonly expectedDate: string;
    public readonly id: string;
    public readonly resolved: boolean;
    public readonly storyId?: string;

    public constructor(data: FollowUpProps) {
        const result = followUpSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid follow-up data: ${result.error.message}`);
        }

        this.id = result.data.id;
        this.event = result.data.event;
        this.expectedDate = result.data.expectedDate;
        this.storyId = result.data.storyId;
        this.createdAt = result.data.createdAt;
        this.resolved = result.data.resolved;
    }

    public describesSameEvent(event: string, expectedDate: string): boolean {
        return (
            this.expectedDate === expectedDate &&
            normalizeEvent(this.event) === normalizeEvent(event)
        );
    }

    public isDue(asOf: string): boolean {
        return !this.resolved && this.expectedDate <= asOf;
    }
}
