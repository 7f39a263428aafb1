import { z } from 'zod/v4';

export const storyStatusSchema = z
    .enum(['active', 'dormant', 'resolved'])
    .describe('Lifecycle status of a story thread');

export type StoryStatusType = z.infer<typeof storyStatusSchema>;

/**
 * @description
 * Status of a tracked story thread.
 * Transitions are active -> dormant (archival) and any -> resolved.
 *
 * @example
 * const status = new StoryStatus('active');
 */
export class StoryStatus {
    public readonly value: StoryStatusType;

    constructor(value: string) {
        const result = storyStatusSchema.safeParse(value);

        if (!result.success) {
            throw new Error(`Invalid story status: ${value}`);
        }

        this.value = result.data;
    }

    public isActive(): boolean {
        return this.value === 'active';
    }

    public isDormant(): boolean {
        return this.value === 'dormant';
    }

    public isResolved(): boolean {
        return this.value === 'resolved';
    }

    public toString(): StoryStatusType {
        return this.value;
    }
}
