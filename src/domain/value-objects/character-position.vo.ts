import { z } from 'zod/v4';

import { calendarDateSchema } from './calendar-date.vo.js';

export const characterPositionSchema = z.object({
    date: calendarDateSchema.describe('Day the stance was recorded'),
    sourceUrl: z.string().min(1).optional().describe('Article the stance was taken from'),
    stance: z.string().trim().describe('Free-text summary of the stated position, possibly empty'),
});

export type CharacterPositionProps = z.input<typeof characterPositionSchema>;

/**
 * A stance recorded for a key character on a given day. Never changed once recorded.
 */
export class CharacterPosition {
    public readonly date: string;
    public readonly sourceUrl?: string;
    public readonly stance: string;

    constructor(data: CharacterPositionProps) {
        const result = characterPositionSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid character position data: ${result.error.message}`);
        }

        this.date = result.data.date;
        this.sourceUrl = result.data.sourceUrl;
        this.stance = result.data.stance;
    }
}
