import { z } from 'zod/v4';

import { parseIsoDate } from '../../shared/date/calendar-date.js';

/**
 * A calendar day written as YYYY-MM-DD
 */
export const calendarDateSchema = z
    .string()
    .refine((value) => parseIsoDate(value) === value, { message: 'Expected a YYYY-MM-DD date' })
    .describe('A calendar date in ISO YYYY-MM-DD form');

export type CalendarDate = z.infer<typeof calendarDateSchema>;
