import { HTTPException } from 'hono/http-exception';
import { type z } from 'zod/v4';

/**
 * Validates raw HTTP input against a schema
 * @throws HTTPException with 422 status for validation errors
 */
export function parseOrReject<TSchema extends z.ZodType>(
    schema: TSchema,
    input: unknown,
): z.output<TSchema> {
    const validatedParams = schema.safeParse(input);

    if (!validatedParams.success) {
        throw new HTTPException(422, {
            cause: { details: validatedParams.error.issues },
            message: 'Invalid request parameters',
        });
    }

    return validatedParams.data;
}
