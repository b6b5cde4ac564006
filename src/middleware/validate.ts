import type { z } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * Parses `value` with `schema`, throwing a ValidationError that lists each
 * offending field.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValidationError(
            result.error.issues.map((issue) => ({
                field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
                message: issue.message,
            })),
        );
    }
    return result.data;
}
