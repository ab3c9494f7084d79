/**
 * Schema validation capability supplied per resource.
 *
 * The dispatch layer never looks at field-level schema details: a validator
 * either returns the validated value or a list of issues. `fromZod` adapts a
 * zod schema; any other library can be plugged in by writing a function with
 * the same shape.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { ValidationIssue } from '../errors.js';

export type ValidationOutcome<T> =
  | { success: true; data: T }
  | { success: false; issues: ValidationIssue[] };

export type Validator<T> = (raw: unknown) => ValidationOutcome<T>;

/**
 * Build a validator from a zod schema.
 *
 * @example
 * ```typescript
 * const validator = fromZod(z.object({ userId: z.number().int() }));
 * validator({ userId: 'x' });
 * // { success: false, issues: [{ field: 'userId', message: 'Expected number, received string' }] }
 * ```
 */
export function fromZod<T>(schema: ZodType<T, ZodTypeDef, unknown>): Validator<T> {
  return (raw) => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      return { success: true, data: parsed.data };
    }
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    };
  };
}
