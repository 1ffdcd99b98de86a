/**
 * Zod request validation helpers
 *
 * Route handlers parse bodies/params through `parseWith`; a failed parse
 * surfaces as a ValidationError and is rendered by the global handler.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../common/errors.js';

export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, what = 'request'): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || what}: ${i.message}`);
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return result.data;
}
