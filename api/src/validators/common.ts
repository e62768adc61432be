/**
 * Shared validation pieces
 */

import { z, type ZodError } from 'zod';
import { ValidationError } from '@/errors/api';

/**
 * Query, path and form values arrive as strings. Blank strings are
 * rejected before coercion so "" never turns into 0.
 */
export const numericString = z
  .string()
  .trim()
  .min(1, 'Required')
  .pipe(z.coerce.number().finite());

export const integerString = z
  .string()
  .trim()
  .min(1, 'Required')
  .pipe(z.coerce.number().int());

// Upper bound of a Postgres SERIAL (int4) column
const MAX_SERIAL_ID = 2_147_483_647;

/**
 * Row ids: anything outside the serial range can never match a row
 */
export const idString = z
  .string()
  .trim()
  .min(1, 'Required')
  .pipe(z.coerce.number().int().min(1).max(MAX_SERIAL_ID));

export const requiredText = z.string().min(1, 'Required');

/**
 * zValidator hook: turn a failed parse into a ValidationError so the
 * onError handler answers with the standard 400 body
 */
export function rejectInvalid(
  result: { success: true } | { success: false; error: ZodError },
): void {
  if (!result.success) {
    throw new ValidationError('Invalid request data', {
      details: result.error.issues,
      cause: result.error,
    });
  }
}
