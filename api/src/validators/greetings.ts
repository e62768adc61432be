/**
 * Greeting Validation Schemas
 */

import { z } from 'zod';
import { integerString, requiredText } from './common';

/**
 * GET /parameters?name=...&age=...
 */
export const ageQuerySchema = z.object({
  name: requiredText,
  age: integerString,
});

/**
 * GET /url_variables/:name/:age
 */
export const ageParamSchema = z.object({
  name: requiredText,
  age: integerString,
});
