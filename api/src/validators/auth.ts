/**
 * Authentication Validation Schemas
 *
 * Zod schemas for registration, login and password recovery
 */

import { z } from 'zod';
import { requiredText } from './common';

/**
 * POST /register (form body)
 */
export const registerFormSchema = z.object({
  firstname: requiredText,
  lastname: requiredText,
  email: z.string().trim().email(),
  password: requiredText,
});

/**
 * POST /login (JSON or form body)
 */
export const loginBodySchema = z.object({
  email: z.string().trim().min(1, 'Required'),
  password: requiredText,
});

/**
 * GET /retrieve_password/:email
 */
export const emailParamSchema = z.object({
  email: z.string().trim().min(1, 'Required'),
});
