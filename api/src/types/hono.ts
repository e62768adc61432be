/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { Identity } from '@/services/auth.service';

/**
 * Environment variables for Hono context
 */
export type HonoEnv = {
  Variables: {
    /** Set by authResolver when a valid bearer token is present */
    identity?: Identity;
    requestId: string;
  };
};
