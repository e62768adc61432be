/**
 * Planet Validation Schemas
 */

import { z } from 'zod';
import { idString, numericString, requiredText } from './common';

/**
 * :id path segment for detail and delete
 */
export const planetIdParamSchema = z.object({
  id: idString,
});

/**
 * POST /add_planet (form body)
 */
export const addPlanetFormSchema = z.object({
  planet_name: requiredText,
  planet_type: requiredText,
  home_star: requiredText,
  mass: numericString,
  radius: numericString,
  distance: numericString,
});

/**
 * PUT /update_planet (form body)
 *
 * planet_id selects the row; every other field is optional and only
 * supplied ones are overwritten.
 */
export const updatePlanetFormSchema = addPlanetFormSchema.partial().extend({
  planet_id: idString,
});
