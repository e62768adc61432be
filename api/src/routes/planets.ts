/**
 * Planet Routes
 *
 * Catalogue reads are public; writes need a bearer token.
 *
 * Routes:
 * - GET    /planets
 * - GET    /planet_detail/:id
 * - POST   /add_planet          (form body, auth)
 * - PUT    /update_planet       (form body, auth)
 * - DELETE /remove_planet/:id   (auth; a miss answers 200 with a message)
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import type { AppServices } from '@/services';
import type { PlanetChanges } from '@/services/planet.service';
import { requireAuth } from '@/middleware/auth';
import {
  addPlanetFormSchema,
  planetIdParamSchema,
  updatePlanetFormSchema,
} from '@/validators/planets';
import { rejectInvalid } from '@/validators/common';
import { ConflictError, NotFoundError } from '@/errors/api';
import { serializePlanet, serializePlanets } from '@/utils/serialize';
import { titleCase } from '@/utils/text';
import { logger } from '@/utils/logger';

export function createPlanetRoutes(services: AppServices): Hono<HonoEnv> {
  const { planets } = services;
  const routes = new Hono<HonoEnv>({ strict: false });

  /**
   * GET /planets
   */
  routes.get('/planets', async (c) => {
    const all = await planets.listPlanets();
    return c.json(serializePlanets(all));
  });

  /**
   * GET /planet_detail/:id
   */
  routes.get('/planet_detail/:id', zValidator('param', planetIdParamSchema, rejectInvalid), async (c) => {
    const { id } = c.req.valid('param');

    const planet = await planets.findPlanetById(id);
    if (!planet) {
      throw new NotFoundError('That planet does not exist');
    }

    return c.json(serializePlanet(planet));
  });

  /**
   * POST /add_planet
   *
   * Name is title-cased before the duplicate check and the insert
   */
  routes.post(
    '/add_planet',
    requireAuth,
    zValidator('form', addPlanetFormSchema, rejectInvalid),
    async (c) => {
      const form = c.req.valid('form');
      const planetName = titleCase(form.planet_name);

      const existing = await planets.findPlanetByName(planetName);
      if (existing) {
        throw new ConflictError('There is already a planet by that name');
      }

      const planet = await planets.insertPlanet({
        planetName,
        planetType: form.planet_type,
        homeStar: form.home_star,
        mass: form.mass,
        radius: form.radius,
        distance: form.distance,
      });

      logger.info('Planet added', { planetId: planet.planetId, by: c.get('identity')?.email });

      return c.json({ message: 'You added a planet', planet: serializePlanet(planet) }, 201);
    }
  );

  /**
   * PUT /update_planet
   *
   * Only the fields present in the form are overwritten
   */
  routes.put(
    '/update_planet',
    requireAuth,
    zValidator('form', updatePlanetFormSchema, rejectInvalid),
    async (c) => {
      const form = c.req.valid('form');

      const changes: PlanetChanges = {};
      if (form.planet_name !== undefined) changes.planetName = titleCase(form.planet_name);
      if (form.planet_type !== undefined) changes.planetType = form.planet_type;
      if (form.home_star !== undefined) changes.homeStar = form.home_star;
      if (form.mass !== undefined) changes.mass = form.mass;
      if (form.radius !== undefined) changes.radius = form.radius;
      if (form.distance !== undefined) changes.distance = form.distance;

      const planet = await planets.updatePlanet(form.planet_id, changes);

      logger.info('Planet updated', {
        planetId: planet.planetId,
        fields: Object.keys(changes),
        by: c.get('identity')?.email,
      });

      return c.json({ message: 'You updated a planet', planet: serializePlanet(planet) }, 202);
    }
  );

  /**
   * DELETE /remove_planet/:id
   */
  routes.delete(
    '/remove_planet/:id',
    requireAuth,
    zValidator('param', planetIdParamSchema, rejectInvalid),
    async (c) => {
      const { id } = c.req.valid('param');

      // A miss is reported in the body only, with the default status
      const removed = await planets.deletePlanet(id);
      if (!removed) {
        return c.json({ message: 'That planet does not exist' });
      }

      logger.info('Planet removed', { planetId: id, by: c.get('identity')?.email });

      return c.json({ message: 'You deleted a planet' }, 202);
    }
  );

  return routes;
}
