import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { AuthService } from '@/services/auth.service';
import { buildPlanet, createTestDatabase, type TestDatabase } from '../../helpers/db';
import { TEST_AUTH, bearer, createTestApp, form, type TestContext } from '../../helpers/app';

const newPlanet = {
  planet_name: 'mars',
  planet_type: 'Class M',
  home_star: 'Sol',
  mass: '6.417e23',
  radius: '2106',
  distance: '141.6e6',
};

describe('Planet routes', () => {
  let database: TestDatabase;
  let ctx: TestContext;
  let token: string;

  beforeAll(async () => {
    database = await createTestDatabase();
    ctx = createTestApp(database);
    ({ token } = await ctx.services.auth.issue('ana@example.com'));
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await database.reset();
  });

  describe('GET /planets', () => {
    it('lists every planet in wire format', async () => {
      await ctx.services.planets.insertPlanet(buildPlanet({ planetName: 'Mercury' }));
      await ctx.services.planets.insertPlanet(buildPlanet({ planetName: 'Venus' }));

      const response = await ctx.app.request('/planets');
      const data = await response.json();

      expect(response.status).toBe(200);
      expect(data).toHaveLength(2);
      expect(data[0]).toEqual({
        planet_id: 1,
        planet_name: 'Mercury',
        planet_type: 'Class J',
        home_star: 'Kepler-22',
        mass: 1.2e25,
        radius: 15000,
        distance: 5.8e15,
      });
      expect(data[1].planet_name).toBe('Venus');
    });

    it('returns an empty array when there are no planets', async () => {
      const response = await ctx.app.request('/planets/');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual([]);
    });
  });

  describe('GET /planet_detail/:id', () => {
    it('returns the planet', async () => {
      const planet = await ctx.services.planets.insertPlanet(buildPlanet());

      const response = await ctx.app.request(`/planet_detail/${planet.planetId}`);

      expect(response.status).toBe(200);
      expect((await response.json()).planet_name).toBe('Kepler');
    });

    it('answers 404 for an unknown id', async () => {
      const response = await ctx.app.request('/planet_detail/9999');

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ message: 'That planet does not exist', code: 'NOT_FOUND' });
    });

    it.each(['99999999999', '3000000000', '1e10', '0'])('answers 400 for out-of-range id %s', async (id) => {
      const response = await ctx.app.request(`/planet_detail/${id}`);

      expect(response.status).toBe(400);
      expect((await response.json()).code).toBe('VALIDATION_ERROR');
    });

    it('answers 400 for a non-numeric id', async () => {
      const response = await ctx.app.request('/planet_detail/mars');

      expect(response.status).toBe(400);
    });
  });

  describe('protected endpoints without a valid token', () => {
    const requests: Array<[string, string, RequestInit['body']]> = [
      ['POST', '/add_planet', form(newPlanet)],
      ['POST', '/add_planet', form({ planet_name: '' })],
      ['PUT', '/update_planet', form({ planet_id: 1, mass: 1 })],
      ['PUT', '/update_planet', form({ planet_id: 'x' })],
      ['DELETE', '/remove_planet/1', undefined],
      ['DELETE', '/remove_planet/abc', undefined],
    ];

    it.each(requests)('%s %s answers 401 with no Authorization header', async (method, path, body) => {
      const response = await ctx.app.request(path, { method, body });

      expect(response.status).toBe(401);
      expect(response.headers.get('www-authenticate')).toBe('Bearer');
      expect(await response.json()).toEqual({
        message: 'Authentication required',
        code: 'UNAUTHENTICATED',
      });
    });

    it.each(requests)('%s %s answers 401 with a forged token', async (method, path, body) => {
      const forger = new AuthService(ctx.services.users, { ...TEST_AUTH, secret: 'other-secret' });
      const forged = await forger.issue('ana@example.com');

      const response = await ctx.app.request(path, { method, body, headers: bearer(forged.token) });

      expect(response.status).toBe(401);
    });

    it('answers 401 for an expired token and leaves the table alone', async () => {
      const stale = new AuthService(ctx.services.users, {
        ...TEST_AUTH,
        now: () => Date.now() - 2 * 3600 * 1000,
      });
      const expired = await stale.issue('ana@example.com');

      const response = await ctx.app.request('/add_planet', {
        method: 'POST',
        body: form(newPlanet),
        headers: bearer(expired.token),
      });

      expect(response.status).toBe(401);
      expect(await ctx.services.planets.countPlanets()).toBe(0);
    });
  });

  describe('POST /add_planet', () => {
    it('stores the planet with a title-cased name', async () => {
      const response = await ctx.app.request('/add_planet', {
        method: 'POST',
        body: form(newPlanet),
        headers: bearer(token),
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({
        message: 'You added a planet',
        planet: {
          planet_id: 1,
          planet_name: 'Mars',
          planet_type: 'Class M',
          home_star: 'Sol',
          mass: 6.417e23,
          radius: 2106,
          distance: 141600000,
        },
      });
      expect((await ctx.services.planets.findPlanetByName('Mars'))?.planetId).toBe(1);
    });

    it('answers 409 when the title-cased name exists', async () => {
      await ctx.services.planets.insertPlanet(buildPlanet({ planetName: 'Mars' }));

      const response = await ctx.app.request('/add_planet', {
        method: 'POST',
        body: form({ ...newPlanet, planet_name: 'MARS' }),
        headers: bearer(token),
      });

      expect(response.status).toBe(409);
      expect(await response.json()).toEqual({
        message: 'There is already a planet by that name',
        code: 'CONFLICT',
      });
      expect(await ctx.services.planets.countPlanets()).toBe(1);
    });

    it('answers 400 for a non-numeric mass', async () => {
      const response = await ctx.app.request('/add_planet', {
        method: 'POST',
        body: form({ ...newPlanet, mass: 'heavy' }),
        headers: bearer(token),
      });
      const data = await response.json();

      expect(response.status).toBe(400);
      expect(data.code).toBe('VALIDATION_ERROR');
      expect(data.details[0].path).toEqual(['mass']);
    });
  });

  describe('PUT /update_planet', () => {
    it('changes only mass when only mass is sent', async () => {
      const before = await ctx.services.planets.insertPlanet(buildPlanet());

      const response = await ctx.app.request('/update_planet', {
        method: 'PUT',
        body: form({ planet_id: before.planetId, mass: '9.9e24' }),
        headers: bearer(token),
      });

      expect(response.status).toBe(202);
      expect((await response.json()).message).toBe('You updated a planet');
      expect(await ctx.services.planets.findPlanetById(before.planetId)).toEqual({
        ...before,
        mass: 9.9e24,
      });
    });

    it('overwrites every supplied field', async () => {
      const before = await ctx.services.planets.insertPlanet(buildPlanet());

      const response = await ctx.app.request('/update_planet', {
        method: 'PUT',
        body: form({ ...newPlanet, planet_id: before.planetId }),
        headers: bearer(token),
      });

      expect(response.status).toBe(202);
      expect((await response.json()).planet).toEqual({
        planet_id: before.planetId,
        planet_name: 'Mars',
        planet_type: 'Class M',
        home_star: 'Sol',
        mass: 6.417e23,
        radius: 2106,
        distance: 141600000,
      });
    });

    it('answers 404 for an unknown planet_id', async () => {
      const response = await ctx.app.request('/update_planet', {
        method: 'PUT',
        body: form({ planet_id: 9999, mass: 1 }),
        headers: bearer(token),
      });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        message: 'That planet does not exist',
        code: 'NOT_FOUND',
      });
    });

    it('answers 400 for a planet_id beyond the serial range', async () => {
      await ctx.services.planets.insertPlanet(buildPlanet());

      const response = await ctx.app.request('/update_planet', {
        method: 'PUT',
        body: form({ planet_id: '1e10', mass: 1 }),
        headers: bearer(token),
      });

      expect(response.status).toBe(400);
      expect((await response.json()).code).toBe('VALIDATION_ERROR');
      expect((await ctx.services.planets.findPlanetById(1))?.mass).toBe(1.2e25);
    });

    it('answers 409 when renaming onto an existing planet', async () => {
      await ctx.services.planets.insertPlanet(buildPlanet({ planetName: 'Mars' }));
      const venus = await ctx.services.planets.insertPlanet(buildPlanet({ planetName: 'Venus' }));

      const response = await ctx.app.request('/update_planet', {
        method: 'PUT',
        body: form({ planet_id: venus.planetId, planet_name: 'mars' }),
        headers: bearer(token),
      });

      expect(response.status).toBe(409);
      expect((await response.json()).code).toBe('CONFLICT');
    });
  });

  describe('DELETE /remove_planet/:id', () => {
    it('deletes the planet with 202', async () => {
      const planet = await ctx.services.planets.insertPlanet(buildPlanet());

      const response = await ctx.app.request(`/remove_planet/${planet.planetId}`, {
        method: 'DELETE',
        headers: bearer(token),
      });

      expect(response.status).toBe(202);
      expect(await response.json()).toEqual({ message: 'You deleted a planet' });
      expect(await ctx.services.planets.findPlanetById(planet.planetId)).toBeNull();
    });

    it('reports a miss for id 9999 in the body and leaves the row count unchanged', async () => {
      await ctx.services.planets.insertPlanet(buildPlanet());

      const response = await ctx.app.request('/remove_planet/9999', {
        method: 'DELETE',
        headers: bearer(token),
      });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ message: 'That planet does not exist' });
      expect(await ctx.services.planets.countPlanets()).toBe(1);
    });

    it('answers 400 for an id beyond the serial range', async () => {
      await ctx.services.planets.insertPlanet(buildPlanet());

      const response = await ctx.app.request('/remove_planet/3000000000', {
        method: 'DELETE',
        headers: bearer(token),
      });

      expect(response.status).toBe(400);
      expect((await response.json()).code).toBe('VALIDATION_ERROR');
      expect(await ctx.services.planets.countPlanets()).toBe(1);
    });
  });
});
