/**
 * Planet Service
 *
 * Persistence operations for the planet catalogue.
 * Every method is a single round trip relying on auto-commit.
 */

import { asc, count, eq } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { planets, type Planet } from '@/db/schema';
import { ConflictError, NotFoundError, isUniqueViolation } from '@/errors/api';

/**
 * Fields supplied when creating a planet (planet_id is generated)
 */
export type PlanetInput = Omit<Planet, 'planetId'>;

/**
 * Mutable fields; omitted ones keep their stored value
 */
export type PlanetChanges = Partial<PlanetInput>;

export class PlanetService {
  constructor(private readonly db: Database) {}

  /**
   * All planets ordered by id (no pagination)
   */
  async listPlanets(): Promise<Planet[]> {
    return this.db.select().from(planets).orderBy(asc(planets.planetId));
  }

  async findPlanetById(planetId: number): Promise<Planet | null> {
    const [planet] = await this.db
      .select()
      .from(planets)
      .where(eq(planets.planetId, planetId))
      .limit(1);

    return planet ?? null;
  }

  async findPlanetByName(planetName: string): Promise<Planet | null> {
    const [planet] = await this.db
      .select()
      .from(planets)
      .where(eq(planets.planetName, planetName))
      .limit(1);

    return planet ?? null;
  }

  /**
   * @throws ConflictError if planet_name is already taken
   */
  async insertPlanet(input: PlanetInput): Promise<Planet> {
    try {
      const [planet] = await this.db.insert(planets).values(input).returning();
      return planet;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('There is already a planet by that name', { cause: error });
      }
      throw error;
    }
  }

  /**
   * Overwrite the supplied fields of an existing planet
   *
   * @throws NotFoundError if no planet has this id
   * @throws ConflictError if the new name belongs to another planet
   */
  async updatePlanet(planetId: number, changes: PlanetChanges): Promise<Planet> {
    if (Object.keys(changes).length === 0) {
      const existing = await this.findPlanetById(planetId);
      if (!existing) throw new NotFoundError('That planet does not exist');
      return existing;
    }

    let updated: Planet[];
    try {
      updated = await this.db
        .update(planets)
        .set(changes)
        .where(eq(planets.planetId, planetId))
        .returning();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('There is already a planet by that name', { cause: error });
      }
      throw error;
    }

    const [planet] = updated;
    if (!planet) {
      throw new NotFoundError('That planet does not exist');
    }
    return planet;
  }

  /**
   * @returns false when no planet had this id
   */
  async deletePlanet(planetId: number): Promise<boolean> {
    const removed = await this.db
      .delete(planets)
      .where(eq(planets.planetId, planetId))
      .returning({ planetId: planets.planetId });

    return removed.length > 0;
  }

  async countPlanets(): Promise<number> {
    const [row] = await this.db.select({ total: count() }).from(planets);
    return row?.total ?? 0;
  }
}
