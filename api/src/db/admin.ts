/**
 * Database Administration
 *
 * create / drop / seed for the two tables. Not reachable over HTTP;
 * driven by src/scripts/db.ts and by the test helpers.
 *
 * One statement per execute() call: pglite's extended protocol rejects
 * multi-statement strings.
 */

import { sql } from 'drizzle-orm';
import type { Database } from './client';
import { planets, users } from './schema';
import type { PlanetInput } from '@/services/planet.service';
import type { UserInput } from '@/services/user.service';

const CREATE_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    firstname TEXT NOT NULL,
    lastname TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    password TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS planets (
    planet_id SERIAL PRIMARY KEY,
    planet_name TEXT NOT NULL UNIQUE,
    planet_type TEXT NOT NULL,
    home_star TEXT NOT NULL,
    mass DOUBLE PRECISION NOT NULL,
    radius DOUBLE PRECISION NOT NULL,
    distance DOUBLE PRECISION NOT NULL
  )`,
];

const DROP_STATEMENTS = ['DROP TABLE IF EXISTS planets', 'DROP TABLE IF EXISTS users'];

export const SEED_PLANETS: readonly PlanetInput[] = [
  {
    planetName: 'Mercury',
    planetType: 'Class D',
    homeStar: 'Sol',
    mass: 3.258e23,
    radius: 1516,
    distance: 35.98e6,
  },
  {
    planetName: 'Venus',
    planetType: 'Class K',
    homeStar: 'Sol',
    mass: 4.867e24,
    radius: 3760,
    distance: 67.24e6,
  },
  {
    planetName: 'Earth',
    planetType: 'Class M',
    homeStar: 'Sol',
    mass: 5.972e24,
    radius: 3959,
    distance: 92.96e6,
  },
];

export const SEED_USER: UserInput = {
  firstname: 'Jemima',
  lastname: 'Briones',
  email: 'jemima_eloise@earth.com',
  password: 'chulis2022',
};

export async function createTables(db: Database): Promise<void> {
  for (const statement of CREATE_STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
}

export async function dropTables(db: Database): Promise<void> {
  for (const statement of DROP_STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
}

/**
 * Insert the fixed bootstrap records; rows that already exist are skipped
 *
 * @returns number of rows actually inserted per table
 */
export async function seedDatabase(db: Database): Promise<{ planets: number; users: number }> {
  const insertedPlanets = await db
    .insert(planets)
    .values([...SEED_PLANETS])
    .onConflictDoNothing({ target: planets.planetName })
    .returning({ planetId: planets.planetId });

  const insertedUsers = await db
    .insert(users)
    .values(SEED_USER)
    .onConflictDoNothing({ target: users.email })
    .returning({ id: users.id });

  return { planets: insertedPlanets.length, users: insertedUsers.length };
}
