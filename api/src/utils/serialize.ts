/**
 * Wire Projections
 *
 * Fixed field allowlists for what crosses the HTTP boundary.
 * Only the listed fields are copied; anything else on the record is dropped.
 */

import type { Planet, User } from '@/db/schema';

export interface UserJson {
  id: number;
  firstname: string;
  lastname: string;
  email: string;
  password: string;
}

export interface PlanetJson {
  planet_id: number;
  planet_name: string;
  planet_type: string;
  home_star: string;
  mass: number;
  radius: number;
  distance: number;
}

// NOTE: includes the plaintext password; see DESIGN.md before exposing it further
export function serializeUser(user: User): UserJson {
  return {
    id: user.id,
    firstname: user.firstname,
    lastname: user.lastname,
    email: user.email,
    password: user.password,
  };
}

export function serializeUsers(list: readonly User[]): UserJson[] {
  return list.map(serializeUser);
}

export function serializePlanet(planet: Planet): PlanetJson {
  return {
    planet_id: planet.planetId,
    planet_name: planet.planetName,
    planet_type: planet.planetType,
    home_star: planet.homeStar,
    mass: planet.mass,
    radius: planet.radius,
    distance: planet.distance,
  };
}

export function serializePlanets(list: readonly Planet[]): PlanetJson[] {
  return list.map(serializePlanet);
}
