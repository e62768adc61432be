/**
 * Planetary API Database Schema
 * Drizzle ORM 0.39.x schema for PostgreSQL
 *
 * Two independent tables, no foreign keys between them.
 * The DDL used by the admin commands lives in ./admin.ts and must stay
 * in sync with these definitions.
 */

import { pgTable, serial, text, doublePrecision } from 'drizzle-orm/pg-core';

/**
 * Registered API users
 *
 * Passwords are stored verbatim as supplied at registration.
 */
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  firstname: text('firstname').notNull(),
  lastname: text('lastname').notNull(),
  email: text('email').notNull().unique(),
  password: text('password').notNull(),
});

/**
 * Planet catalogue
 *
 * planet_name is unique at the store level; handlers also check it before
 * inserting so they can answer with a friendly 409.
 */
export const planets = pgTable('planets', {
  planetId: serial('planet_id').primaryKey(),
  planetName: text('planet_name').notNull().unique(),
  planetType: text('planet_type').notNull(),
  homeStar: text('home_star').notNull(),
  mass: doublePrecision('mass').notNull(),
  radius: doublePrecision('radius').notNull(),
  distance: doublePrecision('distance').notNull(),
});

export type User = typeof users.$inferSelect;
export type Planet = typeof planets.$inferSelect;
