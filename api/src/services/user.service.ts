/**
 * User Service
 *
 * Persistence operations for registered users. Users are never updated
 * or deleted through the API.
 */

import { and, eq } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { users, type User } from '@/db/schema';
import { ConflictError, isUniqueViolation } from '@/errors/api';

export type UserInput = Omit<User, 'id'>;

export class UserService {
  constructor(private readonly db: Database) {}

  async findUserByEmail(email: string): Promise<User | null> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.email, email))
      .limit(1);

    return user ?? null;
  }

  /**
   * Exact string match on both email and password
   */
  async findUserByEmailAndPassword(email: string, password: string): Promise<User | null> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(and(eq(users.email, email), eq(users.password, password)))
      .limit(1);

    return user ?? null;
  }

  /**
   * Callers check findUserByEmail first; a concurrent registration that
   * slips past that check still lands here as a unique violation.
   *
   * @throws ConflictError if the email is already registered
   */
  async insertUser(input: UserInput): Promise<User> {
    try {
      const [user] = await this.db.insert(users).values(input).returning();
      return user;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('That email already exists.', { cause: error });
      }
      throw error;
    }
  }
}
