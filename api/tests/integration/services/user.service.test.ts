import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { UserService } from '@/services/user.service';
import { ConflictError } from '@/errors/api';
import { buildUser, createTestDatabase, type TestDatabase } from '../../helpers/db';

describe('UserService', () => {
  let database: TestDatabase;
  let users: UserService;

  beforeAll(async () => {
    database = await createTestDatabase();
    users = new UserService(database.db);
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await database.reset();
  });

  it('stores the user verbatim and finds it by email', async () => {
    const inserted = await users.insertUser(buildUser());

    expect(inserted).toEqual({ id: 1, ...buildUser() });
    expect(await users.findUserByEmail('ana@example.com')).toEqual(inserted);
  });

  it('returns null for an unknown email', async () => {
    expect(await users.findUserByEmail('nobody@example.com')).toBeNull();
  });

  it('matches email and password exactly', async () => {
    const inserted = await users.insertUser(buildUser());

    expect(await users.findUserByEmailAndPassword('ana@example.com', 'test-password')).toEqual(inserted);
    expect(await users.findUserByEmailAndPassword('ana@example.com', 'Test-Password')).toBeNull();
    expect(await users.findUserByEmailAndPassword('ANA@example.com', 'test-password')).toBeNull();
  });

  it('raises ConflictError on a duplicate email', async () => {
    await users.insertUser(buildUser());

    await expect(users.insertUser(buildUser({ firstname: 'Other' }))).rejects.toMatchObject({
      name: 'ConflictError',
      status: 409,
      message: 'That email already exists.',
    });
    await expect(users.insertUser(buildUser())).rejects.toBeInstanceOf(ConflictError);
  });
});
