/**
 * Authentication Service
 *
 * Credential checks and bearer token lifecycle:
 * - login: exact (email, password) lookup, then an HS256 JWT with sub = email
 * - verify: signature + expiry check, returns the token's identity
 *
 * Authorization is flat: any valid token may write any planet.
 */

import { sign, verify } from 'hono/jwt';
import type { UserService } from '@/services/user.service';
import { AuthenticationError } from '@/errors/api';
import { logger } from '@/utils/logger';

/**
 * Identity carried by a verified token
 */
export interface Identity {
  email: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface AuthServiceOptions {
  secret: string;
  ttlSeconds: number;
  /** Epoch milliseconds; overridable so tests can mint already-expired tokens */
  now?: () => number;
}

const ALGORITHM = 'HS256';

export class AuthService {
  private readonly now: () => number;

  constructor(
    private readonly users: UserService,
    private readonly options: AuthServiceOptions,
  ) {
    if (!options.secret) {
      throw new Error('AuthService requires a non-empty token secret');
    }
    this.now = options.now ?? Date.now;
  }

  /**
   * @throws AuthenticationError when no user matches the pair
   */
  async login(email: string, password: string): Promise<IssuedToken> {
    const user = await this.users.findUserByEmailAndPassword(email, password);

    if (!user) {
      logger.debug('Login rejected', { email });
      throw new AuthenticationError('Bad email or password');
    }

    return this.issue(user.email);
  }

  /**
   * Sign a token for an email without checking credentials
   */
  async issue(email: string): Promise<IssuedToken> {
    const iat = Math.floor(this.now() / 1000);
    const exp = iat + this.options.ttlSeconds;

    const token = await sign({ sub: email, iat, exp }, this.options.secret, ALGORITHM);

    return { token, expiresAt: new Date(exp * 1000) };
  }

  /**
   * @throws AuthenticationError if the token is malformed, expired,
   *   signed with another secret, or has no subject
   */
  async verify(token: string): Promise<Identity> {
    let payload: Awaited<ReturnType<typeof verify>>;
    try {
      payload = await verify(token, this.options.secret, ALGORITHM);
    } catch (error) {
      throw new AuthenticationError('Invalid or expired token', { cause: error });
    }

    const { sub, iat, exp } = payload;
    if (typeof sub !== 'string' || sub.length === 0 || typeof exp !== 'number') {
      throw new AuthenticationError('Invalid or expired token');
    }

    return {
      email: sub,
      issuedAt: new Date((typeof iat === 'number' ? iat : exp - this.options.ttlSeconds) * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }
}
