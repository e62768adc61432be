/**
 * Service Container
 *
 * Builds every service from explicit dependencies. Nothing here is a
 * module-level singleton; the server bootstrap owns the instances and
 * shuts them down.
 */

import type { Transporter } from 'nodemailer';
import type { AppConfig } from '@/config';
import type { Database } from '@/db/client';
import { AuthService } from './auth.service';
import { MailService, createSmtpTransport } from './mail.service';
import { PlanetService } from './planet.service';
import { UserService } from './user.service';

export interface AppServices {
  users: UserService;
  planets: PlanetService;
  auth: AuthService;
  mail: MailService;
}

export interface ServiceDependencies {
  db: Database;
  auth: AppConfig['auth'];
  mail: AppConfig['mail'];
  /** Defaults to an SMTP transport built from `mail` */
  transport?: Transporter;
}

export function createServices(deps: ServiceDependencies): AppServices {
  const users = new UserService(deps.db);
  const transport = deps.transport ?? createSmtpTransport(deps.mail);

  return {
    users,
    planets: new PlanetService(deps.db),
    auth: new AuthService(users, deps.auth),
    mail: new MailService(transport, deps.mail.from),
  };
}

export { AuthService, MailService, PlanetService, UserService };
