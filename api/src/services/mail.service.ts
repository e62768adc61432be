/**
 * Mail Service
 *
 * Password recovery over SMTP via nodemailer.
 * The transport is injected so tests can swap in nodemailer's JSON transport.
 */

import nodemailer, { type Transporter } from 'nodemailer';
import { DeliveryError } from '@/errors/api';
import { logger } from '@/utils/logger';

export interface SmtpOptions {
  host: string;
  port: number;
  user?: string;
  password?: string;
}

/**
 * STARTTLS is mandatory; implicit TLS (port 465 style) is not used
 */
export function createSmtpTransport(options: SmtpOptions): Transporter {
  return nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: false,
    requireTLS: true,
    auth: options.user ? { user: options.user, pass: options.password ?? '' } : undefined,
  });
}

export interface RecoveryMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export function buildRecoveryMessage(from: string, email: string, password: string): RecoveryMessage {
  return {
    from,
    to: email,
    subject: 'Your planetary API password',
    text: `Your planetary API password is ${password}`,
  };
}

export class MailService {
  constructor(
    private readonly transport: Transporter,
    private readonly from: string,
  ) {}

  /**
   * @throws DeliveryError if the transport rejects the message
   */
  async sendPasswordRecovery(email: string, password: string): Promise<void> {
    const message = buildRecoveryMessage(this.from, email, password);

    try {
      const info = await this.transport.sendMail(message);
      logger.info('Password recovery sent', { to: email, messageId: info.messageId });
    } catch (error) {
      logger.error('Password recovery delivery failed', { to: email, error: String(error) });
      throw new DeliveryError(`Could not send password to ${email}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    this.transport.close();
  }
}
