/**
 * Email Sender Service
 *
 * SMTP send layer over nodemailer:
 * - Security mode mapping (implicit TLS / STARTTLS / none)
 * - Plain messages or pre-built raw MIME (PGP signed/encrypted)
 * - Translation of nodemailer failures into typed errors
 *
 * One transporter is created per run and closed when the run ends.
 *
 * @module services/email/emailSender
 */

import nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { senderLogger } from '../../utils/logger';
import type { SmtpSecurity } from '../../config/env';
import type { ComposedEmail } from './emailComposer';
import { AuthenticationError, ConnectionError } from './errors';

// ========================================
// TYPES
// ========================================

export interface SmtpSettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
  security: SmtpSecurity;
}

export interface OutgoingMessage {
  email: ComposedEmail;
  /** Complete MIME message; set when the message was signed or encrypted. */
  raw?: Buffer;
}

export interface SendEmailResult {
  messageId?: string;
  accepted: string[];
}

export interface MailTransport {
  send(message: OutgoingMessage): Promise<SendEmailResult>;
  close(): void;
}

/** The part of a nodemailer transporter the sender uses. */
export interface MailTransporter {
  sendMail(options: Mail.Options): Promise<{
    messageId?: string;
    accepted?: Array<string | Mail.Address>;
  }>;
  close(): void;
}

export type TransporterFactory = (options: SMTPTransport.Options) => MailTransporter;

// ========================================
// OPTION MAPPING
// ========================================

export function toTransportOptions(settings: SmtpSettings): SMTPTransport.Options {
  return {
    host: settings.host,
    port: settings.port,
    secure: settings.security === 'tls',
    requireTLS: settings.security === 'starttls',
    ignoreTLS: settings.security === 'none',
    auth: settings.username
      ? { user: settings.username, pass: settings.password }
      : undefined,
  };
}

export function toMailOptions(message: OutgoingMessage): Mail.Options {
  const { email, raw } = message;

  if (raw) {
    return {
      envelope: {
        from: email.from.address,
        to: email.to.map((recipient) => recipient.address),
      },
      raw,
    };
  }

  return {
    from: email.from,
    to: email.to,
    subject: email.subject,
    text: email.text,
    html: email.html,
  };
}

// ========================================
// ERROR TRANSLATION
// ========================================

const CONNECTION_ERROR_CODES = new Set(['ECONNECTION', 'ESOCKET', 'ETIMEDOUT', 'EDNS', 'ETLS']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function translateTransportError(error: unknown): unknown {
  const code = errorCode(error);
  const detail = error instanceof Error ? error.message : String(error);

  if (code === 'EAUTH') {
    return new AuthenticationError(detail);
  }
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return new ConnectionError(detail, code);
  }
  return error;
}

function addressText(address: string | Mail.Address): string {
  return typeof address === 'string' ? address : address.address;
}

// ========================================
// SMTP TRANSPORT
// ========================================

export class SmtpMailTransport implements MailTransport {
  private readonly transporter: MailTransporter;

  constructor(
    private readonly settings: SmtpSettings,
    createTransporter: TransporterFactory = (options) => nodemailer.createTransport(options)
  ) {
    this.transporter = createTransporter(toTransportOptions(settings));
    senderLogger.debug('SMTP transport ready', {
      host: settings.host,
      port: settings.port,
      security: settings.security,
      authenticated: Boolean(settings.username),
    });
  }

  async send(message: OutgoingMessage): Promise<SendEmailResult> {
    try {
      const info = await this.transporter.sendMail(toMailOptions(message));
      return {
        messageId: info.messageId,
        accepted: (info.accepted ?? []).map(addressText),
      };
    } catch (error) {
      senderLogger.debug('SMTP send failed', {
        host: this.settings.host,
        code: errorCode(error),
      });
      throw translateTransportError(error);
    }
  }

  close(): void {
    this.transporter.close();
  }
}

export function createSmtpTransport(
  settings: SmtpSettings,
  createTransporter?: TransporterFactory
): MailTransport {
  return new SmtpMailTransport(settings, createTransporter);
}
