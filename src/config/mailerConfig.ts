/**
 * Mailer Configuration
 *
 * Builds the immutable configuration of one run from CLI options layered
 * over environment defaults. Validated with Zod, templates read from disk,
 * then deeply frozen: the send loop only ever reads it.
 *
 * @module config/mailerConfig
 */

import { z } from 'zod';
import { type EnvConfig, type SmtpSecurity } from './env';
import { hasAnyTemplate, loadTemplateSet, type TemplateSet } from '../templates/emails';
import type { CsvSourceConfig } from '../services/recipientListService';
import type { SmtpSettings } from '../services/email/emailSender';
import type { PgpSettings } from '../services/email/emailSigner';
import {
  formatAddress,
  parseAddress,
  parseAddressList,
  type MailAddress,
} from '../services/email/addressParser';
import {
  InvalidAddressError,
  InvalidConfigurationError,
  MissingTemplateError,
} from '../services/email/errors';

// ========================================
// OPTIONS SCHEMA
// ========================================

export const DEFAULT_SMTP_PORT = 465;
export const DEFAULT_CSV_DELIMITER = ',';

const optionalText = z.string().optional();

export const mailerOptionsSchema = z.object({
  recipientLists: z.array(z.string().min(1)).min(1, 'at least one CSV file is required'),

  smtpHost: optionalText,
  smtpPort: z.number().int().min(1).max(65535).optional(),
  smtpUsername: optionalText,
  smtpPassword: optionalText,
  smtpNossl: z.boolean().default(false),
  smtpStarttls: z.boolean().default(false),

  sender: optionalText,
  subject: optionalText,
  htmlTemplate: optionalText,
  markdownTemplate: optionalText,
  plaintextTemplate: optionalText,

  csvSkipRows: z.number().int().min(0).default(0),
  csvDelimiter: z.string().length(1, 'must be a single character').default(DEFAULT_CSV_DELIMITER),
  sendDelay: z.number().min(0).default(0),

  gpgEncrypt: z.boolean().default(false),
  gpgSign: z.boolean().default(false),
  gpgKey: optionalText,
  gpgPassword: optionalText,
  gpgKeyring: optionalText,

  testEmail: optionalText,
  testCount: z.number().int().min(0).default(1),
  dryRun: z.boolean().default(false),
});

export type MailerOptions = z.input<typeof mailerOptionsSchema>;

// ========================================
// CONFIGURATION
// ========================================

export interface MailerConfig {
  readonly smtp: Readonly<SmtpSettings>;
  /** Formatted default sender, e.g. `Ann <ann@example.com>`. */
  readonly sender?: string;
  readonly subject?: string;
  readonly templates: TemplateSet;
  readonly recipientLists: readonly Readonly<CsvSourceConfig>[];
  /** Seconds to wait after each sent message. */
  readonly sendDelaySeconds: number;
  readonly pgp: Readonly<PgpSettings>;
  readonly testRecipients?: Readonly<{
    addresses: readonly MailAddress[];
    count: number;
  }>;
  readonly dryRun: boolean;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function resolveSecurity(
  options: { smtpNossl: boolean; smtpStarttls: boolean },
  fallback: SmtpSecurity | undefined
): SmtpSecurity {
  if (options.smtpNossl) return 'none';
  if (options.smtpStarttls) return 'starttls';
  return fallback ?? 'tls';
}

function parseOptions(options: MailerOptions): z.output<typeof mailerOptionsSchema> {
  const result = mailerOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

function addressIssue(field: string, build: () => MailAddress[] | MailAddress): string | undefined {
  try {
    build();
    return undefined;
  } catch (error) {
    if (error instanceof InvalidAddressError) return `${field}: ${error.message}`;
    throw error;
  }
}

/**
 * Build the configuration of one run.
 *
 * @throws InvalidConfigurationError on invalid or missing settings
 * @throws TemplateFileNotFoundError when a template path cannot be read
 * @throws MissingTemplateError when no template path is given
 */
export function buildMailerConfig(options: MailerOptions, env: EnvConfig): MailerConfig {
  const parsed = parseOptions(options);

  const host = parsed.smtpHost ?? env.smtp.host ?? '';
  const senderValue = parsed.sender ?? env.mail.sender;

  const issues = [
    !parsed.dryRun && !host ? 'smtpHost: an SMTP host is required' : undefined,
    senderValue ? addressIssue('sender', () => parseAddress(senderValue)) : undefined,
    parsed.testEmail ? addressIssue('testEmail', () => parseAddressList(parsed.testEmail ?? '')) : undefined,
  ].filter((issue): issue is string => issue !== undefined);

  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  const templates = loadTemplateSet({
    plaintext: parsed.plaintextTemplate,
    markdown: parsed.markdownTemplate,
    html: parsed.htmlTemplate,
  });
  if (!hasAnyTemplate(templates)) {
    throw new MissingTemplateError();
  }

  const testAddresses = parsed.testEmail ? parseAddressList(parsed.testEmail) : [];

  const config: MailerConfig = {
    smtp: {
      host,
      port: parsed.smtpPort ?? env.smtp.port ?? DEFAULT_SMTP_PORT,
      username: parsed.smtpUsername ?? env.smtp.username,
      password: parsed.smtpPassword ?? env.smtp.password,
      security: resolveSecurity(parsed, env.smtp.security),
    },
    sender: senderValue ? formatAddress(parseAddress(senderValue)) : undefined,
    subject: parsed.subject ?? env.mail.subject,
    templates,
    recipientLists: parsed.recipientLists.map((path) => ({
      path,
      delimiter: parsed.csvDelimiter,
      skipRows: parsed.csvSkipRows,
    })),
    sendDelaySeconds: parsed.sendDelay,
    pgp: {
      sign: parsed.gpgSign,
      encrypt: parsed.gpgEncrypt,
      keyFile: parsed.gpgKey ?? env.pgp.keyFile,
      passphrase: parsed.gpgPassword ?? env.pgp.passphrase,
      keyringDir: parsed.gpgKeyring ?? env.pgp.keyringDir,
    },
    testRecipients:
      testAddresses.length > 0 ? { addresses: testAddresses, count: parsed.testCount } : undefined,
    dryRun: parsed.dryRun,
  };

  return deepFreeze(config);
}
