/**
 * Environment Configuration Module
 *
 * Single source of truth for the environment variables the mailer reads.
 * Every value is optional; CLI flags take precedence over what is found here.
 * Uses Zod for type-safe validation.
 *
 * Usage:
 *   import { loadEnvConfig } from './config/env';
 *   const envConfig = loadEnvConfig();
 *   console.log(envConfig.smtp.host);
 *
 * @module config/env
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { InvalidConfigurationError } from '../services/email/errors';

// ========================================
// ENVIRONMENT SCHEMA
// ========================================

export const SmtpSecurityEnum = z.enum(['tls', 'starttls', 'none']);
export type SmtpSecurity = z.infer<typeof SmtpSecurityEnum>;

const envSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),

  // SMTP
  SMTP_HOST: z.string().min(1).optional(),
  SMTP_PORT: z.string().regex(/^\d+$/, 'must be a number').transform(Number).optional(),
  SMTP_USERNAME: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  SMTP_SECURITY: SmtpSecurityEnum.optional(),

  // Mail defaults
  MAIL_SENDER: z.string().min(1).optional(),
  MAIL_SUBJECT: z.string().optional(),

  // PGP
  GPG_KEY_FILE: z.string().min(1).optional(),
  GPG_PASSPHRASE: z.string().optional(),
  GPG_KEYRING_DIR: z.string().min(1).optional(),
});

export type RawEnv = z.infer<typeof envSchema>;

// ========================================
// PARSE AND VALIDATE
// ========================================

function parseEnv(source: NodeJS.ProcessEnv): RawEnv {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

// ========================================
// DERIVED CONFIGURATION
// ========================================

export interface EnvConfig {
  logLevel?: RawEnv['LOG_LEVEL'];
  smtp: {
    host?: string;
    port?: number;
    username?: string;
    password?: string;
    security?: SmtpSecurity;
  };
  mail: {
    sender?: string;
    subject?: string;
  };
  pgp: {
    keyFile?: string;
    passphrase?: string;
    keyringDir?: string;
  };
}

/**
 * Typed configuration derived from the environment.
 *
 * Reads `.env` from the working directory first unless `source` is given.
 */
export function loadEnvConfig(source?: NodeJS.ProcessEnv): EnvConfig {
  if (!source) {
    dotenv.config();
  }
  const env = parseEnv(source ?? process.env);

  return {
    logLevel: env.LOG_LEVEL,
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      username: env.SMTP_USERNAME,
      password: env.SMTP_PASSWORD,
      security: env.SMTP_SECURITY,
    },
    mail: {
      sender: env.MAIL_SENDER,
      subject: env.MAIL_SUBJECT,
    },
    pgp: {
      keyFile: env.GPG_KEY_FILE,
      passphrase: env.GPG_PASSPHRASE,
      keyringDir: env.GPG_KEYRING_DIR,
    },
  };
}
