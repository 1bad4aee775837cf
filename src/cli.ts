#!/usr/bin/env node
/**
 * Bulk Mailer CLI
 *
 * Sends one templated email per row of one or more CSV files.
 *
 * Usage:
 *   bulk-mailer -h smtp.example.com -u ann -e "Ann <ann@example.com>" \
 *     -s "Spring sale" -m message.md recipients.csv
 *   bulk-mailer -n -v -m message.md recipients.csv
 *   bulk-mailer --test-email me@example.com --test-count 2 -m message.md recipients.csv
 *
 * @module cli
 */

import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { input, password } from '@inquirer/prompts';
import { z } from 'zod';
import { cliLogger, configureLogger } from './utils/logger';
import { loadEnvConfig, type EnvConfig } from './config/env';
import { buildMailerConfig, type MailerOptions } from './config/mailerConfig';
import { runBulkMail } from './services/bulkMailerService';

// ========================================
// FLAGS
// ========================================

export type CliFlags = {
  smtpHost?: string;
  smtpPort?: number;
  smtpUsername?: string;
  smtpPassword?: string;
  smtpNossl?: boolean;
  smtpStarttls?: boolean;
  sender?: string;
  subject?: string;
  htmlTemplate?: string;
  markdownTemplate?: string;
  plaintextTemplate?: string;
  csvSkipRows?: number;
  csvDelimiter?: string;
  sendDelay?: number;
  gpgEncrypt?: boolean;
  gpgSign?: boolean;
  gpgKey?: string;
  gpgPassword?: string;
  gpgKeyring?: string;
  testEmail?: string;
  testCount?: number;
  dryRun?: boolean;
  verbose: number;
};

export type CliAction = (csvFiles: string[], flags: CliFlags) => Promise<void>;

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative number.');
  }
  return parsed;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function readPackageVersion(): string {
  const packageJson = fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8');
  return z.object({ version: z.string() }).parse(JSON.parse(packageJson)).version;
}

/**
 * The command line program. `-h` belongs to `--smtp-host`, so help is only
 * available as `--help`.
 */
export function createProgram(version: string, action: CliAction): Command {
  const program = new Command();

  program
    .name('bulk-mailer')
    .description('Send templated emails to every recipient of one or more CSV files')
    .version(version, '--version')
    .helpOption('--help', 'display help for command')
    .argument('<recipient-lists...>', 'CSV files with one recipient per row')
    .option('-h, --smtp-host <host>', 'SMTP server host')
    .option('-o, --smtp-port <port>', 'SMTP server port (default: 465)', parseInteger)
    .option('-u, --smtp-username <username>', 'SMTP username')
    .option('-p, --smtp-password <password>', 'SMTP password')
    .option('--smtp-nossl', 'connect without TLS')
    .option('--smtp-starttls', 'upgrade the connection with STARTTLS')
    .option('-e, --sender <address>', 'default sender, e.g. "Ann <ann@example.com>"')
    .option('-s, --subject <subject>', 'default subject, used as given')
    .option('-l, --html-template <file>', 'HTML template')
    .option('-m, --markdown-template <file>', 'Markdown template')
    .option('--plaintext-template <file>', 'plaintext template')
    .option('--csv-skip-rows <count>', 'rows to skip before the header (default: 0)', parseInteger)
    .option('--csv-delimiter <char>', 'CSV field delimiter (default: ",")')
    .option('--send-delay <seconds>', 'pause after every sent email (default: 0)', parseSeconds)
    .option('--gpg-encrypt', 'encrypt every email with PGP')
    .option('--gpg-sign', 'sign every email with PGP')
    .option('--gpg-key <file>', 'armored private key used for signing')
    .option('--gpg-password <passphrase>', 'passphrase of the signing key')
    .option('--gpg-keyring <directory>', 'directory of armored *.asc keys')
    .option('--test-email <address>', 'send to this address instead of the recipients')
    .option('--test-count <count>', 'emails to send in test mode (default: 1)', parseInteger)
    .option('-n, --dry-run', 'compose every email without sending')
    .option('-v, --verbose', 'increase verbosity (repeatable)', increaseVerbosity, 0)
    .action(async (csvFiles: string[], _options: unknown, command: Command) => {
      await action(csvFiles, command.opts<CliFlags>());
    });

  return program;
}

// ========================================
// OPTIONS
// ========================================

export function toMailerOptions(csvFiles: string[], flags: CliFlags): MailerOptions {
  return {
    recipientLists: csvFiles,
    smtpHost: flags.smtpHost,
    smtpPort: flags.smtpPort,
    smtpUsername: flags.smtpUsername,
    smtpPassword: flags.smtpPassword,
    smtpNossl: flags.smtpNossl,
    smtpStarttls: flags.smtpStarttls,
    sender: flags.sender,
    subject: flags.subject,
    htmlTemplate: flags.htmlTemplate,
    markdownTemplate: flags.markdownTemplate,
    plaintextTemplate: flags.plaintextTemplate,
    csvSkipRows: flags.csvSkipRows,
    csvDelimiter: flags.csvDelimiter,
    sendDelay: flags.sendDelay,
    gpgEncrypt: flags.gpgEncrypt,
    gpgSign: flags.gpgSign,
    gpgKey: flags.gpgKey,
    gpgPassword: flags.gpgPassword,
    gpgKeyring: flags.gpgKeyring,
    testEmail: flags.testEmail,
    testCount: flags.testCount,
    dryRun: flags.dryRun,
  };
}

/**
 * Ask for the SMTP settings neither flags nor environment provide. An empty
 * username means the server is used without authentication.
 */
async function promptForCredentials(options: MailerOptions, env: EnvConfig): Promise<MailerOptions> {
  const smtpHost =
    options.smtpHost ?? env.smtp.host ?? (await input({
      message: 'SMTP host:',
      validate: (value) => value.trim() !== '' || 'An SMTP host is required',
    }));

  const smtpUsername =
    options.smtpUsername ??
    env.smtp.username ??
    (await input({ message: 'SMTP username (empty for none):' }));

  const smtpPassword =
    options.smtpPassword ??
    env.smtp.password ??
    (smtpUsername ? await password({ message: 'SMTP password:' }) : undefined);

  return { ...options, smtpHost, smtpUsername: smtpUsername || undefined, smtpPassword };
}

// ========================================
// MAIN
// ========================================

const INTERRUPTED_MESSAGE = 'Interrupted by user, Exiting...';

function isPromptInterrupt(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

export function describeFailure(error: unknown, verbosity: number): string {
  if (!(error instanceof Error)) return String(error);
  return verbosity >= 2 && error.stack ? error.stack : error.message;
}

async function run(csvFiles: string[], flags: CliFlags): Promise<void> {
  const env = loadEnvConfig();
  configureLogger({
    verbosity: flags.verbose,
    dryRun: Boolean(flags.dryRun),
    defaultLevel: env.logLevel,
  });

  let options = toMailerOptions(csvFiles, flags);
  if (!options.dryRun) {
    options = await promptForCredentials(options, env);
  }

  await runBulkMail(buildMailerConfig(options, env));
}

async function main(): Promise<void> {
  process.on('SIGINT', () => {
    cliLogger.error(INTERRUPTED_MESSAGE);
    process.exit(1);
  });

  let verbosity = 0;
  const program = createProgram(readPackageVersion(), (csvFiles, flags) => {
    verbosity = flags.verbose;
    return run(csvFiles, flags);
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    cliLogger.error(isPromptInterrupt(error) ? INTERRUPTED_MESSAGE : describeFailure(error, verbosity));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(describeFailure(error, 2));
    process.exit(1);
  });
}
