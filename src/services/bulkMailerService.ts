/**
 * Bulk Mailer Service
 *
 * The send loop: reads context records, composes one message per record and
 * hands it to the transport, strictly one after another.
 *
 * - Test mode redirects the first N messages to the test addresses, then stops
 * - Dry-run composes every message but never touches the transport
 * - An optional delay follows every successful send
 * - Any error aborts the run; there is no per-recipient retry
 *
 * @module services/bulkMailerService
 */

import { setTimeout as sleep } from 'timers/promises';
import { isDebugEnabled, mailerLogger } from '../utils/logger';
import type { MailerConfig } from '../config/mailerConfig';
import { loadRecipientContexts } from './recipientListService';
import { composeEmail, type ComposedEmail } from './email/emailComposer';
import { createSmtpTransport, type MailTransport } from './email/emailSender';
import { createEmailSigner, type EmailSigner } from './email/emailSigner';
import { formatAddress } from './email/addressParser';

// ========================================
// TYPES
// ========================================

export interface BulkMailerDependencies {
  /** Required unless the run is a dry-run. */
  transport?: MailTransport;
  signer?: EmailSigner;
  wait?: (milliseconds: number) => Promise<unknown>;
}

export interface BulkSendSummary {
  composed: number;
  sent: number;
}

// ========================================
// PREVIEW
// ========================================

/**
 * Human readable rendition of a message, every line prefixed with `    > `.
 */
export function formatMessagePreview(email: ComposedEmail): string {
  const lines = [
    `From: ${formatAddress(email.from)}`,
    `To: ${email.to.map(formatAddress).join(', ')}`,
    `Subject: ${email.subject}`,
    '',
    ...email.text.split(/\r?\n/),
  ];
  if (email.html) {
    lines.push('', '--- HTML ---', ...email.html.split(/\r?\n/));
  }
  return lines.map((line) => `    > ${line}`).join('\n');
}

// ========================================
// SEND LOOP
// ========================================

function applyTestRecipients(email: ComposedEmail, config: MailerConfig): ComposedEmail {
  if (!config.testRecipients) return email;
  return { ...email, to: [...config.testRecipients.addresses] };
}

export async function sendBulkMail(
  config: MailerConfig,
  dependencies: BulkMailerDependencies = {}
): Promise<BulkSendSummary> {
  const { transport, signer, wait = sleep } = dependencies;
  if (!config.dryRun && !transport) {
    throw new TypeError('A mail transport is required unless running a dry-run');
  }

  const contexts = loadRecipientContexts(config.recipientLists, {
    sender: config.sender,
    subject: config.subject,
  });

  const summary: BulkSendSummary = { composed: 0, sent: 0 };

  for await (const context of contexts) {
    if (config.testRecipients && summary.composed >= config.testRecipients.count) {
      break;
    }

    const email = applyTestRecipients(composeEmail(config.templates, context), config);
    summary.composed++;

    mailerLogger.info(
      `Sending email from ${formatAddress(email.from)} to ${email.to.map(formatAddress).join(', ')}`
    );
    if (isDebugEnabled()) {
      mailerLogger.debug(`Message content:\n${formatMessagePreview(email)}`);
    }

    if (config.dryRun || !transport) {
      continue;
    }

    const message = signer ? await signer.prepare(email) : { email };
    const result = await transport.send(message);
    summary.sent++;
    mailerLogger.debug('Email accepted', { messageId: result.messageId, accepted: result.accepted });

    if (config.sendDelaySeconds > 0) {
      await wait(config.sendDelaySeconds * 1000);
    }
  }

  mailerLogger.info(`Finished: ${summary.composed} composed, ${summary.sent} sent`);
  return summary;
}

/**
 * Run a complete send with the SMTP transport and PGP settings from `config`.
 * The transport is closed when the run ends, whether it succeeded or not.
 */
export async function runBulkMail(config: MailerConfig): Promise<BulkSendSummary> {
  if (config.dryRun) {
    return sendBulkMail(config);
  }

  const transport = createSmtpTransport(config.smtp);
  try {
    return await sendBulkMail(config, {
      transport,
      signer: createEmailSigner(config.pgp),
    });
  } finally {
    transport.close();
  }
}
