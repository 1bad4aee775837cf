/**
 * Email Module
 *
 * Composition and delivery of templated emails.
 *
 * Architecture layers:
 * 1. Templates (frontMatter.ts, templateRenderer.ts) - Front matter, strict rendering
 * 2. Converters (markdownConverter.ts, plaintextConverter.ts) - Markdown to HTML to text
 * 3. Composer (emailComposer.ts) - Pure email composition
 * 4. Signer (emailSigner.ts) - Optional PGP/MIME signing and encryption
 * 5. Sender (emailSender.ts) - SMTP delivery over nodemailer
 *
 * @module services/email
 */

// Errors
export * from './errors';

// Addresses
export {
  type MailAddress,
  parseAddress,
  parseAddressList,
  formatAddress,
} from './addressParser';

// Template layer
export { type SplitDocument, splitFrontMatter } from './frontMatter';
export {
  type TemplateContext,
  collectVariableReferences,
  renderTemplate,
} from './templateRenderer';
export { TEMPLATE_HELPERS } from './templateHelpers';

// Converters
export { markdownToHtml } from './markdownConverter';
export { htmlToPlaintext } from './plaintextConverter';

// Composer layer
export { type ComposedEmail, composeEmail } from './emailComposer';

// Signer layer
export {
  type PgpSettings,
  type EmailSigner,
  PgpEmailSigner,
  createEmailSigner,
  readKeyring,
} from './emailSigner';

// Sender layer
export {
  type SmtpSettings,
  type OutgoingMessage,
  type SendEmailResult,
  type MailTransport,
  SmtpMailTransport,
  createSmtpTransport,
} from './emailSender';
