/**
 * Bulk Mailer
 *
 * Library entry point. The command line lives in cli.ts.
 *
 * @module bulk-mailer
 */

export * from './services/email';
export {
  type CsvSourceConfig,
  type ContextRecord,
  type RecipientDefaults,
  loadRecipientContexts,
  normalizeHeaderName,
} from './services/recipientListService';
export {
  type BulkMailerDependencies,
  type BulkSendSummary,
  formatMessagePreview,
  sendBulkMail,
  runBulkMail,
} from './services/bulkMailerService';
export {
  type MailerConfig,
  type MailerOptions,
  buildMailerConfig,
} from './config/mailerConfig';
export { type EnvConfig, loadEnvConfig } from './config/env';
export {
  DEFAULT_HTML_TEMPLATE,
  type TemplateSet,
  loadTemplateSet,
} from './templates/emails';
