/**
 * Bulk Mailer Errors
 *
 * Every failure the mailer raises on purpose. Any of them aborts the whole run;
 * the CLI prints `message` (or the stack at high verbosity) and exits with 1.
 *
 * @module services/email/errors
 */

export class BulkMailerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BulkMailerError';
  }
}

// ========================================
// RECIPIENT LIST
// ========================================

export class RecipientListNotFoundError extends BulkMailerError {
  constructor(public path: string) {
    super(`CSV file '${path}' does not exist or is not a file.`);
    this.name = 'RecipientListNotFoundError';
  }
}

export class MissingHeaderError extends BulkMailerError {
  constructor(public path: string, public columnIndex: number) {
    super(
      `CSV file '${path}' is missing a proper header. Make sure none of the headers is empty (column ${columnIndex + 1}).`
    );
    this.name = 'MissingHeaderError';
  }
}

export class MissingRecipientColumnError extends BulkMailerError {
  constructor(public path: string, public headers: string[]) {
    super(`CSV file '${path}' is missing an email column.`);
    this.name = 'MissingRecipientColumnError';
  }
}

// ========================================
// TEMPLATES
// ========================================

export class TemplateFileNotFoundError extends BulkMailerError {
  constructor(public path: string) {
    super(`Template file '${path}' does not exist or is not a file.`);
    this.name = 'TemplateFileNotFoundError';
  }
}

export class MissingTemplateError extends BulkMailerError {
  constructor() {
    super('No template given. Provide a plaintext, Markdown or HTML template.');
    this.name = 'MissingTemplateError';
  }
}

export class UndefinedVariableError extends BulkMailerError {
  constructor(public variable: string) {
    super(`Undefined variable: '${variable}' is undefined`);
    this.name = 'UndefinedVariableError';
  }
}

export class TemplateSyntaxError extends BulkMailerError {
  constructor(public detail: string) {
    super(`Template syntax error: ${detail}`);
    this.name = 'TemplateSyntaxError';
  }
}

export class InvalidFrontMatterError extends BulkMailerError {
  constructor(public detail: string) {
    super(`Invalid front matter: ${detail}`);
    this.name = 'InvalidFrontMatterError';
  }
}

// ========================================
// ADDRESSES
// ========================================

export class InvalidAddressError extends BulkMailerError {
  constructor(public value: string, reason: string) {
    super(`Invalid email address '${value}': ${reason}`);
    this.name = 'InvalidAddressError';
  }
}

export class MissingSenderError extends BulkMailerError {
  constructor() {
    super('Missing sender');
    this.name = 'MissingSenderError';
  }
}

export class MissingRecipientError extends BulkMailerError {
  constructor() {
    super('Missing recipient');
    this.name = 'MissingRecipientError';
  }
}

// ========================================
// TRANSPORT
// ========================================

export class AuthenticationError extends BulkMailerError {
  constructor(public detail: string) {
    super(`Authentication failed: ${detail}`);
    this.name = 'AuthenticationError';
  }
}

export class ConnectionError extends BulkMailerError {
  constructor(public detail: string, public code?: string) {
    super(`Server disconnected: ${detail}`);
    this.name = 'ConnectionError';
  }
}

// ========================================
// PGP
// ========================================

export class MissingSigningKeyError extends BulkMailerError {
  constructor() {
    super('No signing key given. Pass --gpg-key or set GPG_KEY_FILE.');
    this.name = 'MissingSigningKeyError';
  }
}

export class MissingEncryptionKeyError extends BulkMailerError {
  constructor(public address: string) {
    super(`No public key found for '${address}'.`);
    this.name = 'MissingEncryptionKeyError';
  }
}

// ========================================
// CONFIGURATION
// ========================================

export class InvalidConfigurationError extends BulkMailerError {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'InvalidConfigurationError';
  }
}
