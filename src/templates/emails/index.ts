/**
 * Email Templates Module
 *
 * Loads the plaintext, Markdown and HTML template documents a run uses and
 * holds the HTML wrapper applied when only Markdown is given.
 *
 * @module templates/emails
 */

import * as fs from 'fs';
import * as path from 'path';
import { TemplateFileNotFoundError } from '../../services/email/errors';

// ========================================
// DEFAULT HTML WRAPPER
// ========================================

/**
 * Used as the HTML template when a Markdown template is given without one.
 * `content` is the HTML rendered from the Markdown template.
 */
export const DEFAULT_HTML_TEMPLATE = '<html><body>{{ content }}</body></html>';

// ========================================
// TEMPLATE TYPES
// ========================================

export type TemplateFormat = 'plaintext' | 'markdown' | 'html';

/**
 * Raw template documents (front matter included). An empty string means the
 * format was not supplied.
 */
export type TemplateSet = Readonly<Record<TemplateFormat, string>>;

export const EMPTY_TEMPLATE_SET: TemplateSet = Object.freeze({
  plaintext: '',
  markdown: '',
  html: '',
});

// ========================================
// LOADING
// ========================================

/**
 * Load a template document from disk.
 *
 * @throws TemplateFileNotFoundError if the path is missing or not a file
 */
export function loadTemplateFile(filePath: string): string {
  const resolved = path.resolve(filePath);

  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new TemplateFileNotFoundError(filePath);
  }

  return fs.readFileSync(resolved, 'utf-8');
}

/**
 * Load whichever of the three template documents have a path.
 */
export function loadTemplateSet(paths: Partial<Record<TemplateFormat, string>>): TemplateSet {
  return Object.freeze({
    plaintext: paths.plaintext ? loadTemplateFile(paths.plaintext) : '',
    markdown: paths.markdown ? loadTemplateFile(paths.markdown) : '',
    html: paths.html ? loadTemplateFile(paths.html) : '',
  });
}

export function hasAnyTemplate(templates: TemplateSet): boolean {
  return Boolean(templates.plaintext || templates.markdown || templates.html);
}
