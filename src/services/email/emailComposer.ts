/**
 * Email Composer Service
 *
 * Pure functions that turn the template set and one recipient's context
 * record into a complete message. Nothing is sent here: sending happens in
 * emailSender.
 *
 * Composition order:
 * 1. Markdown template: front matter split, rendered, converted to HTML. The
 *    result becomes the `content` variable; without an HTML template the
 *    default wrapper is used.
 * 2. HTML template: front matter split against the Markdown-extended
 *    context, rendered into the HTML part.
 * 3. Plaintext template: front matter split against the ORIGINAL context (the
 *    plaintext part does not see HTML/Markdown metadata), rendered. Without
 *    one, plaintext is derived from the HTML part.
 * 4. Sender, recipient and subject come from the HTML-stage context (the
 *    record itself when there is no HTML part), then the plaintext-stage
 *    context.
 *
 * @module services/email/emailComposer
 */

import { composerLogger } from '../../utils/logger';
import { DEFAULT_HTML_TEMPLATE, hasAnyTemplate, type TemplateSet } from '../../templates/emails';
import { parseAddress, parseAddressList, type MailAddress } from './addressParser';
import { splitFrontMatter } from './frontMatter';
import { markdownToHtml } from './markdownConverter';
import { htmlToPlaintext } from './plaintextConverter';
import { renderTemplate, type TemplateContext } from './templateRenderer';
import { MissingRecipientError, MissingSenderError, MissingTemplateError } from './errors';

// ========================================
// TYPES
// ========================================

export interface ComposedEmail {
  from: MailAddress;
  to: MailAddress[];
  subject: string;
  html?: string;
  text: string;
}

interface RenderedPart {
  content: string;
  context: TemplateContext;
}

// ========================================
// STAGES
// ========================================

function renderDocument(document: string, context: TemplateContext): RenderedPart {
  const { body, context: extended } = splitFrontMatter(document, context);
  return { content: renderTemplate(body, extended), context: extended };
}

function renderHtmlPart(templates: TemplateSet, context: TemplateContext): RenderedPart | undefined {
  let htmlTemplate = templates.html;
  let htmlContext = context;

  if (templates.markdown) {
    const markdown = renderDocument(templates.markdown, context);
    htmlContext = Object.freeze({ ...markdown.context, content: markdownToHtml(markdown.content) });
    htmlTemplate = htmlTemplate || DEFAULT_HTML_TEMPLATE;
  }

  if (!htmlTemplate) {
    return undefined;
  }

  return renderDocument(htmlTemplate, htmlContext);
}

// ========================================
// FIELD RESOLUTION
// ========================================

function textValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function addressValues(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(textValue).filter((entry): entry is string => entry !== undefined);
  }
  const text = textValue(value);
  return text ? [text] : [];
}

function firstText(key: string, contexts: TemplateContext[]): string | undefined {
  for (const context of contexts) {
    const value = textValue(context[key]);
    if (value !== undefined) return value;
  }
  return undefined;
}

function firstAddresses(key: string, contexts: TemplateContext[]): string[] {
  for (const context of contexts) {
    const values = addressValues(context[key]);
    if (values.length > 0) return values;
  }
  return [];
}

// ========================================
// COMPOSER
// ========================================

/**
 * Compose the message for one context record.
 *
 * @throws MissingTemplateError when no template is given at all
 * @throws UndefinedVariableError / TemplateSyntaxError from rendering
 * @throws MissingSenderError / MissingRecipientError when those cannot be resolved
 */
export function composeEmail(templates: TemplateSet, context: TemplateContext): ComposedEmail {
  if (!hasAnyTemplate(templates)) {
    throw new MissingTemplateError();
  }

  const html = renderHtmlPart(templates, context);

  let text: string;
  let plaintextStageContext = context;
  if (templates.plaintext) {
    const plaintext = renderDocument(templates.plaintext, context);
    text = plaintext.content;
    plaintextStageContext = plaintext.context;
  } else {
    text = htmlToPlaintext(html?.content ?? '');
  }

  const contexts = html ? [html.context, plaintextStageContext] : [context, plaintextStageContext];

  const sender = firstText('sender', contexts);
  if (!sender) {
    throw new MissingSenderError();
  }

  const recipients = parseAddressList(firstAddresses('recipient', contexts));
  if (recipients.length === 0) {
    throw new MissingRecipientError();
  }

  const subject = firstText('subject', contexts) ?? '';
  composerLogger.debug('Composed email', {
    to: recipients.map((recipient) => recipient.address),
    subject,
    html: html !== undefined,
  });

  return {
    from: parseAddress(sender),
    to: recipients,
    subject,
    html: html?.content,
    text,
  };
}
