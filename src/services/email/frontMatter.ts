/**
 * Front-Matter Splitter
 *
 * Separates a template document into its YAML front matter and its body.
 * String values in the front matter are templates themselves, rendered
 * against the incoming context, so a subject line can use CSV columns:
 *
 *   ---
 *   subject: "Your order, {{ first_name }}"
 *   from: Shop <shop@example.com>
 *   ---
 *   Hello {{ first_name }}!
 *
 * @module services/email/frontMatter
 */

import matter from 'gray-matter';
import { renderTemplate, type TemplateContext } from './templateRenderer';
import { InvalidFrontMatterError } from './errors';

export interface SplitDocument {
  body: string;
  /** Front matter layered over the base context; front matter wins. */
  context: TemplateContext;
}

function parseDocument(document: string): { data: Record<string, unknown>; content: string } {
  try {
    const parsed = matter(document);
    return { data: { ...parsed.data }, content: parsed.content };
  } catch (error) {
    throw new InvalidFrontMatterError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Render every string value of the front matter and alias `sender` to `from`.
 */
function renderMetadata(
  data: Record<string, unknown>,
  baseContext: TemplateContext
): Record<string, unknown> {
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    metadata[key] = typeof value === 'string' ? renderTemplate(value, baseContext) : value;
  }

  if ('from' in metadata && !('sender' in metadata)) {
    metadata.sender = metadata.from;
  }

  return metadata;
}

export function splitFrontMatter(document: string, baseContext: TemplateContext): SplitDocument {
  if (!document) {
    return { body: '', context: baseContext };
  }

  const { data, content } = parseDocument(document);
  const metadata = renderMetadata(data, baseContext);

  return {
    body: content,
    context: Object.freeze({ ...baseContext, ...metadata }),
  };
}
