import { Marked } from 'marked';

/**
 * Markdown is rendered with GitHub flavour and `breaks` on, so a single
 * newline becomes `<br>`. Raw HTML inside the Markdown is passed through as is.
 */
const markdown = new Marked({
  gfm: true,
  breaks: true,
  async: false,
});

export function markdownToHtml(source: string): string {
  const html = markdown.parse(source);
  if (typeof html !== 'string') {
    throw new TypeError('Markdown renderer returned a promise; async extensions are not supported');
  }
  return html;
}
