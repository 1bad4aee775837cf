import { convert, type HtmlToTextOptions } from 'html-to-text';

// Images carry no text worth keeping in the plaintext alternative.
const CONVERT_OPTIONS: HtmlToTextOptions = {
  wordwrap: 78,
  selectors: [
    { selector: 'img', format: 'skip' },
    { selector: 'a', options: { hideLinkHrefIfSameAsText: true } },
  ],
};

/**
 * Derive the plaintext part of a message from its rendered HTML part.
 */
export function htmlToPlaintext(html: string): string {
  if (!html) return '';
  return convert(html, CONVERT_OPTIONS);
}
