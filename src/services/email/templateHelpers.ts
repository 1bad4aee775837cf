/**
 * Template Helpers
 *
 * The fixed helper library available inside every template, e.g.
 * `{{upper name}}` or `{{default nickname "friend"}}`.
 *
 * @module services/email/templateHelpers
 */

import type { HelperDelegate } from 'handlebars';

function asText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Handlebars passes an options object as the last argument of every helper
 * call; strip it so helpers only see their real arguments.
 */
function helperArgs(args: unknown[]): unknown[] {
  return args.slice(0, -1);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export const TEMPLATE_HELPERS: Record<string, HelperDelegate> = {
  upper: (value: unknown) => asText(value).toUpperCase(),

  lower: (value: unknown) => asText(value).toLowerCase(),

  capitalize: (value: unknown) => capitalize(asText(value)),

  title: (value: unknown) =>
    asText(value)
      .split(/(\s+)/)
      .map((part) => (part.trim() ? capitalize(part) : part))
      .join(''),

  trim: (value: unknown) => asText(value).trim(),

  replace: (value: unknown, search: unknown, replacement: unknown) =>
    asText(value).split(asText(search)).join(asText(replacement)),

  truncate: (value: unknown, length: unknown) => {
    const text = asText(value);
    const max = Number(length);
    if (!Number.isFinite(max) || text.length <= max) return text;
    return `${text.slice(0, Math.max(0, max - 3))}...`;
  },

  join: (...args: unknown[]) => {
    const [list, separator] = helperArgs(args);
    if (!Array.isArray(list)) return asText(list);
    return list.map(asText).join(typeof separator === 'string' ? separator : ', ');
  },

  // Empty strings count as missing; CSV cells are never undefined.
  default: (value: unknown, fallback: unknown) => {
    const text = asText(value);
    return text ? text : asText(fallback);
  },

  date: (...args: unknown[]) => {
    const [value, locale] = helperArgs(args);
    const date = value === undefined ? new Date() : new Date(asText(value));
    if (Number.isNaN(date.getTime())) return asText(value);
    return date.toLocaleDateString(typeof locale === 'string' ? locale : 'en-US', {
      year: 'numeric',
      month: 'long',
      day: 'numeric',
    });
  },
};
