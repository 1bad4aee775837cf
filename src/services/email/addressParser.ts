/**
 * Recipient Address Parser
 *
 * Thin layer over nodemailer's RFC 5322 address parser. Turns the loose
 * strings found in CSV cells, front matter and CLI flags into validated
 * `MailAddress` values.
 *
 * @module services/email/addressParser
 */

import addressparser from 'nodemailer/lib/addressparser';
import { InvalidAddressError } from './errors';

export interface MailAddress {
  name: string;
  address: string;
}

const ADDRESS_PATTERN = /^[^\s@<>]+@[^\s@<>]+$/;

function parseEntries(value: string): MailAddress[] {
  return addressparser(value, { flatten: true }).map((entry) => ({
    name: entry.name.trim(),
    address: entry.address.trim(),
  }));
}

function assertValid(value: string, entry: MailAddress): MailAddress {
  if (!ADDRESS_PATTERN.test(entry.address)) {
    throw new InvalidAddressError(value, 'not an email address');
  }
  return entry;
}

/**
 * Parse a string holding exactly one address, e.g. `Ann <ann@example.com>`.
 */
export function parseAddress(value: string): MailAddress {
  const entries = parseEntries(value);
  if (entries.length === 0) {
    throw new InvalidAddressError(value, 'no address found');
  }
  if (entries.length > 1) {
    throw new InvalidAddressError(value, 'expected a single address');
  }
  return assertValid(value, entries[0]);
}

/**
 * Parse one or more address strings (each may itself be a comma separated
 * list) into a list without duplicates. Duplicates are detected on the
 * lower-cased address; the first occurrence wins.
 */
export function parseAddressList(values: string | string[]): MailAddress[] {
  const seen = new Set<string>();
  const result: MailAddress[] = [];

  for (const value of Array.isArray(values) ? values : [values]) {
    if (!value.trim()) continue;

    for (const entry of parseEntries(value)) {
      const key = assertValid(value, entry).address.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      result.push(entry);
    }
  }

  return result;
}

export function formatAddress(address: MailAddress): string {
  if (!address.name) return address.address;
  const name = /[",;:<>@()[\]\\]/.test(address.name)
    ? `"${address.name.replace(/(["\\])/g, '\\$1')}"`
    : address.name;
  return `${name} <${address.address}>`;
}
