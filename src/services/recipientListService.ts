/**
 * Recipient List Service
 *
 * Reads recipient CSV files and yields one context record per data row.
 *
 * - Sources are read one after another, rows in file order
 * - `skipRows` leading records are dropped, blank lines included, and the
 *   next non-blank record is the header
 * - Blank records after the skipped ones are ignored
 * - Stray quotes inside unquoted cells are kept as text
 * - Header cells become identifiers (see normalizeHeaderName)
 * - The recipient column is the first of `mail`, `e_mail`, `email`, `to`
 * - Rows shorter than the header simply lack the trailing keys
 *
 * @module services/recipientListService
 */

import * as fs from 'fs';
import { pipeline } from 'stream';
import { parse } from 'csv-parse';
import { recipientsLogger } from '../utils/logger';
import {
  MissingHeaderError,
  MissingRecipientColumnError,
  RecipientListNotFoundError,
} from './email/errors';

// ========================================
// TYPES
// ========================================

export interface CsvSourceConfig {
  path: string;
  delimiter: string;
  skipRows: number;
}

export interface RecipientDefaults {
  /** Formatted sender address; becomes `from` and `sender`. */
  sender?: string;
  subject?: string;
}

export type ContextRecord = Readonly<Record<string, string>>;

export const RECIPIENT_COLUMN_NAMES = ['mail', 'e_mail', 'email', 'to'] as const;

// ========================================
// HEADER NORMALIZATION
// ========================================

/**
 * Turn a header cell into a template identifier: lower-cased, every
 * character outside `[0-9a-z_]` replaced by `_`, leading non-letters
 * (other than `_`) removed. `E-Mail` becomes `e_mail`, `1st Name` becomes
 * `st_name`.
 */
export function normalizeHeaderName(cell: string): string {
  return cell
    .toLowerCase()
    .replace(/[^0-9a-zA-Z_]/g, '_')
    .replace(/^[^a-zA-Z_]+/, '');
}

export function findRecipientColumn(headers: string[]): number {
  for (const name of RECIPIENT_COLUMN_NAMES) {
    const index = headers.indexOf(name);
    if (index !== -1) return index;
  }
  return -1;
}

// ========================================
// ROW MAPPING
// ========================================

function toRow(record: unknown): string[] {
  if (!Array.isArray(record)) return [];
  return record.map((cell) => (typeof cell === 'string' ? cell : String(cell ?? '')));
}

export function buildContextRecord(
  headers: string[],
  row: string[],
  recipientColumn: number,
  defaults: RecipientDefaults
): ContextRecord {
  const record: Record<string, string> = {};

  headers.forEach((header, index) => {
    if (index < row.length) {
      record[header] = row[index];
    }
  });

  if (defaults.sender) {
    record.from = defaults.sender;
    record.sender = defaults.sender;
  }
  if (defaults.subject) {
    record.subject = defaults.subject;
  }
  if (recipientColumn < row.length) {
    record.recipient = row[recipientColumn];
    record.to = row[recipientColumn];
  }

  return Object.freeze(record);
}

// ========================================
// LOADING
// ========================================

function isBlankRow(row: string[]): boolean {
  return row.every((cell) => cell === '');
}

function assertReadableFile(filePath: string): void {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new RecipientListNotFoundError(filePath);
  }
}

async function* readSource(
  source: CsvSourceConfig,
  defaults: RecipientDefaults
): AsyncGenerator<ContextRecord> {
  assertReadableFile(source.path);

  const input = fs.createReadStream(source.path);
  const parser = parse({
    delimiter: source.delimiter,
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  // A failed read destroys the parser with the same error, ending the loop below.
  pipeline(input, parser, (error) => {
    if (error) {
      recipientsLogger.debug('CSV stream closed', { path: source.path, reason: error.message });
    }
  });

  let skipped = 0;
  let headers: string[] | undefined;
  let recipientColumn = -1;
  let rows = 0;

  try {
    for await (const record of parser) {
      const row = toRow(record);

      if (skipped < source.skipRows) {
        skipped++;
        continue;
      }
      if (isBlankRow(row)) {
        continue;
      }

      if (!headers) {
        headers = row.map(normalizeHeaderName);
        const emptyIndex = headers.findIndex((header) => !header);
        if (emptyIndex !== -1) {
          throw new MissingHeaderError(source.path, emptyIndex);
        }
        recipientColumn = findRecipientColumn(headers);
        if (recipientColumn === -1) {
          throw new MissingRecipientColumnError(source.path, headers);
        }
        recipientsLogger.debug('Parsed CSV header', { path: source.path, headers });
        continue;
      }

      rows++;
      yield buildContextRecord(headers, row, recipientColumn, defaults);
    }
  } finally {
    parser.destroy();
    input.destroy();
  }

  recipientsLogger.debug('Finished reading CSV file', { path: source.path, rows });
}

/**
 * Lazily yield the context records of every source, in order.
 *
 * Files are opened when iteration reaches them; a new call is needed to
 * read them again.
 */
export async function* loadRecipientContexts(
  sources: readonly CsvSourceConfig[],
  defaults: RecipientDefaults = {}
): AsyncGenerator<ContextRecord> {
  for (const source of sources) {
    yield* readSource(source, defaults);
  }
}
