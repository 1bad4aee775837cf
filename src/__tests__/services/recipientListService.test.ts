/**
 * Recipient List Service Tests
 *
 * Tests for CSV loading including:
 * - Header normalization and recipient column detection
 * - Fixed fields (sender, subject, recipient) layered over CSV columns
 * - Skipped preamble rows, custom delimiters and BOM handling
 * - Blank lines and stray quotes
 * - Malformed files
 */

import fs from 'fs';
import {
  buildContextRecord,
  findRecipientColumn,
  loadRecipientContexts,
  normalizeHeaderName,
  type ContextRecord,
  type CsvSourceConfig,
} from '../../services/recipientListService';
import {
  MissingHeaderError,
  MissingRecipientColumnError,
  RecipientListNotFoundError,
} from '../../services/email/errors';
import { testUtils } from '../setup';

function source(file: string, overrides: Partial<CsvSourceConfig> = {}): CsvSourceConfig {
  return { path: testUtils.fixturePath(file), delimiter: ',', skipRows: 0, ...overrides };
}

async function collect(records: AsyncIterable<ContextRecord>): Promise<ContextRecord[]> {
  const result: ContextRecord[] = [];
  for await (const record of records) {
    result.push(record);
  }
  return result;
}

// ========================================
// HEADER NORMALIZATION TESTS
// ========================================

describe('normalizeHeaderName()', () => {
  it('should lower-case and replace separators with underscores', () => {
    expect(normalizeHeaderName('First Name')).toBe('first_name');
    expect(normalizeHeaderName('E-Mail')).toBe('e_mail');
  });

  it('should replace every special character individually', () => {
    expect(normalizeHeaderName('a -- b')).toBe('a____b');
  });

  it('should strip leading digits but keep leading underscores', () => {
    expect(normalizeHeaderName('1st Name')).toBe('st_name');
    expect(normalizeHeaderName(' Name')).toBe('_name');
  });

  it('should return an empty name for an empty cell', () => {
    expect(normalizeHeaderName('')).toBe('');
    expect(normalizeHeaderName('123')).toBe('');
  });
});

describe('findRecipientColumn()', () => {
  it('should prefer mail over e_mail, email and to', () => {
    expect(findRecipientColumn(['to', 'email', 'e_mail', 'mail'])).toBe(3);
    expect(findRecipientColumn(['to', 'email'])).toBe(1);
    expect(findRecipientColumn(['name', 'to'])).toBe(1);
  });

  it('should return -1 without a recipient column', () => {
    expect(findRecipientColumn(['name', 'company'])).toBe(-1);
  });
});

// ========================================
// ROW MAPPING TESTS
// ========================================

describe('buildContextRecord()', () => {
  const headers = ['name', 'email', 'subject'];

  it('should let fixed fields override CSV columns', () => {
    const record = buildContextRecord(headers, ['Ann', 'ann@example.com', 'From CSV'], 1, {
      sender: 'Shop <shop@example.com>',
      subject: 'Fixed',
    });

    expect(record).toEqual({
      name: 'Ann',
      email: 'ann@example.com',
      subject: 'Fixed',
      from: 'Shop <shop@example.com>',
      sender: 'Shop <shop@example.com>',
      recipient: 'ann@example.com',
      to: 'ann@example.com',
    });
  });

  it('should keep CSV values when no defaults are given', () => {
    const record = buildContextRecord(headers, ['Ann', 'ann@example.com', 'From CSV'], 1, {});
    expect(record.subject).toBe('From CSV');
    expect(record).not.toHaveProperty('sender');
  });

  it('should return a frozen record', () => {
    const record = buildContextRecord(headers, ['Ann', 'ann@example.com', ''], 1, {});
    expect(Object.isFrozen(record)).toBe(true);
  });
});

// ========================================
// LOADING TESTS
// ========================================

describe('loadRecipientContexts()', () => {
  it('should yield one record per data row in file order', async () => {
    const records = await collect(
      loadRecipientContexts([source('recipients.csv')], {
        sender: 'Shop <shop@example.com>',
        subject: 'Hi',
      })
    );

    expect(records).toEqual([
      {
        first_name: 'Ann',
        e_mail: 'ann@example.com',
        company: 'Acme',
        from: 'Shop <shop@example.com>',
        sender: 'Shop <shop@example.com>',
        subject: 'Hi',
        recipient: 'ann@example.com',
        to: 'ann@example.com',
      },
      {
        first_name: 'Bob',
        e_mail: 'bob@example.com',
        company: 'Globex',
        from: 'Shop <shop@example.com>',
        sender: 'Shop <shop@example.com>',
        subject: 'Hi',
        recipient: 'bob@example.com',
        to: 'bob@example.com',
      },
    ]);
  });

  it('should read several sources one after another', async () => {
    const records = await collect(
      loadRecipientContexts([
        source('recipients.csv'),
        source('preamble.csv', { delimiter: ';', skipRows: 2 }),
      ])
    );

    expect(records.map((record) => record.recipient)).toEqual([
      'ann@example.com',
      'bob@example.com',
      'carol@example.com',
    ]);
  });

  it('should skip leading rows and honour the delimiter', async () => {
    const records = await collect(
      loadRecipientContexts([source('preamble.csv', { delimiter: ';', skipRows: 2 })])
    );

    expect(records).toEqual([
      {
        name: 'Carol',
        email: 'carol@example.com',
        recipient: 'carol@example.com',
        to: 'carol@example.com',
      },
    ]);
  });

  it('should strip a byte order mark from the header', async () => {
    const [record] = await collect(loadRecipientContexts([source('bom.csv')]));
    expect(record.email).toBe('ann@example.com');
    expect(record.recipient).toBe('ann@example.com');
  });

  it('should leave trailing keys out of short rows and skip blank lines', async () => {
    const records = await collect(loadRecipientContexts([source('short-rows.csv')]));

    expect(records).toEqual([
      { name: 'Ann', email: 'ann@example.com', recipient: 'ann@example.com', to: 'ann@example.com' },
      { name: 'Bob' },
    ]);
  });

  it('should count blank lines among the skipped rows', async () => {
    const records = await collect(loadRecipientContexts([source('blank-preamble.csv', { skipRows: 2 })]));

    expect(records).toEqual([
      { name: 'Ann', email: 'ann@example.com', recipient: 'ann@example.com', to: 'ann@example.com' },
    ]);
  });

  it('should keep quotes inside an unquoted cell', async () => {
    const [record] = await collect(loadRecipientContexts([source('inner-quotes.csv')]));
    expect(record.name).toBe('John "JJ" Doe');
    expect(record.recipient).toBe('jj@example.com');
  });

  it('should yield nothing for a file with only a header', async () => {
    expect(await collect(loadRecipientContexts([source('header-only.csv')]))).toEqual([]);
  });

  it('should yield nothing for an empty source list', async () => {
    expect(await collect(loadRecipientContexts([]))).toEqual([]);
  });

  describe('malformed files', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should reject a missing file', async () => {
      await expect(collect(loadRecipientContexts([source('missing.csv')]))).rejects.toBeInstanceOf(
        RecipientListNotFoundError
      );
    });

    it('should reject a header without a recipient column', async () => {
      await expect(collect(loadRecipientContexts([source('no-email.csv')]))).rejects.toBeInstanceOf(
        MissingRecipientColumnError
      );
    });

    it('should reject an empty header cell and name its column', async () => {
      const error = await collect(loadRecipientContexts([source('empty-header.csv')])).catch(
        (caught: unknown) => caught
      );

      expect(error).toBeInstanceOf(MissingHeaderError);
      expect(error).toMatchObject({ columnIndex: 1 });
    });

    it('should reject when reading the file fails', async () => {
      const createReadStream = fs.createReadStream;
      jest.spyOn(fs, 'createReadStream').mockImplementation((filePath, options) => {
        const stream = createReadStream(filePath, options);
        process.nextTick(() => stream.destroy(new Error('read failed')));
        return stream;
      });

      await expect(collect(loadRecipientContexts([source('recipients.csv')]))).rejects.toThrow('read failed');
    });
  });
});
