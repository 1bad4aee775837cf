/**
 * CLI Tests
 *
 * Flag parsing and option mapping; the send itself is stubbed out.
 */

import { createProgram, describeFailure, toMailerOptions, type CliFlags } from '../cli';

async function parse(args: string[]): Promise<{ csvFiles: string[]; flags: CliFlags }> {
  const action = jest.fn(async (_csvFiles: string[], _flags: CliFlags) => undefined);
  await createProgram('1.2.3', action).exitOverride().parseAsync(args, { from: 'user' });

  expect(action).toHaveBeenCalledTimes(1);
  const [csvFiles, flags] = action.mock.calls[0];
  return { csvFiles, flags };
}

describe('createProgram()', () => {
  it('should collect recipient lists and short flags', async () => {
    const { csvFiles, flags } = await parse([
      '-h', 'smtp.example.com',
      '-o', '587',
      '-u', 'ann',
      '-p', 'test-secret',
      '-e', 'Shop <shop@example.com>',
      '-s', 'Spring sale',
      '-m', 'message.md',
      '-n',
      'a.csv',
      'b.csv',
    ]);

    expect(csvFiles).toEqual(['a.csv', 'b.csv']);
    expect(flags).toMatchObject({
      smtpHost: 'smtp.example.com',
      smtpPort: 587,
      smtpUsername: 'ann',
      smtpPassword: 'test-secret',
      sender: 'Shop <shop@example.com>',
      subject: 'Spring sale',
      markdownTemplate: 'message.md',
      dryRun: true,
      verbose: 0,
    });
  });

  it('should map long flags to camel case', async () => {
    const { flags } = await parse([
      '--smtp-starttls',
      '--csv-delimiter', ';',
      '--csv-skip-rows', '2',
      '--send-delay', '0.5',
      '--gpg-sign',
      '--gpg-keyring', 'keys',
      '--test-email', 'me@example.com',
      '--test-count', '3',
      '--plaintext-template', 'message.txt',
      'list.csv',
    ]);

    expect(flags).toMatchObject({
      smtpStarttls: true,
      csvDelimiter: ';',
      csvSkipRows: 2,
      sendDelay: 0.5,
      gpgSign: true,
      gpgKeyring: 'keys',
      testEmail: 'me@example.com',
      testCount: 3,
      plaintextTemplate: 'message.txt',
    });
  });

  it('should count repeated -v flags', async () => {
    const { flags } = await parse(['-v', '-v', 'list.csv']);
    expect(flags.verbose).toBe(2);
  });

  it('should reject a non-numeric port', async () => {
    const program = createProgram('1.2.3', jest.fn())
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(['-o', 'abc', 'list.csv'], { from: 'user' })).rejects.toThrow(
      'Not an integer.'
    );
  });
});

describe('toMailerOptions()', () => {
  it('should pass recipient lists and flags through', () => {
    expect(toMailerOptions(['list.csv'], { verbose: 1, dryRun: true, smtpNossl: true })).toMatchObject({
      recipientLists: ['list.csv'],
      dryRun: true,
      smtpNossl: true,
    });
  });
});

describe('describeFailure()', () => {
  const error = new Error('Missing sender');

  it('should print the message by default', () => {
    expect(describeFailure(error, 0)).toBe('Missing sender');
  });

  it('should print the stack at high verbosity', () => {
    expect(describeFailure(error, 2)).toBe(error.stack);
  });
});
