/**
 * Test Setup
 *
 * Configure environment and global test utilities
 */

import * as path from 'path';

// Keep a developer's .env from leaking into tests
process.env.NODE_ENV = 'test';
delete process.env.SMTP_HOST;
delete process.env.MAIL_SENDER;
delete process.env.LOG_LEVEL;

// PGP key generation is slow
jest.setTimeout(30000);

// Mock logger to suppress output during tests
jest.mock('../utils/logger', () => {
  const createChild = () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  });

  return {
    __esModule: true,
    default: { ...createChild(), child: jest.fn(createChild) },
    configureLogger: jest.fn(() => 'info'),
    isDebugEnabled: jest.fn(() => false),
    cliLogger: createChild(),
    recipientsLogger: createChild(),
    composerLogger: createChild(),
    senderLogger: createChild(),
    signerLogger: createChild(),
    mailerLogger: createChild(),
  };
});

// Global test utilities
export const testUtils = {
  fixturePath: (...segments: string[]) => path.join(__dirname, 'fixtures', ...segments),

  createContext: (overrides: Record<string, string> = {}) =>
    Object.freeze({
      first_name: 'Ann',
      email: 'ann@example.com',
      recipient: 'ann@example.com',
      to: 'ann@example.com',
      from: 'Shop <shop@example.com>',
      sender: 'Shop <shop@example.com>',
      subject: 'Hello',
      ...overrides,
    }),
};
