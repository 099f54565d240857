import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadEnv, resolveSecret, resolveValkeyPassword } from '@/config';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('loadEnv', () => {
  /**
   * Purpose:
   * Verifies an empty environment yields the documented defaults
   */
  test('applies defaults', () => {
    const env = loadEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'production',
      VALKEY_HOST: '127.0.0.1',
      VALKEY_PORT: 6379,
      OPENAI_MODEL: 'gpt-4o-mini',
      KEYWORDS_FILE: 'config/keywords.json',
      KEYWORD_CACHE_TTL_MS: 300_000,
      RECENCY_WINDOW_DAYS: 2,
      KEYWORD_DELAY_MS: 5_000,
      WRITE_DELAY_MS: 2_000,
      RELEVANCE_FILTER_ENABLED: true,
    });
    expect(env.HARVEST_INTERVAL_MINUTES).toBeUndefined();
  });

  test('coerces numeric and boolean variables', () => {
    const env = loadEnv({
      VALKEY_PORT: '6380',
      RECENCY_WINDOW_DAYS: '7',
      RELEVANCE_FILTER_ENABLED: 'false',
      HARVEST_INTERVAL_MINUTES: '30',
    });

    expect(env.VALKEY_PORT).toBe(6380);
    expect(env.RECENCY_WINDOW_DAYS).toBe(7);
    expect(env.RELEVANCE_FILTER_ENABLED).toBe(false);
    expect(env.HARVEST_INTERVAL_MINUTES).toBe(30);
  });

  test('rejects a recency window outside 1-30 days', () => {
    expect(() => loadEnv({ RECENCY_WINDOW_DAYS: '45' })).toThrow();
    expect(() => loadEnv({ RECENCY_WINDOW_DAYS: '0' })).toThrow();
  });
});

describe('secrets', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('resolveSecret trims literal values and ignores blanks', () => {
    expect(resolveSecret('  test-secret \n')).toBe('test-secret');
    expect(resolveSecret('   ')).toBeUndefined();
    expect(resolveSecret(undefined)).toBeUndefined();
  });

  test('resolveValkeyPassword prefers the literal variable', () => {
    const file = path.join(dir, 'valkey_password');
    fs.writeFileSync(file, 'from-file\n');

    const env = loadEnv({ VALKEY_PASSWORD: 'test-secret', VALKEY_PASSWORD_FILE: file });

    expect(resolveValkeyPassword(env)).toBe('test-secret');
  });

  test('resolveValkeyPassword reads the secret file', () => {
    const file = path.join(dir, 'valkey_password');
    fs.writeFileSync(file, 'test-secret\n');

    expect(resolveValkeyPassword(loadEnv({ VALKEY_PASSWORD_FILE: file }))).toBe('test-secret');
  });

  test('resolveValkeyPassword returns undefined for a missing file', () => {
    const env = loadEnv({ VALKEY_PASSWORD_FILE: path.join(dir, 'absent') });

    expect(resolveValkeyPassword(env)).toBeUndefined();
  });
});
