import { readFile } from 'node:fs/promises';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigError, loadAuditConfig, resolveEnvVars } from './loader.js';

// Mock node:fs/promises
vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const mockedReadFile = vi.mocked(readFile);

// ─── Test Fixtures ──────────────────────────────────────────────

const validConfigJson = {
  usage: {
    baseUrl: 'https://usage.test/api/',
    token: '${TEST_USAGE_TOKEN}',
    queries: { scicomp: 'query/scicomp' },
  },
  directory: {
    baseUrl: 'https://directory.test/',
  },
  ledger: { path: ':memory:' },
  email: {
    apiKey: '${TEST_EMAIL_KEY}',
  },
};

// ─── resolveEnvVars Tests ───────────────────────────────────────

describe('resolveEnvVars', () => {
  beforeEach(() => {
    vi.stubEnv('TEST_VAR', 'test-value');
    vi.stubEnv('API_KEY', 'test-secret');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('replaces ${VAR} with the environment variable value', () => {
    expect(resolveEnvVars('${TEST_VAR}')).toBe('test-value');
  });

  it('handles nested objects and arrays', () => {
    const input = { level1: { value: '${TEST_VAR}', list: ['${API_KEY}', 'plain'] } };
    expect(resolveEnvVars(input)).toEqual({
      level1: { value: 'test-value', list: ['test-secret', 'plain'] },
    });
  });

  it('leaves numbers, booleans and null alone', () => {
    expect(resolveEnvVars(42)).toBe(42);
    expect(resolveEnvVars(true)).toBe(true);
    expect(resolveEnvVars(null)).toBe(null);
  });

  it('does not replace partial patterns like prefix${VAR}suffix', () => {
    expect(resolveEnvVars('prefix${TEST_VAR}suffix')).toBe('prefix${TEST_VAR}suffix');
  });

  it('throws ConfigError if the env var does not exist', () => {
    expect(() => resolveEnvVars('${NONEXISTENT_VAR}')).toThrow(ConfigError);
    expect(() => resolveEnvVars('${NONEXISTENT_VAR}')).toThrow(
      'Environment variable "NONEXISTENT_VAR" is not defined',
    );
  });

  it('treats an empty env var as missing', () => {
    vi.stubEnv('EMPTY_VAR', '');
    expect(() => resolveEnvVars('${EMPTY_VAR}')).toThrow('Environment variable "EMPTY_VAR" is not defined');
  });
});

// ─── loadAuditConfig Tests ──────────────────────────────────────

describe('loadAuditConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.stubEnv('TEST_USAGE_TOKEN', 'jwt:token-id:test-secret');
    vi.stubEnv('TEST_EMAIL_KEY', 'test-api-key');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('loads a valid config and fills defaults', async () => {
    mockedReadFile.mockResolvedValue(JSON.stringify(validConfigJson));

    const result = await loadAuditConfig('/path/to/audit.json');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.usage.token).toBe('jwt:token-id:test-secret');
      expect(result.value.usage.timeoutMs).toBe(30_000);
      expect(result.value.directory.entryPath).toBe('config/workday/');
      expect(result.value.email).toEqual({
        apiKey: 'test-api-key',
        from: 'donotreply@example.org',
        subject: 'Disk space warning',
        teamName: 'Scientific Computing Software',
        signature: 'Some annoying program',
      });
    }
  });

  it('returns error if the file does not exist', async () => {
    const error: NodeJS.ErrnoException = new Error('ENOENT');
    error.code = 'ENOENT';
    mockedReadFile.mockRejectedValue(error);

    const result = await loadAuditConfig('/nonexistent/audit.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toBe('Configuration file not found: /nonexistent/audit.json');
    }
  });

  it('handles file read permission errors', async () => {
    const error: NodeJS.ErrnoException = new Error('EACCES');
    error.code = 'EACCES';
    mockedReadFile.mockRejectedValue(error);

    const result = await loadAuditConfig('/protected/audit.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Failed to read configuration file: /protected/audit.json');
      expect(result.error.context?.['errorCode']).toBe('EACCES');
    }
  });

  it('returns error if the JSON is invalid', async () => {
    mockedReadFile.mockResolvedValue('{ invalid json }');

    const result = await loadAuditConfig('/path/to/invalid.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid JSON in configuration file');
    }
  });

  it('returns error when a credential env var is missing', async () => {
    vi.stubEnv('TEST_USAGE_TOKEN', '');
    mockedReadFile.mockResolvedValue(JSON.stringify(validConfigJson));

    const result = await loadAuditConfig('/path/to/audit.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Environment variable "TEST_USAGE_TOKEN" is not defined');
    }
  });

  it('returns error with issue paths if Zod validation fails', async () => {
    const invalid = { ...validConfigJson, directory: { baseUrl: 'not a url' } };
    mockedReadFile.mockResolvedValue(JSON.stringify(invalid));

    const result = await loadAuditConfig('/path/to/audit.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Configuration validation failed');
      expect(result.error.context?.['issues']).toEqual([
        { path: 'directory.baseUrl', message: 'Invalid directory base URL' },
      ]);
    }
  });

  it('rejects queries for groups outside the allow-list', async () => {
    const invalid = {
      ...validConfigJson,
      usage: { ...validConfigJson.usage, queries: { unknown: 'query/x' } },
    };
    mockedReadFile.mockResolvedValue(JSON.stringify(invalid));

    const result = await loadAuditConfig('/path/to/audit.json');

    expect(result.ok).toBe(false);
  });
});

// ─── ConfigError Tests ──────────────────────────────────────────

describe('ConfigError', () => {
  it('has correct code and name', () => {
    const error = new ConfigError('test message');
    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.name).toBe('ConfigError');
  });

  it('includes context when provided', () => {
    const error = new ConfigError('test message', { filePath: '/test/path' });
    expect(error.context).toEqual({ filePath: '/test/path' });
  });
});
