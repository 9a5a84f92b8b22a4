import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { groupName } from '@/core/types.js';
import { createMockLogger, makeConfig } from '@/testing/fixtures/audit.js';

import { createUsageSource, tokenId } from './usage-source.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function makeSource() {
  return createUsageSource({ config: makeConfig().usage, logger: createMockLogger() });
}

describe('UsageSource', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('listUsage', () => {
    it('maps analytics rows to usage records', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse([
          { fn: 'alice', rec_aggrs: { size: 659_706_976_665, size_hum: '614.4G' } },
          { fn: 'bob', rec_aggrs: { size: 1024, size_hum: '1.0K' } },
        ]),
      );

      const result = await makeSource().listUsage(groupName('scicomp'));

      expect(result).toEqual({
        ok: true,
        value: [
          { userId: 'alice', bytesUsed: 659_706_976_665, bytesUsedHuman: '614.4G' },
          { userId: 'bob', bytesUsed: 1024, bytesUsedHuman: '1.0K' },
        ],
      });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://usage.test/api/query/scicomp');
    });

    it('fails for a group without a configured query', async () => {
      const result = await makeSource().listUsage(groupName('flyem'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('usage-api: No usage query configured for group flyem');
      }
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('fails on an unexpected response shape', async () => {
      fetchMock.mockResolvedValue(jsonResponse([{ fn: 'alice', rec_aggrs: { size: 'big' } }]));

      const result = await makeSource().listUsage(groupName('scicomp'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('usage-api: Unexpected usage response shape');
      }
    });

    it('fails when the query is not found', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 404 }));

      const result = await makeSource().listUsage(groupName('scicomp'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('usage-api: Usage query for group scicomp was not found');
      }
    });

    it('passes transport errors through', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 502 }));

      const result = await makeSource().listUsage(groupName('scicomp'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('usage-api: Status: 502');
      }
    });
  });

  describe('describeToken', () => {
    it('looks the token up by its identifier segment', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ valid_until_hum: '2026-12-31 23:59:59' }));

      const result = await makeSource().describeToken();

      expect(result).toEqual({ ok: true, value: { validUntil: '2026-12-31 23:59:59' } });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://usage.test/api/auth/token-id');
    });

    it('fails when the token has no identifier segment', async () => {
      const source = createUsageSource({
        config: { ...makeConfig().usage, token: 'opaque' },
        logger: createMockLogger(),
      });

      const result = await source.describeToken();

      expect(result.ok).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});

describe('tokenId', () => {
  it('returns the second colon-separated segment', () => {
    expect(tokenId('jwt:abc123:rest')).toBe('abc123');
    expect(tokenId('jwt:abc123')).toBe('abc123');
  });

  it('returns undefined when there is no second segment', () => {
    expect(tokenId('abc123')).toBeUndefined();
    expect(tokenId('jwt::x')).toBeUndefined();
  });
});
