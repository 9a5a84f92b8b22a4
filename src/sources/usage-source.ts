/**
 * Usage Source — storage-analytics API client.
 *
 * Each group maps to a saved query whose response is an array of
 * per-user aggregates: `{ fn, rec_aggrs: { size, size_hum } }`.
 */
import { z } from 'zod';

import { UpstreamError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { GroupName, UsageRecord } from '@/core/types.js';
import { userId } from '@/core/types.js';
import type { UsageServiceConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';

import { createJsonClient } from './http-client.js';
import type { TokenDetails, UsageSource } from './types.js';

const SOURCE = 'usage-api';

// ─── Wire Schemas ───────────────────────────────────────────────

const usageRowSchema = z.object({
  fn: z.string().min(1),
  rec_aggrs: z.object({
    size: z.number().int().nonnegative(),
    size_hum: z.string(),
  }),
});

const usageResponseSchema = z.array(usageRowSchema);

const tokenResponseSchema = z.object({
  valid_until_hum: z.string(),
});

// ─── Helpers ────────────────────────────────────────────────────

/**
 * Tokens look like `<prefix>:<token-id>:...`; the analytics API
 * describes a token by its second segment.
 */
export function tokenId(token: string): string | undefined {
  const segment = token.split(':')[1];
  return segment === undefined || segment === '' ? undefined : segment;
}

// ─── Factory ────────────────────────────────────────────────────

export interface UsageSourceOptions {
  config: UsageServiceConfig;
  logger: Logger;
}

/** Create a UsageSource backed by the storage-analytics REST API. */
export function createUsageSource(options: UsageSourceOptions): UsageSource {
  const { config, logger } = options;
  const client = createJsonClient({
    source: SOURCE,
    baseUrl: config.baseUrl,
    token: config.token,
    timeoutMs: config.timeoutMs,
    logger,
  });

  return {
    async listUsage(group: GroupName): Promise<Result<UsageRecord[], UpstreamError>> {
      const query = Object.entries(config.queries).find(([name]) => name === group)?.[1];
      if (query === undefined) {
        return err(new UpstreamError(SOURCE, `No usage query configured for group ${group}`, { group }));
      }

      const response = await client.get(query);
      if (response.status === 'transport-error') {
        return err(response.error);
      }
      if (response.status === 'not-found') {
        return err(new UpstreamError(SOURCE, `Usage query for group ${group} was not found`, { group }));
      }

      const parsed = usageResponseSchema.safeParse(response.value);
      if (!parsed.success) {
        return err(
          new UpstreamError(SOURCE, 'Unexpected usage response shape', {
            group,
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          }),
        );
      }

      logger.info('Usage retrieved', { component: SOURCE, group, users: parsed.data.length });
      return ok(
        parsed.data.map((row) => ({
          userId: userId(row.fn),
          bytesUsed: row.rec_aggrs.size,
          bytesUsedHuman: row.rec_aggrs.size_hum,
        })),
      );
    },

    async describeToken(): Promise<Result<TokenDetails, UpstreamError>> {
      const id = tokenId(config.token);
      if (id === undefined) {
        return err(new UpstreamError(SOURCE, 'Token has no identifier segment'));
      }

      const response = await client.get(`auth/${id}`);
      if (response.status === 'transport-error') {
        return err(response.error);
      }
      if (response.status === 'not-found') {
        return err(new UpstreamError(SOURCE, 'Token is not known to the analytics API'));
      }

      const parsed = tokenResponseSchema.safeParse(response.value);
      if (!parsed.success) {
        return err(new UpstreamError(SOURCE, 'Unexpected token response shape'));
      }
      return ok({ validUntil: parsed.data.valid_until_hum });
    },
  };
}
