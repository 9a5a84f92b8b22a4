/**
 * Directory Source — HR directory client.
 *
 * An entry is `{ config: { active: "Y" | "N", first, email } }`. A 404, or
 * a body without `config`, means the directory does not know the user.
 * Only active entries must carry an email address.
 */
import { z } from 'zod';

import { UpstreamError } from '@/core/errors.js';
import type { Lookup } from '@/core/result.js';
import { found, notFound, transportError } from '@/core/result.js';
import type { DirectoryEntry, UserId } from '@/core/types.js';
import type { DirectoryServiceConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';

import { createJsonClient } from './http-client.js';
import type { DirectorySource } from './types.js';

const SOURCE = 'directory';

const directoryRecordSchema = z.object({
  config: z
    .object({
      active: z.string().nullish(),
      first: z.string().nullish(),
      email: z.string().nullish(),
    })
    .optional(),
});

export interface DirectorySourceOptions {
  config: DirectoryServiceConfig;
  logger: Logger;
}

/** Create a DirectorySource backed by the HR directory REST API. */
export function createDirectorySource(options: DirectorySourceOptions): DirectorySource {
  const { config, logger } = options;
  const client = createJsonClient({
    source: SOURCE,
    baseUrl: config.baseUrl,
    token: config.token,
    timeoutMs: config.timeoutMs,
    logger,
  });

  return {
    async lookup(userId: UserId): Promise<Lookup<DirectoryEntry, UpstreamError>> {
      const response = await client.get(config.entryPath + encodeURIComponent(userId));
      if (response.status !== 'found') {
        return response;
      }

      const parsed = directoryRecordSchema.safeParse(response.value);
      if (!parsed.success) {
        return transportError(
          new UpstreamError(SOURCE, 'Unexpected directory response shape', { userId }),
        );
      }

      const entry = parsed.data.config;
      if (!entry) {
        return notFound();
      }

      const active = entry.active === 'Y';
      if (active && !entry.email) {
        return transportError(
          new UpstreamError(SOURCE, 'Active directory entry has no email', { userId }),
        );
      }

      return found({
        active,
        firstName: entry.first ?? '',
        email: entry.email ?? '',
      });
    },
  };
}
