import type { OverageRecord, UserId } from '@/core/types.js';

import type { OverageLedger } from './types.js';

/** In-memory OverageLedger with the same upsert semantics as the SQLite one. */
export function createInMemoryOverageLedger(seed: OverageRecord[] = []): OverageLedger {
  const entries = new Map<UserId, OverageRecord>();
  for (const record of seed) {
    entries.set(record.userId, { ...record });
  }

  return {
    async find(userId: UserId): Promise<OverageRecord | null> {
      const record = entries.get(userId);
      return record ? { ...record } : null;
    },

    async upsert(record: OverageRecord): Promise<OverageRecord> {
      const existing = entries.get(record.userId);
      const next =
        existing && existing.lastNotifiedAt.getTime() > record.lastNotifiedAt.getTime()
          ? existing
          : { ...record };
      entries.set(record.userId, next);
      return { ...next };
    },
  };
}
