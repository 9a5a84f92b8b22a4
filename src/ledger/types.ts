import type { OverageRecord, UserId } from '@/core/types.js';

/** Read side of the ledger; all the eligibility decision needs. */
export interface OverageLedgerReader {
  find(userId: UserId): Promise<OverageRecord | null>;
}

/**
 * Persisted record of past warnings, one entry per user.
 * Entries are created or updated, never deleted.
 */
export interface OverageLedger extends OverageLedgerReader {
  /**
   * Insert or update the user's entry. The stored `lastNotifiedAt` never
   * moves backwards: an older timestamp leaves it unchanged.
   *
   * @throws LedgerError when the write fails
   */
  upsert(record: OverageRecord): Promise<OverageRecord>;
}
