/**
 * Threshold filter and notification eligibility.
 *
 * Neither function writes anything; the eligibility decision only reads
 * the ledger through the accessor it is given.
 */
import type { DirectoryEntry, OverageRecord, UserId } from '@/core/types.js';
import { BYTES_PER_TIB, DAY_MS } from '@/core/types.js';
import type { OverageLedgerReader } from '@/ledger/types.js';

/** True iff usage is strictly above `limitTib` tebibytes. */
export function exceedsThreshold(bytesUsed: number, limitTib: number): boolean {
  return bytesUsed > limitTib * BYTES_PER_TIB;
}

/** Whole days elapsed since the last warning, rounded down. */
export function elapsedDays(record: OverageRecord, now: Date): number {
  return Math.floor((now.getTime() - record.lastNotifiedAt.getTime()) / DAY_MS);
}

/** Milliseconds until the user may be warned again; 0 once eligible. */
export function cooldownRemainingMs(record: OverageRecord, now: Date): number {
  return Math.max(0, record.lastNotifiedAt.getTime() + DAY_MS - now.getTime());
}

/**
 * Decide whether a user may receive a warning now.
 *
 * - No directory entry, or an entry that is not active: never.
 * - Never warned before: always.
 * - Otherwise only once at least one whole day has passed since the
 *   last warning (exactly 24h counts).
 */
export async function isNotificationAllowed(
  userId: UserId,
  entry: DirectoryEntry | null | undefined,
  ledger: OverageLedgerReader,
  now: Date = new Date(),
): Promise<boolean> {
  if (!entry || entry.active !== true) {
    return false;
  }

  const record = await ledger.find(userId);
  if (!record) {
    return true;
  }

  return elapsedDays(record, now) >= 1;
}

/** Render a duration as `H:MM:SS`. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${String(hours)}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}
