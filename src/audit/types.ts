import type { UserId } from '@/core/types.js';

/**
 * What happened to one user during a run.
 *
 * - `ok`: under the threshold
 * - `suppressed`: over the threshold but not eligible (inactive or cooling down)
 * - `flagged`: eligible, but the run is a dry run
 * - `notified`: warned and recorded in the ledger
 * - `notify-failed`: eligible, but the email could not be sent
 */
export type UserOutcome = 'ok' | 'suppressed' | 'flagged' | 'notified' | 'notify-failed';

export interface UserAuditResult {
  userId: UserId;
  bytesUsedHuman: string;
  outcome: UserOutcome;
}

export interface AuditSummary {
  group: string;
  limitTib: number;
  write: boolean;
  results: UserAuditResult[];
  counts: Record<UserOutcome, number>;
}
