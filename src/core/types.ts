// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a group name where a user ID is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type UserId = Brand<string, 'UserId'>;
export type GroupName = Brand<string, 'GroupName'>;

export function userId(value: string): UserId {
  return value as UserId;
}

export function groupName(value: string): GroupName {
  return value as GroupName;
}

// ─── Units ───────────────────────────────────────────────────────

/** Bytes in one tebibyte (2^40). */
export const BYTES_PER_TIB = 1024 ** 4;

/** Length of the notification cooldown. */
export const DAY_MS = 24 * 60 * 60 * 1000;

// ─── Domain Records ──────────────────────────────────────────────

/** Aggregate home-directory usage for one user, as reported by the analytics API. */
export interface UsageRecord {
  userId: UserId;
  bytesUsed: number;
  /** Size as the analytics API formats it, e.g. "612.3G". */
  bytesUsedHuman: string;
}

/** HR directory data needed to decide on and address a warning. */
export interface DirectoryEntry {
  active: boolean;
  firstName: string;
  email: string;
}

/** Persisted trace of the last warning sent to a user. */
export interface OverageRecord {
  userId: UserId;
  lastNotifiedSize: string;
  lastNotifiedAt: Date;
}
