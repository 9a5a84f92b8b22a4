import type { DirectoryEntry, GroupName, UsageRecord, UserId } from '@/core/types.js';
import type { UpstreamError } from '@/core/errors.js';
import type { Lookup, Result } from '@/core/result.js';

// ─── Usage Source ───────────────────────────────────────────────

export interface TokenDetails {
  /** Human-readable expiry as reported by the analytics API. */
  validUntil: string;
}

export interface UsageSource {
  /** Per-user aggregate usage for one group's home-directory tree. */
  listUsage(group: GroupName): Promise<Result<UsageRecord[], UpstreamError>>;
  /** Ask the analytics API when the configured token expires. */
  describeToken(): Promise<Result<TokenDetails, UpstreamError>>;
}

// ─── Directory Source ───────────────────────────────────────────

export interface DirectorySource {
  lookup(userId: UserId): Promise<Lookup<DirectoryEntry, UpstreamError>>;
}
