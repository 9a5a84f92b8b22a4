/**
 * Zod schemas for validating the auditor configuration file.
 */
import { z } from 'zod';

// ─── Groups ─────────────────────────────────────────────────────

/** Groups whose home-directory trees may be audited. */
export const ALLOWED_GROUPS = [
  'flyem',
  'flylight',
  'jayaraman',
  'karpovap',
  'mousebrainmicro',
  'projtechres',
  'quantitativegenomics',
  'rubin',
  'scicomp',
  'svoboda',
] as const;

export type AllowedGroup = (typeof ALLOWED_GROUPS)[number];

export const DEFAULT_GROUP: AllowedGroup = 'scicomp';

/** Default threshold in TiB. */
export const DEFAULT_LIMIT_TIB = 0.5;

const DEFAULT_TIMEOUT_MS = 30_000;

// ─── Service Sections ───────────────────────────────────────────

/**
 * Storage-analytics API. `queries` maps each group to the endpoint
 * (relative to `baseUrl`) that returns its per-user aggregates.
 */
export const usageServiceSchema = z.object({
  baseUrl: z.string().url('Invalid usage API base URL'),
  token: z.string().min(1, 'Usage API token cannot be empty'),
  queries: z.record(z.enum(ALLOWED_GROUPS), z.string().min(1)),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export const directoryServiceSchema = z.object({
  baseUrl: z.string().url('Invalid directory base URL'),
  /** Appended to `baseUrl`; the user ID follows it. */
  entryPath: z.string().default('config/workday/'),
  token: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export const ledgerSchema = z.object({
  /** SQLite database file; ":memory:" keeps the ledger in-process. */
  path: z.string().min(1, 'Ledger path cannot be empty'),
});

export const emailSchema = z.object({
  apiKey: z.string().min(1, 'Email API key cannot be empty'),
  from: z.string().email('Invalid sender address').default('donotreply@example.org'),
  replyTo: z.string().email().optional(),
  subject: z.string().min(1).default('Disk space warning'),
  teamName: z.string().min(1).default('Scientific Computing Software'),
  signature: z.string().min(1).default('Some annoying program'),
});

// ─── Full Config File ───────────────────────────────────────────

export const auditConfigFileSchema = z.object({
  usage: usageServiceSchema,
  directory: directoryServiceSchema,
  ledger: ledgerSchema,
  email: emailSchema,
});
