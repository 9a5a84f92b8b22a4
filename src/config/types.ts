import type { z } from 'zod';

import type { AllowedGroup, auditConfigFileSchema } from './schema.js';

/** Validated configuration, as loaded from the JSON file. */
export type AuditConfig = z.infer<typeof auditConfigFileSchema>;

export type UsageServiceConfig = AuditConfig['usage'];
export type DirectoryServiceConfig = AuditConfig['directory'];
export type EmailConfig = AuditConfig['email'];

/** Per-invocation options, taken from the command line. */
export interface RunOptions {
  group: AllowedGroup;
  limitTib: number;
  /** Send email and update the ledger; otherwise only report. */
  write: boolean;
}
