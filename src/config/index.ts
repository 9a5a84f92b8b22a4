// ─── Types ──────────────────────────────────────────────────────
export type {
  AuditConfig,
  DirectoryServiceConfig,
  EmailConfig,
  RunOptions,
  UsageServiceConfig,
} from './types.js';
export type { AllowedGroup } from './schema.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  ALLOWED_GROUPS,
  DEFAULT_GROUP,
  DEFAULT_LIMIT_TIB,
  auditConfigFileSchema,
  directoryServiceSchema,
  emailSchema,
  ledgerSchema,
  usageServiceSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadAuditConfig, resolveEnvVars } from './loader.js';
