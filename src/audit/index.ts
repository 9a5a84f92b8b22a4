export type { AuditSummary, UserAuditResult, UserOutcome } from './types.js';
export {
  cooldownRemainingMs,
  elapsedDays,
  exceedsThreshold,
  formatDuration,
  isNotificationAllowed,
} from './eligibility.js';
export type { Reporter } from './report.js';
export { createConsoleReporter, formatSummary, formatUserLine } from './report.js';
export type { UsageAuditor, UsageAuditorDeps, WarningSettings } from './auditor.js';
export { createUsageAuditor } from './auditor.js';
