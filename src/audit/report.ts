/**
 * Console report — one coloured line per user.
 *
 * Green is under the limit, yellow is over the limit but suppressed,
 * red is over the limit and eligible for a warning.
 */
import type { AuditSummary, UserAuditResult, UserOutcome } from './types.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

const OUTCOME_COLOR: Record<UserOutcome, string> = {
  ok: GREEN,
  suppressed: YELLOW,
  flagged: RED,
  notified: RED,
  'notify-failed': RED,
};

const USER_COLUMN_WIDTH = 16;

// ─── Reporter ───────────────────────────────────────────────────

export interface Reporter {
  userLine(result: UserAuditResult): void;
  summary(summary: AuditSummary): void;
}

export function formatUserLine(result: UserAuditResult): string {
  return `${OUTCOME_COLOR[result.outcome]}${result.userId.padEnd(USER_COLUMN_WIDTH)}  ${result.bytesUsedHuman}${RESET}`;
}

export function formatSummary(summary: AuditSummary): string {
  const { counts } = summary;
  const mode = summary.write ? 'write' : 'dry run';
  return (
    `${summary.group} (${mode}, limit ${String(summary.limitTib)} TiB): ` +
    `${String(summary.results.length)} users, ${String(counts.ok)} ok, ` +
    `${String(counts.suppressed)} suppressed, ${String(counts.flagged)} flagged, ` +
    `${String(counts.notified)} notified, ${String(counts['notify-failed'])} failed`
  );
}

/** Reporter that writes to a line sink, stdout by default. */
export function createConsoleReporter(
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
): Reporter {
  return {
    userLine(result) {
      write(formatUserLine(result));
    },
    summary(summary) {
      write(formatSummary(summary));
    },
  };
}
