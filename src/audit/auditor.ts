/**
 * Usage auditor — walks one group's usage list and warns over-limit users.
 *
 * Fatal conditions (usage or directory unreachable, unknown user, ledger
 * write failure) are thrown and end the run. A failed email is logged and
 * the run moves on; that user's ledger entry is left as it was so the next
 * run retries.
 */
import { UnknownUserError } from '@/core/errors.js';
import type { DirectoryEntry, UsageRecord } from '@/core/types.js';
import { groupName } from '@/core/types.js';
import type { RunOptions } from '@/config/types.js';
import type { OverageLedger } from '@/ledger/types.js';
import type { Notifier } from '@/notify/types.js';
import { buildWarningEmail } from '@/notify/templates.js';
import type { Logger } from '@/observability/logger.js';
import type { DirectorySource, UsageSource } from '@/sources/types.js';

import {
  cooldownRemainingMs,
  exceedsThreshold,
  formatDuration,
  isNotificationAllowed,
} from './eligibility.js';
import type { Reporter } from './report.js';
import type { AuditSummary, UserAuditResult, UserOutcome } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface WarningSettings {
  from: string;
  subject: string;
  teamName: string;
  signature: string;
}

export interface UsageAuditorDeps {
  usageSource: UsageSource;
  directorySource: DirectorySource;
  ledger: OverageLedger;
  notifier: Notifier;
  reporter: Reporter;
  logger: Logger;
  warning: WarningSettings;
  /** Clock; injectable for tests. */
  now?: () => Date;
}

export interface UsageAuditor {
  run(options: RunOptions): Promise<AuditSummary>;
}

function emptyCounts(): Record<UserOutcome, number> {
  return { ok: 0, suppressed: 0, flagged: 0, notified: 0, 'notify-failed': 0 };
}

// ─── Factory ────────────────────────────────────────────────────

export function createUsageAuditor(deps: UsageAuditorDeps): UsageAuditor {
  const { usageSource, directorySource, ledger, notifier, reporter, warning } = deps;
  const logger = deps.logger.child({ component: 'usage-auditor' });
  const now = deps.now ?? ((): Date => new Date());

  async function lookupEntry(usage: UsageRecord): Promise<DirectoryEntry> {
    const lookup = await directorySource.lookup(usage.userId);
    switch (lookup.status) {
      case 'found':
        return lookup.value;
      case 'not-found':
        throw new UnknownUserError(usage.userId);
      case 'transport-error':
        throw lookup.error;
    }
  }

  async function logCooldown(usage: UsageRecord, at: Date): Promise<void> {
    const record = await ledger.find(usage.userId);
    if (!record) return;
    logger.warn(`${usage.userId} can be notified in ${formatDuration(cooldownRemainingMs(record, at))}`, {
      component: 'usage-auditor',
      userId: usage.userId,
      lastNotifiedAt: record.lastNotifiedAt.toISOString(),
    });
  }

  async function warn(
    usage: UsageRecord,
    entry: DirectoryEntry,
    options: RunOptions,
  ): Promise<UserOutcome> {
    const sent = await notifier.send({
      body: buildWarningEmail(entry.firstName, usage.bytesUsedHuman, options.limitTib, warning),
      from: warning.from,
      to: [entry.email],
      subject: warning.subject,
    });
    if (!sent.ok) {
      return 'notify-failed';
    }

    await ledger.upsert({
      userId: usage.userId,
      lastNotifiedSize: usage.bytesUsedHuman,
      lastNotifiedAt: now(),
    });
    return 'notified';
  }

  async function auditUser(usage: UsageRecord, options: RunOptions): Promise<UserOutcome> {
    if (!exceedsThreshold(usage.bytesUsed, options.limitTib)) {
      return 'ok';
    }

    const entry = await lookupEntry(usage);
    const at = now();
    if (!(await isNotificationAllowed(usage.userId, entry, ledger, at))) {
      if (entry.active) {
        await logCooldown(usage, at);
      } else {
        logger.info(`${usage.userId} is not active`, { component: 'usage-auditor', userId: usage.userId });
      }
      return 'suppressed';
    }

    if (!options.write) {
      return 'flagged';
    }
    return warn(usage, entry, options);
  }

  return {
    async run(options: RunOptions): Promise<AuditSummary> {
      const listed = await usageSource.listUsage(groupName(options.group));
      if (!listed.ok) {
        throw listed.error;
      }

      const results: UserAuditResult[] = [];
      const counts = emptyCounts();

      for (const usage of listed.value) {
        const outcome = await auditUser(usage, options);
        const result: UserAuditResult = {
          userId: usage.userId,
          bytesUsedHuman: usage.bytesUsedHuman,
          outcome,
        };
        reporter.userLine(result);
        results.push(result);
        counts[outcome] += 1;
      }

      const summary: AuditSummary = {
        group: options.group,
        limitTib: options.limitTib,
        write: options.write,
        results,
        counts,
      };
      logger.info('Audit complete', { component: 'usage-auditor', group: options.group, ...counts });
      return summary;
    },
  };
}
