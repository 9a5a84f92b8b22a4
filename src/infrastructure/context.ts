/**
 * Application context — every collaborator the auditor needs, built once at
 * startup from the validated configuration and passed down explicitly.
 */
import { createConsoleReporter, createUsageAuditor } from '@/audit/index.js';
import type { Reporter, UsageAuditor } from '@/audit/index.js';
import type { AuditConfig } from '@/config/index.js';
import { createSqliteOverageLedger } from '@/ledger/index.js';
import type { OverageLedger } from '@/ledger/index.js';
import { createEmailNotifier } from '@/notify/index.js';
import type { Notifier } from '@/notify/index.js';
import type { Logger } from '@/observability/index.js';
import { createDirectorySource, createUsageSource } from '@/sources/index.js';
import type { DirectorySource, UsageSource } from '@/sources/index.js';

import { openDatabase } from './database.js';

export interface AppContext {
  config: AuditConfig;
  logger: Logger;
  usageSource: UsageSource;
  directorySource: DirectorySource;
  ledger: OverageLedger;
  notifier: Notifier;
  reporter: Reporter;
  auditor: UsageAuditor;
  /** Release resources (the ledger database). */
  close(): void;
}

/** Collaborators that may be swapped out, mostly for tests. */
export interface AppContextOverrides {
  usageSource?: UsageSource;
  directorySource?: DirectorySource;
  ledger?: OverageLedger;
  notifier?: Notifier;
  reporter?: Reporter;
  now?: () => Date;
}

export function createAppContext(
  config: AuditConfig,
  logger: Logger,
  overrides: AppContextOverrides = {},
): AppContext {
  const usageSource = overrides.usageSource ?? createUsageSource({ config: config.usage, logger });
  const directorySource =
    overrides.directorySource ?? createDirectorySource({ config: config.directory, logger });

  let close = (): void => undefined;
  let ledger = overrides.ledger;
  if (!ledger) {
    const db = openDatabase({ path: config.ledger.path, logger });
    ledger = createSqliteOverageLedger(db.client);
    close = (): void => db.close();
  }

  const notifier =
    overrides.notifier ??
    createEmailNotifier({ apiKey: config.email.apiKey, replyTo: config.email.replyTo, logger });
  const reporter = overrides.reporter ?? createConsoleReporter();

  const auditor = createUsageAuditor({
    usageSource,
    directorySource,
    ledger,
    notifier,
    reporter,
    logger,
    warning: {
      from: config.email.from,
      subject: config.email.subject,
      teamName: config.email.teamName,
      signature: config.email.signature,
    },
    now: overrides.now,
  });

  return {
    config,
    logger,
    usageSource,
    directorySource,
    ledger,
    notifier,
    reporter,
    auditor,
    close,
  };
}
