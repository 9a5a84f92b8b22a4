/**
 * SQLite handle for the notification ledger, with open/close lifecycle.
 */
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';

import { LedgerError, toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

const MEMORY_PATH = ':memory:';

/** Options for opening the ledger database. */
export interface DatabaseOptions {
  /** SQLite file path, or ":memory:". */
  path: string;
  logger: Logger;
}

/** Wrapper around a better-sqlite3 connection. */
export interface LedgerDatabase {
  /** The raw better-sqlite3 handle. */
  client: Database.Database;
  close(): void;
}

/**
 * Open (creating if needed) the ledger database and its parent directory.
 *
 * @throws LedgerError when the file cannot be opened
 */
export function openDatabase(options: DatabaseOptions): LedgerDatabase {
  const { path, logger } = options;

  logger.info(`Connecting to ledger at ${path}`, { component: 'database', path });
  let client: Database.Database;
  try {
    if (path !== MEMORY_PATH) {
      mkdirSync(dirname(path), { recursive: true });
    }
    client = new Database(path);
    client.pragma('journal_mode = WAL');
    client.pragma('busy_timeout = 5000');
  } catch (error) {
    throw new LedgerError(`Failed to open ledger database at ${path}`, { path }, toError(error));
  }

  return {
    client,

    close(): void {
      if (client.open) {
        client.close();
        logger.info('Ledger database closed', { component: 'database', path });
      }
    },
  };
}
