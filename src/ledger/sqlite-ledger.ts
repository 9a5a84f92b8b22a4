/**
 * SQLite-backed overage ledger.
 */
import type Database from 'better-sqlite3';

import { LedgerError, toError } from '@/core/errors.js';
import type { OverageRecord, UserId } from '@/core/types.js';
import { userId as toUserId } from '@/core/types.js';

import type { OverageLedger } from './types.js';

export const CREATE_OVERAGE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS overage (
    user_id TEXT PRIMARY KEY,
    last_notified_size TEXT NOT NULL,
    last_notified_at INTEGER NOT NULL
  )
`;

const FIND_SQL = `
  SELECT user_id AS userId, last_notified_size AS lastNotifiedSize, last_notified_at AS lastNotifiedAt
  FROM overage
  WHERE user_id = ?
`;

// The stored timestamp only ever advances.
const UPSERT_SQL = `
  INSERT INTO overage (user_id, last_notified_size, last_notified_at)
  VALUES (@userId, @lastNotifiedSize, @lastNotifiedAt)
  ON CONFLICT(user_id) DO UPDATE SET
    last_notified_size = CASE
      WHEN excluded.last_notified_at >= overage.last_notified_at THEN excluded.last_notified_size
      ELSE overage.last_notified_size
    END,
    last_notified_at = MAX(overage.last_notified_at, excluded.last_notified_at)
`;

interface OverageRow {
  userId: string;
  lastNotifiedSize: string;
  lastNotifiedAt: number;
}

// ─── Mapper ─────────────────────────────────────────────────────

function toOverageRecord(row: OverageRow): OverageRecord {
  return {
    userId: toUserId(row.userId),
    lastNotifiedSize: row.lastNotifiedSize,
    lastNotifiedAt: new Date(row.lastNotifiedAt),
  };
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Create an OverageLedger on an open better-sqlite3 handle.
 * The `overage` table is created when missing.
 */
export function createSqliteOverageLedger(db: Database.Database): OverageLedger {
  db.exec(CREATE_OVERAGE_TABLE_SQL);
  const findStmt = db.prepare<[string], OverageRow>(FIND_SQL);
  const upsertStmt = db.prepare<[OverageRow]>(UPSERT_SQL);

  const find = (id: UserId): OverageRecord | null => {
    const row = findStmt.get(id);
    return row ? toOverageRecord(row) : null;
  };

  return {
    async find(id: UserId): Promise<OverageRecord | null> {
      try {
        return find(id);
      } catch (error) {
        throw new LedgerError(`Failed to read ledger entry for ${id}`, { userId: id }, toError(error));
      }
    },

    async upsert(record: OverageRecord): Promise<OverageRecord> {
      try {
        upsertStmt.run({
          userId: record.userId,
          lastNotifiedSize: record.lastNotifiedSize,
          lastNotifiedAt: record.lastNotifiedAt.getTime(),
        });
        const stored = find(record.userId);
        if (!stored) {
          throw new Error('Entry missing after upsert');
        }
        return stored;
      } catch (error) {
        throw new LedgerError(
          `Failed to record notification for ${record.userId}`,
          { userId: record.userId },
          toError(error),
        );
      }
    },
  };
}
