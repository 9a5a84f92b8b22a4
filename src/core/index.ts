// Core module — shared domain types, result unions, errors
export type { DirectoryEntry, GroupName, OverageRecord, UsageRecord, UserId } from './types.js';
export { BYTES_PER_TIB, DAY_MS, groupName, userId } from './types.js';

export type { Lookup, Result } from './result.js';
export { err, found, notFound, ok, transportError } from './result.js';

export {
  AuditError,
  LedgerError,
  NotifierError,
  UnknownUserError,
  UpstreamError,
  toError,
} from './errors.js';
