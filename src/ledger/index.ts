export type { OverageLedger, OverageLedgerReader } from './types.js';
export { CREATE_OVERAGE_TABLE_SQL, createSqliteOverageLedger } from './sqlite-ledger.js';
export { createInMemoryOverageLedger } from './memory-ledger.js';
