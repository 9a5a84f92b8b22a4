export type { DatabaseOptions, LedgerDatabase } from './database.js';
export { openDatabase } from './database.js';
export type { AppContext, AppContextOverrides } from './context.js';
export { createAppContext } from './context.js';
