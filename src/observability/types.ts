// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  userId?: string;
  group?: string;
  [key: string]: unknown;
}
