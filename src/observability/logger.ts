import pino from 'pino';

import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for the auditor. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/** Adapt pino's (object, message) call order to the Logger interface. */
function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/**
 * Create a structured pino logger writing to stderr.
 * stdout is reserved for the per-user report.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const pretty = process.env['NODE_ENV'] === 'development';
  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'disk-overage-notifier',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'warn',
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
      : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: {
      paths: ['apiKey', 'token', 'authorization', '*.apiKey', '*.token', '*.authorization'],
      censor: '[REDACTED]',
    },
  };

  const instance = pretty ? pino(pinoOptions) : pino(pinoOptions, pino.destination(2));
  return wrap(instance);
}
