/**
 * Base error class for every failure the auditor reports.
 * Extends Error with a machine-readable code and structured context.
 */
export class AuditError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  /** False for programming errors; true for expected runtime failures. */
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'AuditError';
    this.code = params.code;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when a remote source (usage API, HR directory) cannot be reached or answers badly. */
export class UpstreamError extends AuditError {
  constructor(source: string, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({
      message: `${source}: ${message}`,
      code: 'UPSTREAM_ERROR',
      cause,
      context: { source, ...context },
    });
    this.name = 'UpstreamError';
  }
}

/** Thrown when an over-limit user has no entry in the HR directory. */
export class UnknownUserError extends AuditError {
  constructor(userId: string) {
    super({
      message: `User ${userId} was not found in the directory`,
      code: 'UNKNOWN_USER',
      context: { userId },
    });
    this.name = 'UnknownUserError';
  }
}

/** Thrown when the notification ledger cannot be read or written. */
export class LedgerError extends AuditError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({
      message,
      code: 'LEDGER_ERROR',
      cause,
      context,
    });
    this.name = 'LedgerError';
  }
}

/** Returned (never thrown) when an email could not be delivered. */
export class NotifierError extends AuditError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({
      message: `Failed to send email: ${message}`,
      code: 'NOTIFIER_ERROR',
      cause,
      context,
    });
    this.name = 'NotifierError';
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
