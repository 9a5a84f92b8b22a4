import type { NotifierError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';

export interface EmailMessage {
  body: string;
  from: string;
  to: string[];
  subject: string;
}

export interface NotificationReceipt {
  /** Provider message ID; empty when the provider returns none. */
  id: string;
}

/** Outbound email. Transport failures are returned, never thrown. */
export interface Notifier {
  send(message: EmailMessage): Promise<Result<NotificationReceipt, NotifierError>>;
}
