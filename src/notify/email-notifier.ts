/**
 * Email notifier backed by Resend.
 *
 * Transport problems come back as `err(NotifierError)` and are logged here,
 * so a failed send never aborts the audit run.
 */
import { Resend } from 'resend';

import { NotifierError, toError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';

import type { EmailMessage, NotificationReceipt, Notifier } from './types.js';

export interface EmailNotifierOptions {
  apiKey: string;
  replyTo?: string;
  logger: Logger;
}

export function createEmailNotifier(options: EmailNotifierOptions): Notifier {
  const resend = new Resend(options.apiKey);
  const { logger, replyTo } = options;

  return {
    async send(message: EmailMessage): Promise<Result<NotificationReceipt, NotifierError>> {
      logger.info('Sending email', { component: 'email-notifier', to: message.to });

      let response: Awaited<ReturnType<typeof resend.emails.send>>;
      try {
        response = await resend.emails.send({
          from: message.from,
          to: message.to,
          replyTo,
          subject: message.subject,
          text: message.body,
        });
      } catch (error) {
        const cause = toError(error);
        logger.error('Failed to send email', {
          component: 'email-notifier',
          to: message.to,
          error: cause.message,
        });
        return err(new NotifierError(cause.message, { to: message.to }, cause));
      }

      if (response.error) {
        logger.error('Failed to send email', {
          component: 'email-notifier',
          to: message.to,
          error: response.error.message,
        });
        return err(new NotifierError(response.error.message, { to: message.to }));
      }

      const receipt: NotificationReceipt = { id: response.data?.id ?? '' };
      logger.info('Email sent', { component: 'email-notifier', emailId: receipt.id, to: message.to });
      return ok(receipt);
    },
  };
}
