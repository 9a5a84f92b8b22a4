export type { EmailMessage, NotificationReceipt, Notifier } from './types.js';
export type { EmailNotifierOptions } from './email-notifier.js';
export { createEmailNotifier } from './email-notifier.js';
export type { WarningEmailOptions } from './templates.js';
export { buildWarningEmail } from './templates.js';
