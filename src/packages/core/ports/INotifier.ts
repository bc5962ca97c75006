/**
 * INotifier - Port Interfaces for account notifications
 *
 * @module packages/core/ports/INotifier
 */

import type { EntitlementNotification } from '../domain/notification.js';

/**
 * Fire-and-forget notification. Never throws and never blocks the caller.
 */
export interface INotifier {
  notify(event: EntitlementNotification): void;
}

/**
 * Transport that actually delivers a notification. May throw.
 */
export interface INotificationSink {
  deliver(event: EntitlementNotification): Promise<void>;
}

/**
 * Records when tagged notifications were last sent to an account.
 */
export interface INotificationLog {
  lastSentAt(accountId: string, tag: string): Promise<Date | null>;
  record(accountId: string, tag: string, sentAt: Date): Promise<void>;
}
