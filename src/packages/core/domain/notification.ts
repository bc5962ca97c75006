/**
 * Account-facing notification events
 */

export type NotificationKind =
  | 'purchased'
  | 'extended'
  | 'upgraded'
  | 'expired'
  | 'sold'
  | 'expiring'
  | 'credited';

export interface EntitlementNotification {
  accountId: string;
  /** Absent for pure wallet events */
  tierName?: string;
  kind: NotificationKind;
  /** Currency amount relevant to the event (refund, credit, renewal price) */
  amount?: number;
  expiresAt?: Date;
}

/** notification_log tag used to de-duplicate expiry reminders */
export const EXPIRY_REMINDER_TAG = 'entitlement_expiring';
