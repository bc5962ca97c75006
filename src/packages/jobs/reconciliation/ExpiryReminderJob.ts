/**
 * ExpiryReminderJob - Warns accounts shortly before an entitlement expires
 *
 * Entitlements expiring within the reminder window get one `expiring`
 * notification carrying the renewal price. A notification_log entry per
 * (account, tier) keeps the same reminder from repeating within the window.
 *
 * @module packages/jobs/reconciliation/ExpiryReminderJob
 */

import type { Logger } from 'pino';
import type { TierCatalog } from '../../core/domain/tier-catalog.js';
import { systemClock, type Clock } from '../../core/domain/entitlement.js';
import { EXPIRY_REMINDER_TAG } from '../../core/domain/notification.js';
import type { IEntitlementStore } from '../../core/ports/IEntitlementStore.js';
import type { IRoleAuthority } from '../../core/ports/IRoleAuthority.js';
import type { INotificationLog, INotifier } from '../../core/ports/INotifier.js';
import { errorMessage } from '../../core/errors.js';

export interface ExpiryReminderOptions {
  /** How far ahead to look, and how long a reminder suppresses repeats (default: 24h) */
  windowMs?: number;
}

export interface ExpiryReminderStats {
  candidates: number;
  sent: number;
  skippedRecentlyNotified: number;
  skippedNoGrant: number;
  failed: number;
}

export interface ExpiryReminderDeps {
  catalog: TierCatalog;
  store: IEntitlementStore;
  authority: IRoleAuthority;
  notifier: INotifier;
  notificationLog: INotificationLog;
  logger: Logger;
  clock?: Clock;
}

export class ExpiryReminderJob {
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly windowMs: number;

  constructor(
    private readonly deps: ExpiryReminderDeps,
    options: ExpiryReminderOptions = {}
  ) {
    this.log = deps.logger.child({ component: 'ExpiryReminderJob' });
    this.clock = deps.clock ?? systemClock;
    this.windowMs = options.windowMs ?? 24 * 60 * 60 * 1000;
  }

  async run(): Promise<ExpiryReminderStats> {
    const { store, authority, notifier, notificationLog, catalog } = this.deps;
    const now = this.clock();
    const expiring = await store.findExpiringBetween(now, new Date(now.getTime() + this.windowMs));

    const stats: ExpiryReminderStats = {
      candidates: expiring.length,
      sent: 0,
      skippedRecentlyNotified: 0,
      skippedNoGrant: 0,
      failed: 0,
    };

    for (const entitlement of expiring) {
      const { accountId, tierName } = entitlement;
      const tag = `${EXPIRY_REMINDER_TAG}:${tierName}`;

      try {
        const lastSent = await notificationLog.lastSentAt(accountId, tag);
        if (lastSent && now.getTime() - lastSent.getTime() < this.windowMs) {
          stats.skippedRecentlyNotified++;
          continue;
        }

        if (!(await authority.hasGrant(accountId, tierName))) {
          stats.skippedNoGrant++;
          continue;
        }

        notifier.notify({
          accountId,
          tierName,
          kind: 'expiring',
          amount: catalog.priceOf(tierName),
          expiresAt: entitlement.expiresAt,
        });
        await notificationLog.record(accountId, tag, now);
        stats.sent++;
      } catch (error) {
        stats.failed++;
        this.log.warn({ accountId, tierName, error: errorMessage(error) }, 'Expiry reminder failed');
      }
    }

    if (stats.sent > 0 || stats.failed > 0) {
      this.log.info({ ...stats }, 'Expiry reminders processed');
    }
    return stats;
  }
}
