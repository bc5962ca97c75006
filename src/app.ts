/**
 * Service wiring
 *
 * Builds every adapter, service and scheduled job from configuration and
 * the shared infrastructure handles. Kept apart from the process entry so
 * the wiring can be exercised without signals or timers.
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { Config } from './config.js';
import type { TierConfig } from './tier-config.js';
import type { Clock } from './packages/core/domain/index.js';
import {
  PaymentIntakeService,
  PurchaseDecisionEngine,
  SaleService,
} from './packages/core/services/index.js';
import {
  SqliteEntitlementStore,
  SqliteNotificationLog,
  SqlitePaymentLog,
  SqlitePrivilegeRevoker,
  SqliteWallet,
} from './packages/adapters/storage/index.js';
import {
  DiscordDmNotificationSink,
  DiscordRestrictionService,
  DiscordRoleAuthority,
  type DiscordRestClient,
} from './packages/adapters/discord/index.js';
import { BoundedRoleAuthority } from './packages/adapters/resilience/index.js';
import { NotificationDispatcher } from './packages/adapters/notifications/index.js';
import {
  ExpiryReminderJob,
  JobScheduler,
  ReconciliationSweepJob,
} from './packages/jobs/reconciliation/index.js';

export interface AppInfrastructure {
  config: Config;
  tiers: TierConfig;
  db: Database.Database;
  rest: DiscordRestClient;
  logger: Logger;
  clock?: Clock;
}

export interface App {
  engine: PurchaseDecisionEngine;
  sales: SaleService;
  intake: PaymentIntakeService;
  sweep: ReconciliationSweepJob;
  reminders: ExpiryReminderJob;
  notifications: NotificationDispatcher;
  privileges: SqlitePrivilegeRevoker;
  wallet: SqliteWallet;
  schedulers: JobScheduler[];
}

export function createApp(infra: AppInfrastructure): App {
  const { config, tiers, db, rest, logger, clock } = infra;
  const { catalog } = tiers;

  const store = new SqliteEntitlementStore(db);
  const wallet = new SqliteWallet(db);
  const privileges = new SqlitePrivilegeRevoker(db, logger);

  const authority = new BoundedRoleAuthority(
    new DiscordRoleAuthority(rest, { guildId: config.discord.guildId, roleIds: tiers.roleIds }, logger),
    { timeoutMs: config.externalTimeoutMs }
  );
  const restrictions = new DiscordRestrictionService(
    rest,
    config.discord.guildId,
    tiers.restrictionRoleIds,
    logger
  );
  const notifications = new NotificationDispatcher(new DiscordDmNotificationSink(rest), logger);

  const engine = new PurchaseDecisionEngine({
    catalog,
    store,
    authority,
    wallet,
    notifier: notifications,
    restrictions,
    logger,
    clock,
  });
  const sales = new SaleService({
    catalog,
    store,
    authority,
    wallet,
    notifier: notifications,
    privileges,
    logger,
    clock,
  });
  const intake = new PaymentIntakeService({
    catalog,
    engine,
    authority,
    wallet,
    payments: new SqlitePaymentLog(db),
    notifier: notifications,
    logger,
    clock,
  });

  const sweep = new ReconciliationSweepJob(
    { catalog, store, authority, notifier: notifications, privileges, logger, clock },
    { repairOrphanGrants: config.repairOrphanGrants }
  );
  const reminders = new ExpiryReminderJob({
    catalog,
    store,
    authority,
    notifier: notifications,
    notificationLog: new SqliteNotificationLog(db),
    logger,
    clock,
  });

  const schedulers = [
    new JobScheduler({ name: 'reconciliation-sweep', run: () => sweep.sweep() }, config.sweepIntervalMs, logger),
    new JobScheduler({ name: 'expiry-reminders', run: () => reminders.run() }, config.reminderIntervalMs, logger),
  ];

  return { engine, sales, intake, sweep, reminders, notifications, privileges, wallet, schedulers };
}
