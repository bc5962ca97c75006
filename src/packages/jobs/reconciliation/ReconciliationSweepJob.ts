/**
 * ReconciliationSweepJob - Expires entitlements and repairs drift
 *
 * Each run:
 * 1. Load expired ledger records (optionally for a set of tiers)
 * 2. Group them by account so each account costs one revoke call
 * 3. Per account, inside its unit of work:
 *    - account gone from the community: drop its records, no revoke
 *    - role already gone: drop that record, no revoke
 *    - otherwise revoke the remaining roles in one batch and drop only the
 *      records whose revoke succeeded
 * 4. Optionally revoke roles held without any ledger record
 *
 * Failures are counted per account and never stop the batch. A record that
 * fails to revoke stays in the ledger and is retried next run.
 *
 * @module packages/jobs/reconciliation/ReconciliationSweepJob
 */

import type { Logger } from 'pino';
import type { TierCatalog } from '../../core/domain/tier-catalog.js';
import {
  emptySweepStats,
  sweepStatsEqual,
  systemClock,
  type Clock,
  type Entitlement,
  type SweepStats,
} from '../../core/domain/entitlement.js';
import type { IEntitlementStore, IAccountEntitlements } from '../../core/ports/IEntitlementStore.js';
import type { IRoleAuthority } from '../../core/ports/IRoleAuthority.js';
import type { INotifier } from '../../core/ports/INotifier.js';
import type { IPrivilegeRevoker } from '../../core/ports/ICollaborators.js';
import { errorMessage } from '../../core/errors.js';

// =============================================================================
// Types
// =============================================================================

export interface ReconciliationSweepOptions {
  /** Revoke roles that have no ledger record (default: false) */
  repairOrphanGrants?: boolean;
}

export interface ReconciliationSweepDeps {
  catalog: TierCatalog;
  store: IEntitlementStore;
  authority: IRoleAuthority;
  notifier: INotifier;
  privileges: IPrivilegeRevoker;
  logger: Logger;
  clock?: Clock;
}

// =============================================================================
// Job
// =============================================================================

export class ReconciliationSweepJob {
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly options: Required<ReconciliationSweepOptions>;
  private previousStats: SweepStats | null = null;
  private lastStats: SweepStats | null = null;

  constructor(
    private readonly deps: ReconciliationSweepDeps,
    options: ReconciliationSweepOptions = {}
  ) {
    this.log = deps.logger.child({ component: 'ReconciliationSweepJob' });
    this.clock = deps.clock ?? systemClock;
    this.options = {
      repairOrphanGrants: options.repairOrphanGrants ?? false,
    };
  }

  /**
   * Run one sweep. Safe to run repeatedly; a second run over an unchanged
   * ledger finds nothing to do.
   */
  async sweep(tierNames?: readonly string[]): Promise<SweepStats> {
    const startTime = Date.now();
    const stats = emptySweepStats();
    const now = this.clock();

    const expired = await this.deps.store.findExpired(now, tierNames);
    stats.expiredFound = expired.length;

    for (const [accountId, records] of groupByAccount(expired)) {
      try {
        await this.deps.store.withAccount(accountId, (tx) =>
          this.reconcileAccount(tx, records, now, stats)
        );
      } catch (error) {
        stats.failed += records.length;
        this.log.error(
          { accountId, tiers: records.map((r) => r.tierName), error: errorMessage(error) },
          'Account reconciliation failed; records left for next sweep'
        );
      }
    }

    if (this.options.repairOrphanGrants) {
      await this.repairOrphans(stats, tierNames);
    }

    this.record(stats, Date.now() - startTime);
    return stats;
  }

  getLastStats(): SweepStats | null {
    return this.lastStats;
  }

  // ---------------------------------------------------------------------------
  // Per-account reconciliation
  // ---------------------------------------------------------------------------

  private async reconcileAccount(
    tx: IAccountEntitlements,
    records: readonly Entitlement[],
    now: Date,
    stats: SweepStats
  ): Promise<void> {
    const accountId = tx.accountId;

    // Re-read under the account lock; a purchase may have renewed or a sale removed it
    const stillExpired: Entitlement[] = [];
    for (const record of records) {
      const current = await tx.get(record.tierName);
      if (current && current.expiresAt.getTime() <= now.getTime()) {
        stillExpired.push(current);
      } else {
        stats.skippedAlreadyRevoked++;
      }
    }
    if (stillExpired.length === 0) return;

    if (!(await this.deps.authority.resolveAccount(accountId))) {
      for (const record of stillExpired) {
        stats.skippedMissingAccount += await tx.delete(record.tierName);
      }
      this.log.info(
        { accountId, tiers: stillExpired.map((r) => r.tierName) },
        'Account left the community; expired records dropped'
      );
      return;
    }

    const granted = new Set(await this.deps.authority.getGrantedTiers(accountId));
    const toRevoke: Entitlement[] = [];
    for (const record of stillExpired) {
      if (granted.has(record.tierName)) {
        toRevoke.push(record);
      } else {
        stats.skippedMissingExternalGrant += await tx.delete(record.tierName);
        this.log.info(
          { accountId, tierName: record.tierName },
          'Role already removed externally; expired record dropped'
        );
      }
    }
    if (toRevoke.length === 0) return;

    const result = await this.deps.authority.revokeBatch(
      accountId,
      toRevoke.map((r) => r.tierName)
    );

    for (const failure of result.failed) {
      stats.failed++;
      this.log.warn(
        { accountId, tierName: failure.tierName, code: failure.error.code, error: failure.error.message },
        'Role revoke failed; record kept'
      );
    }

    const revoked = new Set(result.revoked);
    let removedForAccount = 0;
    for (const record of toRevoke) {
      if (!revoked.has(record.tierName)) continue;
      removedForAccount += await tx.delete(record.tierName);
      this.deps.notifier.notify({
        accountId,
        tierName: record.tierName,
        kind: 'expired',
        expiresAt: record.expiresAt,
      });
    }
    stats.removed += removedForAccount;

    if (removedForAccount > 0 && !(await this.holdsAnyTier(tx))) {
      await this.stripPrivileges(accountId);
    }
  }

  private async holdsAnyTier(tx: IAccountEntitlements): Promise<boolean> {
    const remaining = await tx.list();
    return remaining.some((entitlement) => this.deps.catalog.has(entitlement.tierName));
  }

  private async stripPrivileges(accountId: string): Promise<void> {
    try {
      await this.deps.privileges.stripDependentPrivileges(accountId);
    } catch (error) {
      this.log.warn({ accountId, error: errorMessage(error) }, 'Failed to strip delegated privileges');
    }
  }

  // ---------------------------------------------------------------------------
  // Orphan grants
  // ---------------------------------------------------------------------------

  private async repairOrphans(stats: SweepStats, tierNames?: readonly string[]): Promise<void> {
    const { authority, store, catalog } = this.deps;
    if (!authority.listHolders) {
      this.log.debug('Authority cannot enumerate holders; orphan repair skipped');
      return;
    }

    const tiers = tierNames ?? catalog.tiersByPriority().map((tier) => tier.name);
    for (const tier of tiers) {
      let holders: string[];
      try {
        holders = await authority.listHolders(tier);
      } catch (error) {
        stats.failed++;
        this.log.error({ tierName: tier, error: errorMessage(error) }, 'Failed to list role holders');
        continue;
      }

      const recorded = new Set(await store.listAccountsWithTier(tier));
      for (const accountId of holders) {
        if (recorded.has(accountId)) continue;
        try {
          await store.withAccount(accountId, async (tx) => {
            // A purchase may have written the record since the listing
            if (await tx.get(tier)) return;
            const result = await authority.revokeBatch(accountId, [tier]);
            const failure = result.failed[0];
            if (failure) throw failure.error;
            stats.orphanGrantsRevoked++;
            this.log.info({ accountId, tierName: tier }, 'Revoked role held without entitlement');
          });
        } catch (error) {
          stats.failed++;
          this.log.warn(
            { accountId, tierName: tier, error: errorMessage(error) },
            'Failed to revoke orphan role'
          );
        }
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Stats
  // ---------------------------------------------------------------------------

  private record(stats: SweepStats, durationMs: number): void {
    const changed = !this.lastStats || !sweepStatsEqual(this.lastStats, stats);
    this.previousStats = this.lastStats;
    this.lastStats = stats;

    if (changed) {
      this.log.info({ ...stats, durationMs }, 'Reconciliation sweep completed');
    } else {
      this.log.debug({ durationMs }, 'Reconciliation sweep unchanged');
    }
  }

  getPreviousStats(): SweepStats | null {
    return this.previousStats;
  }
}

function groupByAccount(records: readonly Entitlement[]): Map<string, Entitlement[]> {
  const groups = new Map<string, Entitlement[]>();
  for (const record of records) {
    const group = groups.get(record.accountId);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.accountId, [record]);
    }
  }
  return groups;
}
