/**
 * SaleService - Early termination of an entitlement for a prorated refund
 *
 * The external revoke happens first; the ledger row is only deleted once the
 * role is gone. Any failure after the revoke re-grants the role (and
 * restores the ledger row when it was already deleted) before returning.
 *
 * @module packages/core/services/SaleService
 */

import type { Logger } from 'pino';
import type { TierCatalog } from '../domain/tier-catalog.js';
import { systemClock, type Clock, type Entitlement } from '../domain/entitlement.js';
import { calculateRefund } from '../domain/refund.js';
import type { IAccountEntitlements, IEntitlementStore } from '../ports/IEntitlementStore.js';
import type { IRoleAuthority } from '../ports/IRoleAuthority.js';
import type { IWallet } from '../ports/IWallet.js';
import type { INotifier } from '../ports/INotifier.js';
import type { IPrivilegeRevoker } from '../ports/ICollaborators.js';
import { errorMessage } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export type SaleFailureReason =
  | 'UNKNOWN_TIER'
  | 'NOT_HELD_EXTERNALLY'
  | 'NOT_HELD_INTERNALLY'
  | 'PERSISTENCE_ERROR';

export type SaleResult =
  | { success: true; tierName: string; refund: number; privilegesStripped: number }
  | { success: false; reason: SaleFailureReason; message: string };

export interface SaleServiceDeps {
  catalog: TierCatalog;
  store: IEntitlementStore;
  authority: IRoleAuthority;
  wallet: IWallet;
  notifier: INotifier;
  privileges: IPrivilegeRevoker;
  logger: Logger;
  clock?: Clock;
}

// =============================================================================
// Service
// =============================================================================

export class SaleService {
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: SaleServiceDeps) {
    this.log = deps.logger.child({ component: 'SaleService' });
    this.clock = deps.clock ?? systemClock;
  }

  async sell(accountId: string, tierName: string): Promise<SaleResult> {
    const { catalog, store, authority } = this.deps;

    if (!catalog.has(tierName)) {
      return { success: false, reason: 'UNKNOWN_TIER', message: `Unknown tier: ${tierName}` };
    }

    const result = await store.withAccount(accountId, async (tx): Promise<SaleResult> => {
      if (!(await authority.hasGrant(accountId, tierName))) {
        return {
          success: false,
          reason: 'NOT_HELD_EXTERNALLY',
          message: `${accountId} does not hold the ${tierName} role`,
        };
      }

      const entitlement = await tx.get(tierName);
      if (!entitlement) {
        return {
          success: false,
          reason: 'NOT_HELD_INTERNALLY',
          message: `${accountId} has no ${tierName} entitlement on record`,
        };
      }

      const refund = calculateRefund(entitlement.expiresAt, catalog.priceOf(tierName), this.clock());

      const revoke = await authority.revokeBatch(accountId, [tierName]);
      const failure = revoke.failed[0];
      if (failure) {
        throw failure.error;
      }

      return this.settle(tx, entitlement, refund);
    });

    if (!result.success) {
      this.log.info({ accountId, tierName, reason: result.reason }, 'Sale rejected');
      return result;
    }

    const privilegesStripped = await this.stripPrivileges(accountId);
    this.deps.notifier.notify({ accountId, tierName, kind: 'sold', amount: result.refund });
    this.log.info({ accountId, tierName, refund: result.refund }, 'Entitlement sold');

    return { ...result, privilegesStripped };
  }

  /**
   * Runs after the role was revoked: delete the row, then credit the refund.
   */
  private async settle(
    tx: IAccountEntitlements,
    entitlement: Entitlement,
    refund: number
  ): Promise<SaleResult> {
    const { accountId, tierName } = entitlement;

    let deleted: number;
    try {
      deleted = await tx.delete(tierName);
    } catch (error) {
      await this.regrant(accountId, tierName);
      throw error;
    }

    if (deleted === 0) {
      await this.regrant(accountId, tierName);
      return {
        success: false,
        reason: 'PERSISTENCE_ERROR',
        message: `Entitlement ${tierName} for ${accountId} could not be deleted`,
      };
    }

    if (refund > 0) {
      try {
        await this.deps.wallet.credit(accountId, refund);
      } catch (error) {
        await tx.insert({
          tierName,
          expiresAt: entitlement.expiresAt,
          externalAssignmentId: entitlement.externalAssignmentId,
        });
        await this.regrant(accountId, tierName);
        throw error;
      }
    }

    return { success: true, tierName, refund, privilegesStripped: 0 };
  }

  private async regrant(accountId: string, tierName: string): Promise<void> {
    try {
      await this.deps.authority.grant(accountId, tierName);
      this.log.warn({ accountId, tierName }, 'Sale aborted; role re-granted');
    } catch (error) {
      this.log.error(
        { accountId, tierName, error: errorMessage(error) },
        'Sale aborted and re-grant failed'
      );
    }
  }

  private async stripPrivileges(accountId: string): Promise<number> {
    try {
      return await this.deps.privileges.stripDependentPrivileges(accountId);
    } catch (error) {
      this.log.warn({ accountId, error: errorMessage(error) }, 'Failed to strip delegated privileges');
      return 0;
    }
  }
}
