/**
 * PurchaseDecisionEngine - Executes tier purchases
 *
 * For one account at a time (inside the store's per-account unit of work):
 * re-resolves the effective tier against the role authority, asks the
 * planner for exactly one path, then applies it.
 *
 * Ordering per path:
 *   - wallet debit first (conditional; INSUFFICIENT_FUNDS when refused)
 *   - external grant before the ledger write
 *   - on failure: revoke what was granted, credit the wallet back, rethrow
 *
 * Business conditions come back as typed rejections; infrastructure
 * failures (ExternalAuthorityError, PersistenceError, SQLite errors)
 * propagate after compensation.
 *
 * @module packages/core/services/PurchaseDecisionEngine
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { TierCatalog } from '../domain/tier-catalog.js';
import {
  addDays,
  extendExpiry,
  systemClock,
  type Clock,
  type Entitlement,
  type PurchaseDuration,
  type PurchaseOutcome,
  type PurchaseSource,
} from '../domain/entitlement.js';
import {
  planPurchase,
  type PurchasePlan,
  type PurchaseRejection,
} from '../domain/purchase-plan.js';
import type { NotificationKind } from '../domain/notification.js';
import type { IAccountEntitlements, IEntitlementStore } from '../ports/IEntitlementStore.js';
import type { IRoleAuthority } from '../ports/IRoleAuthority.js';
import type { IWallet } from '../ports/IWallet.js';
import type { INotifier } from '../ports/INotifier.js';
import type { IRestrictionService } from '../ports/ICollaborators.js';
import { ExternalAuthorityError, errorMessage } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export const PurchaseRequestSchema = z.object({
  accountId: z.string().min(1),
  tierName: z.string().min(1),
  amount: z.number().int().positive(),
  source: z.enum(['payment', 'shop', 'operator']),
  duration: z.enum(['monthly', 'yearly']).default('monthly'),
});

export interface PurchaseRequest {
  accountId: string;
  tierName: string;
  amount: number;
  source: PurchaseSource;
  duration?: PurchaseDuration;
}

export type PurchaseResult = { success: true; outcome: PurchaseOutcome } | PurchaseRejection;

export interface PurchaseDecisionEngineDeps {
  catalog: TierCatalog;
  store: IEntitlementStore;
  authority: IRoleAuthority;
  wallet: IWallet;
  notifier: INotifier;
  restrictions: IRestrictionService;
  logger: Logger;
  clock?: Clock;
}

type ExecutionResult =
  | { success: true; outcome: PurchaseOutcome; extended: boolean }
  | PurchaseRejection;

// =============================================================================
// Engine
// =============================================================================

export class PurchaseDecisionEngine {
  private readonly catalog: TierCatalog;
  private readonly store: IEntitlementStore;
  private readonly authority: IRoleAuthority;
  private readonly wallet: IWallet;
  private readonly notifier: INotifier;
  private readonly restrictions: IRestrictionService;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(deps: PurchaseDecisionEngineDeps) {
    this.catalog = deps.catalog;
    this.store = deps.store;
    this.authority = deps.authority;
    this.wallet = deps.wallet;
    this.notifier = deps.notifier;
    this.restrictions = deps.restrictions;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger.child({ component: 'PurchaseDecisionEngine' });
  }

  /**
   * Highest-priority catalog tier the authority currently reports for the
   * account, or null when it holds none.
   */
  async resolveEffectiveTier(accountId: string): Promise<string | null> {
    const granted = await this.authority.getGrantedTiers(accountId);
    return this.catalog.highestOf(granted)?.name ?? null;
  }

  async purchase(request: PurchaseRequest): Promise<PurchaseResult> {
    const parsed = PurchaseRequestSchema.safeParse(request);
    if (!parsed.success) {
      return { success: false, reason: 'VALIDATION', message: parsed.error.message };
    }
    const input = parsed.data;

    if (!this.catalog.has(input.tierName)) {
      return { success: false, reason: 'UNKNOWN_TIER', message: `Unknown tier: ${input.tierName}` };
    }

    const result = await this.store.withAccount(input.accountId, async (tx): Promise<ExecutionResult> => {
      let granted: string[];
      try {
        granted = await this.authority.getGrantedTiers(input.accountId);
      } catch (error) {
        if (error instanceof ExternalAuthorityError && error.code === 'ACCOUNT_NOT_FOUND') {
          return {
            success: false,
            reason: 'ACCOUNT_NOT_FOUND',
            message: `Account ${input.accountId} is not a community member`,
          };
        }
        throw error;
      }

      const now = this.clock();
      const effectiveTier = this.catalog.highestOf(granted)?.name ?? null;
      const planned = planPurchase(this.catalog, {
        ...input,
        effectiveTier,
        current: effectiveTier ? await tx.get(effectiveTier) : null,
        targetRecord: await tx.get(input.tierName),
        now,
      });

      if (!planned.success) {
        return planned;
      }
      return this.execute(tx, planned.plan, granted, now);
    });

    if (!result.success) {
      this.log.info(
        { accountId: input.accountId, tierName: input.tierName, amount: input.amount, reason: result.reason },
        'Purchase not applied'
      );
      if (result.reason === 'CREDITED_TO_WALLET') {
        this.notifier.notify({
          accountId: input.accountId,
          tierName: input.tierName,
          kind: 'credited',
          amount: input.amount,
        });
      }
      return result;
    }

    const { outcome } = result;
    this.log.info({ accountId: input.accountId, source: input.source, ...outcome }, 'Purchase applied');

    await this.liftRestrictions(input.accountId);

    let kind: NotificationKind = result.extended ? 'extended' : 'purchased';
    if (outcome.pathTaken === 'UPGRADE') kind = 'upgraded';
    this.notifier.notify({
      accountId: input.accountId,
      tierName: outcome.tierName,
      kind,
      amount: outcome.refundIssued ?? undefined,
      expiresAt: outcome.expiresAt,
    });

    return { success: true, outcome };
  }

  // ---------------------------------------------------------------------------
  // Plan execution
  // ---------------------------------------------------------------------------

  private async execute(
    tx: IAccountEntitlements,
    plan: PurchasePlan,
    granted: readonly string[],
    now: Date
  ): Promise<ExecutionResult> {
    const accountId = tx.accountId;

    if (plan.charge > 0 && !(await this.wallet.debit(accountId, plan.charge))) {
      return {
        success: false,
        reason: 'INSUFFICIENT_FUNDS',
        message: `Wallet balance does not cover ${plan.charge}`,
      };
    }

    try {
      switch (plan.path) {
        case 'PARTIAL':
          return { success: true, extended: true, outcome: await this.applyPartial(tx, plan, now) };
        case 'UPGRADE':
          return { success: true, extended: false, outcome: await this.applyUpgrade(tx, plan, now) };
        case 'NORMAL':
          return {
            success: true,
            extended: plan.existing !== null,
            outcome: await this.applyNormal(tx, plan, granted, now),
          };
      }
    } catch (error) {
      if (plan.charge > 0) {
        await this.refundCharge(accountId, plan.charge, error);
      }
      throw error;
    }
  }

  private async applyPartial(
    tx: IAccountEntitlements,
    plan: Extract<PurchasePlan, { path: 'PARTIAL' }>,
    now: Date
  ): Promise<PurchaseOutcome> {
    const { entitlement, days } = plan;
    const updated = await tx.updateExpiry(
      entitlement.tierName,
      extendExpiry(entitlement.expiresAt, days, now)
    );

    return {
      pathTaken: 'PARTIAL',
      tierName: updated.tierName,
      daysAdded: days,
      refundIssued: null,
      walletDelta: -plan.charge,
      expiresAt: updated.expiresAt,
    };
  }

  private async applyUpgrade(
    tx: IAccountEntitlements,
    plan: Extract<PurchasePlan, { path: 'UPGRADE' }>,
    now: Date
  ): Promise<PurchaseOutcome> {
    const accountId = tx.accountId;
    const fromTier = plan.from.tierName;

    if (plan.staleTarget) {
      this.log.warn(
        { accountId, tierName: plan.toTier, staleExpiresAt: plan.staleTarget.expiresAt },
        'Upgrade target has a record without its role; record will be overwritten'
      );
    }

    const assignmentId = await this.authority.grant(accountId, plan.toTier);

    const revoke = await this.revokeOne(accountId, fromTier);
    if (revoke) {
      await this.compensateGrant(accountId, plan.toTier);
      throw revoke;
    }

    let updated: Entitlement;
    try {
      updated = await tx.replace(fromTier, {
        tierName: plan.toTier,
        expiresAt: addDays(now, plan.days),
        externalAssignmentId: assignmentId,
      });
    } catch (error) {
      await this.compensateRevoke(accountId, fromTier);
      await this.compensateGrant(accountId, plan.toTier);
      throw error;
    }

    return {
      pathTaken: 'UPGRADE',
      tierName: updated.tierName,
      daysAdded: plan.days,
      refundIssued: plan.refund,
      walletDelta: -plan.charge,
      expiresAt: updated.expiresAt,
    };
  }

  private async applyNormal(
    tx: IAccountEntitlements,
    plan: Extract<PurchasePlan, { path: 'NORMAL' }>,
    granted: readonly string[],
    now: Date
  ): Promise<PurchaseOutcome> {
    const accountId = tx.accountId;
    const { tierName, existing, days } = plan;
    const mustGrant = !granted.includes(tierName);
    const assignmentId = mustGrant ? await this.authority.grant(accountId, tierName) : undefined;

    let updated: Entitlement;
    try {
      updated = existing
        ? await tx.updateExpiry(tierName, extendExpiry(existing.expiresAt, days, now), assignmentId)
        : await tx.insert({
            tierName,
            expiresAt: addDays(now, days),
            externalAssignmentId: assignmentId ?? null,
          });
    } catch (error) {
      if (mustGrant) {
        await this.compensateGrant(accountId, tierName);
      }
      throw error;
    }

    return {
      pathTaken: 'NORMAL',
      tierName,
      daysAdded: days,
      refundIssued: null,
      walletDelta: -plan.charge,
      expiresAt: updated.expiresAt,
    };
  }

  // ---------------------------------------------------------------------------
  // Compensation
  // ---------------------------------------------------------------------------

  /** Returns the failure, or null when the tier was revoked */
  private async revokeOne(accountId: string, tierName: string): Promise<ExternalAuthorityError | null> {
    const result = await this.authority.revokeBatch(accountId, [tierName]);
    return result.failed[0]?.error ?? null;
  }

  /** Undo a grant issued by this purchase */
  private async compensateGrant(accountId: string, tierName: string): Promise<void> {
    try {
      const failure = await this.revokeOne(accountId, tierName);
      if (failure) throw failure;
    } catch (error) {
      this.log.error(
        { accountId, tierName, error: errorMessage(error) },
        'Compensating revoke failed; grant left for reconciliation'
      );
    }
  }

  /** Undo a revoke issued by this purchase */
  private async compensateRevoke(accountId: string, tierName: string): Promise<void> {
    try {
      await this.authority.grant(accountId, tierName);
    } catch (error) {
      this.log.error(
        { accountId, tierName, error: errorMessage(error) },
        'Compensating re-grant failed'
      );
    }
  }

  private async refundCharge(accountId: string, amount: number, cause: unknown): Promise<void> {
    try {
      await this.wallet.credit(accountId, amount);
    } catch (error) {
      this.log.error(
        { accountId, amount, error: errorMessage(error), cause: errorMessage(cause) },
        'Failed to return charge after aborted purchase'
      );
    }
  }

  private async liftRestrictions(accountId: string): Promise<void> {
    try {
      const removed = await this.restrictions.clearRestrictions(accountId);
      if (removed > 0) {
        this.log.debug({ accountId, removed }, 'Restrictions cleared after purchase');
      }
    } catch (error) {
      this.log.warn({ accountId, error: errorMessage(error) }, 'Failed to clear restrictions');
    }
  }
}
