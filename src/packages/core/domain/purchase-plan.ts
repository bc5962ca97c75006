/**
 * Purchase Planner
 *
 * Pure path selection for a purchase request. Given the catalog, the
 * account's effective tier and its ledger records, picks exactly one of
 * NORMAL, PARTIAL or UPGRADE (or a typed rejection) without touching any
 * store or external system. The engine executes the returned plan.
 *
 * Order of evaluation:
 *   1. Guard: a payment for a tier below the effective tier is credited
 *   2. PARTIAL: top-up of the held, highest-priority entitlement
 *   3. UPGRADE: next tier up during the renewal window, with refund
 *   4. NORMAL: extend or create the target tier at full price
 *
 * @module packages/core/domain/purchase-plan
 */

import type { TierCatalog } from './tier-catalog.js';
import type { Entitlement, PurchaseDuration, PurchaseSource } from './entitlement.js';
import { remainingWholeDays } from './entitlement.js';
import { calculateRefund } from './refund.js';

// =============================================================================
// Types
// =============================================================================

export interface PlanInput {
  tierName: string;
  amount: number;
  source: PurchaseSource;
  duration: PurchaseDuration;
  /** Highest-priority tier the external authority reports as granted */
  effectiveTier: string | null;
  /** Ledger record of the effective tier, when one exists */
  current: Entitlement | null;
  /** Ledger record of the requested tier, when one exists */
  targetRecord: Entitlement | null;
  now: Date;
}

export type PurchasePlan =
  | {
      path: 'PARTIAL';
      entitlement: Entitlement;
      days: number;
      charge: number;
    }
  | {
      path: 'UPGRADE';
      from: Entitlement;
      toTier: string;
      /** Unexpired record of toTier whose role was removed externally; overwritten */
      staleTarget: Entitlement | null;
      days: number;
      upgradeCost: number;
      refund: number;
      charge: number;
    }
  | {
      path: 'NORMAL';
      tierName: string;
      /** Existing record to extend; null creates a new entitlement */
      existing: Entitlement | null;
      days: number;
      charge: number;
    };

export type PurchaseRejectionReason =
  | 'VALIDATION'
  | 'UNKNOWN_TIER'
  | 'ACCOUNT_NOT_FOUND'
  | 'CREDITED_TO_WALLET'
  | 'INSUFFICIENT_PAYMENT'
  | 'INSUFFICIENT_FUNDS';

export interface PurchaseRejection {
  success: false;
  reason: PurchaseRejectionReason;
  message: string;
  /** Amount left in (or returned to) the wallet */
  creditedAmount?: number;
}

export type PlanResult = { success: true; plan: PurchasePlan } | PurchaseRejection;

// =============================================================================
// Planner
// =============================================================================

export function planPurchase(catalog: TierCatalog, input: PlanInput): PlanResult {
  const { tierName, amount, now } = input;
  const target = catalog.get(tierName);
  if (!target) {
    return { success: false, reason: 'UNKNOWN_TIER', message: `Unknown tier: ${tierName}` };
  }

  const effectivePriority = input.effectiveTier ? catalog.priorityOf(input.effectiveTier) : 0;

  if (input.source === 'payment' && effectivePriority > target.priority) {
    return {
      success: false,
      reason: 'CREDITED_TO_WALLET',
      message: `${input.effectiveTier} outranks ${tierName}; payment kept as wallet balance`,
      creditedAmount: amount,
    };
  }

  const current = input.current;

  if (current && input.duration === 'monthly') {
    const heldPriority = catalog.priorityOf(current.tierName);
    const isRenewal = current.tierName === tierName && amount >= target.price;

    if (
      !isRenewal &&
      heldPriority >= target.priority &&
      catalog.partialExtensionDays(tierName, amount) > 0
    ) {
      const days = catalog.partialExtensionDays(current.tierName, amount);
      if (days > 0) {
        return {
          success: true,
          plan: { path: 'PARTIAL', entitlement: current, days, charge: amount },
        };
      }
    }

    const upgradeCost = catalog.upgradeCost(current.tierName, tierName);
    if (upgradeCost !== undefined && amount >= upgradeCost) {
      const base = catalog.baseDurationOf(current.tierName);
      const remaining = remainingWholeDays(current.expiresAt, now);
      if (remaining >= base - 1 && remaining <= base) {
        const refund = calculateRefund(current.expiresAt, catalog.priceOf(current.tierName), now);
        return {
          success: true,
          plan: {
            path: 'UPGRADE',
            from: current,
            toTier: tierName,
            staleTarget: input.targetRecord,
            days: target.baseDurationDays,
            upgradeCost,
            refund,
            charge: Math.max(0, upgradeCost - refund),
          },
        };
      }
    }
  }

  const yearly = input.duration === 'yearly';
  const charge = yearly ? catalog.yearlyPriceOf(tierName) : target.price;
  if (amount < charge) {
    return {
      success: false,
      reason: 'INSUFFICIENT_PAYMENT',
      message: `${amount} does not cover ${tierName} (${charge}) and matches no top-up or upgrade`,
      creditedAmount: amount,
    };
  }

  return {
    success: true,
    plan: {
      path: 'NORMAL',
      tierName,
      existing: input.targetRecord,
      days: yearly ? catalog.yearly.durationDays : target.baseDurationDays,
      charge,
    },
  };
}
