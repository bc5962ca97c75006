/**
 * PaymentIntakeService - Entry point for resolved payments
 *
 * A payment that has already been matched to an account and an integer
 * amount enters here. The amount is credited to the account's wallet, a
 * tier is resolved from the amount, and the purchase engine spends it from
 * the wallet. Amounts that resolve to no tier, or whose purchase is
 * refused, stay as balance.
 *
 * Amount resolution, first match wins:
 *   1. relative to the effective tier E: E's price, E's yearly price,
 *      the upgrade cost from E to the next tier, a partial price point of E
 *   2. any tier's monthly price (highest priority first)
 *   3. any tier's yearly price
 *
 * @module packages/core/services/PaymentIntakeService
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { TierCatalog } from '../domain/tier-catalog.js';
import { systemClock, type Clock, type PurchaseDuration } from '../domain/entitlement.js';
import type { IRoleAuthority } from '../ports/IRoleAuthority.js';
import type { IWallet } from '../ports/IWallet.js';
import type { INotifier } from '../ports/INotifier.js';
import type { IPaymentLog } from '../ports/ICollaborators.js';
import type { PurchaseDecisionEngine, PurchaseResult } from './PurchaseDecisionEngine.js';

// =============================================================================
// Types
// =============================================================================

export const ResolvedPaymentSchema = z.object({
  paymentId: z.string().min(1),
  accountId: z.string().min(1),
  amount: z.number().int().positive(),
  source: z.string().min(1).default('external'),
});

export type ResolvedPayment = z.input<typeof ResolvedPaymentSchema>;

export type IngestStatus =
  | 'INVALID'
  | 'DUPLICATE'
  | 'ACCOUNT_NOT_FOUND'
  | 'CREDITED'
  | 'APPLIED'
  | 'NOT_APPLIED';

export interface IngestResult {
  status: IngestStatus;
  paymentId?: string;
  tierName?: string;
  duration?: PurchaseDuration;
  purchase?: PurchaseResult;
  message?: string;
}

export interface PaymentTarget {
  tierName: string;
  duration: PurchaseDuration;
}

export interface PaymentIntakeDeps {
  catalog: TierCatalog;
  engine: PurchaseDecisionEngine;
  authority: IRoleAuthority;
  wallet: IWallet;
  payments: IPaymentLog;
  notifier: INotifier;
  logger: Logger;
  clock?: Clock;
}

// =============================================================================
// Service
// =============================================================================

export class PaymentIntakeService {
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: PaymentIntakeDeps) {
    this.log = deps.logger.child({ component: 'PaymentIntakeService' });
    this.clock = deps.clock ?? systemClock;
  }

  async ingest(payment: ResolvedPayment): Promise<IngestResult> {
    const parsed = ResolvedPaymentSchema.safeParse(payment);
    if (!parsed.success) {
      return { status: 'INVALID', message: parsed.error.message };
    }
    const { paymentId, accountId, amount, source } = parsed.data;
    const { authority, payments, wallet, engine } = this.deps;

    const exists = await authority.resolveAccount(accountId);
    const claimed = await payments.claim({
      paymentId,
      accountId: exists ? accountId : null,
      amount,
      source,
      receivedAt: this.clock(),
      outcome: exists ? 'RECEIVED' : 'ACCOUNT_NOT_FOUND',
    });

    if (!claimed) {
      this.log.debug({ paymentId }, 'Payment already handled');
      return { status: 'DUPLICATE', paymentId };
    }
    if (!exists) {
      this.log.warn({ paymentId, accountId, amount }, 'Payment for unknown account');
      return { status: 'ACCOUNT_NOT_FOUND', paymentId };
    }

    const balance = await wallet.credit(accountId, amount);
    this.log.info({ paymentId, accountId, amount, balance }, 'Payment credited');

    const effectiveTier = await engine.resolveEffectiveTier(accountId);
    const target = this.resolveTarget(amount, effectiveTier);

    if (!target) {
      await payments.complete(paymentId, 'CREDITED');
      this.deps.notifier.notify({ accountId, kind: 'credited', amount });
      return { status: 'CREDITED', paymentId };
    }

    const purchase = await engine.purchase({
      accountId,
      tierName: target.tierName,
      amount,
      source: 'payment',
      duration: target.duration,
    });

    const outcome = purchase.success
      ? `APPLIED:${purchase.outcome.pathTaken}`
      : `NOT_APPLIED:${purchase.reason}`;
    await payments.complete(paymentId, outcome);

    return {
      status: purchase.success ? 'APPLIED' : 'NOT_APPLIED',
      paymentId,
      tierName: target.tierName,
      duration: target.duration,
      purchase,
    };
  }

  /**
   * Maps a paid amount onto the tier it most plausibly buys.
   */
  resolveTarget(amount: number, effectiveTier: string | null): PaymentTarget | null {
    const { catalog } = this.deps;
    const held = effectiveTier ? catalog.get(effectiveTier) : undefined;

    if (held) {
      if (amount === held.price) {
        return { tierName: held.name, duration: 'monthly' };
      }
      if (amount === catalog.yearlyPriceOf(held.name)) {
        return { tierName: held.name, duration: 'yearly' };
      }
      const next = catalog.nextTierAbove(held.name);
      if (next && amount === catalog.upgradeCost(held.name, next.name)) {
        return { tierName: next.name, duration: 'monthly' };
      }
      if (catalog.partialExtensionDays(held.name, amount) > 0) {
        return { tierName: held.name, duration: 'monthly' };
      }
    }

    const tiers = [...catalog.tiersByPriority()].reverse();
    const monthly = tiers.find((tier) => tier.price === amount);
    if (monthly) {
      return { tierName: monthly.name, duration: 'monthly' };
    }
    const yearly = tiers.find((tier) => catalog.yearlyPriceOf(tier.name) === amount);
    if (yearly) {
      return { tierName: yearly.name, duration: 'yearly' };
    }

    return null;
  }
}
