/**
 * IEntitlementStore - Port Interface for the Entitlement Ledger
 *
 * Durable record of which account holds which tier until when. Mutations of
 * one account happen inside a unit of work obtained from `withAccount`,
 * which serializes work per account id; different accounts never block
 * each other.
 *
 * @module packages/core/ports/IEntitlementStore
 */

import type { Entitlement } from '../domain/entitlement.js';

/**
 * Ledger operations scoped to one locked account.
 */
export interface IAccountEntitlements {
  readonly accountId: string;

  get(tierName: string): Promise<Entitlement | null>;

  list(): Promise<Entitlement[]>;

  insert(entitlement: Omit<Entitlement, 'accountId'>): Promise<Entitlement>;

  /**
   * Sets a new expiry (and optionally a new assignment handle).
   * @throws PersistenceError when no record exists for the tier
   */
  updateExpiry(
    tierName: string,
    expiresAt: Date,
    externalAssignmentId?: string | null
  ): Promise<Entitlement>;

  /** Returns the number of rows deleted (0 or 1) */
  delete(tierName: string): Promise<number>;

  /**
   * Atomically deletes `removeTier` and writes `entitlement`, overwriting any
   * record already held for the new tier.
   * @throws PersistenceError when `removeTier` has no record
   */
  replace(removeTier: string, entitlement: Omit<Entitlement, 'accountId'>): Promise<Entitlement>;
}

export interface IEntitlementStore {
  withAccount<T>(accountId: string, work: (tx: IAccountEntitlements) => Promise<T>): Promise<T>;

  /** Records with expiresAt <= now, optionally limited to a set of tiers (empty set matches none) */
  findExpired(now: Date, tierNames?: readonly string[]): Promise<Entitlement[]>;

  /** Records with from < expiresAt <= to */
  findExpiringBetween(from: Date, to: Date): Promise<Entitlement[]>;

  /** Account ids holding a ledger record for the tier */
  listAccountsWithTier(tierName: string): Promise<string[]>;
}
