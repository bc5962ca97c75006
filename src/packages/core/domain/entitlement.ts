/**
 * Entitlement Domain Types
 *
 * @module packages/core/domain/entitlement
 */

/** Milliseconds in one day */
export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A time-bound grant of one tier to one account.
 * At most one record exists per (accountId, tierName).
 */
export interface Entitlement {
  accountId: string;
  tierName: string;
  /** UTC expiry instant, second precision */
  expiresAt: Date;
  /** Handle returned by the external authority when the grant was issued */
  externalAssignmentId: string | null;
}

export type PurchasePath = 'NORMAL' | 'PARTIAL' | 'UPGRADE';

/** Where a purchase request originated */
export type PurchaseSource = 'payment' | 'shop' | 'operator';

export type PurchaseDuration = 'monthly' | 'yearly';

export interface PurchaseOutcome {
  pathTaken: PurchasePath;
  /** Tier whose expiry changed (the held tier for PARTIAL) */
  tierName: string;
  daysAdded: number;
  refundIssued: number | null;
  /** Net change applied to the account's wallet (negative = debit) */
  walletDelta: number;
  expiresAt: Date;
}

/**
 * Aggregate counters of one reconciliation sweep.
 */
export interface SweepStats {
  expiredFound: number;
  removed: number;
  skippedMissingAccount: number;
  skippedMissingExternalGrant: number;
  skippedAlreadyRevoked: number;
  failed: number;
  orphanGrantsRevoked: number;
}

export function emptySweepStats(): SweepStats {
  return {
    expiredFound: 0,
    removed: 0,
    skippedMissingAccount: 0,
    skippedMissingExternalGrant: 0,
    skippedAlreadyRevoked: 0,
    failed: 0,
    orphanGrantsRevoked: 0,
  };
}

const SWEEP_STAT_KEYS = [
  'expiredFound',
  'removed',
  'skippedMissingAccount',
  'skippedMissingExternalGrant',
  'skippedAlreadyRevoked',
  'failed',
  'orphanGrantsRevoked',
] as const satisfies readonly (keyof SweepStats)[];

export function sweepStatsEqual(a: SweepStats, b: SweepStats): boolean {
  return SWEEP_STAT_KEYS.every((key) => a[key] === b[key]);
}

/**
 * Whole days between now and the expiry, floored; negative once expired.
 */
export function remainingWholeDays(expiresAt: Date, now: Date): number {
  return Math.floor((expiresAt.getTime() - now.getTime()) / DAY_MS);
}

/**
 * Adds days to the later of `now` and the current expiry.
 */
export function extendExpiry(expiresAt: Date, days: number, now: Date): Date {
  const base = Math.max(expiresAt.getTime(), now.getTime());
  return new Date(base + days * DAY_MS);
}

export function addDays(from: Date, days: number): Date {
  return new Date(from.getTime() + days * DAY_MS);
}

/** Injectable time source */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
