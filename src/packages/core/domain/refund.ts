/**
 * Prorated refund for the unused part of an entitlement.
 *
 * Half the nominal value of the remaining time, floored, and never more
 * than half of one period's price.
 */

import { remainingWholeDays } from './entitlement.js';

const DAYS_PER_MONTH = 30;

export function calculateRefund(expiresAt: Date, tierPrice: number, now: Date): number {
  if (tierPrice <= 0) return 0;

  const remainingDays = Math.max(0, remainingWholeDays(expiresAt, now));
  if (remainingDays <= 0) return 0;

  const fullMonths = Math.floor(remainingDays / DAYS_PER_MONTH);
  const extraDays = remainingDays % DAYS_PER_MONTH;

  // price*m/2 + price*d/30/2 over a common denominator
  const refund = Math.floor(
    (tierPrice * fullMonths * DAYS_PER_MONTH + tierPrice * extraDays) / (DAYS_PER_MONTH * 2)
  );

  return Math.min(refund, Math.floor(tierPrice / 2));
}
