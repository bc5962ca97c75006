/**
 * TierCatalog - Immutable tier pricing and priority tables
 *
 * Built once at start-up from the configured tier list. Derived tables
 * (partial-extension price points, adjacent upgrade costs) are computed in
 * the constructor and never change afterwards. Lookups for unknown tier
 * names return 0 / undefined instead of throwing.
 *
 * @module packages/core/domain/tier-catalog
 */

import { CatalogError } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export interface TierDefinition {
  /** Unique tier name, e.g. "Silver" */
  name: string;
  /** Monthly price in wallet currency units */
  price: number;
  /** Strict total order; higher value outranks lower */
  priority: number;
  /** Days granted by one full-price purchase */
  baseDurationDays: number;
}

export interface YearlyPricing {
  /** Yearly price = monthly price x months */
  months: number;
  durationDays: number;
}

export interface TierCatalogOptions {
  yearly?: Partial<YearlyPricing>;
  /**
   * Amounts accepted as partial top-ups. Defaults to every tier's price and
   * price - 1.
   */
  pricePoints?: number[];
}

export const DEFAULT_YEARLY_PRICING: YearlyPricing = {
  months: 10,
  durationDays: 365,
};

interface UpgradeEdge {
  toTier: string;
  cost: number;
}

// =============================================================================
// Catalog
// =============================================================================

export class TierCatalog {
  readonly yearly: YearlyPricing;

  private readonly ordered: readonly TierDefinition[];
  private readonly byName: ReadonlyMap<string, TierDefinition>;
  private readonly partialDays: ReadonlyMap<string, ReadonlyMap<number, number>>;
  private readonly upgrades: ReadonlyMap<string, UpgradeEdge>;

  constructor(tiers: readonly TierDefinition[], options: TierCatalogOptions = {}) {
    validateTiers(tiers);

    this.yearly = Object.freeze({
      months: options.yearly?.months ?? DEFAULT_YEARLY_PRICING.months,
      durationDays: options.yearly?.durationDays ?? DEFAULT_YEARLY_PRICING.durationDays,
    });

    this.ordered = Object.freeze(
      [...tiers]
        .sort((a, b) => a.priority - b.priority)
        .map((tier) => Object.freeze({ ...tier }))
    );
    this.byName = new Map(this.ordered.map((tier) => [tier.name, tier]));

    const points = options.pricePoints ?? defaultPricePoints(this.ordered);
    this.partialDays = new Map(
      this.ordered.map((tier) => [tier.name, buildPartialTable(tier, points)])
    );

    const upgrades = new Map<string, UpgradeEdge>();
    for (let i = 0; i < this.ordered.length - 1; i++) {
      const from = this.ordered[i];
      const to = this.ordered[i + 1];
      upgrades.set(from.name, { toTier: to.name, cost: to.price - from.price });
    }
    this.upgrades = upgrades;
  }

  has(tierName: string): boolean {
    return this.byName.has(tierName);
  }

  get(tierName: string): TierDefinition | undefined {
    return this.byName.get(tierName);
  }

  /** Tiers ordered from lowest to highest priority */
  tiersByPriority(): readonly TierDefinition[] {
    return this.ordered;
  }

  priceOf(tierName: string): number {
    return this.byName.get(tierName)?.price ?? 0;
  }

  priorityOf(tierName: string): number {
    return this.byName.get(tierName)?.priority ?? 0;
  }

  baseDurationOf(tierName: string): number {
    return this.byName.get(tierName)?.baseDurationDays ?? 0;
  }

  yearlyPriceOf(tierName: string): number {
    return this.priceOf(tierName) * this.yearly.months;
  }

  /**
   * Days granted when `amount` is paid towards `tierName` as a partial
   * top-up. 0 when the amount is not a supported price point.
   */
  partialExtensionDays(tierName: string, amount: number): number {
    return this.partialDays.get(tierName)?.get(amount) ?? 0;
  }

  /**
   * Cost of moving from `fromTier` to `toTier`; defined only when `toTier`
   * is the next tier above `fromTier`.
   */
  upgradeCost(fromTier: string, toTier: string): number | undefined {
    const edge = this.upgrades.get(fromTier);
    return edge && edge.toTier === toTier ? edge.cost : undefined;
  }

  nextTierAbove(tierName: string): TierDefinition | undefined {
    const edge = this.upgrades.get(tierName);
    return edge ? this.byName.get(edge.toTier) : undefined;
  }

  /**
   * Highest-priority tier among the given names; unknown names are ignored.
   */
  highestOf(tierNames: Iterable<string>): TierDefinition | undefined {
    let best: TierDefinition | undefined;
    for (const name of tierNames) {
      const tier = this.byName.get(name);
      if (tier && (!best || tier.priority > best.priority)) {
        best = tier;
      }
    }
    return best;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validateTiers(tiers: readonly TierDefinition[]): void {
  if (tiers.length === 0) {
    throw new CatalogError('Tier catalog must contain at least one tier');
  }

  const names = new Set<string>();
  const priorities = new Set<number>();
  for (const tier of tiers) {
    if (!tier.name) {
      throw new CatalogError('Tier name must not be empty');
    }
    if (names.has(tier.name)) {
      throw new CatalogError(`Duplicate tier name: ${tier.name}`);
    }
    if (priorities.has(tier.priority)) {
      throw new CatalogError(`Duplicate tier priority ${tier.priority} (${tier.name})`);
    }
    if (!Number.isInteger(tier.price) || tier.price <= 0) {
      throw new CatalogError(`Tier ${tier.name} must have a positive integer price`);
    }
    if (!Number.isInteger(tier.baseDurationDays) || tier.baseDurationDays <= 0) {
      throw new CatalogError(`Tier ${tier.name} must have a positive base duration`);
    }
    names.add(tier.name);
    priorities.add(tier.priority);
  }

  const sorted = [...tiers].sort((a, b) => a.priority - b.priority);
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].price <= sorted[i - 1].price) {
      throw new CatalogError(
        `Tier ${sorted[i].name} outranks ${sorted[i - 1].name} but is not priced higher`
      );
    }
  }
}

function defaultPricePoints(tiers: readonly TierDefinition[]): number[] {
  const points = new Set<number>();
  for (const tier of tiers) {
    points.add(tier.price - 1);
    points.add(tier.price);
  }
  return [...points].sort((a, b) => a - b);
}

function buildPartialTable(tier: TierDefinition, points: readonly number[]): Map<number, number> {
  const table = new Map<number, number>();
  for (const point of points) {
    if (point <= 0 || point >= tier.price) continue;
    const days = Math.floor((point * tier.baseDurationDays) / tier.price);
    if (days > 0) {
      table.set(point, days);
    }
  }
  table.set(tier.price, tier.baseDurationDays);
  return table;
}
