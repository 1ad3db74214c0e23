/**
 * Tiered Cost
 * Volume-tier integration shared by every service with tiered pricing
 */

import type { PricingTier } from './types';

/**
 * Charge each tier's rate for the slice of quantity between the previous
 * tier's upper bound and its own (clamped to the quantity). Tiers must be
 * ordered by ascending upper bound.
 */
export function calculateTieredCost(quantity: number, tiers: readonly PricingTier[]): number {
  if (tiers.length === 0 || !(quantity > 0)) {
    return 0;
  }

  let total = 0;
  let previousLimit = 0;

  for (const tier of tiers) {
    if (quantity <= previousLimit) break;

    const upper = Math.min(tier.upTo, quantity);
    const slice = upper - previousLimit;
    if (slice > 0) {
      total += slice * tier.rate;
    }
    previousLimit = tier.upTo;
  }

  return total;
}

/**
 * Rate of the first tier, used where a single representative rate is reported
 */
export function firstTierRate(tiers: readonly PricingTier[]): number {
  return tiers.length > 0 ? tiers[0].rate : 0;
}
