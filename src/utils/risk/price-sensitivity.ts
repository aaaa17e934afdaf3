/**
 * Price Sensitivity
 *
 * Second-order estimate of the price move for a parallel yield shock:
 *
 *   ΔP / P ≈ -D_mod · Δy + ½ · C · Δy²
 *
 * with Δy as an annual yield change, D_mod in years and C in years².
 *
 * @module price-sensitivity
 */

import type { PriceChangeEstimate, RiskResult } from '../../shared/types/index.js';
import { BASIS_POINTS_PER_UNIT } from '../../config/analytics-defaults.js';

/**
 * Estimate the price after a yield change given in basis points
 *
 * @param price - Starting price
 * @param risk - Risk metrics at the starting yield
 * @param yieldChangeBps - Annual yield change in basis points (+100 = +1%)
 *
 * @example
 * ```typescript
 * // modified duration 7.7946, convexity 73.6287, +100bp
 * estimatePriceChange(1000, risk, 100);
 * // durationEffect ≈ -0.077946, convexityEffect ≈ 0.003681, estimatedPrice ≈ 925.74
 * ```
 */
export function estimatePriceChange(
  price: number,
  risk: RiskResult,
  yieldChangeBps: number
): PriceChangeEstimate {
  const yieldChange = yieldChangeBps / BASIS_POINTS_PER_UNIT;

  const durationEffect = -risk.modifiedDuration * yieldChange;
  const convexityEffect = 0.5 * risk.convexity * yieldChange * yieldChange;
  const totalEffect = durationEffect + convexityEffect;
  const priceChange = price * totalEffect;

  return {
    yieldChangeBps,
    durationEffect,
    convexityEffect,
    totalEffect,
    priceChange,
    estimatedPrice: price + priceChange,
  };
}
