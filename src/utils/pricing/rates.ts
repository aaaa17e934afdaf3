/**
 * Yield Rate Conversions
 *
 * The pricing engine works in yields per coupon period. This module is the
 * single place where annual yields are converted to and from periodic ones;
 * every annual-yield entry point divides by frequency exactly once, here.
 *
 * @module rates
 */

import type { PaymentFrequency } from '../../shared/types/index.js';
import { InvalidRateError } from '../errors/index.js';

/**
 * Convert an annual yield to a yield per coupon period
 *
 * @example
 * ```typescript
 * toPeriodicYield(0.05, 2); // 0.025
 * ```
 */
export function toPeriodicYield(annualYield: number, frequency: PaymentFrequency): number {
  return annualYield / frequency;
}

/**
 * Convert a yield per coupon period to an annual yield
 *
 * @example
 * ```typescript
 * toAnnualYield(0.025, 2); // 0.05
 * ```
 */
export function toAnnualYield(yieldPerPeriod: number, frequency: PaymentFrequency): number {
  return yieldPerPeriod * frequency;
}

/**
 * Ensure a periodic yield gives a positive discount base
 *
 * @throws InvalidRateError if the yield is not finite or 1 + y <= 0
 */
export function assertValidYield(yieldPerPeriod: number): void {
  if (!Number.isFinite(yieldPerPeriod) || 1 + yieldPerPeriod <= 0) {
    throw new InvalidRateError(yieldPerPeriod);
  }
}

/**
 * Discount factor for a number of periods: (1 + y)^-periods
 *
 * @throws InvalidRateError if 1 + y <= 0
 */
export function discountFactor(yieldPerPeriod: number, periods: number): number {
  assertValidYield(yieldPerPeriod);
  return Math.pow(1 + yieldPerPeriod, -periods);
}
