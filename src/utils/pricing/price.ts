/**
 * Bond Price Calculations
 *
 * Present value of a cash-flow schedule at a flat per-period yield:
 *
 *   price(y) = Σ amount_k / (1 + y)^k
 *
 * price(y) is continuous and strictly decreasing for y > -1, which is what
 * makes the yield-to-maturity inversion well posed.
 *
 * @module price
 */

import type {
  Bond,
  CashFlowSchedule,
  PricingResult,
} from '../../shared/types/index.js';
import { assertValidYield } from './rates.js';
import { InvalidPriceError } from '../errors/index.js';

/**
 * Present value (dirty price) of a schedule
 *
 * @param schedule - Cash flows from buildCashFlowSchedule()
 * @param yieldPerPeriod - Discount rate per coupon period
 * @throws InvalidRateError if 1 + yieldPerPeriod <= 0
 *
 * @example
 * ```typescript
 * // 10y 5% semi-annual bond at 2.5% per period prices at par
 * calculatePrice(schedule, 0.025); // ≈ 1000
 * ```
 */
export function calculatePrice(
  schedule: CashFlowSchedule,
  yieldPerPeriod: number
): number {
  assertValidYield(yieldPerPeriod);

  const base = 1 + yieldPerPeriod;
  let price = 0;
  for (const cashFlow of schedule) {
    // 0 / 0 when (1 + y)^k underflows near y = -1
    if (cashFlow.amount === 0) continue;
    price += cashFlow.amount / Math.pow(base, cashFlow.periodIndex);
  }
  return price;
}

/**
 * First derivative of price with respect to the periodic yield
 *
 *   dP/dy = -Σ k · amount_k / (1 + y)^(k + 1)
 *
 * @throws InvalidRateError if 1 + yieldPerPeriod <= 0
 */
export function calculatePriceDerivative(
  schedule: CashFlowSchedule,
  yieldPerPeriod: number
): number {
  assertValidYield(yieldPerPeriod);

  const base = 1 + yieldPerPeriod;
  let derivative = 0;
  for (const cashFlow of schedule) {
    if (cashFlow.amount === 0) continue;
    derivative -=
      (cashFlow.periodIndex * cashFlow.amount) /
      Math.pow(base, cashFlow.periodIndex + 1);
  }
  return derivative;
}

/**
 * Price a schedule and split the result into clean and dirty prices
 *
 * @param accruedInterest - Interest accrued since the last coupon (see calculateAccruedInterest)
 */
export function calculatePricingResult(
  schedule: CashFlowSchedule,
  yieldPerPeriod: number,
  accruedInterest = 0
): PricingResult {
  const dirtyPrice = calculatePrice(schedule, yieldPerPeriod);

  return {
    price: dirtyPrice,
    dirtyPrice,
    cleanPrice: dirtyPrice - accruedInterest,
    accruedInterest,
  };
}

/**
 * Current yield: annual coupon income divided by price
 *
 * @throws InvalidPriceError if price is not positive
 *
 * @example
 * ```typescript
 * calculateCurrentYield(bond, 950); // 50 / 950 ≈ 0.05263 for a 1000 face 5% bond
 * ```
 */
export function calculateCurrentYield(bond: Bond, price: number): number {
  if (!Number.isFinite(price) || price <= 0) {
    throw new InvalidPriceError(price);
  }
  return (bond.faceValue * bond.couponRate) / price;
}
