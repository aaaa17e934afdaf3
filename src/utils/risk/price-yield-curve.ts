/**
 * Price-Yield Curve
 *
 * Lazy, restartable sweeps of price over a range of yields, for plotting.
 * Each iteration re-runs the underlying map over calculatePrice(); nothing
 * is cached between iterations.
 *
 * @module price-yield-curve
 */

import type {
  CashFlowSchedule,
  PaymentFrequency,
  PriceYieldPoint,
  YieldRange,
} from '../../shared/types/index.js';
import { DEFAULT_CURVE_RANGE } from '../../config/analytics-defaults.js';
import { calculatePrice, toPeriodicYield } from '../pricing/index.js';
import { InvalidCurveRangeError } from '../errors/index.js';

/**
 * Evenly spaced annual yields from fromAnnualYield to toAnnualYield inclusive
 *
 * A single point yields fromAnnualYield only.
 *
 * @throws InvalidCurveRangeError if points is not a positive integer or a bound is not finite
 *
 * @example
 * ```typescript
 * [...yieldRange({ fromAnnualYield: 0.01, toAnnualYield: 0.05, points: 5 })];
 * // [0.01, 0.02, 0.03, 0.04, 0.05]
 * ```
 */
export function yieldRange(range: YieldRange = DEFAULT_CURVE_RANGE): Iterable<number> {
  const { fromAnnualYield, toAnnualYield, points } = range;

  if (!Number.isInteger(points) || points < 1) {
    throw new InvalidCurveRangeError(
      `Yield range must have a positive integer number of points, got ${points}`,
      'points'
    );
  }
  if (!Number.isFinite(fromAnnualYield)) {
    throw new InvalidCurveRangeError(
      `Yield range bounds must be finite, got [${fromAnnualYield}, ${toAnnualYield}]`,
      'fromAnnualYield'
    );
  }
  if (!Number.isFinite(toAnnualYield)) {
    throw new InvalidCurveRangeError(
      `Yield range bounds must be finite, got [${fromAnnualYield}, ${toAnnualYield}]`,
      'toAnnualYield'
    );
  }

  const step = points === 1 ? 0 : (toAnnualYield - fromAnnualYield) / (points - 1);

  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < points; i++) {
        yield i === points - 1 && points > 1 ? toAnnualYield : fromAnnualYield + i * step;
      }
    },
  };
}

/**
 * Sweep prices over annual yields
 *
 * Every annual yield is converted to a periodic one once, via
 * toPeriodicYield(). Prices are computed on demand while iterating; an
 * invalid yield raises InvalidRateError at the point it is reached.
 *
 * @example
 * ```typescript
 * const curve = sweepPriceYieldCurve(schedule, 2, yieldRange());
 * for (const { annualYield, price } of curve) {
 *   plot(annualYield * 100, price);
 * }
 * ```
 */
export function sweepPriceYieldCurve(
  schedule: CashFlowSchedule,
  frequency: PaymentFrequency,
  annualYields: Iterable<number>
): Iterable<PriceYieldPoint> {
  return {
    *[Symbol.iterator]() {
      for (const annualYield of annualYields) {
        const yieldPerPeriod = toPeriodicYield(annualYield, frequency);
        yield {
          annualYield,
          yieldPerPeriod,
          price: calculatePrice(schedule, yieldPerPeriod),
        };
      }
    },
  };
}
