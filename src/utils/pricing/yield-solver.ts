/**
 * Yield-to-Maturity Solver
 *
 * Inverts price(y) = marketPrice for the per-period yield with a safeguarded
 * Newton-Raphson iteration: the root is always kept inside a bracket
 * [lo, hi] with price(lo) > marketPrice > price(hi), and any Newton step that
 * leaves the bracket, meets a zero or non-finite slope, or fails to halve the
 * step taken two iterations earlier is replaced by a bisection step, so the
 * bracket shrinks on every iteration.
 *
 * Search domain: (-1, +∞) per period. The upper bound is widened when the
 * root lies above it; a price that would need a yield at or below -100% per
 * period raises YieldNotFoundError rather than being extrapolated.
 *
 * @module yield-solver
 */

import type {
  CashFlowSchedule,
  PaymentFrequency,
  YieldSolverConfig,
  YieldToMaturityResult,
} from '../../shared/types/index.js';
import { resolveYieldSolverConfig } from '../../config/solver.js';
import { InvalidPriceError, YieldNotFoundError } from '../errors/index.js';
import { calculatePrice, calculatePriceDerivative } from './price.js';
import { toAnnualYield } from './rates.js';

/**
 * Solve for the yield that prices a schedule at a given market price
 *
 * @param schedule - Cash flows from buildCashFlowSchedule()
 * @param marketPrice - Observed dirty price (positive)
 * @param frequency - Coupon payments per year, used to annualize the result
 * @param options - Overrides for tolerance, maxIterations, bracket, initialGuess, maxBracketExpansions
 * @throws InvalidPriceError if marketPrice is not a positive number
 * @throws YieldNotFoundError if no root lies in the search domain or the iteration cap is reached
 * @throws InvalidSolverConfigError if the options are unusable
 *
 * @example
 * ```typescript
 * // 10y 5% semi-annual bond quoted at 950
 * const { yieldPerPeriod, annualYield } = calculateYieldToMaturity(schedule, 950, 2);
 * // yieldPerPeriod ≈ 0.028308, annualYield ≈ 0.056617
 * ```
 */
export function calculateYieldToMaturity(
  schedule: CashFlowSchedule,
  marketPrice: number,
  frequency: PaymentFrequency,
  options: Partial<YieldSolverConfig> = {}
): YieldToMaturityResult {
  if (!Number.isFinite(marketPrice) || marketPrice <= 0) {
    throw new InvalidPriceError(marketPrice);
  }

  const config = resolveYieldSolverConfig(options);
  const priceTolerance = config.tolerance * marketPrice;
  const excess = (yieldPerPeriod: number): number =>
    calculatePrice(schedule, yieldPerPeriod) - marketPrice;

  const converged = (yieldPerPeriod: number, iterations: number): YieldToMaturityResult => ({
    yieldPerPeriod,
    annualYield: toAnnualYield(yieldPerPeriod, frequency),
    iterations,
  });

  let [lo, hi] = config.bracket;

  const excessAtLo = excess(lo);
  if (Math.abs(excessAtLo) <= priceTolerance) {
    return converged(lo, 0);
  }
  if (excessAtLo < 0) {
    throw new YieldNotFoundError(
      `Market price ${marketPrice} exceeds the bond value at every yield above ${lo} per period`,
      marketPrice,
      0
    );
  }

  let excessAtHi = excess(hi);
  let expansions = 0;
  while (excessAtHi > priceTolerance) {
    if (expansions >= config.maxBracketExpansions) {
      throw new YieldNotFoundError(
        `Market price ${marketPrice} is below the bond value at ${hi} per period after ${expansions} bracket expansions`,
        marketPrice,
        0
      );
    }
    // Root lies above hi: the old upper bound becomes the new lower bound.
    const width = hi - lo;
    lo = hi;
    hi = lo + 2 * width;
    excessAtHi = excess(hi);
    expansions++;
  }
  if (excessAtHi >= -priceTolerance) {
    return converged(hi, 0);
  }

  let yieldPerPeriod =
    config.initialGuess > lo && config.initialGuess < hi
      ? config.initialGuess
      : lo + (hi - lo) / 2;
  let step = hi - lo;
  let stepBeforeLast = step;

  for (let iteration = 1; iteration <= config.maxIterations; iteration++) {
    const f = excess(yieldPerPeriod);
    if (Math.abs(f) <= priceTolerance) {
      return converged(yieldPerPeriod, iteration);
    }

    if (f > 0) {
      lo = yieldPerPeriod;
    } else {
      hi = yieldPerPeriod;
    }

    // Bracket collapsed to floating-point resolution
    if (hi - lo <= Number.EPSILON * Math.max(1, Math.abs(yieldPerPeriod))) {
      return converged(yieldPerPeriod, iteration);
    }

    // Newton is taken only when it stays inside the bracket and at least
    // halves the step from two iterations back; otherwise bisect.
    const newtonStep = f / calculatePriceDerivative(schedule, yieldPerPeriod);
    const candidate = yieldPerPeriod - newtonStep;
    const acceptNewton =
      Number.isFinite(candidate) &&
      candidate > lo &&
      candidate < hi &&
      Math.abs(newtonStep) <= Math.abs(stepBeforeLast) / 2;

    stepBeforeLast = step;
    if (acceptNewton) {
      step = newtonStep;
      yieldPerPeriod = candidate;
    } else {
      step = (hi - lo) / 2;
      yieldPerPeriod = lo + step;
    }
  }

  throw new YieldNotFoundError(
    `Yield did not converge within ${config.maxIterations} iterations for market price ${marketPrice}`,
    marketPrice,
    config.maxIterations
  );
}
