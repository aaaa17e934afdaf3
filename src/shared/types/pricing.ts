/**
 * Pricing Types
 */

/**
 * Price decomposition at the valuation date
 *
 * dirtyPrice is the present value of all future cash flows; price is the
 * same number. cleanPrice = dirtyPrice - accruedInterest.
 */
export interface PricingResult {
  price: number;
  cleanPrice: number;
  dirtyPrice: number;
  accruedInterest: number;
}

/**
 * Solved yield to maturity
 */
export interface YieldToMaturityResult {
  /** Discount rate per coupon period */
  yieldPerPeriod: number;
  /** yieldPerPeriod * frequency */
  annualYield: number;
  /** Solver iterations used */
  iterations: number;
}

/**
 * Options for the yield-to-maturity root finder
 */
export interface YieldSolverConfig {
  /** Convergence threshold on |price(y) - marketPrice|, relative to marketPrice */
  tolerance: number;
  /** Iteration cap for the Newton/bisection loop */
  maxIterations: number;
  /** Initial search interval [lo, hi] for the per-period yield; lo must exceed -1 */
  bracket: readonly [number, number];
  /** Starting point for Newton steps (per period) */
  initialGuess: number;
  /** How many times the upper bound may be widened when the root lies above it */
  maxBracketExpansions: number;
}

/**
 * Day-count conventions for accrual year fractions
 */
export type DayCountConvention = '30/360' | 'ACT/360' | 'ACT/365';
