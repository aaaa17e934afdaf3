/**
 * Analytics Defaults
 */

import type { DayCountConvention, YieldRange } from '../shared/types/index.js';

/**
 * Annual-yield range swept for the price-yield curve: 1% to 15%, 100 points
 */
export const DEFAULT_CURVE_RANGE: Readonly<YieldRange> = {
  fromAnnualYield: 0.01,
  toAnnualYield: 0.15,
  points: 100,
};

/**
 * Day count used when accrual is derived from dates
 * Actual days elapsed over a 360-day year
 */
export const DEFAULT_DAY_COUNT_CONVENTION: DayCountConvention = 'ACT/360';

/**
 * Basis points per unit of yield
 */
export const BASIS_POINTS_PER_UNIT = 10_000;
