/**
 * Risk Metrics
 *
 * Duration and convexity of a cash-flow schedule at a flat per-period yield.
 * All functions are pure weighted sums over the schedule; the only failure
 * mode is an invalid yield (1 + y <= 0), raised as InvalidRateError.
 *
 * Both metrics are ratios over present values, so they are computed from
 * present-value weights scaled so that the largest one is 1. The absolute
 * present values can overflow (or underflow) for long schedules.
 *
 * Units:
 * - Macaulay and modified duration are in years
 * - calculateConvexity() returns periodic convexity (periods squared);
 *   annualizeConvexity() converts it to years squared
 *
 * @module risk-metrics
 */

import type {
  CashFlowSchedule,
  PaymentFrequency,
  RiskResult,
} from '../../shared/types/index.js';
import { assertValidYield } from '../pricing/index.js';

/**
 * Present-value weight of each non-zero cash flow, scaled to a maximum of 1
 */
function presentValueWeights(
  schedule: CashFlowSchedule,
  yieldPerPeriod: number
): Array<{ periodIndex: number; timeInYears: number; weight: number }> {
  const logBase = Math.log1p(yieldPerPeriod);
  const logValues = schedule
    .filter((cashFlow) => cashFlow.amount > 0)
    .map((cashFlow) => ({
      periodIndex: cashFlow.periodIndex,
      timeInYears: cashFlow.timeInYears,
      logValue: Math.log(cashFlow.amount) - cashFlow.periodIndex * logBase,
    }));

  const maxLogValue = Math.max(...logValues.map((entry) => entry.logValue));

  return logValues.map(({ periodIndex, timeInYears, logValue }) => ({
    periodIndex,
    timeInYears,
    weight: Math.exp(logValue - maxLogValue),
  }));
}

// ============================================================================
// DURATION
// ============================================================================

/**
 * Macaulay duration: Σ t_i · PV_i / Σ PV_i, with t_i in years
 *
 * @throws InvalidRateError if 1 + yieldPerPeriod <= 0
 *
 * @example
 * ```typescript
 * // 10y 5% semi-annual bond at 2.5% per period
 * calculateMacaulayDuration(schedule, 0.025); // ≈ 7.9894 years
 * ```
 */
export function calculateMacaulayDuration(
  schedule: CashFlowSchedule,
  yieldPerPeriod: number
): number {
  assertValidYield(yieldPerPeriod);

  let weightedTime = 0;
  let totalWeight = 0;

  for (const { timeInYears, weight } of presentValueWeights(schedule, yieldPerPeriod)) {
    weightedTime += timeInYears * weight;
    totalWeight += weight;
  }

  return weightedTime / totalWeight;
}

/**
 * Modified duration: macaulayDuration / (1 + yieldPerPeriod)
 *
 * @throws InvalidRateError if 1 + yieldPerPeriod <= 0
 */
export function calculateModifiedDuration(
  macaulayDuration: number,
  yieldPerPeriod: number
): number {
  assertValidYield(yieldPerPeriod);
  return macaulayDuration / (1 + yieldPerPeriod);
}

// ============================================================================
// CONVEXITY
// ============================================================================

/**
 * Periodic convexity: Σ k(k+1) · PV_k / ((1+y)² · Σ PV_k)
 *
 * Result is in periods squared. Divide by frequency² (annualizeConvexity)
 * before combining it with annual yield changes.
 *
 * @throws InvalidRateError if 1 + yieldPerPeriod <= 0
 */
export function calculateConvexity(
  schedule: CashFlowSchedule,
  yieldPerPeriod: number
): number {
  assertValidYield(yieldPerPeriod);

  const base = 1 + yieldPerPeriod;
  let weighted = 0;
  let totalWeight = 0;

  for (const { periodIndex: k, weight } of presentValueWeights(schedule, yieldPerPeriod)) {
    weighted += k * (k + 1) * weight;
    totalWeight += weight;
  }

  return weighted / (base * base * totalWeight);
}

/**
 * Convert periodic convexity (periods²) to annual convexity (years²)
 *
 * @example
 * ```typescript
 * annualizeConvexity(294.515, 2); // ≈ 73.629
 * ```
 */
export function annualizeConvexity(
  periodicConvexity: number,
  frequency: PaymentFrequency
): number {
  return periodicConvexity / (frequency * frequency);
}

// ============================================================================
// COMBINED
// ============================================================================

/**
 * Duration and annualized convexity in one pass over the inputs
 *
 * @throws InvalidRateError if 1 + yieldPerPeriod <= 0
 */
export function calculateRiskMetrics(
  schedule: CashFlowSchedule,
  yieldPerPeriod: number,
  frequency: PaymentFrequency
): RiskResult {
  const macaulayDuration = calculateMacaulayDuration(schedule, yieldPerPeriod);

  return {
    macaulayDuration,
    modifiedDuration: calculateModifiedDuration(macaulayDuration, yieldPerPeriod),
    convexity: annualizeConvexity(calculateConvexity(schedule, yieldPerPeriod), frequency),
  };
}
