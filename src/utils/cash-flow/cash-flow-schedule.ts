/**
 * Cash Flow Schedule
 *
 * Pure functions producing the ordered payments of a fixed-rate coupon bond.
 * Each period pays the same coupon; the final period also repays face value.
 *
 * @module cash-flow-schedule
 */

import type {
  Bond,
  CashFlow,
  CashFlowRow,
  CashFlowSchedule,
} from '../../shared/types/index.js';
import { getPeriodCount, getPeriodCoupon } from '../bond/index.js';
import { InvalidBondError } from '../errors/index.js';

/**
 * Build the cash-flow schedule of a bond
 *
 * Period i (1-indexed) is paid at i / frequency years.
 *
 * @throws InvalidBondError if the bond has no coupon period
 *
 * @example
 * ```typescript
 * const bond = createBond({ faceValue: 1000, couponRate: 0.06, yearsToMaturity: 2, frequency: 1 });
 * buildCashFlowSchedule(bond);
 * // [
 * //   { periodIndex: 1, timeInYears: 1, amount: 60 },
 * //   { periodIndex: 2, timeInYears: 2, amount: 1060 },
 * // ]
 * ```
 */
export function buildCashFlowSchedule(bond: Bond): CashFlowSchedule {
  const periods = getPeriodCount(bond);
  if (periods < 1) {
    throw new InvalidBondError(
      `Bond must have at least one coupon period, got ${periods}`,
      'yearsToMaturity',
      bond.yearsToMaturity
    );
  }

  const coupon = getPeriodCoupon(bond);
  const cashFlows: CashFlow[] = [];

  for (let periodIndex = 1; periodIndex <= periods; periodIndex++) {
    const amount = periodIndex === periods ? coupon + bond.faceValue : coupon;
    cashFlows.push(
      Object.freeze({
        periodIndex,
        timeInYears: periodIndex / bond.frequency,
        amount,
      })
    );
  }

  return Object.freeze(cashFlows);
}

/**
 * Convert a schedule into serializable table rows
 */
export function toCashFlowRows(schedule: CashFlowSchedule): CashFlowRow[] {
  return schedule.map((cashFlow) => ({
    period: cashFlow.periodIndex,
    time: cashFlow.timeInYears,
    amount: cashFlow.amount,
  }));
}

/**
 * Undiscounted sum of all payments (the price at a zero yield)
 */
export function getTotalCashFlows(schedule: CashFlowSchedule): number {
  return schedule.reduce((sum, cashFlow) => sum + cashFlow.amount, 0);
}
