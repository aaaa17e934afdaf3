/**
 * Cash Flow Types
 */

/**
 * A single scheduled payment
 */
export interface CashFlow {
  /** 1-indexed coupon period */
  readonly periodIndex: number;
  /** Time to payment in years (periodIndex / frequency) */
  readonly timeInYears: number;
  /** Coupon, plus face value on the final period */
  readonly amount: number;
}

/**
 * Ordered cash flows of a bond, earliest first
 */
export type CashFlowSchedule = readonly CashFlow[];

/**
 * Serializable schedule row for tabular display
 */
export interface CashFlowRow {
  period: number;
  time: number;
  amount: number;
}
