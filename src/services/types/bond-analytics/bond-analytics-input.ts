/**
 * Bond Analytics Input Types
 *
 * Input and result shapes exchanged with a presentation shell. Every
 * analysis is re-derived from these inputs; nothing is persisted.
 */

import type {
  Bond,
  BondInput,
  CashFlowRow,
  CashFlowSchedule,
  DayCountConvention,
  PriceYieldPoint,
  PricingResult,
  RiskResult,
  YieldRange,
  YieldToMaturityResult,
} from '../../../shared/types/index.js';

/**
 * Quote given as an annual yield (e.g. 0.05 for 5%)
 *
 * Converted to a per-period yield once, inside the service.
 */
export interface YieldQuote {
  type: 'yield';
  annualYield: number;
}

/**
 * Quote given as a market price
 *
 * A 'clean' price is grossed up by accrued interest before solving;
 * 'dirty' (the default) is solved as is.
 */
export interface PriceQuote {
  type: 'price';
  marketPrice: number;
  priceType?: 'dirty' | 'clean';
}

export type BondQuote = YieldQuote | PriceQuote;

/**
 * Accrual given directly as the elapsed fraction of the coupon period
 */
export interface FractionAccrualInput {
  fractionElapsed: number;
}

/**
 * Accrual derived from the last coupon date and the settlement date
 */
export interface DateAccrualInput {
  lastPaymentDate: Date;
  settlementDate: Date;
  /** @default 'ACT/360' */
  dayCount?: DayCountConvention;
}

export type AccrualInput = FractionAccrualInput | DateAccrualInput;

/**
 * Input for BondAnalyticsService.analyze()
 */
export interface BondAnalyticsInput {
  bond: BondInput;
  quote: BondQuote;
  /** Omitted means valuation on a coupon date (no accrued interest) */
  accrual?: AccrualInput;
  /** Overrides the service's curve range */
  curve?: YieldRange;
}

/**
 * Everything a shell renders for one set of form inputs
 */
export interface BondAnalyticsResult {
  bond: Bond;
  schedule: CashFlowSchedule;
  cashFlowRows: CashFlowRow[];
  yield: YieldToMaturityResult;
  pricing: PricingResult;
  risk: RiskResult;
  /** Annual coupon / dirty price (present value) */
  currentYield: number;
  /** Coupon paid each period */
  periodicPayment: number;
  /** Number of scheduled payments */
  totalPayments: number;
  curve: PriceYieldPoint[];
}
