/**
 * Shared Types
 */

export type {
  Bond,
  BondInput,
  PaymentFrequency,
  FrequencyLabel,
} from './bond.js';
export type { CashFlow, CashFlowSchedule, CashFlowRow } from './cash-flow.js';
export type {
  PricingResult,
  YieldToMaturityResult,
  YieldSolverConfig,
  DayCountConvention,
} from './pricing.js';
export type {
  RiskResult,
  PriceChangeEstimate,
  PriceYieldPoint,
  YieldRange,
} from './risk.js';
