export type {
  YieldQuote,
  PriceQuote,
  BondQuote,
  FractionAccrualInput,
  DateAccrualInput,
  AccrualInput,
  BondAnalyticsInput,
  BondAnalyticsResult,
} from './bond-analytics-input.js';
