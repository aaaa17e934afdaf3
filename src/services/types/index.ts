/**
 * Service layer types
 * Inputs and results exchanged with a presentation shell
 */

// Bond analytics input types
export type {
  YieldQuote,
  PriceQuote,
  BondQuote,
  FractionAccrualInput,
  DateAccrualInput,
  AccrualInput,
  BondAnalyticsInput,
  BondAnalyticsResult,
} from './bond-analytics/index.js';
