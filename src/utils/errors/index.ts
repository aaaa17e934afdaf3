/**
 * Bond Analytics Errors - Barrel Export
 */

export {
  BondAnalyticsError,
  InvalidBondError,
  InvalidRateError,
  InvalidPriceError,
  YieldNotFoundError,
  InvalidAccrualError,
  InvalidSolverConfigError,
  InvalidCurveRangeError,
} from './bond-errors.js';
