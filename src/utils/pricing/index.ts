/**
 * Pricing Utilities - Barrel Export
 */

export {
  toPeriodicYield,
  toAnnualYield,
  assertValidYield,
  discountFactor,
} from './rates.js';

export {
  calculatePrice,
  calculatePriceDerivative,
  calculatePricingResult,
  calculateCurrentYield,
} from './price.js';

export { calculateYieldToMaturity } from './yield-solver.js';

export {
  calculateAccruedInterest,
  calculateYearFraction,
  calculateAccrualFraction,
} from './accrued-interest.js';
