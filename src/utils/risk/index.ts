/**
 * Risk Utilities - Barrel Export
 */

export {
  calculateMacaulayDuration,
  calculateModifiedDuration,
  calculateConvexity,
  annualizeConvexity,
  calculateRiskMetrics,
} from './risk-metrics.js';

export { estimatePriceChange } from './price-sensitivity.js';

export { yieldRange, sweepPriceYieldCurve } from './price-yield-curve.js';
