/**
 * Configuration exports for Bond Analytics Services
 */

export {
  PAYMENT_FREQUENCIES,
  SUPPORTED_FREQUENCIES,
  isSupportedFrequency,
  isFrequencyLabel,
  getPaymentsPerYear,
  getFrequencyLabel,
} from './frequency.js';

export {
  DEFAULT_YIELD_SOLVER_CONFIG,
  resolveYieldSolverConfig,
  loadYieldSolverConfig,
} from './solver.js';

export {
  DEFAULT_CURVE_RANGE,
  DEFAULT_DAY_COUNT_CONVENTION,
  BASIS_POINTS_PER_UNIT,
} from './analytics-defaults.js';
