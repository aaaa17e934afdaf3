/**
 * Yield Solver Configuration
 *
 * Defaults for the yield-to-maturity root finder, plus optional overrides
 * from environment variables.
 *
 * Environment Variables (OPTIONAL):
 * - YTM_SOLVER_TOLERANCE              - relative price tolerance (e.g. 1e-10)
 * - YTM_SOLVER_MAX_ITERATIONS         - iteration cap (e.g. 100)
 * - YTM_SOLVER_MAX_BRACKET_EXPANSIONS - upper-bound widenings (e.g. 20)
 */

import type { YieldSolverConfig } from '../shared/types/index.js';
import { InvalidSolverConfigError } from '../utils/errors/index.js';

/**
 * Default solver options
 *
 * The lower bracket sits just above -100% per period, where the discount
 * base 1 + y reaches zero. The upper bound of 1000% per period is widened
 * on demand.
 */
export const DEFAULT_YIELD_SOLVER_CONFIG: Readonly<YieldSolverConfig> = {
  tolerance: 1e-10,
  maxIterations: 100,
  bracket: [-1 + 1e-9, 10],
  initialGuess: 0.05,
  maxBracketExpansions: 20,
};

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws InvalidSolverConfigError if any option is unusable
 *
 * @example
 * ```typescript
 * const config = resolveYieldSolverConfig({ maxIterations: 50 });
 * ```
 */
export function resolveYieldSolverConfig(
  overrides: Partial<YieldSolverConfig> = {}
): YieldSolverConfig {
  const config: YieldSolverConfig = {
    ...DEFAULT_YIELD_SOLVER_CONFIG,
    ...overrides,
  };

  if (!Number.isFinite(config.tolerance) || config.tolerance <= 0) {
    throw new InvalidSolverConfigError(
      `tolerance must be a positive number, got ${config.tolerance}`,
      'tolerance'
    );
  }

  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    throw new InvalidSolverConfigError(
      `maxIterations must be a positive integer, got ${config.maxIterations}`,
      'maxIterations'
    );
  }

  if (
    !Number.isInteger(config.maxBracketExpansions) ||
    config.maxBracketExpansions < 0
  ) {
    throw new InvalidSolverConfigError(
      `maxBracketExpansions must be a non-negative integer, got ${config.maxBracketExpansions}`,
      'maxBracketExpansions'
    );
  }

  const [lo, hi] = config.bracket;
  if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo <= -1 || lo >= hi) {
    throw new InvalidSolverConfigError(
      `bracket must satisfy -1 < lo < hi, got [${lo}, ${hi}]`,
      'bracket'
    );
  }

  if (!Number.isFinite(config.initialGuess)) {
    throw new InvalidSolverConfigError(
      `initialGuess must be a finite number, got ${config.initialGuess}`,
      'initialGuess'
    );
  }

  return config;
}

/**
 * Read solver overrides from environment variables
 *
 * Unset variables are omitted so the defaults apply.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws InvalidSolverConfigError if a variable is set but not numeric
 */
export function loadYieldSolverConfig(
  env: NodeJS.ProcessEnv = process.env
): Partial<YieldSolverConfig> {
  const overrides: Partial<YieldSolverConfig> = {};

  const tolerance = readNumber(env, 'YTM_SOLVER_TOLERANCE', 'tolerance');
  if (tolerance !== undefined) overrides.tolerance = tolerance;

  const maxIterations = readNumber(env, 'YTM_SOLVER_MAX_ITERATIONS', 'maxIterations');
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;

  const maxBracketExpansions = readNumber(
    env,
    'YTM_SOLVER_MAX_BRACKET_EXPANSIONS',
    'maxBracketExpansions'
  );
  if (maxBracketExpansions !== undefined) {
    overrides.maxBracketExpansions = maxBracketExpansions;
  }

  return overrides;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  variable: string,
  option: string
): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidSolverConfigError(
      `${variable} must be numeric, got '${raw}'`,
      option
    );
  }
  return value;
}
