/**
 * Bond Analytics Errors
 *
 * All errors are raised synchronously at the offending computation and
 * propagate to the caller unchanged. They share BondAnalyticsError as a
 * base so a caller can catch the whole family with one instanceof check.
 */

/**
 * Base class for every error raised by the analytics library
 */
export class BondAnalyticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BondAnalyticsError';
  }
}

/**
 * Error thrown when bond parameters violate an invariant
 * (non-positive face value or maturity, zero periods, unsupported frequency)
 */
export class InvalidBondError extends BondAnalyticsError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = 'InvalidBondError';
  }
}

/**
 * Error thrown when a yield gives a non-positive discount base (1 + y <= 0)
 */
export class InvalidRateError extends BondAnalyticsError {
  constructor(public readonly yieldPerPeriod: number) {
    super(
      `Invalid yield per period ${yieldPerPeriod}: discount base 1 + y must be positive`
    );
    this.name = 'InvalidRateError';
  }
}

/**
 * Error thrown when a non-positive market price is supplied for yield inversion
 */
export class InvalidPriceError extends BondAnalyticsError {
  constructor(public readonly marketPrice: number) {
    super(`Invalid market price ${marketPrice}: price must be a positive number`);
    this.name = 'InvalidPriceError';
  }
}

/**
 * Error thrown when the yield solver cannot bracket the root or does not
 * converge within its iteration cap
 */
export class YieldNotFoundError extends BondAnalyticsError {
  constructor(
    message: string,
    public readonly marketPrice: number,
    public readonly iterations: number
  ) {
    super(message);
    this.name = 'YieldNotFoundError';
  }
}

/**
 * Error thrown when an accrual fraction or accrual date range is outside
 * the current coupon period
 */
export class InvalidAccrualError extends BondAnalyticsError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidAccrualError';
  }
}

/**
 * Error thrown when yield solver options are unusable
 */
export class InvalidSolverConfigError extends BondAnalyticsError {
  constructor(
    message: string,
    public readonly option: string
  ) {
    super(message);
    this.name = 'InvalidSolverConfigError';
  }
}

/**
 * Error thrown when a price-yield curve range has unusable bounds or point count
 */
export class InvalidCurveRangeError extends BondAnalyticsError {
  constructor(
    message: string,
    public readonly field: 'fromAnnualYield' | 'toAnnualYield' | 'points'
  ) {
    super(message);
    this.name = 'InvalidCurveRangeError';
  }
}
