/**
 * Risk Types
 */

/**
 * Duration and convexity at a fixed yield
 */
export interface RiskResult {
  /** PV-weighted average time to cash flow, in years */
  macaulayDuration: number;
  /** Macaulay duration / (1 + yieldPerPeriod), in years */
  modifiedDuration: number;
  /** Annualized convexity, in years squared */
  convexity: number;
}

/**
 * Duration/convexity estimate of the price move for a yield shock
 *
 * Effects are fractions of the starting price.
 */
export interface PriceChangeEstimate {
  yieldChangeBps: number;
  durationEffect: number;
  convexityEffect: number;
  totalEffect: number;
  priceChange: number;
  estimatedPrice: number;
}

/**
 * One point of a price-yield curve
 */
export interface PriceYieldPoint {
  annualYield: number;
  yieldPerPeriod: number;
  price: number;
}

/**
 * Evenly spaced annual-yield range for curve sweeps
 */
export interface YieldRange {
  fromAnnualYield: number;
  toAnnualYield: number;
  points: number;
}
