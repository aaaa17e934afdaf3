/**
 * Bond Types
 *
 * Plain fixed-rate coupon bond. Amortizing, callable and floating-rate
 * instruments are not modelled.
 */

/**
 * Coupon payments per year
 */
export type PaymentFrequency = 1 | 2 | 4 | 12;

/**
 * Human-readable payment frequency, as offered by a form select
 */
export type FrequencyLabel = 'Annual' | 'Semi-annual' | 'Quarterly' | 'Monthly';

/**
 * Validated, immutable bond
 *
 * Only createBond() produces values of this type.
 */
export interface Bond {
  /** Principal repaid at maturity (positive) */
  readonly faceValue: number;
  /** Annual coupon rate as a fraction (0.05 = 5%) */
  readonly couponRate: number;
  /** Remaining life in years (positive) */
  readonly yearsToMaturity: number;
  /** Coupon payments per year */
  readonly frequency: PaymentFrequency;
}

/**
 * Unvalidated bond parameters, as received from a caller
 */
export interface BondInput {
  faceValue: number;
  couponRate: number;
  yearsToMaturity: number;
  frequency: PaymentFrequency | FrequencyLabel | number;
}
