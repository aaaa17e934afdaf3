/**
 * Payment Frequency Configuration
 *
 * Supported coupon frequencies and their form labels.
 */

import type { FrequencyLabel, PaymentFrequency } from '../shared/types/index.js';

/**
 * Payments per year by frequency label
 */
export const PAYMENT_FREQUENCIES: Readonly<Record<FrequencyLabel, PaymentFrequency>> = {
  Annual: 1,
  'Semi-annual': 2,
  Quarterly: 4,
  Monthly: 12,
};

/**
 * Supported payments per year, ascending
 */
export const SUPPORTED_FREQUENCIES: readonly PaymentFrequency[] = [1, 2, 4, 12];

/**
 * Check whether a number is a supported payment frequency
 */
export function isSupportedFrequency(value: number): value is PaymentFrequency {
  return SUPPORTED_FREQUENCIES.some((frequency) => frequency === value);
}

/**
 * Check whether a string is a known frequency label
 */
export function isFrequencyLabel(value: string): value is FrequencyLabel {
  return Object.hasOwn(PAYMENT_FREQUENCIES, value);
}

/**
 * Convert a frequency label to payments per year
 *
 * @example
 * ```typescript
 * getPaymentsPerYear('Semi-annual'); // 2
 * ```
 */
export function getPaymentsPerYear(label: FrequencyLabel): PaymentFrequency {
  return PAYMENT_FREQUENCIES[label];
}

/**
 * Convert payments per year back to its form label
 *
 * @example
 * ```typescript
 * getFrequencyLabel(4); // 'Quarterly'
 * ```
 */
export function getFrequencyLabel(frequency: PaymentFrequency): FrequencyLabel {
  for (const [label, value] of Object.entries(PAYMENT_FREQUENCIES)) {
    if (value === frequency && isFrequencyLabel(label)) {
      return label;
    }
  }
  throw new Error(`No label configured for payment frequency ${frequency}`);
}
