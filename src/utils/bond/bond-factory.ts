/**
 * Bond Factory
 *
 * Builds validated, frozen Bond values. Every invariant is checked here so
 * downstream math never sees an invalid bond.
 *
 * @module bond-factory
 */

import type {
  Bond,
  BondInput,
  PaymentFrequency,
} from '../../shared/types/index.js';
import {
  isFrequencyLabel,
  isSupportedFrequency,
  getPaymentsPerYear,
  SUPPORTED_FREQUENCIES,
} from '../../config/frequency.js';
import { InvalidBondError } from '../errors/index.js';

/**
 * Create a validated bond
 *
 * The frequency may be given as payments per year or as a form label.
 *
 * @throws InvalidBondError if face value or maturity is not positive, the
 * coupon rate is negative, the frequency is unsupported, or the bond has
 * no coupon period
 *
 * @example
 * ```typescript
 * const bond = createBond({
 *   faceValue: 1000,
 *   couponRate: 0.05,
 *   yearsToMaturity: 10,
 *   frequency: 'Semi-annual',
 * });
 * // { faceValue: 1000, couponRate: 0.05, yearsToMaturity: 10, frequency: 2 }
 * ```
 */
export function createBond(input: BondInput): Bond {
  const { faceValue, couponRate, yearsToMaturity } = input;

  if (!Number.isFinite(faceValue) || faceValue <= 0) {
    throw new InvalidBondError(
      `Face value must be a positive number, got ${faceValue}`,
      'faceValue',
      faceValue
    );
  }

  if (!Number.isFinite(couponRate) || couponRate < 0) {
    throw new InvalidBondError(
      `Coupon rate must be a non-negative number, got ${couponRate}`,
      'couponRate',
      couponRate
    );
  }

  if (!Number.isFinite(yearsToMaturity) || yearsToMaturity <= 0) {
    throw new InvalidBondError(
      `Years to maturity must be a positive number, got ${yearsToMaturity}`,
      'yearsToMaturity',
      yearsToMaturity
    );
  }

  const frequency = normalizeFrequency(input.frequency);

  const periods = Math.round(yearsToMaturity * frequency);
  if (periods < 1) {
    throw new InvalidBondError(
      `Bond must have at least one coupon period, got ${yearsToMaturity} years at ${frequency} payments per year`,
      'yearsToMaturity',
      yearsToMaturity
    );
  }

  return Object.freeze({ faceValue, couponRate, yearsToMaturity, frequency });
}

/**
 * Number of coupon periods: round(yearsToMaturity * frequency)
 */
export function getPeriodCount(bond: Bond): number {
  return Math.round(bond.yearsToMaturity * bond.frequency);
}

/**
 * Coupon paid each period: faceValue * couponRate / frequency
 */
export function getPeriodCoupon(bond: Bond): number {
  return (bond.faceValue * bond.couponRate) / bond.frequency;
}

function normalizeFrequency(frequency: BondInput['frequency']): PaymentFrequency {
  if (typeof frequency === 'string') {
    if (isFrequencyLabel(frequency)) {
      return getPaymentsPerYear(frequency);
    }
  } else if (isSupportedFrequency(frequency)) {
    return frequency;
  }

  throw new InvalidBondError(
    `Unsupported payment frequency ${String(frequency)}; expected one of ${SUPPORTED_FREQUENCIES.join(', ')}`,
    'frequency',
    frequency
  );
}
