/**
 * Accrued Interest
 *
 * Coupon earned by the seller since the last payment, proportional to the
 * elapsed fraction of the current coupon period. The elapsed fraction is
 * either supplied directly or derived from dates with a simple day count.
 *
 * @module accrued-interest
 */

import type {
  DayCountConvention,
  PaymentFrequency,
} from '../../shared/types/index.js';
import { DEFAULT_DAY_COUNT_CONVENTION } from '../../config/analytics-defaults.js';
import { InvalidAccrualError } from '../errors/index.js';

const MILLISECONDS_PER_DAY = 86_400_000;

/**
 * Accrued interest: periodCoupon * fractionElapsed
 *
 * @param periodCoupon - Coupon paid each period (see getPeriodCoupon)
 * @param fractionElapsed - Elapsed share of the current period, in [0, 1)
 * @throws InvalidAccrualError if fractionElapsed is outside [0, 1)
 *
 * @example
 * ```typescript
 * calculateAccruedInterest(25, 0.5); // 12.5
 * ```
 */
export function calculateAccruedInterest(
  periodCoupon: number,
  fractionElapsed: number
): number {
  if (!Number.isFinite(fractionElapsed) || fractionElapsed < 0 || fractionElapsed >= 1) {
    throw new InvalidAccrualError(
      `Elapsed fraction of the coupon period must be in [0, 1), got ${fractionElapsed}`
    );
  }
  return periodCoupon * fractionElapsed;
}

/**
 * Year fraction between two dates under a day-count convention
 *
 * - '30/360'  : US 30/360, day 31 rolls to 30
 * - 'ACT/360' : actual days / 360
 * - 'ACT/365' : actual days / 365
 *
 * Dates are compared by their UTC calendar day.
 *
 * @example
 * ```typescript
 * calculateYearFraction(new Date('2024-01-15'), new Date('2024-04-15'), '30/360'); // 0.25
 * ```
 */
export function calculateYearFraction(
  start: Date,
  end: Date,
  convention: DayCountConvention
): number {
  switch (convention) {
    case '30/360': {
      const d1 = Math.min(start.getUTCDate(), 30);
      const d2 = end.getUTCDate() === 31 && d1 === 30 ? 30 : end.getUTCDate();
      const days =
        360 * (end.getUTCFullYear() - start.getUTCFullYear()) +
        30 * (end.getUTCMonth() - start.getUTCMonth()) +
        (d2 - d1);
      return days / 360;
    }
    case 'ACT/360':
      return actualDays(start, end) / 360;
    case 'ACT/365':
      return actualDays(start, end) / 365;
  }
}

/**
 * Elapsed fraction of the current coupon period between the last payment
 * and settlement: yearFraction * frequency
 *
 * @throws InvalidAccrualError if settlement precedes the last payment or
 * falls at or beyond the next coupon date
 *
 * @example
 * ```typescript
 * // 90 actual days into a semi-annual period, ACT/360
 * calculateAccrualFraction(new Date('2024-01-01'), new Date('2024-03-31'), 2); // 0.5
 * ```
 */
export function calculateAccrualFraction(
  lastPaymentDate: Date,
  settlementDate: Date,
  frequency: PaymentFrequency,
  convention: DayCountConvention = DEFAULT_DAY_COUNT_CONVENTION
): number {
  if (Number.isNaN(lastPaymentDate.getTime()) || Number.isNaN(settlementDate.getTime())) {
    throw new InvalidAccrualError('Accrual dates must be valid dates');
  }

  if (utcDayNumber(settlementDate) < utcDayNumber(lastPaymentDate)) {
    throw new InvalidAccrualError(
      `Settlement date ${settlementDate.toISOString()} is before last payment date ${lastPaymentDate.toISOString()}`
    );
  }

  const fraction = calculateYearFraction(lastPaymentDate, settlementDate, convention) * frequency;
  if (fraction >= 1) {
    throw new InvalidAccrualError(
      `Settlement date ${settlementDate.toISOString()} is at or beyond the next coupon date`
    );
  }
  return fraction;
}

/**
 * Days since the epoch of the date's UTC calendar day; the time of day is dropped
 */
function utcDayNumber(date: Date): number {
  return Math.round(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) /
      MILLISECONDS_PER_DAY
  );
}

function actualDays(start: Date, end: Date): number {
  return utcDayNumber(end) - utcDayNumber(start);
}
