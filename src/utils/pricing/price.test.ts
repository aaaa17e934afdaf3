/**
 * Bond Price Calculations - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  calculatePrice,
  calculatePriceDerivative,
  calculatePricingResult,
  calculateCurrentYield,
} from './price.js';
import {
  toPeriodicYield,
  toAnnualYield,
  assertValidYield,
  discountFactor,
} from './rates.js';
import { createBond } from '../bond/index.js';
import { buildCashFlowSchedule } from '../cash-flow/index.js';
import { InvalidPriceError, InvalidRateError } from '../errors/index.js';

// 10-year 5% semi-annual bond, 1000 face
const parBond = createBond({
  faceValue: 1000,
  couponRate: 0.05,
  yearsToMaturity: 10,
  frequency: 2,
});
const parSchedule = buildCashFlowSchedule(parBond);

describe('Pricing', () => {
  // ============================================================================
  // Rate conversions
  // ============================================================================

  describe('rates', () => {
    it('should convert annual yield to periodic yield', () => {
      expect(toPeriodicYield(0.05, 2)).toBe(0.025);
      expect(toPeriodicYield(0.12, 12)).toBeCloseTo(0.01, 15);
    });

    it('should convert periodic yield to annual yield', () => {
      expect(toAnnualYield(0.025, 2)).toBe(0.05);
    });

    it('should accept yields above -1 per period', () => {
      expect(() => assertValidYield(-0.5)).not.toThrow();
      expect(() => assertValidYield(0)).not.toThrow();
    });

    it('should reject yields at or below -1 per period', () => {
      expect(() => assertValidYield(-1)).toThrow(InvalidRateError);
      expect(() => assertValidYield(-1.5)).toThrow(InvalidRateError);
      expect(() => assertValidYield(Number.NaN)).toThrow(InvalidRateError);
    });

    it('should compute discount factors', () => {
      expect(discountFactor(0.1, 2)).toBeCloseTo(1 / 1.21, 12);
      expect(() => discountFactor(-1, 1)).toThrow(InvalidRateError);
    });
  });

  // ============================================================================
  // calculatePrice
  // ============================================================================

  describe('calculatePrice', () => {
    it('should price a par bond at face value', () => {
      // 5% annual coupon, 5% annual yield, semi-annual
      expect(calculatePrice(parSchedule, 0.025)).toBeCloseTo(1000, 8);
    });

    it('should price a quarterly par bond at face value', () => {
      const schedule = buildCashFlowSchedule(createBond({ ...parBond, frequency: 4 }));

      expect(calculatePrice(schedule, 0.0125)).toBeCloseTo(1000, 8);
    });

    it('should price a discount bond below par', () => {
      // 3y 6% annual coupon at 8%
      const schedule = buildCashFlowSchedule(
        createBond({ faceValue: 1000, couponRate: 0.06, yearsToMaturity: 3, frequency: 1 })
      );

      expect(calculatePrice(schedule, 0.08)).toBeCloseTo(948.4580602550423, 8);
    });

    it('should price a premium bond above par', () => {
      // 4% annual yield on a 5% coupon
      expect(calculatePrice(parSchedule, 0.02)).toBeCloseTo(1081.7571667229854, 8);
    });

    it('should discount a zero-coupon bond', () => {
      const schedule = buildCashFlowSchedule(
        createBond({ faceValue: 1000, couponRate: 0, yearsToMaturity: 5, frequency: 1 })
      );

      expect(calculatePrice(schedule, 0.05)).toBeCloseTo(783.5261664684588, 8);
    });

    it('should equal the undiscounted sum at a zero yield', () => {
      expect(calculatePrice(parSchedule, 0)).toBe(1500);
    });

    it('should be strictly decreasing in yield', () => {
      const yields = [-0.5, -0.1, 0, 0.01, 0.025, 0.05, 0.2, 1];
      const prices = yields.map((y) => calculatePrice(parSchedule, y));

      for (let i = 1; i < prices.length; i++) {
        expect(prices[i]).toBeLessThan(prices[i - 1] ?? Number.POSITIVE_INFINITY);
      }
    });

    it('should throw InvalidRateError when 1 + y <= 0', () => {
      expect(() => calculatePrice(parSchedule, -1)).toThrow(InvalidRateError);
      expect(() => calculatePrice(parSchedule, -2)).toThrow(
        'Invalid yield per period -2: discount base 1 + y must be positive'
      );
    });
  });

  // ============================================================================
  // calculatePriceDerivative
  // ============================================================================

  describe('calculatePriceDerivative', () => {
    it('should match a central finite difference', () => {
      const h = 1e-6;
      const numeric =
        (calculatePrice(parSchedule, 0.03 + h) - calculatePrice(parSchedule, 0.03 - h)) /
        (2 * h);

      expect(calculatePriceDerivative(parSchedule, 0.03)).toBeCloseTo(numeric, 3);
    });

    it('should be negative for positive cash flows', () => {
      expect(calculatePriceDerivative(parSchedule, 0.025)).toBeLessThan(0);
    });
  });

  // ============================================================================
  // calculatePricingResult
  // ============================================================================

  describe('calculatePricingResult', () => {
    it('should subtract accrued interest from the dirty price', () => {
      const result = calculatePricingResult(parSchedule, 0.025, 12.5);

      expect(result.dirtyPrice).toBeCloseTo(1000, 8);
      expect(result.price).toBe(result.dirtyPrice);
      expect(result.accruedInterest).toBe(12.5);
      expect(result.cleanPrice).toBe(result.dirtyPrice - 12.5);
    });

    it('should default to no accrued interest', () => {
      const result = calculatePricingResult(parSchedule, 0.025);

      expect(result.accruedInterest).toBe(0);
      expect(result.cleanPrice).toBe(result.dirtyPrice);
    });
  });

  // ============================================================================
  // calculateCurrentYield
  // ============================================================================

  describe('calculateCurrentYield', () => {
    it('should divide annual coupon income by price', () => {
      expect(calculateCurrentYield(parBond, 1000)).toBe(0.05);
      expect(calculateCurrentYield(parBond, 950)).toBeCloseTo(0.05263157894736842, 15);
    });

    it('should throw InvalidPriceError for non-positive price', () => {
      expect(() => calculateCurrentYield(parBond, 0)).toThrow(InvalidPriceError);
    });
  });
});
