/**
 * Yield-to-Maturity Solver - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { calculateYieldToMaturity } from './yield-solver.js';
import { calculatePrice } from './price.js';
import { createBond } from '../bond/index.js';
import { buildCashFlowSchedule } from '../cash-flow/index.js';
import {
  InvalidPriceError,
  InvalidSolverConfigError,
  YieldNotFoundError,
} from '../errors/index.js';

// 10-year 5% semi-annual bond, 1000 face
const schedule = buildCashFlowSchedule(
  createBond({ faceValue: 1000, couponRate: 0.05, yearsToMaturity: 10, frequency: 2 })
);

describe('calculateYieldToMaturity', () => {
  // ============================================================================
  // Known prices
  // ============================================================================

  describe('known prices', () => {
    it('should return the coupon rate for a par price', () => {
      const result = calculateYieldToMaturity(schedule, 1000, 2);

      expect(result.yieldPerPeriod).toBeCloseTo(0.025, 10);
      expect(result.annualYield).toBeCloseTo(0.05, 10);
    });

    it('should solve a discount price above the coupon rate', () => {
      const result = calculateYieldToMaturity(schedule, 950, 2);

      expect(result.yieldPerPeriod).toBeCloseTo(0.02830844538489219, 9);
      expect(result.annualYield).toBeCloseTo(0.05661689076978438, 9);
      expect(result.annualYield).toBeGreaterThan(0.05);
    });

    it('should report the iterations used', () => {
      const result = calculateYieldToMaturity(schedule, 950, 2);

      expect(result.iterations).toBeGreaterThan(0);
      expect(result.iterations).toBeLessThanOrEqual(100);
    });

    it('should return a negative yield when price exceeds undiscounted cash flows', () => {
      // Single 1000 payment priced at 1100: 1000 / (1 + y) = 1100
      const zero = buildCashFlowSchedule(
        createBond({ faceValue: 1000, couponRate: 0, yearsToMaturity: 1, frequency: 1 })
      );

      const result = calculateYieldToMaturity(zero, 1100, 1);

      expect(result.yieldPerPeriod).toBeCloseTo(-1 / 11, 8);
    });

    it('should be deterministic', () => {
      const first = calculateYieldToMaturity(schedule, 987.65, 2);
      const second = calculateYieldToMaturity(schedule, 987.65, 2);

      expect(second).toEqual(first);
    });
  });

  // ============================================================================
  // Round trip
  // ============================================================================

  describe('round trip', () => {
    const cases = [
      { frequency: 1 as const, couponRate: 0.03, years: 5, yieldPerPeriod: 0.07 },
      { frequency: 2 as const, couponRate: 0.05, years: 10, yieldPerPeriod: 0.01 },
      { frequency: 4 as const, couponRate: 0.08, years: 30, yieldPerPeriod: 0.03 },
      { frequency: 12 as const, couponRate: 0, years: 2, yieldPerPeriod: 0.004 },
      { frequency: 2 as const, couponRate: 0.05, years: 10, yieldPerPeriod: -0.01 },
      { frequency: 12 as const, couponRate: 0, years: 30, yieldPerPeriod: 0.004 },
      { frequency: 12 as const, couponRate: 0.1, years: 50, yieldPerPeriod: 0.3 },
    ];

    it.each(cases)(
      'should recover $yieldPerPeriod per period for a $years-year bond paying $frequency times a year',
      ({ frequency, couponRate, years, yieldPerPeriod }) => {
        const bondSchedule = buildCashFlowSchedule(
          createBond({ faceValue: 1000, couponRate, yearsToMaturity: years, frequency })
        );
        const price = calculatePrice(bondSchedule, yieldPerPeriod);

        const result = calculateYieldToMaturity(bondSchedule, price, frequency);

        expect(result.yieldPerPeriod).toBeCloseTo(yieldPerPeriod, 6);
      }
    );
  });

  // ============================================================================
  // Bracketing
  // ============================================================================

  describe('bracketing', () => {
    it('should widen the upper bound when the root lies above it', () => {
      const result = calculateYieldToMaturity(schedule, 950, 2, { bracket: [0, 0.01] });

      expect(result.yieldPerPeriod).toBeCloseTo(0.02830844538489219, 9);
    });

    it('should throw YieldNotFoundError when widening is not allowed', () => {
      expect(() =>
        calculateYieldToMaturity(schedule, 950, 2, {
          bracket: [0, 0.01],
          maxBracketExpansions: 0,
        })
      ).toThrow(YieldNotFoundError);
    });

    it('should throw YieldNotFoundError when the yield lies below the lower bound', () => {
      // Undiscounted cash flows total 1500; 1600 needs a negative yield
      expect(() =>
        calculateYieldToMaturity(schedule, 1600, 2, { bracket: [0, 10] })
      ).toThrow(
        'Market price 1600 exceeds the bond value at every yield above 0 per period'
      );
    });

    it('should solve tiny prices through a very high yield', () => {
      const result = calculateYieldToMaturity(schedule, 1, 2);

      expect(calculatePrice(schedule, result.yieldPerPeriod)).toBeCloseTo(1, 6);
      expect(result.yieldPerPeriod).toBeGreaterThan(1);
    });
  });

  // ============================================================================
  // Failures
  // ============================================================================

  describe('failures', () => {
    it('should throw InvalidPriceError for non-positive prices', () => {
      expect(() => calculateYieldToMaturity(schedule, 0, 2)).toThrow(InvalidPriceError);
      expect(() => calculateYieldToMaturity(schedule, -950, 2)).toThrow(
        'Invalid market price -950: price must be a positive number'
      );
      expect(() => calculateYieldToMaturity(schedule, Number.NaN, 2)).toThrow(
        InvalidPriceError
      );
    });

    it('should throw YieldNotFoundError when the iteration cap is reached', () => {
      try {
        calculateYieldToMaturity(schedule, 950, 2, { maxIterations: 1 });
        expect.fail('expected YieldNotFoundError');
      } catch (error) {
        expect(error).toBeInstanceOf(YieldNotFoundError);
        expect(error).toMatchObject({ marketPrice: 950, iterations: 1 });
      }
    });

    it('should reject unusable solver options', () => {
      expect(() =>
        calculateYieldToMaturity(schedule, 950, 2, { bracket: [-1, 10] })
      ).toThrow(InvalidSolverConfigError);
      expect(() => calculateYieldToMaturity(schedule, 950, 2, { tolerance: 0 })).toThrow(
        InvalidSolverConfigError
      );
    });
  });
});
