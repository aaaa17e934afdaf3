/**
 * Tests for Payment Frequency Configuration
 */

import { describe, it, expect } from 'vitest';
import {
  PAYMENT_FREQUENCIES,
  SUPPORTED_FREQUENCIES,
  getFrequencyLabel,
  getPaymentsPerYear,
  isFrequencyLabel,
  isSupportedFrequency,
} from './frequency.js';

describe('Payment Frequency Configuration', () => {
  it('should map every label to a supported frequency', () => {
    for (const frequency of Object.values(PAYMENT_FREQUENCIES)) {
      expect(SUPPORTED_FREQUENCIES).toContain(frequency);
    }
    expect(SUPPORTED_FREQUENCIES).toEqual([1, 2, 4, 12]);
  });

  describe('isSupportedFrequency', () => {
    it.each([1, 2, 4, 12])('should accept %i', (frequency) => {
      expect(isSupportedFrequency(frequency)).toBe(true);
    });

    it.each([0, 3, 6, 2.5, -2])('should reject %d', (frequency) => {
      expect(isSupportedFrequency(frequency)).toBe(false);
    });
  });

  describe('isFrequencyLabel', () => {
    it('should recognise configured labels only', () => {
      expect(isFrequencyLabel('Semi-annual')).toBe(true);
      expect(isFrequencyLabel('semi-annual')).toBe(false);
      expect(isFrequencyLabel('toString')).toBe(false);
    });
  });

  describe('getPaymentsPerYear / getFrequencyLabel', () => {
    it('should convert labels to payments per year', () => {
      expect(getPaymentsPerYear('Annual')).toBe(1);
      expect(getPaymentsPerYear('Semi-annual')).toBe(2);
      expect(getPaymentsPerYear('Quarterly')).toBe(4);
      expect(getPaymentsPerYear('Monthly')).toBe(12);
    });

    it('should convert payments per year back to labels', () => {
      expect(getFrequencyLabel(1)).toBe('Annual');
      expect(getFrequencyLabel(2)).toBe('Semi-annual');
      expect(getFrequencyLabel(4)).toBe('Quarterly');
      expect(getFrequencyLabel(12)).toBe('Monthly');
    });
  });
});
