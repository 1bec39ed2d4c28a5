import { describe, it, expect } from 'vitest';
import { roundBase, toDisplayCurrency } from '../src/config/currency.js';

describe('Currency', () => {
  describe('toDisplayCurrency', () => {
    it('converts with the fixed rate', () => {
      expect(toDisplayCurrency(10)).toBe(155_000);
      expect(toDisplayCurrency(0)).toBe(0);
    });

    it('truncates to whole display units', () => {
      expect(toDisplayCurrency(0.0001)).toBe(1);
      expect(toDisplayCurrency(1, 2.75)).toBe(2);
    });

    it('accepts numeric strings', () => {
      expect(toDisplayCurrency('2')).toBe(31_000);
    });

    it('returns 0 for invalid input', () => {
      expect(toDisplayCurrency('abc')).toBe(0);
      expect(toDisplayCurrency('')).toBe(0);
      expect(toDisplayCurrency(undefined)).toBe(0);
      expect(toDisplayCurrency(null)).toBe(0);
      expect(toDisplayCurrency({ amount: 1 })).toBe(0);
      expect(toDisplayCurrency(Number.NaN)).toBe(0);
      expect(toDisplayCurrency(Number.POSITIVE_INFINITY)).toBe(0);
    });

    it('is monotonic non-decreasing for non-negative input', () => {
      const inputs = [0, 0.00001, 0.01, 0.5, 1, 1.005, 9.99, 10, 109.95, 1000.5];
      const outputs = inputs.map((amount) => toDisplayCurrency(amount));

      for (let i = 1; i < outputs.length; i++) {
        expect(outputs[i]).toBeGreaterThanOrEqual(outputs[i - 1]);
      }
    });
  });

  describe('roundBase', () => {
    it('rounds to cents', () => {
      expect(roundBase(20)).toBe(20);
      expect(roundBase(3 * 0.1)).toBe(0.3);
      expect(roundBase(22.333)).toBe(22.33);
    });

    it('rounds exact halves to the even cent', () => {
      expect(roundBase(0.375 * 3)).toBe(1.12);
      expect(roundBase(0.625)).toBe(0.62);
      expect(roundBase(0.875)).toBe(0.88);
    });

    it('never returns negative zero', () => {
      expect(Object.is(roundBase(-0.001), 0)).toBe(true);
    });
  });
});
