import { isFiniteNumber, isInteger, clamp, roundTo } from './index';

describe('number utilities', () => {
  describe('isFiniteNumber', () => {
    it('should accept finite numbers', () => {
      expect(isFiniteNumber(0)).toBe(true);
      expect(isFiniteNumber(-12.5)).toBe(true);
    });

    it('should reject non-finite and non-number values', () => {
      expect(isFiniteNumber(NaN)).toBe(false);
      expect(isFiniteNumber(Infinity)).toBe(false);
      expect(isFiniteNumber('5')).toBe(false);
      expect(isFiniteNumber(null)).toBe(false);
      expect(isFiniteNumber(true)).toBe(false);
    });
  });

  describe('isInteger', () => {
    it('should accept whole numbers', () => {
      expect(isInteger(7)).toBe(true);
      expect(isInteger(-3)).toBe(true);
    });

    it('should reject fractions and non-numbers', () => {
      expect(isInteger(7.5)).toBe(false);
      expect(isInteger('7')).toBe(false);
      expect(isInteger(Infinity)).toBe(false);
    });
  });

  describe('clamp', () => {
    it('should return value inside bounds unchanged', () => {
      expect(clamp(5, 0, 10)).toBe(5);
    });

    it('should clamp to the bounds', () => {
      expect(clamp(-1, 0, 10)).toBe(0);
      expect(clamp(11, 0, 10)).toBe(10);
    });
  });

  describe('roundTo', () => {
    it('should round to the requested decimals', () => {
      expect(roundTo(1.23456, 2)).toBe(1.23);
      expect(roundTo(1.235, 1)).toBe(1.2);
      expect(roundTo(2.5, 0)).toBe(3);
    });
  });
});
