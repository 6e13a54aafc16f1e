import { isFiniteNumber, isInteger, parseDecimal, parseUnsignedInteger } from './index';

describe('number utilities', () => {
  describe('isFiniteNumber', () => {
    it('should accept finite numbers only', () => {
      expect(isFiniteNumber(4.5)).toBe(true);
      expect(isFiniteNumber(0)).toBe(true);
      expect(isFiniteNumber(Infinity)).toBe(false);
      expect(isFiniteNumber(NaN)).toBe(false);
      expect(isFiniteNumber('5')).toBe(false);
      expect(isFiniteNumber(null)).toBe(false);
    });
  });

  describe('isInteger', () => {
    it('should accept whole numbers only', () => {
      expect(isInteger(3)).toBe(true);
      expect(isInteger(-0)).toBe(true);
      expect(isInteger(3.5)).toBe(false);
      expect(isInteger(NaN)).toBe(false);
      expect(isInteger('3')).toBe(false);
    });
  });

  describe('parseDecimal', () => {
    it('should parse plain and signed decimals', () => {
      expect(parseDecimal('75')).toBe(75);
      expect(parseDecimal('75.0')).toBe(75);
      expect(parseDecimal('-3.25')).toBe(-3.25);
      expect(parseDecimal('+2')).toBe(2);
      expect(parseDecimal('.5')).toBe(0.5);
      expect(parseDecimal('5.')).toBe(5);
    });

    it('should parse exponent notation', () => {
      expect(parseDecimal('1e3')).toBe(1000);
      expect(parseDecimal('2.5E-1')).toBe(0.25);
    });

    it('should read a single comma as decimal separator', () => {
      expect(parseDecimal('21,5')).toBe(21.5);
      expect(parseDecimal('-0,25')).toBe(-0.25);
    });

    it('should reject thousands separators and mixed separators', () => {
      expect(parseDecimal('1,000.5')).toBeNull();
      expect(parseDecimal('1.000,5')).toBeNull();
      expect(parseDecimal('1,2,3')).toBeNull();
    });

    it('should not convert decimals that would lose digits', () => {
      expect(parseDecimal('12345678901234567890')).toBeNull();
      expect(parseDecimal('0.12345678901234567')).toBeNull();
      expect(parseDecimal('123456789012345')).toBe(123456789012345);
      expect(parseDecimal('120000000000000000000')).toBe(1.2e20);
      expect(parseDecimal('0.000125')).toBe(0.000125);
    });

    it('should reject non-numeric text', () => {
      expect(parseDecimal('')).toBeNull();
      expect(parseDecimal('on')).toBeNull();
      expect(parseDecimal('12abc')).toBeNull();
      expect(parseDecimal('0x10')).toBeNull();
      expect(parseDecimal('Infinity')).toBeNull();
    });
  });

  describe('parseUnsignedInteger', () => {
    it('should parse digit strings', () => {
      expect(parseUnsignedInteger('0')).toBe(0);
      expect(parseUnsignedInteger('42')).toBe(42);
      expect(parseUnsignedInteger('007')).toBe(7);
    });

    it('should reject signs, fractions and blanks', () => {
      expect(parseUnsignedInteger('-1')).toBeNull();
      expect(parseUnsignedInteger('+1')).toBeNull();
      expect(parseUnsignedInteger('1.5')).toBeNull();
      expect(parseUnsignedInteger('')).toBeNull();
      expect(parseUnsignedInteger(' 1')).toBeNull();
    });
  });
});
