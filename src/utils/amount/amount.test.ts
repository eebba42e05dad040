import { describe, it, expect } from 'vitest';
import { normalizeAmount, readAmount, parseNumber, formatAmount, formatMoney, plainDecimal } from './amount';

describe('normalizeAmount', () => {
  it('should strip currency symbols and separators', () => {
    expect(normalizeAmount('₹500.00')).toBe(500);
    expect(normalizeAmount('$1,234.50')).toBe(1234.5);
    expect(normalizeAmount('AED 75.25')).toBe(75.25);
    expect(normalizeAmount(' 300 ')).toBe(300);
  });

  it('should keep a leading minus sign', () => {
    expect(normalizeAmount('-$20.00')).toBe(-20);
    expect(normalizeAmount('£-5')).toBe(-5);
  });

  it('should accept partial decimals', () => {
    expect(normalizeAmount('5.')).toBe(5);
    expect(normalizeAmount('.5')).toBe(0.5);
    expect(normalizeAmount('-.25')).toBe(-0.25);
  });

  it('should degrade to zero when nothing parses', () => {
    expect(normalizeAmount('')).toBe(0);
    expect(normalizeAmount('abc')).toBe(0);
    expect(normalizeAmount('-')).toBe(0);
    expect(normalizeAmount('.')).toBe(0);
    expect(normalizeAmount('1.2.3')).toBe(0);
    expect(normalizeAmount('5-3')).toBe(0);
    expect(normalizeAmount('--5')).toBe(0);
    expect(normalizeAmount(null)).toBe(0);
    expect(normalizeAmount(undefined)).toBe(0);
  });

  it('should ignore non-ASCII digits', () => {
    expect(normalizeAmount('٣')).toBe(0);
  });

  it('should accept numbers', () => {
    expect(normalizeAmount(42.5)).toBe(42.5);
  });

  it('should be idempotent on its own output', () => {
    const inputs = ['₹500.00', '$1,234.50', ' 300 ', '', 'abc', '-€9.99', '1.2.3', 'CAD 0.10'];
    for (const input of inputs) {
      const once = normalizeAmount(input);
      expect(normalizeAmount(String(once))).toBe(once);
    }
  });
});

describe('parseNumber', () => {
  it('should parse plain decimals', () => {
    expect(parseNumber('12')).toBe(12);
    expect(parseNumber(' 12.5 ')).toBe(12.5);
    expect(parseNumber('-3')).toBe(-3);
    expect(parseNumber('+3')).toBe(3);
    expect(parseNumber('1e3')).toBe(1000);
    expect(parseNumber(7)).toBe(7);
  });

  it('should reject anything else', () => {
    expect(parseNumber('')).toBeNull();
    expect(parseNumber('   ')).toBeNull();
    expect(parseNumber('$5')).toBeNull();
    expect(parseNumber('1,000')).toBeNull();
    expect(parseNumber('abc')).toBeNull();
    expect(parseNumber('Infinity')).toBeNull();
    expect(parseNumber(Number.NaN)).toBeNull();
    expect(parseNumber(undefined)).toBeNull();
    expect(parseNumber(true)).toBeNull();
  });
});

describe('formatAmount', () => {
  it('should prefix the symbol and fix two decimals', () => {
    expect(formatAmount('₹', 500)).toBe('₹500.00');
    expect(formatAmount('$', 1234.5)).toBe('$1234.50');
    expect(formatAmount('AED', 0.1)).toBe('AED0.10');
  });

  it('should write large amounts in full so they read back unchanged', () => {
    const stored = formatAmount('$', 1e21);

    expect(stored).toBe('$1000000000000000000000.00');
    expect(normalizeAmount(stored)).toBe(1e21);
  });
});

describe('plainDecimal', () => {
  it('should fix the requested number of decimals', () => {
    expect(plainDecimal(12.5)).toBe('12.50');
    expect(plainDecimal(7, 1)).toBe('7.0');
    expect(plainDecimal(-5)).toBe('-5.00');
  });

  it('should print negative zero as zero', () => {
    expect(plainDecimal(-0)).toBe('0.00');
  });
});

describe('readAmount', () => {
  it('should report unreadable text as null', () => {
    expect(readAmount('₹12.00')).toBe(12);
    expect(readAmount('abc')).toBeNull();
    expect(readAmount('')).toBeNull();
    expect(readAmount(undefined)).toBeNull();
  });
});

describe('formatMoney', () => {
  it('should add thousands separators', () => {
    expect(formatMoney('$', 12809.328)).toBe('$12,809.33');
    expect(formatMoney('₹', 1000000)).toBe('₹1,000,000.00');
    expect(formatMoney('€', 5)).toBe('€5.00');
  });
});
