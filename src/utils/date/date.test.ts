import { describe, it, expect } from 'vitest';
import {
  monthKey,
  currentMonthKey,
  todayDateString,
  formatDate,
  formatMonthKey,
  isDateString,
  isMonthKey,
} from './date';

describe('Date utilities', () => {
  describe('monthKey', () => {
    it('should read strict YYYY-MM-DD dates', () => {
      expect(monthKey('2024-03-15')).toBe('2024-03');
      expect(monthKey('1999-12-31')).toBe('1999-12');
    });

    it('should read ISO date-times without shifting the month', () => {
      expect(monthKey('2024-03-15T10:30:00')).toBe('2024-03');
      expect(monthKey('2024-03-31T23:30:00-05:00')).toBe('2024-03');
      expect(monthKey('2024-01-01 00:00:00Z')).toBe('2024-01');
      expect(monthKey('20240704')).toBe('2024-07');
    });

    it('should fall back to the first two numeric segments', () => {
      expect(monthKey('2024-03')).toBe('2024-03');
      expect(monthKey('2024-3')).toBe('2024-03');
      expect(monthKey('2024-3-5')).toBe('2024-03');
      expect(monthKey('2024-02-30')).toBe('2024-02');
      expect(monthKey('99-7')).toBe('0099-07');
    });

    it('should not validate the month in the segment fallback', () => {
      expect(monthKey('2024-13')).toBe('2024-13');
    });

    it('should return null when no stage can read the value', () => {
      expect(monthKey('not-a-date')).toBeNull();
      expect(monthKey('')).toBeNull();
      expect(monthKey('2024')).toBeNull();
      expect(monthKey('2024-03-xx')).toBeNull();
      expect(monthKey('15/03/2024')).toBeNull();
    });
  });

  describe('formatting', () => {
    it('should format local dates', () => {
      const date = new Date(2024, 2, 5, 12, 0, 0);

      expect(formatDate(date)).toBe('2024-03-05');
      expect(todayDateString(date)).toBe('2024-03-05');
      expect(currentMonthKey(date)).toBe('2024-03');
    });

    it('should pad month keys', () => {
      expect(formatMonthKey(2024, 3)).toBe('2024-03');
      expect(formatMonthKey(5, 11)).toBe('0005-11');
    });
  });

  describe('validation', () => {
    it('should accept only real YYYY-MM-DD dates', () => {
      expect(isDateString('2024-02-29')).toBe(true);
      expect(isDateString('2023-02-29')).toBe(false);
      expect(isDateString('2024-3-5')).toBe(false);
      expect(isDateString('yesterday')).toBe(false);
    });

    it('should accept only YYYY-MM month keys', () => {
      expect(isMonthKey('2024-03')).toBe(true);
      expect(isMonthKey('2024-13')).toBe(false);
      expect(isMonthKey('2024-3')).toBe(false);
    });
  });
});
