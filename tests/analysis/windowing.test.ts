import { describe, it, expect } from 'vitest';
import {
  addDays,
  daysBetween,
  isIsoDate,
  scanWindows,
  shiftTradingDays,
} from '../../src/analysis/windowing';

describe('windowing', () => {
  describe('calendar arithmetic', () => {
    it('should add days across month ends', () => {
      expect(addDays('2024-01-01', 14)).toBe('2024-01-15');
      expect(addDays('2024-02-28', 2)).toBe('2024-03-01');
      expect(addDays('2024-03-01', -30)).toBe('2024-01-31');
    });

    it('should count whole days between dates', () => {
      expect(daysBetween('2024-01-01', '2024-01-15')).toBe(14);
      expect(daysBetween('2024-01-15', '2024-01-01')).toBe(-14);
    });

    it('should recognise ISO calendar dates only', () => {
      expect(isIsoDate('2024-03-04')).toBe(true);
      expect(isIsoDate('2024/03/04')).toBe(false);
      expect(isIsoDate('not-a-date')).toBe(false);
      expect(isIsoDate('2024-03-04T10:00:00Z')).toBe(false);
    });
  });

  describe('shiftTradingDays', () => {
    it('should skip weekends in both directions', () => {
      // 2024-01-05 is a Friday
      expect(shiftTradingDays('2024-01-05', 1)).toBe('2024-01-08');
      expect(shiftTradingDays('2024-01-08', -1)).toBe('2024-01-05');
    });

    it('should move twenty trading days', () => {
      expect(shiftTradingDays('2024-01-01', 20)).toBe('2024-01-29');
      expect(shiftTradingDays('2024-03-04', -20)).toBe('2024-02-05');
    });

    it('should return the same date for zero days', () => {
      expect(shiftTradingDays('2024-01-06', 0)).toBe('2024-01-06');
    });
  });

  describe('scanWindows', () => {
    it('should keep a window half-open at start + windowDays', () => {
      const { windows, residue } = scanWindows(
        ['2024-01-01', '2024-01-14', '2024-01-15'],
        (d) => d,
        14
      );

      expect(residue).toEqual([]);
      expect(windows).toEqual([
        { start: '2024-01-01', end: '2024-01-15', members: ['2024-01-01', '2024-01-14'] },
        { start: '2024-01-15', end: '2024-01-29', members: ['2024-01-15'] },
      ]);
    });

    it('should release only the anchor of a rejected window', () => {
      const { windows, residue } = scanWindows(
        ['2024-01-01', '2024-01-10', '2024-01-20'],
        (d) => d,
        14,
        (members) => members.length >= 2
      );

      expect(residue).toEqual(['2024-01-01']);
      expect(windows).toEqual([
        { start: '2024-01-10', end: '2024-01-24', members: ['2024-01-10', '2024-01-20'] },
      ]);
    });
  });
});
