import { describe, it, expect } from 'vitest';
import { CrossSignalEnricher, latestSnapshot } from '../../src/analysis/crossSignal';
import type { ShortInterestSnapshot } from '../../src/types';

function si(date: string, daysToCover: number, changePct: number): ShortInterestSnapshot {
  return { ticker: 'ACME', date, daysToCover, changePct };
}

describe('CrossSignalEnricher', () => {
  const enricher = new CrossSignalEnricher();

  describe('classify', () => {
    it('should need DTC above 5 and SI growth above 10% for the top tier', () => {
      expect(enricher.classify(6, 15)).toBe('CROSS_SIGNAL_TOP');
      expect(enricher.classify(6, 10)).toBe('CROSS_SIGNAL_SECONDARY');
      expect(enricher.classify(5.1, 0)).toBe('CROSS_SIGNAL_SECONDARY');
      expect(enricher.classify(5, 30)).toBe('NO_CROSS');
      expect(enricher.classify(2, -20)).toBe('NO_CROSS');
    });

    it('should classify DTC 6 with +12% as top, +5% as secondary, and DTC 4 as none', () => {
      expect(enricher.classify(6, 12)).toBe('CROSS_SIGNAL_TOP');
      expect(enricher.classify(6, 5)).toBe('CROSS_SIGNAL_SECONDARY');
      expect(enricher.classify(4, 12)).toBe('NO_CROSS');
      expect(enricher.classify(4, 80)).toBe('NO_CROSS');
    });
  });

  describe('trendOf', () => {
    it('should label the short-interest trend', () => {
      expect(enricher.trendOf(30)).toBe('SURGING');
      expect(enricher.trendOf(25)).toBe('INCREASING');
      expect(enricher.trendOf(10)).toBe('STABLE');
      expect(enricher.trendOf(-10)).toBe('STABLE');
      expect(enricher.trendOf(-11)).toBe('DECREASING');
    });
  });

  describe('enrich', () => {
    it('should use the latest snapshot on or before the as-of date', () => {
      const snapshots = [si('2024-03-01', 2, 0), si('2024-03-15', 8, 20), si('2024-04-01', 1, 0)];

      expect(latestSnapshot(snapshots, '2024-03-20')?.date).toBe('2024-03-15');
      expect(enricher.enrich('ACME', 'STRONG_SIGNAL', snapshots, '2024-03-20')).toEqual({
        tier: 'CROSS_SIGNAL_TOP',
        daysToCover: 8,
        shortInterestChangePct: 20,
        trend: 'INCREASING',
        snapshotDate: '2024-03-15',
        notes: [],
      });
    });

    it('should apply to mean-reversion clusters but not to WATCH or AVOID', () => {
      const snapshots = [si('2024-03-15', 8, 20)];

      expect(enricher.enrich('ACME', 'MEAN_REVERSION', snapshots, '2024-03-20')?.tier).toBe('CROSS_SIGNAL_TOP');
      expect(enricher.enrich('ACME', 'WATCH', snapshots, '2024-03-20')).toBeNull();
      expect(enricher.enrich('ACME', 'AVOID', snapshots, '2024-03-20')).toBeNull();
    });

    it('should report NO_CROSS with a note when no snapshot exists', () => {
      const result = enricher.enrich('ACME', 'CONVICTION_BUY', [si('2024-04-01', 9, 40)], '2024-03-20');

      expect(result?.tier).toBe('NO_CROSS');
      expect(result?.notes).toEqual([
        {
          code: 'MISSING_SHORT_INTEREST',
          ticker: 'ACME',
          message: 'No short-interest snapshot on or before 2024-03-20',
        },
      ]);
    });
  });
});
