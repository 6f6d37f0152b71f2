import { describe, it, expect, beforeEach } from 'vitest';
import { ClusterDetector, isCSuiteTitle } from '../../src/analysis/clusterDetector';
import { DEFAULT_THRESHOLDS, mergeThresholds } from '../../src/types';
import { tx } from '../fixtures';

const keywords = DEFAULT_THRESHOLDS.cSuiteKeywords;

describe('ClusterDetector', () => {
  let detector: ClusterDetector;

  beforeEach(() => {
    detector = new ClusterDetector();
  });

  describe('isCSuiteTitle', () => {
    it('should match C-suite keywords on word boundaries', () => {
      expect(isCSuiteTitle('Chief Executive Officer', keywords)).toBe(true);
      expect(isCSuiteTitle('President and CEO', keywords)).toBe(true);
      expect(isCSuiteTitle('SVP & CFO', keywords)).toBe(true);
      expect(isCSuiteTitle('Director', keywords)).toBe(false);
      expect(isCSuiteTitle('10% Owner', keywords)).toBe(false);
    });

    it('should not treat vice presidents as presidents', () => {
      expect(isCSuiteTitle('Vice President, Sales', keywords)).toBe(false);
      expect(isCSuiteTitle('Executive Vice President', keywords)).toBe(false);
      expect(isCSuiteTitle('Senior Vice President and CTO', keywords)).toBe(true);
    });
  });

  describe('multi-insider rule', () => {
    it('should not cluster a single insider buying repeatedly', () => {
      const result = detector.detect([
        tx({ accessionNumber: 'A1', transactionDate: '2024-03-01' }),
        tx({ accessionNumber: 'A2', transactionDate: '2024-03-05' }),
        tx({ accessionNumber: 'A3', transactionDate: '2024-03-08' }),
      ]);

      expect(result.clusters).toEqual([]);
      expect(result.residue).toHaveLength(3);
      expect(result.notes).toEqual([
        {
          code: 'SINGLE_INSIDER_RESIDUE',
          ticker: 'ACME',
          message: '3 buy(s) by Alice Able did not form a cluster',
        },
      ]);
    });

    it('should cluster two insiders 13 days apart', () => {
      const { clusters } = detector.detect([
        tx({ accessionNumber: 'A1', insiderCIK: '1001', transactionDate: '2024-03-01' }),
        tx({ accessionNumber: 'A2', insiderCIK: '1002', insiderName: 'Bob Baker', transactionDate: '2024-03-14' }),
      ]);

      expect(clusters).toHaveLength(1);
      expect(clusters[0].windowStart).toBe('2024-03-01');
      expect(clusters[0].windowEnd).toBe('2024-03-15');
      expect(clusters[0].distinctInsiders).toBe(2);
    });

    it('should not cluster two insiders 14 or 15 days apart', () => {
      for (const second of ['2024-03-15', '2024-03-16']) {
        const { clusters, residue } = detector.detect([
          tx({ accessionNumber: 'A1', insiderCIK: '1001', transactionDate: '2024-03-01' }),
          tx({ accessionNumber: 'A2', insiderCIK: '1002', transactionDate: second }),
        ]);

        expect(clusters).toEqual([]);
        expect(residue).toHaveLength(2);
      }
    });

    it('should honour a higher insider minimum', () => {
      const strict = new ClusterDetector(mergeThresholds(DEFAULT_THRESHOLDS, { minClusterInsiders: 3 }));
      const { clusters } = strict.detect([
        tx({ accessionNumber: 'A1', insiderCIK: '1001' }),
        tx({ accessionNumber: 'A2', insiderCIK: '1002' }),
      ]);

      expect(clusters).toEqual([]);
    });
  });

  describe('windowing', () => {
    it('should assign each transaction to at most one cluster', () => {
      const { clusters } = detector.detect([
        tx({ accessionNumber: 'A1', insiderCIK: '1001', transactionDate: '2024-03-01' }),
        tx({ accessionNumber: 'A2', insiderCIK: '1002', transactionDate: '2024-03-05' }),
        tx({ accessionNumber: 'A3', insiderCIK: '1003', transactionDate: '2024-03-20' }),
        tx({ accessionNumber: 'A4', insiderCIK: '1004', transactionDate: '2024-03-22' }),
      ]);

      expect(clusters.map((c) => c.id)).toEqual([
        'ACME:2024-03-01:A1,A2',
        'ACME:2024-03-20:A3,A4',
      ]);
      const used = clusters.flatMap((c) => c.transactions.map((t) => t.accessionNumber));
      expect(new Set(used).size).toBe(used.length);
    });

    it('should re-open the window at the next buy after a lone anchor', () => {
      const { clusters, residue } = detector.detect([
        tx({ accessionNumber: 'A1', insiderCIK: '1001', transactionDate: '2024-03-01' }),
        tx({ accessionNumber: 'A2', insiderCIK: '1001', transactionDate: '2024-03-10' }),
        tx({ accessionNumber: 'A3', insiderCIK: '1002', transactionDate: '2024-03-20' }),
      ]);

      expect(residue.map((t) => t.accessionNumber)).toEqual(['A1']);
      expect(clusters).toHaveLength(1);
      expect(clusters[0].windowStart).toBe('2024-03-10');
      expect(clusters[0].accessionNumbers).toEqual(['A2', 'A3']);
    });

    it('should keep issuers apart', () => {
      const { clusters } = detector.detect([
        tx({ accessionNumber: 'A1', ticker: 'ACME', insiderCIK: '1001' }),
        tx({ accessionNumber: 'B1', ticker: 'BETA', insiderCIK: '1002' }),
      ]);

      expect(clusters).toEqual([]);
    });

    it('should ignore sells', () => {
      const { clusters } = detector.detect([
        tx({ accessionNumber: 'A1', insiderCIK: '1001' }),
        tx({ accessionNumber: 'A2', insiderCIK: '1002', transactionType: 'SELL' }),
      ]);

      expect(clusters).toEqual([]);
    });
  });

  describe('cluster stats', () => {
    it('should aggregate value, distinct insiders and C-suite presence', () => {
      const { clusters } = detector.detect([
        tx({ accessionNumber: 'A1', insiderCIK: '1001', shares: 1000, pricePerShare: 50 }),
        tx({ accessionNumber: 'A2', insiderCIK: '1001', shares: 500, pricePerShare: 50, transactionDate: '2024-03-05' }),
        tx({
          accessionNumber: 'A3',
          insiderCIK: '1002',
          insiderName: 'Carol Chen',
          insiderTitle: 'Chief Financial Officer',
          shares: 2000,
          pricePerShare: 50,
          transactionDate: '2024-03-07',
        }),
      ]);

      expect(clusters).toHaveLength(1);
      const c = clusters[0];
      expect(c.totalValue).toBe(175_000);
      expect(c.distinctInsiders).toBe(2);
      expect(c.insiderCIKs).toEqual(['1001', '1002']);
      expect(c.hasCSuite).toBe(true);
      expect(c.firstTradeDate).toBe('2024-03-04');
      expect(c.lastTradeDate).toBe('2024-03-07');
    });
  });
});
