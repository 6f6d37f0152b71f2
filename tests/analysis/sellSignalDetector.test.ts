import { describe, it, expect } from 'vitest';
import { SellSignalDetector, sellRoleOf } from '../../src/analysis/sellSignalDetector';
import { tx } from '../fixtures';

const director = { isOfficer: false, isDirector: true, isTenPercentOwner: false };
const officer = { isOfficer: true, isDirector: false, isTenPercentOwner: false };

describe('SellSignalDetector', () => {
  const detector = new SellSignalDetector();

  it('should derive the role from the flags', () => {
    expect(sellRoleOf({ isOfficer: true, isDirector: true, isTenPercentOwner: false })).toBe('OFFICER_AND_DIRECTOR');
    expect(sellRoleOf(officer)).toBe('OFFICER_ONLY');
    expect(sellRoleOf(director)).toBe('DIRECTOR_ONLY');
    expect(sellRoleOf({ isOfficer: false, isDirector: false, isTenPercentOwner: true })).toBe('OTHER');
  });

  it('should aggregate one insider\'s sells inside the window', () => {
    const events = detector.detect([
      tx({ accessionNumber: 'S1', transactionType: 'SELL', transactionDate: '2024-03-01' }),
      tx({ accessionNumber: 'S2', transactionType: 'SELL', transactionDate: '2024-03-10', shares: 2000 }),
    ]);

    expect(events).toHaveLength(1);
    expect(events[0].totalValue).toBe(300_000);
    expect(events[0].accessionNumbers).toEqual(['S1', 'S2']);
    expect(events[0].id).toBe('ACME:1001:2024-03-01:S1,S2');
    expect(events[0].role).toBe('DIRECTOR_ONLY');
  });

  it('should split sells more than a window apart', () => {
    const events = detector.detect([
      tx({ accessionNumber: 'S1', transactionType: 'SELL', transactionDate: '2024-03-01' }),
      tx({ accessionNumber: 'S2', transactionType: 'SELL', transactionDate: '2024-03-20' }),
    ]);

    expect(events.map((e) => e.windowStart)).toEqual(['2024-03-01', '2024-03-20']);
  });

  it('should keep insiders apart and need no second insider', () => {
    const events = detector.detect([
      tx({ accessionNumber: 'S1', insiderCIK: '1001', transactionType: 'SELL' }),
      tx({ accessionNumber: 'S2', insiderCIK: '1002', transactionType: 'SELL' }),
    ]);

    expect(events.map((e) => e.insiderCIK)).toEqual(['1001', '1002']);
  });

  it('should combine role flags across the insider\'s filings', () => {
    const [event] = detector.detect([
      tx({ accessionNumber: 'S1', transactionType: 'SELL', roles: officer }),
      tx({ accessionNumber: 'S2', transactionType: 'SELL', roles: director, transactionDate: '2024-03-06' }),
    ]);

    expect(event.role).toBe('OFFICER_AND_DIRECTOR');
  });

  it('should ignore buys', () => {
    expect(detector.detect([tx({ transactionType: 'BUY' })])).toEqual([]);
  });
});
