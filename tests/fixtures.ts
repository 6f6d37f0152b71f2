import type {
  Cluster,
  InsiderTransaction,
  RawInsiderTransaction,
  SellEvent,
} from '../src/types';

export function raw(overrides: Partial<RawInsiderTransaction> = {}): RawInsiderTransaction {
  return {
    accessionNumber: '0000001-24-000001',
    ticker: 'ACME',
    companyName: 'Acme Corp',
    insiderCIK: '1001',
    insiderName: 'Alice Able',
    insiderTitle: 'Director',
    roles: { isOfficer: false, isDirector: true, isTenPercentOwner: false },
    transactionType: 'BUY',
    transactionDate: '2024-03-04',
    shares: 1000,
    pricePerShare: 100,
    filedAt: '2024-03-06T16:00:00Z',
    ...overrides,
  };
}

export function tx(overrides: Partial<InsiderTransaction> = {}): InsiderTransaction {
  const shares = overrides.shares ?? 1000;
  const pricePerShare = overrides.pricePerShare ?? 100;
  return {
    accessionNumber: '0000001-24-000001',
    ticker: 'ACME',
    companyName: 'Acme Corp',
    insiderCIK: '1001',
    insiderName: 'Alice Able',
    insiderTitle: 'Director',
    roles: { isOfficer: false, isDirector: true, isTenPercentOwner: false },
    transactionType: 'BUY',
    transactionDate: '2024-03-04',
    filedAt: '2024-03-06T16:00:00Z',
    ...overrides,
    shares,
    pricePerShare,
    totalValue: overrides.totalValue ?? shares * pricePerShare,
  };
}

export function cluster(overrides: Partial<Cluster> = {}): Cluster {
  return {
    id: 'ACME:2024-03-04:A1,A2',
    ticker: 'ACME',
    transactions: [],
    windowStart: '2024-03-04',
    windowEnd: '2024-03-18',
    firstTradeDate: '2024-03-04',
    lastTradeDate: '2024-03-08',
    totalValue: 1_000_000,
    distinctInsiders: 2,
    insiderCIKs: ['1001', '1002'],
    hasCSuite: true,
    accessionNumbers: ['A1', 'A2'],
    ...overrides,
  };
}

export function sellEvent(overrides: Partial<SellEvent> = {}): SellEvent {
  return {
    id: 'ACME:1001:2024-03-04:S1',
    ticker: 'ACME',
    insiderCIK: '1001',
    insiderName: 'Alice Able',
    insiderTitle: 'Director',
    transactions: [],
    windowStart: '2024-03-04',
    windowEnd: '2024-03-18',
    lastTradeDate: '2024-03-04',
    totalValue: 300_000,
    roles: { isOfficer: false, isDirector: true, isTenPercentOwner: false },
    role: 'DIRECTOR_ONLY',
    accessionNumbers: ['S1'],
    ...overrides,
  };
}
