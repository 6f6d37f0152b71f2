export type TransactionType = 'BUY' | 'SELL' | 'EXERCISE' | 'GIFT' | 'OTHER';

export interface InsiderRoles {
  isOfficer: boolean;
  isDirector: boolean;
  isTenPercentOwner: boolean;
}

/**
 * A Form 4 transaction as handed over by the ingestion pipeline. Shares,
 * price and date may be missing on badly parsed filings; see
 * `validateTransactions` for what gets through.
 */
export interface RawInsiderTransaction {
  accessionNumber: string;
  ticker: string;
  companyName?: string;
  insiderCIK: string;
  insiderName: string;
  insiderTitle: string;
  roles: InsiderRoles;
  transactionType: TransactionType;
  transactionDate?: string | null; // YYYY-MM-DD
  shares?: number | null;
  pricePerShare?: number | null;
  filedAt: string;
}

export interface InsiderTransaction {
  accessionNumber: string;
  ticker: string;
  companyName?: string;
  insiderCIK: string;
  insiderName: string;
  insiderTitle: string;
  roles: InsiderRoles;
  transactionType: TransactionType;
  transactionDate: string;
  shares: number;
  pricePerShare: number;
  totalValue: number;
  filedAt: string;
}

export interface PricePoint {
  date: string;
  close: number;
}

export interface OptionsSnapshot {
  ticker: string;
  date: string;
  volume: number;
  openInterest: number;
  callVolume: number;
  putVolume: number;
}

export interface ShortInterestSnapshot {
  ticker: string;
  date: string;
  daysToCover: number;
  changePct: number; // vs prior reporting period
}

export interface MacroSnapshot {
  date: string;
  vix?: number | null;
  yieldCurve?: number | null; // 10y - 2y
  creditSpread?: number | null; // HY option-adjusted spread
}

/** Pre-fetched, read-only market context for one run, keyed by ticker. */
export interface MarketData {
  prices: Record<string, PricePoint[]>;
  options: Record<string, OptionsSnapshot[]>;
  shortInterest: Record<string, ShortInterestSnapshot[]>;
  macro?: MacroSnapshot | null;
}
