import type { InsiderRoles, InsiderTransaction } from './transactions';

export type BuyTier = 'CONVICTION_BUY' | 'STRONG_SIGNAL' | 'MEAN_REVERSION' | 'WATCH' | 'AVOID';
export type SellTier = 'SELL_TIER_1' | 'SELL_TIER_2' | 'SELL_WATCH';
export type CrossSignalTier = 'CROSS_SIGNAL_TOP' | 'CROSS_SIGNAL_SECONDARY' | 'NO_CROSS';
export type SignalKind = 'cluster' | 'sell';
export type SellRole = 'OFFICER_AND_DIRECTOR' | 'OFFICER_ONLY' | 'DIRECTOR_ONLY' | 'OTHER';
export type ShortInterestTrend = 'SURGING' | 'INCREASING' | 'STABLE' | 'DECREASING';
export type MacroLabel = 'FAVORABLE' | 'CAUTION' | 'UNFAVORABLE' | 'UNKNOWN';

// Highest conviction first
export const BUY_TIER_ORDER: readonly BuyTier[] = [
  'CONVICTION_BUY',
  'STRONG_SIGNAL',
  'MEAN_REVERSION',
  'WATCH',
  'AVOID',
];
export const SELL_TIER_ORDER: readonly SellTier[] = ['SELL_TIER_1', 'SELL_TIER_2', 'SELL_WATCH'];
export const CROSS_SIGNAL_ORDER: readonly CrossSignalTier[] = [
  'CROSS_SIGNAL_TOP',
  'CROSS_SIGNAL_SECONDARY',
  'NO_CROSS',
];

export type DataQualityCode =
  | 'MALFORMED_RECORD'
  | 'MISSING_PRICE_HISTORY'
  | 'MISSING_OPTIONS_DATA'
  | 'MISSING_SHORT_INTEREST'
  | 'MISSING_MACRO_DATA'
  | 'SINGLE_INSIDER_RESIDUE';

export interface DataQualityNote {
  code: DataQualityCode;
  ticker?: string;
  accessionNumber?: string;
  message: string;
}

export type WarningCode = 'OPTIONS_CONTAMINATION' | 'CALL_HEAVY_OPTIONS' | 'POSSIBLE_PLANNED_SALE';

export interface SignalWarning {
  code: WarningCode;
  message: string;
}

export interface Cluster {
  id: string;
  ticker: string;
  companyName?: string;
  transactions: InsiderTransaction[];
  windowStart: string;
  windowEnd: string; // exclusive
  firstTradeDate: string;
  lastTradeDate: string;
  totalValue: number;
  distinctInsiders: number;
  insiderCIKs: string[];
  hasCSuite: boolean;
  accessionNumbers: string[];
}

export interface SellEvent {
  id: string;
  ticker: string;
  companyName?: string;
  insiderCIK: string;
  insiderName: string;
  insiderTitle: string;
  transactions: InsiderTransaction[];
  windowStart: string;
  windowEnd: string;
  lastTradeDate: string;
  totalValue: number;
  roles: InsiderRoles;
  role: SellRole;
  accessionNumbers: string[];
}

export interface BuyScore {
  tier: BuyTier;
  totalValue: number;
  hasCSuite: boolean;
  distinctInsiders: number;
  priceChangePct: number | null;
  notes: DataQualityNote[];
}

export interface SellScore {
  tier: SellTier | null;
  totalValue: number;
  role: SellRole;
  possiblePlannedSale: boolean;
}

export interface ContaminationResult {
  contaminated: boolean;
  callHeavy: boolean;
  maxVolumeOiRatio: number | null;
  maxCallPutRatio: number | null;
  contaminatingDates: string[];
  windowStart: string;
  windowEnd: string;
  snapshotsConsidered: number;
  warnings: SignalWarning[];
  notes: DataQualityNote[];
}

export interface CrossSignalResult {
  tier: CrossSignalTier;
  daysToCover: number | null;
  shortInterestChangePct: number | null;
  trend: ShortInterestTrend | null;
  snapshotDate: string | null;
  notes: DataQualityNote[];
}

export interface MacroRegime {
  label: MacroLabel;
  flags: string[];
  vix: number | null;
  yieldCurve: number | null;
  creditSpread: number | null;
  asOf: string | null;
}

export interface AlertStats {
  totalValue: number;
  transactionCount: number;
  windowStart: string;
  windowEnd: string;
  lastTradeDate: string;
  distinctInsiders?: number;
  insiderNames: string[];
  hasCSuite?: boolean;
  priceChangePct?: number | null;
  sellRole?: SellRole;
  maxVolumeOiRatio?: number | null;
  maxCallPutRatio?: number | null;
  daysToCover?: number | null;
  shortInterestChangePct?: number | null;
  shortInterestTrend?: ShortInterestTrend | null;
  macroRegime?: MacroLabel;
}

export interface ContaminationFlags {
  contaminated: boolean;
  callHeavy: boolean;
  contaminatingDates: string[];
}

/** A fully scored, filtered and enriched signal, before deduplication. */
export interface SignalCandidate {
  ticker: string;
  companyName?: string;
  kind: SignalKind;
  signalId: string;
  accessionNumbers: string[];
  tier: BuyTier | SellTier;
  crossSignal?: CrossSignalTier;
  contamination?: ContaminationFlags;
  warnings: SignalWarning[];
  actionable: boolean;
  stats: AlertStats;
}

export interface Alert extends SignalCandidate {
  id: string;
  signature: string;
  createdAt: string;
}

export interface RunSummary {
  runId: string;
  asOf: string;
  thresholdsVersion: string;
  processed: number;
  malformed: number;
  clustered: number;
  sellEvents: number;
  scored: number;
  contaminated: number;
  enriched: number;
  alerted: number;
  suppressed: number;
  macro: MacroRegime;
  notes: DataQualityNote[];
}

export interface RunResult {
  alerts: Alert[];
  candidates: SignalCandidate[];
  summary: RunSummary;
}
