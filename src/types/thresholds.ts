import type { BuyTier } from './signals';

export interface BuyThresholds {
  convictionMinValue: number;
  strongMinValue: number;
  avoidBelowValue: number;
  meanReversionDropPct: number;
  priceLookbackDays: number;
}

export interface SellThresholds {
  tierMinValue: number;
  tierMaxValue: number;
  watchMinValue: number;
}

export interface OptionsThresholds {
  volumeOiRatio: number;
  callPutRatio: number;
  lookbackTradingDays: number;
}

export interface ShortInterestThresholds {
  minDaysToCover: number;
  minIncreasePct: number;
  surgePct: number;
  decreasePct: number;
}

export interface MacroThresholds {
  vixMax: number;
  flatCurveMax: number;
  creditSpreadMax: number;
}

export interface SignalThresholds {
  version: string;
  clusterWindowDays: number;
  minClusterInsiders: number;
  cSuiteKeywords: string[];
  crossSignalTiers: BuyTier[];
  buy: BuyThresholds;
  sell: SellThresholds;
  options: OptionsThresholds;
  shortInterest: ShortInterestThresholds;
  macro: MacroThresholds;
}

export type ThresholdOverrides = Partial<
  Omit<SignalThresholds, 'buy' | 'sell' | 'options' | 'shortInterest' | 'macro'>
> & {
  buy?: Partial<BuyThresholds>;
  sell?: Partial<SellThresholds>;
  options?: Partial<OptionsThresholds>;
  shortInterest?: Partial<ShortInterestThresholds>;
  macro?: Partial<MacroThresholds>;
};

// Backtested 2020-2025 on Form 4 open-market trades
export const DEFAULT_THRESHOLDS: SignalThresholds = {
  version: '2025.1',
  clusterWindowDays: 14,
  minClusterInsiders: 2,
  cSuiteKeywords: ['CEO', 'CFO', 'COO', 'CTO', 'CIO', 'CMO', 'President', 'Chief'],
  crossSignalTiers: ['CONVICTION_BUY', 'STRONG_SIGNAL', 'MEAN_REVERSION'],
  buy: {
    convictionMinValue: 5_000_000,
    strongMinValue: 500_000,
    avoidBelowValue: 50_000,
    meanReversionDropPct: 10,
    priceLookbackDays: 30,
  },
  sell: {
    tierMinValue: 250_000,
    tierMaxValue: 5_000_000,
    watchMinValue: 50_000,
  },
  options: {
    volumeOiRatio: 7.0,
    callPutRatio: 1.25,
    lookbackTradingDays: 20,
  },
  shortInterest: {
    minDaysToCover: 5,
    minIncreasePct: 10,
    surgePct: 25,
    decreasePct: -10,
  },
  macro: {
    vixMax: 30,
    flatCurveMax: 0.5,
    creditSpreadMax: 4,
  },
};

export function mergeThresholds(
  base: SignalThresholds,
  overrides: ThresholdOverrides = {}
): SignalThresholds {
  return {
    ...base,
    ...overrides,
    cSuiteKeywords: overrides.cSuiteKeywords ?? [...base.cSuiteKeywords],
    crossSignalTiers: overrides.crossSignalTiers ?? [...base.crossSignalTiers],
    buy: { ...base.buy, ...overrides.buy },
    sell: { ...base.sell, ...overrides.sell },
    options: { ...base.options, ...overrides.options },
    shortInterest: { ...base.shortInterest, ...overrides.shortInterest },
    macro: { ...base.macro, ...overrides.macro },
  };
}
