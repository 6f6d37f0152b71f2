import type {
  BuyScore,
  BuyTier,
  Cluster,
  DataQualityNote,
  PricePoint,
  SellEvent,
  SellScore,
  SellTier,
  SignalThresholds,
} from '../types';
import { BUY_TIER_ORDER, DEFAULT_THRESHOLDS, SELL_TIER_ORDER } from '../types';
import { addDays } from './windowing';

/** 0 is the highest conviction. */
export function buyTierRank(tier: BuyTier): number {
  return BUY_TIER_ORDER.indexOf(tier);
}

export function sellTierRank(tier: SellTier): number {
  return SELL_TIER_ORDER.indexOf(tier);
}

/** Negative when `a` carries more conviction than `b`. */
export function compareBuyTiers(a: BuyTier, b: BuyTier): number {
  return buyTierRank(a) - buyTierRank(b);
}

function closeOnOrBefore(prices: PricePoint[], date: string): PricePoint | undefined {
  let found: PricePoint | undefined;
  for (const p of prices) {
    if (p.date <= date && (!found || p.date > found.date)) found = p;
  }
  return found;
}

/**
 * Percent change of the close over `lookbackDays` calendar days ending at
 * `asOf`, or null when either end of the range has no usable close.
 */
export function priceChangePct(
  prices: PricePoint[],
  asOf: string,
  lookbackDays: number
): number | null {
  const current = closeOnOrBefore(prices, asOf);
  const reference = closeOnOrBefore(prices, addDays(asOf, -lookbackDays));
  if (!current || !reference || reference.close <= 0 || current.date === reference.date) {
    return null;
  }
  return ((current.close - reference.close) / reference.close) * 100;
}

export class TierScorer {
  private thresholds: SignalThresholds;

  constructor(thresholds: SignalThresholds = DEFAULT_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  scoreCluster(cluster: Cluster, prices: PricePoint[] = []): BuyScore {
    const { buy } = this.thresholds;
    const { totalValue, hasCSuite, distinctInsiders } = cluster;
    const notes: DataQualityNote[] = [];
    let change: number | null = null;

    const score = (tier: BuyTier): BuyScore => ({
      tier,
      totalValue,
      hasCSuite,
      distinctInsiders,
      priceChangePct: change,
      notes,
    });

    if (hasCSuite && totalValue >= buy.convictionMinValue) {
      return score('CONVICTION_BUY');
    }

    if (hasCSuite && totalValue >= buy.strongMinValue) {
      change = priceChangePct(prices, cluster.lastTradeDate, buy.priceLookbackDays);
      if (change === null) {
        notes.push({
          code: 'MISSING_PRICE_HISTORY',
          ticker: cluster.ticker,
          message: `No ${buy.priceLookbackDays}-day price history before ${cluster.lastTradeDate}; mean-reversion check skipped`,
        });
        return score('STRONG_SIGNAL');
      }
      return score(change < -buy.meanReversionDropPct ? 'MEAN_REVERSION' : 'STRONG_SIGNAL');
    }

    if (!hasCSuite && totalValue < buy.avoidBelowValue) {
      return score('AVOID');
    }

    return score('WATCH');
  }

  scoreSell(event: SellEvent): SellScore {
    const { sell } = this.thresholds;
    const value = event.totalValue;
    const { isOfficer, isDirector } = event.roles;
    const inTierRange = value >= sell.tierMinValue && value <= sell.tierMaxValue;

    let tier: SellTier | null = null;
    if (isOfficer && isDirector && inTierRange) {
      tier = 'SELL_TIER_1';
    } else if (isOfficer !== isDirector && inTierRange) {
      tier = 'SELL_TIER_2';
    } else if (
      (value >= sell.watchMinValue && value < sell.tierMinValue) ||
      value >= sell.tierMaxValue
    ) {
      tier = 'SELL_WATCH';
    }

    return {
      tier,
      totalValue: value,
      role: event.role,
      possiblePlannedSale: value > sell.tierMaxValue,
    };
  }
}
