import { randomUUID } from 'crypto';
import type {
  Alert,
  AlertStore,
  BuyTier,
  Cluster,
  ContaminationResult,
  CrossSignalResult,
  DataQualityNote,
  MacroRegime,
  MarketData,
  RawInsiderTransaction,
  RunResult,
  RunSummary,
  SellEvent,
  SellScore,
  SellTier,
  SignalCandidate,
  SignalThresholds,
  SignalWarning,
  BuyScore,
} from '../types';
import { CROSS_SIGNAL_ORDER, DEFAULT_THRESHOLDS } from '../types';
import { AlertDeduplicator } from '../alerts/alertDeduplicator';
import { StoreUnavailableError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { ClusterDetector } from './clusterDetector';
import { CrossSignalEnricher } from './crossSignal';
import { classifyMacroRegime } from './macroRegime';
import { OptionsContaminationFilter } from './optionsContamination';
import { validateTransactions } from './recordValidator';
import { SellSignalDetector } from './sellSignalDetector';
import { TierScorer, compareBuyTiers, sellTierRank } from './tierScorer';

const ACTIONABLE_BUY_TIERS: readonly BuyTier[] = ['CONVICTION_BUY', 'STRONG_SIGNAL', 'MEAN_REVERSION'];
const ACTIONABLE_SELL_TIERS: readonly SellTier[] = ['SELL_TIER_1', 'SELL_TIER_2'];

export interface SignalEngineOptions {
  thresholds?: SignalThresholds;
  logger?: Logger;
  now?: () => Date;
  /** Report what would be alerted without recording it. */
  dryRun?: boolean;
  /**
   * Return new alerts without recording them; the caller records them with
   * `record()` once they have been delivered.
   */
  deferRecording?: boolean;
}

export interface RunInput {
  transactions: RawInsiderTransaction[];
  market?: Partial<MarketData>;
  /** Defaults to today's UTC date. */
  asOf?: string;
}

interface ScoredCluster {
  cluster: Cluster;
  score: BuyScore;
  contamination: ContaminationResult;
  crossSignal: CrossSignalResult | null;
}

function isBuyTier(tier: BuyTier | SellTier): tier is BuyTier {
  return tier !== 'SELL_TIER_1' && tier !== 'SELL_TIER_2' && tier !== 'SELL_WATCH';
}

/** Re-keys per-ticker market data by upper-case symbol, merging case variants. */
function byTicker<T>(data: Record<string, T[]> | undefined): Record<string, T[]> {
  const keyed: Record<string, T[]> = {};
  for (const [ticker, rows] of Object.entries(data ?? {})) {
    const key = ticker.trim().toUpperCase();
    keyed[key] = [...(keyed[key] ?? []), ...rows];
  }
  return keyed;
}

function uniqueNames(names: string[]): string[] {
  return [...new Set(names)];
}

/**
 * Buy clusters first, by tier, then cross-signal, then value; sells after,
 * by tier then value. Ties fall back to the signal id so output order is
 * stable across runs.
 */
export function compareCandidates(a: SignalCandidate, b: SignalCandidate): number {
  if (a.kind !== b.kind) return a.kind === 'cluster' ? -1 : 1;

  if (isBuyTier(a.tier) && isBuyTier(b.tier)) {
    const byTier = compareBuyTiers(a.tier, b.tier);
    if (byTier !== 0) return byTier;
    const crossA = CROSS_SIGNAL_ORDER.indexOf(a.crossSignal ?? 'NO_CROSS');
    const crossB = CROSS_SIGNAL_ORDER.indexOf(b.crossSignal ?? 'NO_CROSS');
    if (crossA !== crossB) return crossA - crossB;
  } else if (!isBuyTier(a.tier) && !isBuyTier(b.tier)) {
    const byTier = sellTierRank(a.tier) - sellTierRank(b.tier);
    if (byTier !== 0) return byTier;
  }

  if (a.stats.totalValue !== b.stats.totalValue) return b.stats.totalValue - a.stats.totalValue;
  return a.signalId < b.signalId ? -1 : a.signalId > b.signalId ? 1 : 0;
}

export class SignalEngine {
  private thresholds: SignalThresholds;
  private logger: Logger;
  private store: AlertStore;
  private now: () => Date;
  private dryRun: boolean;
  private deferRecording: boolean;

  private clusterDetector: ClusterDetector;
  private sellDetector: SellSignalDetector;
  private scorer: TierScorer;
  private optionsFilter: OptionsContaminationFilter;
  private crossSignal: CrossSignalEnricher;
  private deduplicator: AlertDeduplicator;

  constructor(store: AlertStore, options: SignalEngineOptions = {}) {
    this.store = store;
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.logger = options.logger ?? createLogger('engine');
    this.now = options.now ?? (() => new Date());
    this.dryRun = options.dryRun ?? false;
    this.deferRecording = options.deferRecording ?? false;

    this.clusterDetector = new ClusterDetector(this.thresholds);
    this.sellDetector = new SellSignalDetector(this.thresholds);
    this.scorer = new TierScorer(this.thresholds);
    this.optionsFilter = new OptionsContaminationFilter(this.thresholds);
    this.crossSignal = new CrossSignalEnricher(this.thresholds);
    this.deduplicator = new AlertDeduplicator(store, this.now);
  }

  async run(input: RunInput): Promise<RunResult> {
    const asOf = input.asOf ?? this.now().toISOString().slice(0, 10);
    const runId = randomUUID();
    const market: MarketData = {
      prices: byTicker(input.market?.prices),
      options: byTicker(input.market?.options),
      shortInterest: byTicker(input.market?.shortInterest),
      macro: input.market?.macro ?? null,
    };
    const notes: DataQualityNote[] = [];

    this.logger.info(
      `Run ${runId}: ${input.transactions.length} record(s) as of ${asOf} (thresholds ${this.thresholds.version})`
    );

    const { valid, notes: malformed } = validateTransactions(input.transactions);
    notes.push(...malformed);
    for (const note of malformed) this.logger.warn(note.message);

    const detection = this.clusterDetector.detect(valid);
    notes.push(...detection.notes);
    const sellEvents = this.sellDetector.detect(valid);

    const scoredClusters = detection.clusters.map((cluster) => this.analyzeCluster(cluster, market, asOf));
    for (const s of scoredClusters) {
      notes.push(...s.score.notes, ...s.contamination.notes, ...(s.crossSignal?.notes ?? []));
    }

    const macro = classifyMacroRegime(market.macro, this.thresholds.macro);
    if (macro.label === 'UNKNOWN') {
      notes.push({ code: 'MISSING_MACRO_DATA', message: `No macro snapshot on or before ${asOf}` });
    } else if (macro.flags.length > 0) {
      this.logger.warn(`Macro regime ${macro.label}: ${macro.flags.join('; ')}`);
    }

    const candidates: SignalCandidate[] = [
      ...scoredClusters.map((s) => this.clusterCandidate(s, macro)),
      ...sellEvents.flatMap((event) => {
        const score = this.scorer.scoreSell(event);
        return score.tier ? [this.sellCandidate(event, score, score.tier, macro)] : [];
      }),
    ].sort(compareCandidates);

    try {
      await this.store.ping();
    } catch (error) {
      throw this.storeFailure(error);
    }

    let alerts: Alert[];
    try {
      alerts =
        this.dryRun || this.deferRecording
          ? await this.deduplicator.previewAll(candidates)
          : await this.deduplicator.emitAll(candidates);
    } catch (error) {
      throw this.storeFailure(error);
    }

    const summary: RunSummary = {
      runId,
      asOf,
      thresholdsVersion: this.thresholds.version,
      processed: input.transactions.length,
      malformed: malformed.length,
      clustered: detection.clusters.length,
      sellEvents: sellEvents.length,
      scored: detection.clusters.length + sellEvents.length,
      contaminated: scoredClusters.filter((s) => s.contamination.contaminated).length,
      enriched: scoredClusters.filter((s) => s.crossSignal !== null).length,
      alerted: alerts.length,
      suppressed: candidates.length - alerts.length,
      macro,
      notes,
    };

    this.logger.info(
      `Run ${runId}: ${summary.clustered} cluster(s), ${summary.sellEvents} sell event(s), ` +
        `${summary.alerted} new alert(s), ${summary.suppressed} already sent`
    );

    return { alerts, candidates, summary };
  }

  /**
   * Records alerts from a deferred run after delivery. Returns those that
   * were not already recorded; on a dry run nothing is written.
   */
  async record(alerts: Alert[]): Promise<Alert[]> {
    if (this.dryRun) return [];
    try {
      const recorded = await this.deduplicator.record(alerts);
      this.logger.info(`Recorded ${recorded.length} alert(s)`);
      return recorded;
    } catch (error) {
      throw this.storeFailure(error);
    }
  }

  private analyzeCluster(cluster: Cluster, market: MarketData, asOf: string): ScoredCluster {
    const score = this.scorer.scoreCluster(cluster, market.prices[cluster.ticker] ?? []);
    const contamination = this.optionsFilter.check(cluster, market.options[cluster.ticker] ?? []);
    const crossSignal = this.crossSignal.enrich(
      cluster.ticker,
      score.tier,
      market.shortInterest[cluster.ticker] ?? [],
      asOf
    );
    return { cluster, score, contamination, crossSignal };
  }

  private clusterCandidate(s: ScoredCluster, macro: MacroRegime): SignalCandidate {
    const { cluster, score, contamination, crossSignal } = s;
    return {
      ticker: cluster.ticker,
      companyName: cluster.companyName,
      kind: 'cluster',
      signalId: cluster.id,
      accessionNumbers: cluster.accessionNumbers,
      tier: score.tier,
      crossSignal: crossSignal?.tier,
      contamination: {
        contaminated: contamination.contaminated,
        callHeavy: contamination.callHeavy,
        contaminatingDates: contamination.contaminatingDates,
      },
      warnings: contamination.warnings,
      actionable: ACTIONABLE_BUY_TIERS.includes(score.tier),
      stats: {
        totalValue: cluster.totalValue,
        transactionCount: cluster.transactions.length,
        windowStart: cluster.windowStart,
        windowEnd: cluster.windowEnd,
        lastTradeDate: cluster.lastTradeDate,
        distinctInsiders: cluster.distinctInsiders,
        insiderNames: uniqueNames(cluster.transactions.map((tx) => tx.insiderName)),
        hasCSuite: cluster.hasCSuite,
        priceChangePct: score.priceChangePct,
        maxVolumeOiRatio: contamination.maxVolumeOiRatio,
        maxCallPutRatio:
          contamination.maxCallPutRatio !== null && Number.isFinite(contamination.maxCallPutRatio)
            ? contamination.maxCallPutRatio
            : null,
        daysToCover: crossSignal?.daysToCover ?? null,
        shortInterestChangePct: crossSignal?.shortInterestChangePct ?? null,
        shortInterestTrend: crossSignal?.trend ?? null,
        macroRegime: macro.label,
      },
    };
  }

  private sellCandidate(
    event: SellEvent,
    score: SellScore,
    tier: SellTier,
    macro: MacroRegime
  ): SignalCandidate {
    const warnings: SignalWarning[] = [];
    if (score.possiblePlannedSale) {
      warnings.push({
        code: 'POSSIBLE_PLANNED_SALE',
        message: `$${Math.round(event.totalValue).toLocaleString('en-US')} sale may be a 10b5-1 plan or estate liquidation`,
      });
    }
    return {
      ticker: event.ticker,
      companyName: event.companyName,
      kind: 'sell',
      signalId: event.id,
      accessionNumbers: event.accessionNumbers,
      tier,
      warnings,
      actionable: ACTIONABLE_SELL_TIERS.includes(tier),
      stats: {
        totalValue: event.totalValue,
        transactionCount: event.transactions.length,
        windowStart: event.windowStart,
        windowEnd: event.windowEnd,
        lastTradeDate: event.lastTradeDate,
        insiderNames: [event.insiderName],
        sellRole: score.role,
        macroRegime: macro.label,
      },
    };
  }

  private storeFailure(error: unknown): StoreUnavailableError {
    const failure =
      error instanceof StoreUnavailableError
        ? error
        : new StoreUnavailableError(`Alert store unavailable: ${errorMessage(error)}`, { cause: error });
    this.logger.error(`Alert store failure, no alerts recorded: ${failure.message}`);
    return failure;
  }
}
