import type {
  Cluster,
  ContaminationResult,
  OptionsSnapshot,
  SignalThresholds,
  SignalWarning,
} from '../types';
import { DEFAULT_THRESHOLDS } from '../types';
import { shiftTradingDays } from './windowing';

function callPutRatio(s: OptionsSnapshot): number | null {
  if (s.putVolume > 0) return s.callVolume / s.putVolume;
  return s.callVolume > 0 ? Number.POSITIVE_INFINITY : null;
}

/**
 * Flags clusters that coincide with abnormal options activity. Backtests
 * show a concurrent volume/OI spike inverts the alpha of an insider buy, so
 * the tier is kept but the alert carries a warning.
 */
export class OptionsContaminationFilter {
  private thresholds: SignalThresholds;

  constructor(thresholds: SignalThresholds = DEFAULT_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  window(cluster: Cluster): { start: string; end: string } {
    const days = this.thresholds.options.lookbackTradingDays;
    return {
      start: shiftTradingDays(cluster.windowStart, -days),
      end: shiftTradingDays(cluster.lastTradeDate, days),
    };
  }

  check(cluster: Cluster, snapshots: OptionsSnapshot[] = []): ContaminationResult {
    const { volumeOiRatio, callPutRatio: callHeavyRatio } = this.thresholds.options;
    const { start, end } = this.window(cluster);

    const ticker = cluster.ticker.toUpperCase();
    const inWindow = snapshots.filter(
      (s) =>
        s.ticker.toUpperCase() === ticker && s.date >= start && s.date <= end && s.openInterest > 0
    );

    const result: ContaminationResult = {
      contaminated: false,
      callHeavy: false,
      maxVolumeOiRatio: null,
      maxCallPutRatio: null,
      contaminatingDates: [],
      windowStart: start,
      windowEnd: end,
      snapshotsConsidered: inWindow.length,
      warnings: [],
      notes: [],
    };

    if (inWindow.length === 0) {
      result.notes.push({
        code: 'MISSING_OPTIONS_DATA',
        ticker: cluster.ticker,
        message: `No options volume/open-interest data between ${start} and ${end}`,
      });
      return result;
    }

    let maxRatio = 0;
    const contaminating: OptionsSnapshot[] = [];
    for (const s of inWindow) {
      const ratio = s.volume / s.openInterest;
      maxRatio = Math.max(maxRatio, ratio);
      if (ratio >= volumeOiRatio) contaminating.push(s);
    }
    result.maxVolumeOiRatio = maxRatio;

    if (contaminating.length === 0) return result;

    result.contaminated = true;
    result.contaminatingDates = contaminating.map((s) => s.date).sort();

    const ratios = contaminating
      .map(callPutRatio)
      .filter((r): r is number => r !== null);
    if (ratios.length > 0) {
      result.maxCallPutRatio = Math.max(...ratios);
      result.callHeavy = result.maxCallPutRatio >= callHeavyRatio;
    }

    const warnings: SignalWarning[] = [
      {
        code: 'OPTIONS_CONTAMINATION',
        message:
          `Options volume/OI reached ${maxRatio.toFixed(1)}x on ${result.contaminatingDates.join(', ')} ` +
          `(threshold ${volumeOiRatio}x within ±${this.thresholds.options.lookbackTradingDays} trading days)`,
      },
    ];
    if (result.callHeavy) {
      const shown = Number.isFinite(result.maxCallPutRatio) ? result.maxCallPutRatio?.toFixed(2) : 'all calls';
      warnings.push({
        code: 'CALL_HEAVY_OPTIONS',
        message: `Call/put ratio ${shown} on the contaminating day(s)`,
      });
    }
    result.warnings = warnings;

    return result;
  }
}
