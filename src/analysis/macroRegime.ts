import type { MacroRegime, MacroSnapshot, MacroThresholds } from '../types';
import { DEFAULT_THRESHOLDS } from '../types';

function value(v: number | null | undefined): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

// FRED macro backtest 2006-2026: insider alpha fades with high VIX, a flat
// curve or wide credit spreads.
export function classifyMacroRegime(
  snapshot: MacroSnapshot | null | undefined,
  thresholds: MacroThresholds = DEFAULT_THRESHOLDS.macro
): MacroRegime {
  const vix = value(snapshot?.vix);
  const yieldCurve = value(snapshot?.yieldCurve);
  const creditSpread = value(snapshot?.creditSpread);

  if (vix === null && yieldCurve === null && creditSpread === null) {
    return { label: 'UNKNOWN', flags: [], vix, yieldCurve, creditSpread, asOf: snapshot?.date ?? null };
  }

  const flags: string[] = [];
  if (vix !== null && vix > thresholds.vixMax) {
    flags.push(`VIX=${vix.toFixed(1)} (>${thresholds.vixMax})`);
  }
  if (yieldCurve !== null && yieldCurve >= 0 && yieldCurve < thresholds.flatCurveMax) {
    flags.push(`Yield curve=${yieldCurve.toFixed(2)} (flat 0-${thresholds.flatCurveMax})`);
  }
  if (creditSpread !== null && creditSpread >= thresholds.creditSpreadMax) {
    flags.push(`Credit spread=${creditSpread.toFixed(2)} (>=${thresholds.creditSpreadMax})`);
  }

  const label = flags.length >= 2 ? 'UNFAVORABLE' : flags.length === 1 ? 'CAUTION' : 'FAVORABLE';
  return { label, flags, vix, yieldCurve, creditSpread, asOf: snapshot?.date ?? null };
}
