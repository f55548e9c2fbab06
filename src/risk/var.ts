import { alignTail } from './correlation.js';

export type VarDataQuality = 'ok' | 'partial' | 'no_exposure' | 'insufficient_history';

export interface VarEstimate {
  /** Loss in quote currency at the requested confidence; 0 when not computable. */
  valueAtRisk: number;
  observations: number;
  dataQuality: VarDataQuality;
  missingAssets: string[];
}

/**
 * Historical-simulation VaR of a book of signed notionals (long positive,
 * short negative). Every asset is aligned on the trailing window shared by all
 * series; the loss quantile is read at index floor(n * (1 - confidence)) of the
 * ascending P&L series.
 */
export function historicalVar(params: {
  exposures: Readonly<Record<string, number>>;
  returns: Readonly<Record<string, readonly number[]>>;
  confidence: number;
  minObservations: number;
}): VarEstimate {
  const exposed = Object.entries(params.exposures).filter(([, notional]) => notional !== 0);
  if (exposed.length === 0) {
    return { valueAtRisk: 0, observations: 0, dataQuality: 'no_exposure', missingAssets: [] };
  }

  const missingAssets: string[] = [];
  const series: Array<{ notional: number; returns: readonly number[] }> = [];
  for (const [asset, notional] of exposed) {
    const returns = params.returns[asset];
    if (!returns || returns.length === 0) {
      missingAssets.push(asset);
      continue;
    }
    series.push({ notional, returns });
  }

  const window = series.length > 0 ? Math.min(...series.map((s) => s.returns.length)) : 0;
  if (window < params.minObservations) {
    return {
      valueAtRisk: 0,
      observations: window,
      dataQuality: 'insufficient_history',
      missingAssets,
    };
  }

  const pnl: number[] = new Array<number>(window).fill(0);
  for (const { notional, returns } of series) {
    const [tail] = alignTail(returns, pnl);
    for (let t = 0; t < window; t += 1) {
      pnl[t] = (pnl[t] ?? 0) + notional * (tail[t] ?? 0);
    }
  }

  const sorted = [...pnl].sort((a, b) => a - b);
  const index = Math.max(0, Math.min(sorted.length - 1, Math.floor(sorted.length * (1 - params.confidence))));
  const quantile = sorted[index] ?? 0;

  return {
    valueAtRisk: Math.max(0, -quantile),
    observations: window,
    dataQuality: missingAssets.length > 0 ? 'partial' : 'ok',
    missingAssets,
  };
}
