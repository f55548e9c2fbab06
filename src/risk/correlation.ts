/**
 * Align two series on their trailing common window.
 */
export function alignTail(a: readonly number[], b: readonly number[]): [number[], number[]] {
  const n = Math.min(a.length, b.length);
  return [a.slice(a.length - n), b.slice(b.length - n)];
}

export function pearsonCorrelation(
  a: readonly number[],
  b: readonly number[],
  minObservations = 2
): number | null {
  const [x, y] = alignTail(a, b);
  const n = x.length;
  if (n < Math.max(2, minObservations)) return null;

  const meanX = x.reduce((sum, v) => sum + v, 0) / n;
  const meanY = y.reduce((sum, v) => sum + v, 0) / n;
  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (let i = 0; i < n; i += 1) {
    const dx = (x[i] ?? 0) - meanX;
    const dy = (y[i] ?? 0) - meanY;
    cov += dx * dy;
    varX += dx * dx;
    varY += dy * dy;
  }
  if (varX === 0 || varY === 0) return null;
  const rho = cov / Math.sqrt(varX * varY);
  return Math.max(-1, Math.min(1, rho));
}

export interface CorrelatedHolding {
  assetPair: string;
  correlation: number;
}

/**
 * Open holdings (other than the candidate itself) whose absolute correlation
 * with the candidate exceeds `threshold`. Holdings without enough shared
 * history are treated as uncorrelated.
 */
export function findCorrelatedHoldings(params: {
  candidate: string;
  holdings: readonly string[];
  returns: Readonly<Record<string, readonly number[]>>;
  threshold: number;
  minObservations: number;
}): CorrelatedHolding[] {
  const candidateReturns = params.returns[params.candidate];
  if (!candidateReturns) return [];

  const seen = new Set<string>();
  const correlated: CorrelatedHolding[] = [];
  for (const holding of params.holdings) {
    if (holding === params.candidate || seen.has(holding)) continue;
    seen.add(holding);
    const series = params.returns[holding];
    if (!series) continue;
    const rho = pearsonCorrelation(candidateReturns, series, params.minObservations);
    if (rho != null && Math.abs(rho) > params.threshold) {
      correlated.push({ assetPair: holding, correlation: rho });
    }
  }
  return correlated;
}
