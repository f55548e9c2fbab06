import type { MarketSnapshot } from '../agent/types.js';

export interface FreshnessResult {
  fresh: boolean;
  /** null when `collectedAt` does not parse. */
  ageSeconds: number | null;
  message: string;
}

/**
 * Snapshot freshness against a staleness threshold. Timestamps in the future
 * beyond the allowed clock skew count as stale too.
 */
export function checkSnapshotFreshness(
  snapshot: Pick<MarketSnapshot, 'collectedAt'>,
  params: { stalenessSeconds: number; maxClockSkewSeconds: number; nowMs: number }
): FreshnessResult {
  const collectedMs = Date.parse(snapshot.collectedAt);
  if (!Number.isFinite(collectedMs)) {
    return {
      fresh: false,
      ageSeconds: null,
      message: `Unparseable collectedAt "${snapshot.collectedAt}"`,
    };
  }

  const ageSeconds = (params.nowMs - collectedMs) / 1000;
  if (ageSeconds < -params.maxClockSkewSeconds) {
    return {
      fresh: false,
      ageSeconds,
      message: `collectedAt is ${Math.abs(ageSeconds).toFixed(0)}s in the future`,
    };
  }
  if (ageSeconds > params.stalenessSeconds) {
    return {
      fresh: false,
      ageSeconds,
      message: `Snapshot is ${formatAge(ageSeconds)} old (limit ${formatAge(params.stalenessSeconds)})`,
    };
  }
  return { fresh: true, ageSeconds, message: '' };
}

export function formatAge(seconds: number): string {
  if (seconds >= 3600) return `${(seconds / 3600).toFixed(1)}h`;
  if (seconds >= 60) return `${(seconds / 60).toFixed(1)}m`;
  return `${Math.round(seconds)}s`;
}
