import type { PersistedAgentContext } from './ports.js';
import type { ProviderWeights } from './types.js';

interface FailureRecord {
  count: number;
  lastFailureAt: number;
}

export function utcDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Mutable per-agent state that outlives a single cycle: the daily trade
 * counter, the asset rotation cursor, decision-provider failure tracking and
 * the adaptive provider weights.
 */
export class AgentContext {
  dailyTradeCount = 0;
  tradeDate: string;
  cursor = 0;
  providerWeights: ProviderWeights = {};
  private analysisFailures = new Map<string, FailureRecord>();

  constructor(private now: () => number = Date.now) {
    this.tradeDate = utcDate(now());
  }

  static restore(persisted: PersistedAgentContext, now: () => number = Date.now): AgentContext {
    const context = new AgentContext(now);
    context.hydrate(persisted);
    return context;
  }

  /** Replace this context's state with a persisted copy. */
  hydrate(persisted: PersistedAgentContext): void {
    this.dailyTradeCount = Math.max(0, Math.floor(persisted.dailyTradeCount));
    this.tradeDate = persisted.tradeDate;
    this.cursor = Math.max(0, Math.floor(persisted.cursor));
    this.providerWeights = { ...persisted.providerWeights };
    this.analysisFailures.clear();
    for (const [pair, record] of Object.entries(persisted.analysisFailures)) {
      this.analysisFailures.set(pair, { ...record });
    }
  }

  /**
   * Reset the daily counters when the UTC date has changed. Returns true on
   * a rollover.
   */
  rollDate(): boolean {
    const today = utcDate(this.now());
    if (today === this.tradeDate) return false;
    this.tradeDate = today;
    this.dailyTradeCount = 0;
    this.analysisFailures.clear();
    return true;
  }

  recordTrade(): void {
    this.dailyTradeCount += 1;
  }

  /** A limit of 0 means unlimited. */
  tradeLimitReached(maxDailyTrades: number): boolean {
    return maxDailyTrades > 0 && this.dailyTradeCount >= maxDailyTrades;
  }

  nextAssetPair(assetPairs: readonly string[]): string {
    if (assetPairs.length === 0) {
      throw new Error('No asset pairs configured');
    }
    const index = this.cursor % assetPairs.length;
    this.cursor = (index + 1) % assetPairs.length;
    return assetPairs[index] ?? assetPairs[0] ?? '';
  }

  recordAnalysisFailure(assetPair: string): number {
    const previous = this.analysisFailures.get(assetPair);
    const count = (previous?.count ?? 0) + 1;
    this.analysisFailures.set(assetPair, { count, lastFailureAt: this.now() });
    return count;
  }

  clearAnalysisFailures(assetPair: string): void {
    this.analysisFailures.delete(assetPair);
  }

  analysisFailureCount(assetPair: string): number {
    return this.analysisFailures.get(assetPair)?.count ?? 0;
  }

  /**
   * True while the pair has hit `maxFailures` consecutive provider failures
   * within the decay window. An expired record is dropped.
   */
  isSuppressed(assetPair: string, maxFailures: number, decayMs: number): boolean {
    const record = this.analysisFailures.get(assetPair);
    if (!record) return false;
    if (this.now() - record.lastFailureAt >= decayMs) {
      this.analysisFailures.delete(assetPair);
      return false;
    }
    return record.count >= maxFailures;
  }

  snapshot(): PersistedAgentContext {
    return {
      dailyTradeCount: this.dailyTradeCount,
      tradeDate: this.tradeDate,
      cursor: this.cursor,
      providerWeights: { ...this.providerWeights },
      analysisFailures: Object.fromEntries(
        [...this.analysisFailures.entries()].map(([pair, record]) => [pair, { ...record }])
      ),
    };
  }
}
