import { describe, expect, it } from 'vitest';

import { AgentContext, utcDate } from '../../src/agent/context.js';

describe('AgentContext', () => {
  it('rotates asset pairs round-robin', () => {
    const context = new AgentContext(() => Date.parse('2026-01-01T10:00:00Z'));
    const pairs = ['BTCUSD', 'ETHUSD', 'SOLUSD'];
    expect([1, 2, 3, 4].map(() => context.nextAssetPair(pairs))).toEqual([
      'BTCUSD',
      'ETHUSD',
      'SOLUSD',
      'BTCUSD',
    ]);
  });

  it('resets the daily counter and failures on a new UTC day', () => {
    let now = Date.parse('2026-01-01T23:59:00Z');
    const context = new AgentContext(() => now);
    context.recordTrade();
    context.recordAnalysisFailure('BTCUSD');
    expect(context.rollDate()).toBe(false);

    now = Date.parse('2026-01-02T00:00:01Z');
    expect(context.rollDate()).toBe(true);
    expect(context.dailyTradeCount).toBe(0);
    expect(context.tradeDate).toBe('2026-01-02');
    expect(context.analysisFailureCount('BTCUSD')).toBe(0);
  });

  it('treats a daily limit of 0 as unlimited', () => {
    const context = new AgentContext();
    context.recordTrade();
    context.recordTrade();
    expect(context.tradeLimitReached(0)).toBe(false);
    expect(context.tradeLimitReached(3)).toBe(false);
    expect(context.tradeLimitReached(2)).toBe(true);
  });

  it('suppresses an asset after repeated failures until the decay window passes', () => {
    let now = Date.parse('2026-01-01T10:00:00Z');
    const context = new AgentContext(() => now);
    context.recordAnalysisFailure('ETHUSD');
    context.recordAnalysisFailure('ETHUSD');
    expect(context.isSuppressed('ETHUSD', 3, 3_600_000)).toBe(false);
    context.recordAnalysisFailure('ETHUSD');
    expect(context.isSuppressed('ETHUSD', 3, 3_600_000)).toBe(true);

    now += 3_600_000;
    expect(context.isSuppressed('ETHUSD', 3, 3_600_000)).toBe(false);
    expect(context.analysisFailureCount('ETHUSD')).toBe(0);
  });

  it('restores from a persisted snapshot', () => {
    const now = () => Date.parse('2026-01-05T08:00:00Z');
    const original = new AgentContext(now);
    original.recordTrade();
    original.nextAssetPair(['A', 'B']);
    original.providerWeights = { alpha: 0.7, beta: 0.3 };
    original.recordAnalysisFailure('A');

    const restored = AgentContext.restore(original.snapshot(), now);
    expect(restored.snapshot()).toEqual({
      dailyTradeCount: 1,
      tradeDate: '2026-01-05',
      cursor: 1,
      providerWeights: { alpha: 0.7, beta: 0.3 },
      analysisFailures: { A: { count: 1, lastFailureAt: now() } },
    });
  });

  it('formats UTC dates', () => {
    expect(utcDate(Date.parse('2026-07-04T23:30:00-02:00'))).toBe('2026-07-05');
  });
});
