import { beforeEach, describe, expect, it, vi } from 'vitest';

let outcomes: Array<Record<string, unknown>> = [];
let trades = new Map<string, Record<string, unknown>>();

const fakeDb = {
  exec: vi.fn(),
  prepare: (sql: string) => {
    if (sql.includes('INTO cycle_outcomes')) {
      return {
        run: (params: Record<string, unknown>) => {
          outcomes.push({
            cycle_id: params.cycleId,
            asset_pair: params.assetPair,
            outcome: params.outcome,
            decision_id: params.decisionId,
            action: params.action,
            reason: params.reason,
            trade_id: params.tradeId,
            started_at: params.startedAt,
            finished_at: params.finishedAt,
          });
        },
      };
    }
    if (sql.includes('FROM cycle_outcomes')) {
      return {
        all: (limit: number) =>
          [...outcomes]
            .sort((a, b) => String(b.finished_at).localeCompare(String(a.finished_at)))
            .slice(0, limit),
      };
    }
    if (sql.includes('INTO closed_trades')) {
      return {
        run: (params: Record<string, unknown>) => {
          trades.set(String(params.tradeId), {
            providers: params.providers,
            realized_pnl: params.realizedPnl,
          });
        },
      };
    }
    if (sql.includes('FROM closed_trades')) {
      return { all: () => [...trades.values()].filter((row) => row.realized_pnl != null) };
    }
    return { run: () => undefined, get: () => undefined, all: () => [] };
  },
};

vi.mock('../../src/memory/db.js', () => ({
  openDatabase: () => fakeDb,
}));

import { SqliteOutcomeMemory, computeProviderWeights } from '../../src/memory/cycle_outcomes.js';

beforeEach(() => {
  outcomes = [];
  trades = new Map();
});

describe('computeProviderWeights', () => {
  it('weights providers by win rate', () => {
    expect(
      computeProviderWeights({
        a: { wins: 3, losses: 1 },
        b: { wins: 1, losses: 1 },
        c: { wins: 0, losses: 2 },
      })
    ).toEqual({ a: 0.6, b: 0.4, c: 0 });
  });

  it('splits evenly when nobody has won', () => {
    expect(computeProviderWeights({ a: { wins: 0, losses: 1 }, b: { wins: 0, losses: 3 } })).toEqual({
      a: 0.5,
      b: 0.5,
    });
  });

  it('returns no weights without providers', () => {
    expect(computeProviderWeights({})).toEqual({});
  });
});

describe('SqliteOutcomeMemory', () => {
  it('stores cycle outcomes and lists the latest first', () => {
    const memory = new SqliteOutcomeMemory(':memory:');
    memory.recordCycleOutcome({
      cycleId: 'c1',
      assetPair: 'BTCUSD',
      outcome: 'held',
      startedAt: '2026-03-01T00:00:00Z',
      finishedAt: '2026-03-01T00:00:01Z',
      decisionId: 'd1',
      action: 'HOLD',
      reason: 'hold',
    });
    memory.recordCycleOutcome({
      cycleId: 'c2',
      assetPair: 'ETHUSD',
      outcome: 'stale_data',
      startedAt: '2026-03-01T00:01:00Z',
      finishedAt: '2026-03-01T00:01:01Z',
    });

    expect(memory.listRecentOutcomes(5)).toEqual([
      {
        cycleId: 'c2',
        assetPair: 'ETHUSD',
        outcome: 'stale_data',
        startedAt: '2026-03-01T00:01:00Z',
        finishedAt: '2026-03-01T00:01:01Z',
      },
      {
        cycleId: 'c1',
        assetPair: 'BTCUSD',
        outcome: 'held',
        startedAt: '2026-03-01T00:00:00Z',
        finishedAt: '2026-03-01T00:00:01Z',
        decisionId: 'd1',
        action: 'HOLD',
        reason: 'hold',
      },
    ]);
    expect(memory.listRecentOutcomes(1)).toHaveLength(1);
  });

  it('recomputes provider weights from closed trades with known P&L', () => {
    const memory = new SqliteOutcomeMemory(':memory:');
    const closedAt = '2026-03-01T00:00:00Z';
    memory.recordClosedTrade({
      tradeId: 't1',
      decisionId: 'd1',
      assetPair: 'BTCUSD',
      realizedPnl: 10,
      closedAt,
      providers: ['alpha', 'beta'],
    });
    memory.recordClosedTrade({
      tradeId: 't2',
      decisionId: 'd2',
      assetPair: 'ETHUSD',
      realizedPnl: -5,
      closedAt,
      providers: ['alpha'],
    });

    const weights = memory.recordClosedTrade({
      tradeId: 't3',
      decisionId: 'd3',
      assetPair: 'SOLUSD',
      realizedPnl: null,
      closedAt,
      providers: ['gamma'],
    });

    // alpha 1/2, beta 1/1
    expect(weights?.alpha).toBeCloseTo(1 / 3, 10);
    expect(weights?.beta).toBeCloseTo(2 / 3, 10);
    expect(weights).not.toHaveProperty('gamma');
  });

  it('returns null when no closed trade has a known P&L', () => {
    const memory = new SqliteOutcomeMemory(':memory:');
    expect(
      memory.recordClosedTrade({
        tradeId: 't1',
        decisionId: 'd1',
        assetPair: 'BTCUSD',
        realizedPnl: null,
        closedAt: '2026-03-01T00:00:00Z',
        providers: ['alpha'],
      })
    ).toBeNull();
  });
});
