import { describe, expect, it, vi } from 'vitest';

import type { TradingVenue } from '../../src/agent/ports.js';
import type { Position } from '../../src/agent/types.js';
import { Logger } from '../../src/core/logger.js';
import { TradeMonitor } from '../../src/monitoring/trade-monitor.js';

const NOW = Date.parse('2026-03-01T08:00:00Z');

function open(assetPair: string, unrealizedPnl: number): Position {
  return { assetPair, side: 'LONG', size: 1, entryPrice: 100, currentPrice: 100, unrealizedPnl };
}

function setup(snapshots: Position[][]) {
  let call = 0;
  const venue: TradingVenue = {
    getPositions: vi.fn(async () => snapshots[Math.min(call++, snapshots.length - 1)] ?? []),
    getBalance: vi.fn(),
    submitOrder: vi.fn(),
    closePosition: vi.fn(),
  };
  const monitor = new TradeMonitor(venue, { logger: new Logger('error'), now: () => NOW });
  return { venue, monitor };
}

describe('TradeMonitor', () => {
  it('does not query the venue when nothing is tracked', async () => {
    const { venue, monitor } = setup([[]]);
    expect(await monitor.collectClosedTrades()).toEqual([]);
    expect(venue.getPositions).not.toHaveBeenCalled();
  });

  it('reports a trade once its position disappears, with the last seen P&L', async () => {
    const { monitor } = setup([[open('BTCUSD', 12.5)], []]);
    monitor.associateDecisionToTrade({
      decisionId: 'd1',
      assetPair: 'btcusd',
      tradeId: 't1',
      providers: ['alpha'],
    });

    expect(await monitor.collectClosedTrades()).toEqual([]);
    expect(await monitor.collectClosedTrades()).toEqual([
      {
        tradeId: 't1',
        decisionId: 'd1',
        assetPair: 'BTCUSD',
        realizedPnl: 12.5,
        closedAt: '2026-03-01T08:00:00.000Z',
        providers: ['alpha'],
      },
    ]);
    expect(monitor.trackedPairs()).toEqual([]);
  });

  it('reports unknown P&L for a position never seen open', async () => {
    const { monitor } = setup([[]]);
    monitor.associateDecisionToTrade({ decisionId: 'd2', assetPair: 'ETHUSD' });

    const [closed] = await monitor.collectClosedTrades();
    expect(closed?.tradeId).toBe('d2');
    expect(closed?.realizedPnl).toBeNull();
    expect(closed?.providers).toEqual([]);
  });

  it('keeps the observed P&L when a pair is re-associated', async () => {
    const { monitor } = setup([[open('SOLUSD', -4)], []]);
    monitor.associateDecisionToTrade({ decisionId: 'd1', assetPair: 'SOLUSD' });
    await monitor.collectClosedTrades();
    monitor.associateDecisionToTrade({ decisionId: 'd3', assetPair: 'SOLUSD', tradeId: 't3' });

    const [closed] = await monitor.collectClosedTrades();
    expect(closed).toMatchObject({ decisionId: 'd3', tradeId: 't3', realizedPnl: -4 });
  });
});
