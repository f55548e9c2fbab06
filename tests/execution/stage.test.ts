import { beforeEach, describe, expect, it, vi } from 'vitest';

import { AgentContext } from '../../src/agent/context.js';
import type { TradeMonitorPort, TradingVenue } from '../../src/agent/ports.js';
import type { Decision, OrderRequest, OrderResult } from '../../src/agent/types.js';
import { InvariantViolationError, ReservationConflictError } from '../../src/core/errors.js';
import { Logger } from '../../src/core/logger.js';
import { ExposureLedger } from '../../src/execution/ledger.js';
import { ExecutionStage } from '../../src/execution/stage.js';

const quiet = new Logger('error');
const plan = { size: 2, price: 100, notional: 200 };

function decision(overrides: Partial<Decision> = {}): Decision {
  return {
    id: 'dec-1',
    assetPair: 'BTCUSD',
    action: 'BUY',
    confidence: 0.9,
    provenance: { providers: ['alpha', 'beta'] },
    createdAt: '2026-03-01T00:00:00Z',
    ...overrides,
  };
}

function venueWith(submitOrder: TradingVenue['submitOrder'], cancelOrder?: TradingVenue['cancelOrder']) {
  const venue: TradingVenue = {
    getPositions: vi.fn(async () => []),
    getBalance: vi.fn(async () => ({ equity: 0, freeMargin: 0, currency: 'USD' })),
    submitOrder: vi.fn(submitOrder),
    closePosition: vi.fn(),
    cancelOrder: cancelOrder ? vi.fn(cancelOrder) : undefined,
  };
  return venue;
}

describe('ExecutionStage', () => {
  let ledger: ExposureLedger;
  let context: AgentContext;
  let tradeMonitor: TradeMonitorPort;

  beforeEach(() => {
    ledger = new ExposureLedger({ logger: quiet });
    context = new AgentContext();
    tradeMonitor = { associateDecisionToTrade: vi.fn(), collectClosedTrades: vi.fn(async () => []) };
  });

  const stage = (venue: TradingVenue, orderTimeoutMs = 1000) =>
    new ExecutionStage(
      { ledger, venue, context, tradeMonitor, logger: quiet },
      { orderTimeoutMs, cancelTimeoutMs: 50 }
    );

  it('commits the reservation and records the trade on a fill', async () => {
    const venue = venueWith(async (order: OrderRequest): Promise<OrderResult> => ({
      status: 'filled',
      orderId: 'venue-7',
      filledSize: order.size,
      averagePrice: order.price,
    }));

    const result = await stage(venue).execute(decision(), plan);

    expect(result).toMatchObject({ status: 'FILLED', tradeId: 'venue-7', filledSize: 2, averagePrice: 100 });
    expect(ledger.get(result.reservationId)?.status).toBe('COMMITTED');
    expect(context.dailyTradeCount).toBe(1);
    expect(tradeMonitor.associateDecisionToTrade).toHaveBeenCalledWith({
      decisionId: 'dec-1',
      assetPair: 'BTCUSD',
      tradeId: 'venue-7',
      providers: ['alpha', 'beta'],
    });

    const [order] = vi.mocked(venue.submitOrder).mock.calls[0] ?? [];
    expect(order?.clientOrderId).toBe(`dec-1-${result.reservationId.slice(0, 8)}`);
    expect(order?.action).toBe('BUY');
  });

  it('falls back to the client order id when the venue returns none', async () => {
    const venue = venueWith(async (order) => ({
      status: 'filled',
      orderId: null,
      filledSize: order.size,
      averagePrice: null,
    }));
    const result = await stage(venue).execute(decision(), plan);
    expect(result.status).toBe('FILLED');
    if (result.status === 'FILLED') {
      expect(result.tradeId).toBe(`dec-1-${result.reservationId.slice(0, 8)}`);
    }
  });

  it('releases the reservation on a venue rejection', async () => {
    const venue = venueWith(async () => ({
      status: 'rejected',
      orderId: null,
      filledSize: 0,
      averagePrice: null,
      message: 'insufficient funds',
    }));

    const result = await stage(venue).execute(decision(), plan);

    expect(result).toEqual({
      status: 'FAILED',
      reservationId: result.reservationId,
      error: 'insufficient funds',
      timedOut: false,
    });
    expect(ledger.get(result.reservationId)?.releaseReason).toBe('order_failed');
    expect(ledger.listHeld()).toEqual([]);
    expect(context.dailyTradeCount).toBe(0);
    expect(tradeMonitor.associateDecisionToTrade).not.toHaveBeenCalled();
  });

  it('releases the reservation when the venue throws', async () => {
    const venue = venueWith(async () => {
      throw new Error('connection reset');
    });
    const result = await stage(venue).execute(decision(), plan);
    expect(result).toMatchObject({ status: 'FAILED', error: 'connection reset', timedOut: false });
    expect(ledger.get(result.reservationId)?.releaseReason).toBe('order_failed');
  });

  it('aborts, cancels and releases a timed-out order', async () => {
    const seen: { signal?: AbortSignal } = {};
    const venue = venueWith(
      (_order, signal) => {
        seen.signal = signal;
        return new Promise<OrderResult>(() => undefined);
      },
      async () => undefined
    );

    const result = await stage(venue, 20).execute(decision({ action: 'SELL' }), plan);

    expect(result).toMatchObject({
      status: 'FAILED',
      error: 'submitOrder BTCUSD timed out after 20ms',
      timedOut: true,
    });
    expect(seen.signal?.aborted).toBe(true);
    expect(venue.cancelOrder).toHaveBeenCalledWith(`dec-1-${result.reservationId.slice(0, 8)}`, expect.anything());
    expect(ledger.get(result.reservationId)?.status).toBe('RELEASED');
    expect(ledger.get(result.reservationId)?.releaseReason).toBe('order_timeout');
  });

  it('still releases when the cancel after a timeout fails', async () => {
    const venue = venueWith(
      () => new Promise<OrderResult>(() => undefined),
      async () => {
        throw new Error('cancel rejected');
      }
    );
    const result = await stage(venue, 20).execute(decision(), plan);
    expect(result.status).toBe('FAILED');
    expect(ledger.get(result.reservationId)?.releaseReason).toBe('order_timeout');
  });

  it('refuses a HOLD decision', async () => {
    const venue = venueWith(vi.fn());
    await expect(stage(venue).execute(decision({ action: 'HOLD' }), plan)).rejects.toBeInstanceOf(
      InvariantViolationError
    );
    expect(venue.submitOrder).not.toHaveBeenCalled();
  });

  it('propagates a reservation conflict without submitting', async () => {
    ledger.reserve({ assetPair: 'BTCUSD', decisionId: 'other', amount: 10 });
    const venue = venueWith(vi.fn());
    await expect(stage(venue).execute(decision(), plan)).rejects.toBeInstanceOf(ReservationConflictError);
    expect(venue.submitOrder).not.toHaveBeenCalled();
  });
});
