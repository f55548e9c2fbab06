import { randomUUID } from 'node:crypto';

import type { TradingVenue } from '../agent/ports.js';
import type { Balance, OrderRequest, OrderResult, Position, PositionSide } from '../agent/types.js';
import { Logger } from '../core/logger.js';

interface PaperPosition {
  assetPair: string;
  side: PositionSide;
  size: number;
  entryPrice: number;
  currentPrice: number;
  openedAt: string;
}

function abortIfNeeded(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Error('Request aborted');
  }
}

function pnlOf(position: PaperPosition, price = position.currentPrice): number {
  const delta = position.side === 'LONG' ? price - position.entryPrice : position.entryPrice - price;
  return delta * position.size;
}

/**
 * In-process venue for paper trading. Orders fill immediately at the request
 * price; one net position is kept per asset pair.
 */
export class PaperVenue implements TradingVenue {
  private positions = new Map<string, PaperPosition>();
  private realizedPnl = 0;
  private logger: Logger;
  private now: () => number;

  constructor(
    private options: { startingBalance: number; currency: string; maxLeverage?: number },
    deps?: { logger?: Logger; now?: () => number }
  ) {
    this.logger = deps?.logger ?? new Logger('info');
    this.now = deps?.now ?? Date.now;
  }

  /** Update the mark price used for unrealized P&L. */
  markPrice(assetPair: string, price: number): void {
    const position = this.positions.get(assetPair.toUpperCase());
    if (position && price > 0) {
      position.currentPrice = price;
    }
  }

  /** Seed a position directly, bypassing order flow. */
  seedPosition(position: Omit<Position, 'unrealizedPnl'>): void {
    this.positions.set(position.assetPair.toUpperCase(), {
      assetPair: position.assetPair.toUpperCase(),
      side: position.side,
      size: position.size,
      entryPrice: position.entryPrice,
      currentPrice: position.currentPrice,
      openedAt: position.openedAt ?? new Date(this.now()).toISOString(),
    });
  }

  async getPositions(signal?: AbortSignal): Promise<Position[]> {
    abortIfNeeded(signal);
    return [...this.positions.values()].map((p) => ({
      assetPair: p.assetPair,
      side: p.side,
      size: p.size,
      entryPrice: p.entryPrice,
      currentPrice: p.currentPrice,
      unrealizedPnl: pnlOf(p),
      openedAt: p.openedAt,
      leverage: 1,
    }));
  }

  async getBalance(signal?: AbortSignal): Promise<Balance> {
    abortIfNeeded(signal);
    const open = [...this.positions.values()];
    const unrealized = open.reduce((sum, p) => sum + pnlOf(p), 0);
    const equity = this.options.startingBalance + this.realizedPnl + unrealized;
    const leverage = Math.max(1, this.options.maxLeverage ?? 1);
    const usedMargin = open.reduce((sum, p) => sum + (p.size * p.currentPrice) / leverage, 0);
    return { equity, freeMargin: equity - usedMargin, currency: this.options.currency };
  }

  async submitOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderResult> {
    abortIfNeeded(signal);
    if (!(order.size > 0) || !(order.price > 0)) {
      return {
        status: 'rejected',
        orderId: null,
        filledSize: 0,
        averagePrice: null,
        message: 'Invalid order: size and price must be positive',
      };
    }

    const pair = order.assetPair.toUpperCase();
    const side: PositionSide = order.action === 'BUY' ? 'LONG' : 'SHORT';
    const existing = this.positions.get(pair);

    if (!existing) {
      this.positions.set(pair, {
        assetPair: pair,
        side,
        size: order.size,
        entryPrice: order.price,
        currentPrice: order.price,
        openedAt: new Date(this.now()).toISOString(),
      });
    } else if (existing.side === side) {
      const size = existing.size + order.size;
      existing.entryPrice = (existing.entryPrice * existing.size + order.price * order.size) / size;
      existing.size = size;
      existing.currentPrice = order.price;
    } else {
      const closing = Math.min(existing.size, order.size);
      this.realizedPnl += pnlOf({ ...existing, size: closing }, order.price);
      const remainder = order.size - closing;
      if (existing.size > closing) {
        existing.size -= closing;
        existing.currentPrice = order.price;
      } else if (remainder > 0) {
        this.positions.set(pair, {
          assetPair: pair,
          side,
          size: remainder,
          entryPrice: order.price,
          currentPrice: order.price,
          openedAt: new Date(this.now()).toISOString(),
        });
      } else {
        this.positions.delete(pair);
      }
    }

    const orderId = `paper-${randomUUID()}`;
    this.logger.info(`Paper ${order.action} ${order.size} ${pair} @ ${order.price} (${orderId})`);
    return { status: 'filled', orderId, filledSize: order.size, averagePrice: order.price };
  }

  async closePosition(position: Position, signal?: AbortSignal): Promise<OrderResult> {
    abortIfNeeded(signal);
    const pair = position.assetPair.toUpperCase();
    const existing = this.positions.get(pair);
    if (!existing) {
      return {
        status: 'rejected',
        orderId: null,
        filledSize: 0,
        averagePrice: null,
        message: `No open position for ${pair}`,
      };
    }
    this.realizedPnl += pnlOf(existing);
    this.positions.delete(pair);
    const orderId = `paper-close-${randomUUID()}`;
    this.logger.info(`Paper close ${existing.side} ${existing.size} ${pair} @ ${existing.currentPrice}`);
    return {
      status: 'filled',
      orderId,
      filledSize: existing.size,
      averagePrice: existing.currentPrice,
    };
  }

  async cancelOrder(_clientOrderId: string, signal?: AbortSignal): Promise<void> {
    // Paper orders fill synchronously; nothing is ever resting.
    abortIfNeeded(signal);
  }
}
