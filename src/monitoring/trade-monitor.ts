import type { TradeMonitorPort, TradingVenue } from '../agent/ports.js';
import type { ClosedTrade } from '../agent/types.js';
import { Logger } from '../core/logger.js';

interface TrackedTrade {
  decisionId: string;
  assetPair: string;
  tradeId: string;
  providers: readonly string[];
  lastUnrealizedPnl: number | null;
  seenOpen: boolean;
}

function normalizePair(pair: string): string {
  return pair.trim().toUpperCase();
}

/**
 * Maps decisions to venue positions and reports trades whose position has
 * disappeared. Realized P&L is approximated by the last unrealized P&L seen
 * while the position was open.
 */
export class TradeMonitor implements TradeMonitorPort {
  private tracked = new Map<string, TrackedTrade>();
  private logger: Logger;
  private now: () => number;

  constructor(
    private venue: TradingVenue,
    options?: { logger?: Logger; now?: () => number }
  ) {
    this.logger = options?.logger ?? new Logger('info');
    this.now = options?.now ?? Date.now;
  }

  associateDecisionToTrade(params: {
    decisionId: string;
    assetPair: string;
    tradeId?: string;
    providers?: readonly string[];
  }): void {
    const assetPair = normalizePair(params.assetPair);
    const previous = this.tracked.get(assetPair);
    this.tracked.set(assetPair, {
      decisionId: params.decisionId,
      assetPair,
      tradeId: params.tradeId ?? params.decisionId,
      providers: params.providers ?? [],
      lastUnrealizedPnl: previous?.lastUnrealizedPnl ?? null,
      seenOpen: previous?.seenOpen ?? false,
    });
    this.logger.debug(`Tracking ${assetPair} for decision ${params.decisionId}`);
  }

  trackedPairs(): string[] {
    return [...this.tracked.keys()];
  }

  async collectClosedTrades(signal?: AbortSignal): Promise<ClosedTrade[]> {
    if (this.tracked.size === 0) return [];

    const positions = await this.venue.getPositions(signal);
    const open = new Map(positions.map((p) => [normalizePair(p.assetPair), p]));
    const closed: ClosedTrade[] = [];

    for (const [pair, trade] of this.tracked) {
      const position = open.get(pair);
      if (position) {
        trade.lastUnrealizedPnl = position.unrealizedPnl;
        trade.seenOpen = true;
        continue;
      }
      this.tracked.delete(pair);
      closed.push({
        tradeId: trade.tradeId,
        decisionId: trade.decisionId,
        assetPair: pair,
        realizedPnl: trade.seenOpen ? trade.lastUnrealizedPnl : null,
        closedAt: new Date(this.now()).toISOString(),
        providers: trade.providers,
      });
      this.logger.info(`Trade ${trade.tradeId} on ${pair} closed`);
    }

    return closed;
  }
}
