/**
 * Startup reconciliation against the live venue.
 *
 * Runs once before the first perception. Order of work:
 * 1. release reservations left HELD by a previous process
 * 2. fetch live positions (one retry)
 * 3. close positions beyond the concurrency limit, worst first
 * 4. associate surviving positions with synthetic decision ids
 */

import { createHash } from 'node:crypto';

import type { RecoveryReport } from '../agent/events.js';
import type { TradeMonitorPort, TradingVenue } from '../agent/ports.js';
import type { Position } from '../agent/types.js';
import { describeError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { retryWithPolicy, withTimeout, type RetryPolicy } from '../core/retry.js';
import type { ExposureLedger } from '../execution/ledger.js';

export interface RecoveryOptions {
  maxConcurrentTrades: number;
  timeoutMs: number;
  retryBackoffMs: number;
  reservationMaxAgeMs: number;
}

export type RecoveryResult =
  | { status: 'complete'; report: RecoveryReport; keptPositions: Position[] }
  | { status: 'failed'; error: string; report: RecoveryReport };

export function recoveredDecisionId(position: Position): string {
  const hash = createHash('sha256')
    .update(`${position.assetPair}_${position.side}_${position.size}_${position.entryPrice}`)
    .digest('hex')
    .slice(0, 8);
  return `RECOVERED_${position.assetPair}_${hash}`;
}

const openedAtMs = (position: Position): number => {
  if (!position.openedAt) return Number.NEGATIVE_INFINITY;
  const parsed = Date.parse(position.openedAt);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
};

/**
 * Close order for excess positions: worst unrealized P&L first, then oldest
 * (unknown age counts as oldest), then asset pair ascending.
 */
export function compareForClosing(a: Position, b: Position): number {
  if (a.unrealizedPnl !== b.unrealizedPnl) return a.unrealizedPnl - b.unrealizedPnl;
  const ageA = openedAtMs(a);
  const ageB = openedAtMs(b);
  if (ageA !== ageB) return ageA < ageB ? -1 : 1;
  if (a.assetPair === b.assetPair) return 0;
  return a.assetPair < b.assetPair ? -1 : 1;
}

export class RecoveryManager {
  private logger: Logger;
  private wait?: (ms: number) => Promise<void>;

  constructor(
    private deps: {
      venue: TradingVenue;
      ledger: ExposureLedger;
      tradeMonitor?: TradeMonitorPort;
      logger?: Logger;
      wait?: (ms: number) => Promise<void>;
    },
    private options: RecoveryOptions
  ) {
    this.logger = deps.logger ?? new Logger('info');
    this.wait = deps.wait;
  }

  /**
   * Never throws: anything that prevents a safe state, including a failing
   * reservation journal or trade monitor, comes back as `failed`.
   */
  async recover(): Promise<RecoveryResult> {
    const report: RecoveryReport = {
      positionsFound: 0,
      positionsKept: 0,
      closed: [],
      reservationsReleased: 0,
      actionsTaken: 0,
      degraded: false,
    };
    try {
      return await this.reconcile(report);
    } catch (error) {
      const message = `Recovery aborted: ${describeError(error)}`;
      this.logger.error(message, error);
      return { status: 'failed', error: message, report };
    }
  }

  private async reconcile(report: RecoveryReport): Promise<RecoveryResult> {
    const released =
      this.deps.ledger.releaseOrphans().length +
      this.deps.ledger.sweepStale(this.options.reservationMaxAgeMs).length;
    report.reservationsReleased = released;
    report.actionsTaken = released;

    const policy: RetryPolicy = {
      maxAttempts: 2,
      backoffMs: [this.options.retryBackoffMs],
      timeoutMs: this.options.timeoutMs,
    };

    let positions: Position[] = [];
    try {
      positions = await retryWithPolicy(
        'getPositions',
        policy,
        (signal) => this.deps.venue.getPositions(signal),
        { logger: this.logger, wait: this.wait }
      );
    } catch (error) {
      report.degraded = true;
      this.logger.error('Position recovery degraded: continuing with an empty portfolio', error);
    }
    report.positionsFound = positions.length;
    report.positionsKept = positions.length;

    if (positions.length === 0) {
      this.logger.info('Recovery complete: no open positions');
      return { status: 'complete', report, keptPositions: [] };
    }

    const excess = positions.length - this.options.maxConcurrentTrades;
    const ranked = [...positions].sort(compareForClosing);
    const toClose = excess > 0 ? ranked.slice(0, excess) : [];
    const kept = excess > 0 ? ranked.slice(excess) : ranked;

    for (const position of toClose) {
      this.logger.warn(
        `Closing excess position ${position.assetPair} (${position.side}, PnL ${position.unrealizedPnl.toFixed(2)})`
      );
      try {
        const result = await withTimeout(
          `closePosition ${position.assetPair}`,
          this.options.timeoutMs,
          (signal) => this.deps.venue.closePosition(position, signal)
        );
        if (result.status !== 'filled') {
          throw new Error(result.message ?? `close ${result.status}`);
        }
      } catch (error) {
        const message = `Failed to close excess position ${position.assetPair}: ${describeError(error)}`;
        this.logger.error(message);
        return {
          status: 'failed',
          error: message,
          report: { ...report, positionsKept: positions.length - report.closed.length },
        };
      }
      report.closed.push(position.assetPair);
      report.actionsTaken += 1;
    }

    for (const position of kept) {
      const decisionId = recoveredDecisionId(position);
      this.deps.tradeMonitor?.associateDecisionToTrade({
        decisionId,
        assetPair: position.assetPair,
        providers: ['recovery'],
      });
      this.logger.info(`Recovered position ${position.assetPair} as ${decisionId}`);
    }
    report.positionsKept = kept.length;

    this.logger.info(
      `Recovery complete: ${report.positionsFound} found, ${report.positionsKept} kept, ${report.closed.length} closed`
    );
    return { status: 'complete', report, keptPositions: kept };
  }
}
