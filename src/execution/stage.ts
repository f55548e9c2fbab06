/**
 * Execution stage: reserve, submit, then commit or roll back.
 *
 * Every path out of `execute` leaves the reservation it created COMMITTED or
 * RELEASED. A reservation conflict is not caught here; it is an invariant
 * violation and propagates to the loop.
 */

import type { AgentContext } from '../agent/context.js';
import type { TradeMonitorPort, TradingVenue } from '../agent/ports.js';
import type {
  Decision,
  ExecutionPlan,
  ExecutionResult,
  OrderRequest,
  OrderResult,
} from '../agent/types.js';
import { CollaboratorTimeoutError, InvariantViolationError, describeError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { withTimeout } from '../core/retry.js';
import type { ExposureLedger } from './ledger.js';

export interface ExecutionStageOptions {
  orderTimeoutMs: number;
  cancelTimeoutMs: number;
}

export class ExecutionStage {
  private logger: Logger;

  constructor(
    private deps: {
      ledger: ExposureLedger;
      venue: TradingVenue;
      context: AgentContext;
      tradeMonitor?: TradeMonitorPort;
      logger?: Logger;
    },
    private options: ExecutionStageOptions
  ) {
    this.logger = deps.logger ?? new Logger('info');
  }

  async execute(decision: Decision, plan: ExecutionPlan): Promise<ExecutionResult> {
    if (decision.action === 'HOLD') {
      throw new InvariantViolationError(`HOLD decision ${decision.id} reached execution`);
    }

    const reservation = this.deps.ledger.reserve({
      assetPair: decision.assetPair,
      decisionId: decision.id,
      amount: plan.notional,
    });

    const order: OrderRequest = {
      clientOrderId: `${decision.id}-${reservation.id.slice(0, 8)}`,
      decisionId: decision.id,
      assetPair: reservation.assetPair,
      action: decision.action,
      size: plan.size,
      price: plan.price,
      stopLossFraction: decision.stopLossFraction,
    };

    let result: OrderResult;
    try {
      result = await withTimeout(`submitOrder ${order.assetPair}`, this.options.orderTimeoutMs, (signal) =>
        this.deps.venue.submitOrder(order, signal)
      );
    } catch (error) {
      const timedOut = error instanceof CollaboratorTimeoutError;
      if (timedOut) {
        await this.cancelAfterTimeout(order.clientOrderId);
      }
      this.deps.ledger.release(reservation.id, timedOut ? 'order_timeout' : 'order_failed');
      this.logger.error(`Order ${order.clientOrderId} failed`, error);
      return {
        status: 'FAILED',
        reservationId: reservation.id,
        error: describeError(error),
        timedOut,
      };
    }

    if (result.status !== 'filled' || !(result.filledSize > 0)) {
      this.deps.ledger.release(reservation.id, 'order_failed');
      const message = result.message ?? `order ${result.status}`;
      this.logger.warn(`Order ${order.clientOrderId} not filled: ${message}`);
      return { status: 'FAILED', reservationId: reservation.id, error: message, timedOut: false };
    }

    this.deps.ledger.commit(reservation.id);
    const tradeId = result.orderId ?? order.clientOrderId;
    this.deps.tradeMonitor?.associateDecisionToTrade({
      decisionId: decision.id,
      assetPair: reservation.assetPair,
      tradeId,
      providers: decision.provenance.providers,
    });
    this.deps.context.recordTrade();
    this.logger.info(
      `Filled ${decision.action} ${result.filledSize} ${reservation.assetPair} @ ${result.averagePrice ?? 'n/a'} (trade ${tradeId})`
    );

    return {
      status: 'FILLED',
      tradeId,
      reservationId: reservation.id,
      filledSize: result.filledSize,
      averagePrice: result.averagePrice,
    };
  }

  /**
   * A late fill after this point is picked up by the trade monitor or by the
   * next recovery, never by this reservation.
   */
  private async cancelAfterTimeout(clientOrderId: string): Promise<void> {
    const cancel = this.deps.venue.cancelOrder?.bind(this.deps.venue);
    if (!cancel) return;
    try {
      await withTimeout(`cancelOrder ${clientOrderId}`, this.options.cancelTimeoutMs, (signal) =>
        cancel(clientOrderId, signal)
      );
    } catch (error) {
      this.logger.warn(`Cancel of timed-out order ${clientOrderId} failed: ${describeError(error)}`);
    }
  }
}
