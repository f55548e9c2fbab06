/**
 * Value types shared by the loop stages.
 */

export type TradeAction = 'BUY' | 'SELL' | 'HOLD';

export type PositionSide = 'LONG' | 'SHORT';

export interface MarketSnapshot {
  readonly assetPair: string;
  readonly price: number;
  /** ISO-8601 timestamp of when the data was collected upstream. */
  readonly collectedAt: string;
  readonly volatility?: number;
  readonly trend?: 'up' | 'down' | 'flat';
  readonly rsi?: number;
  readonly sentimentScore?: number;
  /** Recent per-period fractional returns, oldest first. */
  readonly returns?: readonly number[];
}

export interface DecisionProvenance {
  readonly providers: readonly string[];
  readonly reasoning?: string;
}

export interface Decision {
  readonly id: string;
  readonly assetPair: string;
  readonly action: TradeAction;
  /** 0-1 */
  readonly confidence: number;
  /** Base units. */
  readonly recommendedPositionSize?: number;
  readonly stopLossFraction?: number;
  readonly provenance: DecisionProvenance;
  readonly createdAt: string;
}

export interface Position {
  readonly assetPair: string;
  readonly side: PositionSide;
  readonly size: number;
  readonly entryPrice: number;
  readonly currentPrice: number;
  readonly unrealizedPnl: number;
  readonly openedAt?: string;
  readonly leverage?: number;
}

export interface Balance {
  readonly equity: number;
  readonly freeMargin: number;
  readonly currency: string;
}

export type ReservationStatus = 'HELD' | 'COMMITTED' | 'RELEASED';

export type ReleaseReason = 'order_failed' | 'order_timeout' | 'stale_sweep' | 'recovered_orphan';

export interface ExposureReservation {
  readonly id: string;
  readonly assetPair: string;
  readonly decisionId: string;
  /** Notional in quote currency. */
  readonly amount: number;
  /** Epoch ms. */
  readonly createdAt: number;
  readonly status: ReservationStatus;
  readonly releaseReason: ReleaseReason | null;
  readonly settledAt: number | null;
}

export type RejectionReason =
  | 'cooldown_active'
  | 'stale_data'
  | 'correlation_limit'
  | 'var_limit'
  | 'margin_limit';

export interface RejectionRecord {
  readonly fingerprint: string;
  readonly timeBucket: number;
  readonly reason: RejectionReason;
  /** Epoch ms. */
  readonly expiresAt: number;
}

/**
 * Portfolio view handed to the gatekeeper. `returns` holds per-asset return
 * series (oldest first) used for correlation and VaR.
 */
export interface PortfolioSnapshot {
  readonly equity: number;
  readonly freeMargin: number;
  readonly positions: readonly Position[];
  readonly returns: Readonly<Record<string, readonly number[]>>;
  readonly reservedNotional: number;
}

export interface OrderRequest {
  readonly clientOrderId: string;
  readonly decisionId: string;
  readonly assetPair: string;
  readonly action: Exclude<TradeAction, 'HOLD'>;
  readonly size: number;
  readonly price: number;
  readonly stopLossFraction?: number;
}

export interface OrderResult {
  readonly status: 'filled' | 'rejected';
  readonly orderId: string | null;
  readonly filledSize: number;
  readonly averagePrice: number | null;
  readonly message?: string;
}

export interface ExecutionPlan {
  readonly size: number;
  readonly price: number;
  readonly notional: number;
}

export type ExecutionResult =
  | {
      status: 'FILLED';
      tradeId: string;
      reservationId: string;
      filledSize: number;
      averagePrice: number | null;
    }
  | {
      status: 'FAILED';
      reservationId: string;
      error: string;
      timedOut: boolean;
    };

export interface ClosedTrade {
  readonly tradeId: string;
  readonly decisionId: string;
  readonly assetPair: string;
  readonly realizedPnl: number | null;
  readonly closedAt: string;
  readonly providers: readonly string[];
}

export type CycleOutcomeKind =
  | 'filled'
  | 'failed'
  | 'rejected'
  | 'held'
  | 'signal_only'
  | 'skipped_policy'
  | 'stale_data'
  | 'snapshot_unavailable'
  | 'decision_unavailable'
  | 'kill_switch';

export interface CycleOutcome {
  readonly cycleId: string;
  readonly assetPair: string;
  readonly outcome: CycleOutcomeKind;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly decisionId?: string;
  readonly action?: TradeAction;
  readonly reason?: string;
  readonly tradeId?: string;
}

export type ProviderWeights = Record<string, number>;
