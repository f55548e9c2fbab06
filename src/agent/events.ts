import type { AgentState } from './state.js';
import type { CycleOutcome, RejectionReason, TradeAction } from './types.js';
import type { RiskTelemetry } from '../risk/gatekeeper.js';

export interface RecoveryReport {
  positionsFound: number;
  positionsKept: number;
  closed: string[];
  reservationsReleased: number;
  actionsTaken: number;
  degraded: boolean;
}

export type SkipReason =
  | 'hold'
  | 'signal_only'
  | 'low_confidence'
  | 'daily_trade_limit'
  | 'autonomy_disabled'
  | 'invalid_size';

/**
 * Lifecycle events emitted by the trading loop. Each payload carries enough to
 * be logged or persisted without re-deriving anything.
 */
export interface AgentLifecycleEvents {
  state_changed: (payload: { from: AgentState; to: AgentState; cycleId: string | null }) => void;
  recovery_complete: (payload: RecoveryReport) => void;
  recovery_failed: (payload: { error: string; report: RecoveryReport }) => void;
  data_freshness_failed: (payload: {
    cycleId: string;
    assetPair: string;
    collectedAt: string;
    ageSeconds: number | null;
    thresholdSeconds: number;
  }) => void;
  snapshot_unavailable: (payload: { cycleId: string; assetPair: string; reason: string }) => void;
  decision_unavailable: (payload: { cycleId: string; assetPair: string; reason: string }) => void;
  risk_rejected: (payload: {
    cycleId: string;
    assetPair: string;
    decisionId: string;
    action: TradeAction;
    reason: RejectionReason;
    message: string;
    telemetry: RiskTelemetry;
  }) => void;
  trade_skipped: (payload: {
    cycleId: string;
    assetPair: string;
    decisionId: string;
    action: TradeAction;
    reason: SkipReason;
  }) => void;
  trade_executed: (payload: {
    cycleId: string;
    assetPair: string;
    decisionId: string;
    action: TradeAction;
    tradeId: string;
    reservationId: string;
    size: number;
    averagePrice: number | null;
  }) => void;
  trade_failed: (payload: {
    cycleId: string;
    assetPair: string;
    decisionId: string;
    action: TradeAction;
    reservationId: string | null;
    reason: string;
    timedOut: boolean;
  }) => void;
  kill_switch_triggered: (payload: { unrealizedPnlPct: number; thresholdPct: number }) => void;
  invariant_violation: (payload: { cycleId: string | null; error: string }) => void;
  cycle_complete: (payload: CycleOutcome) => void;
  error: (error: Error) => void;
}
