/**
 * Capability ports the agent depends on. Collaborators are built by the process
 * entry point and injected; none of them holds a reference back to the agent.
 */

import type {
  Balance,
  ClosedTrade,
  CycleOutcome,
  Decision,
  ExposureReservation,
  MarketSnapshot,
  OrderRequest,
  OrderResult,
  Position,
  ProviderWeights,
} from './types.js';

export interface MarketDataSource {
  fetchSnapshot(assetPair: string, signal?: AbortSignal): Promise<MarketSnapshot>;
  fetchReturnSeries?(
    assetPairs: string[],
    signal?: AbortSignal
  ): Promise<Record<string, number[]>>;
}

export interface PortfolioContext {
  readonly equity: number | null;
  readonly positions: readonly Position[];
  readonly providerWeights: Readonly<ProviderWeights>;
  readonly signalOnly: boolean;
}

export interface DecisionProvider {
  /** Resolves `null` when no provider could produce a decision. */
  proposeDecision(
    snapshot: MarketSnapshot,
    portfolio: PortfolioContext,
    signal?: AbortSignal
  ): Promise<Decision | null>;
}

export interface TradingVenue {
  getPositions(signal?: AbortSignal): Promise<Position[]>;
  getBalance(signal?: AbortSignal): Promise<Balance>;
  submitOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderResult>;
  closePosition(position: Position, signal?: AbortSignal): Promise<OrderResult>;
  cancelOrder?(clientOrderId: string, signal?: AbortSignal): Promise<void>;
  /** Venues that cannot price positions themselves take the latest fresh snapshot price. */
  markPrice?(assetPair: string, price: number): void;
}

export interface TradeMonitorPort {
  associateDecisionToTrade(params: {
    decisionId: string;
    assetPair: string;
    tradeId?: string;
    providers?: readonly string[];
  }): void;
  /** Returns trades that closed since the previous call. */
  collectClosedTrades(signal?: AbortSignal): Promise<ClosedTrade[]>;
}

export interface OutcomeMemory {
  recordCycleOutcome(outcome: CycleOutcome): void;
  /** May return refreshed provider weights for the adaptive context. */
  recordClosedTrade(trade: ClosedTrade): ProviderWeights | null;
}

export interface ReservationJournal {
  record(reservation: ExposureReservation): void;
  listHeld(): ExposureReservation[];
}

export interface PersistedAgentContext {
  dailyTradeCount: number;
  tradeDate: string;
  cursor: number;
  providerWeights: ProviderWeights;
  analysisFailures: Record<string, { count: number; lastFailureAt: number }>;
}

export interface ContextStore {
  load(agentId: string): PersistedAgentContext | null;
  save(agentId: string, context: PersistedAgentContext): void;
}
