/**
 * Trading Loop Agent
 *
 * Drives the observe, decide, act, learn cycle as an explicit state machine.
 * Each `tick()` performs the work of the current state and applies exactly one
 * transition; `runCycle()` ticks until the agent is back in IDLE. Both go
 * through a serial queue so that only one cycle is ever in flight.
 */

import { randomUUID } from 'node:crypto';

import { EventEmitter } from 'eventemitter3';

import type { TradeLoopConfig } from '../core/config.js';
import {
  InvariantViolationError,
  describeError,
  isInvariantViolation,
  toError,
} from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { SerialQueue } from '../core/queue.js';
import { withTimeout } from '../core/retry.js';
import { ExposureLedger } from '../execution/ledger.js';
import { ExecutionStage } from '../execution/stage.js';
import { TradeMonitor } from '../monitoring/trade-monitor.js';
import { RecoveryManager } from '../recovery/manager.js';
import { checkSnapshotFreshness } from '../risk/freshness.js';
import { RiskGatekeeper } from '../risk/gatekeeper.js';
import { RejectionCache } from '../risk/rejection-cache.js';
import { planPosition } from '../risk/sizing.js';
import { AgentContext } from './context.js';
import type { AgentLifecycleEvents, SkipReason } from './events.js';
import type {
  ContextStore,
  DecisionProvider,
  MarketDataSource,
  OutcomeMemory,
  PortfolioContext,
  ReservationJournal,
  TradeMonitorPort,
  TradingVenue,
} from './ports.js';
import { isTradingState, nextState, type AgentEventType, type AgentState } from './state.js';
import type {
  Balance,
  CycleOutcome,
  CycleOutcomeKind,
  Decision,
  ExecutionPlan,
  MarketSnapshot,
  Position,
} from './types.js';

export interface TradingLoopAgentDeps {
  marketData: MarketDataSource;
  decisionProvider: DecisionProvider;
  venue: TradingVenue;
  tradeMonitor?: TradeMonitorPort;
  outcomeMemory?: OutcomeMemory;
  contextStore?: ContextStore;
  reservationJournal?: ReservationJournal;
  logger?: Logger;
  now?: () => number;
  /** Delay used between recovery retries. */
  wait?: (ms: number) => Promise<void>;
}

interface CycleState {
  cycleId: string;
  assetPair: string;
  startedAt: string;
  snapshot: MarketSnapshot | null;
  balance: Balance | null;
  positions: Position[];
  returns: Record<string, number[]>;
  decision: Decision | null;
  plan: ExecutionPlan | null;
  outcome: CycleOutcomeKind | null;
  reason?: string;
  tradeId?: string;
}

/** Event applied when a stage has to be abandoned. */
const FALLBACK_EVENTS: Partial<Record<AgentState, AgentEventType>> = {
  PERCEPTION: 'snapshot_unusable',
  REASONING: 'decision_unavailable',
  RISK_CHECK: 'execution_skipped',
  EXECUTION: 'execution_finished',
  LEARNING: 'learning_finished',
};

export class TradingLoopAgent extends EventEmitter<AgentLifecycleEvents> {
  readonly agentId: string;
  readonly ledger: ExposureLedger;
  readonly cooldowns: RejectionCache;

  private currentState: AgentState = 'RECOVERING';
  private context: AgentContext;
  private cycle: CycleState | null = null;
  private halted = false;
  private haltReason: string | null = null;
  private running = false;
  private timer: NodeJS.Timeout | null = null;

  private queue = new SerialQueue(1);
  private logger: Logger;
  private now: () => number;
  private tradeMonitor: TradeMonitorPort;
  private gatekeeper: RiskGatekeeper;
  private executionStage: ExecutionStage;
  private recovery: RecoveryManager;

  constructor(
    private config: TradeLoopConfig,
    private deps: TradingLoopAgentDeps,
    options?: { agentId?: string }
  ) {
    super();
    this.agentId = options?.agentId ?? 'default';
    this.logger = deps.logger ?? new Logger(config.logging.level);
    this.now = deps.now ?? Date.now;
    this.context = new AgentContext(this.now);
    this.tradeMonitor =
      deps.tradeMonitor ?? new TradeMonitor(deps.venue, { logger: this.logger.child('monitor'), now: this.now });

    this.ledger = new ExposureLedger({
      logger: this.logger.child('ledger'),
      now: this.now,
      journal: deps.reservationJournal ?? null,
    });
    this.cooldowns = new RejectionCache(config.risk.cooldownSeconds * 1000, this.now);
    this.gatekeeper = new RiskGatekeeper(config.risk, this.cooldowns, {
      logger: this.logger.child('risk'),
      now: this.now,
    });
    this.executionStage = new ExecutionStage(
      {
        ledger: this.ledger,
        venue: deps.venue,
        context: this.context,
        tradeMonitor: this.tradeMonitor,
        logger: this.logger.child('execution'),
      },
      {
        orderTimeoutMs: config.execution.orderTimeoutMs,
        cancelTimeoutMs: config.execution.cancelTimeoutMs,
      }
    );
    this.recovery = new RecoveryManager(
      {
        venue: deps.venue,
        ledger: this.ledger,
        tradeMonitor: this.tradeMonitor,
        logger: this.logger.child('recovery'),
        wait: deps.wait,
      },
      {
        maxConcurrentTrades: config.risk.maxConcurrentTrades,
        timeoutMs: config.recovery.timeoutMs,
        retryBackoffMs: config.recovery.retryBackoffMs,
        reservationMaxAgeMs: config.execution.reservationMaxAgeSeconds * 1000,
      }
    );
  }

  get state(): AgentState {
    return this.currentState;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get haltedBecause(): string | null {
    return this.haltReason;
  }

  getContext(): AgentContext {
    return this.context;
  }

  /**
   * Recover, run the first cycle, then keep cycling every
   * `agent.analysisFrequencySeconds` until stopped or halted.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const persisted = this.deps.contextStore?.load(this.agentId);
    if (persisted) {
      this.context.hydrate(persisted);
      this.logger.info(
        `Restored agent context: ${this.context.dailyTradeCount} trade(s) on ${this.context.tradeDate}`
      );
    }
    this.logger.info(
      `Trading loop starting for ${this.config.agent.assetPairs.join(', ')} every ${this.config.agent.analysisFrequencySeconds}s`
    );
    try {
      await this.runCycle();
    } catch (error) {
      this.halt(`cycle failed: ${describeError(error)}`);
      throw error;
    }
    this.scheduleNext();
  }

  /**
   * Stop scheduling and wait for the running cycle to finish.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.clearTimer();
    await this.queue.drain();
    this.persistContext();
    this.logger.info('Trading loop stopped');
  }

  tick(): Promise<AgentState> {
    return this.queue.enqueue(() => this.step());
  }

  runCycle(): Promise<AgentState> {
    return this.queue.enqueue(async () => {
      if (this.halted) return this.currentState;
      await this.step();
      while (this.currentState !== 'IDLE' && !this.halted) {
        await this.step();
      }
      return this.currentState;
    });
  }

  private scheduleNext(): void {
    if (!this.running || this.halted) return;
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runCycle()
        .catch((error) => {
          this.logger.error('Trading cycle failed', error);
          this.emit('error', toError(error));
          if (isInvariantViolation(error)) {
            this.stop().catch((stopError) => this.logger.error('Failed to stop agent', stopError));
          }
        })
        .finally(() => this.scheduleNext());
    }, Math.max(1, this.config.agent.analysisFrequencySeconds) * 1000);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private halt(reason: string): void {
    if (!this.halted) {
      this.logger.error(`Agent halted: ${reason}`);
    }
    this.halted = true;
    this.haltReason = reason;
    this.running = false;
    this.clearTimer();
  }

  private async step(): Promise<AgentState> {
    if (this.halted) {
      this.logger.warn(`Agent is halted (${this.haltReason ?? 'unknown'}); tick ignored`);
      return this.currentState;
    }

    try {
      const event = await this.runStage();
      if (event) {
        this.transition(event);
      }
    } catch (error) {
      const failedIn = this.currentState;
      const cycleId = this.cycle?.cycleId ?? null;
      const message = describeError(error);
      const violation = isInvariantViolation(error);
      try {
        this.abandonCycle(violation ? `invariant_violation: ${message}` : `error: ${message}`);
      } catch (unwindError) {
        this.logger.error(`Failed to unwind cycle from ${this.currentState}`, unwindError);
      }
      if (violation) {
        this.emit('invariant_violation', { cycleId, error: message });
        this.logger.error('Invariant violation', error);
        this.halt(`invariant violation: ${message}`);
      } else if (this.currentState !== 'IDLE') {
        this.halt(`cycle stuck in ${this.currentState}: ${message}`);
      } else {
        this.logger.error(`Cycle failed in ${failedIn}`, error);
      }
      throw error;
    }
    return this.currentState;
  }

  private async runStage(): Promise<AgentEventType | null> {
    switch (this.currentState) {
      case 'RECOVERING':
        return this.handleRecovering();
      case 'IDLE':
        this.beginCycle();
        return 'cycle_started';
      case 'PERCEPTION':
        return this.handlePerception(this.requireCycle());
      case 'REASONING':
        return this.handleReasoning(this.requireCycle());
      case 'RISK_CHECK':
        return this.handleRiskCheck(this.requireCycle());
      case 'EXECUTION':
        return this.handleExecution(this.requireCycle());
      case 'LEARNING':
        return this.handleLearning(this.requireCycle());
      default:
        return null;
    }
  }

  private transition(event: AgentEventType): void {
    const from = this.currentState;
    const to = nextState(from, { type: event });
    if (this.halted && isTradingState(to)) {
      throw new InvariantViolationError(`Halted agent cannot enter ${to}`);
    }
    this.currentState = to;
    this.emit('state_changed', { from, to, cycleId: this.cycle?.cycleId ?? null });
    this.logger.debug(`${from} -> ${to} (${event})`);
    if (to === 'IDLE' && this.cycle) {
      this.completeCycle(this.cycle);
    }
  }

  /**
   * Walk the fallback transitions until the cycle is back in IDLE. An outcome
   * already set (a fill, for one) is kept.
   */
  private abandonCycle(reason: string): void {
    const cycle = this.cycle;
    if (cycle && !cycle.outcome) {
      cycle.outcome = 'failed';
      cycle.reason = reason;
    }
    let fallback = FALLBACK_EVENTS[this.currentState];
    while (fallback) {
      this.transition(fallback);
      fallback = FALLBACK_EVENTS[this.currentState];
    }
  }

  private requireCycle(): CycleState {
    if (!this.cycle) {
      this.beginCycle();
    }
    if (!this.cycle) {
      throw new Error('No active cycle');
    }
    return this.cycle;
  }

  private beginCycle(): void {
    this.cycle = {
      cycleId: randomUUID(),
      assetPair: this.context.nextAssetPair(this.config.agent.assetPairs),
      startedAt: new Date(this.now()).toISOString(),
      snapshot: null,
      balance: null,
      positions: [],
      returns: {},
      decision: null,
      plan: null,
      outcome: null,
    };
  }

  private completeCycle(cycle: CycleState): void {
    const outcome: CycleOutcome = {
      cycleId: cycle.cycleId,
      assetPair: cycle.assetPair,
      outcome: cycle.outcome ?? 'failed',
      startedAt: cycle.startedAt,
      finishedAt: new Date(this.now()).toISOString(),
      ...(cycle.decision ? { decisionId: cycle.decision.id, action: cycle.decision.action } : {}),
      ...(cycle.reason ? { reason: cycle.reason } : {}),
      ...(cycle.tradeId ? { tradeId: cycle.tradeId } : {}),
    };
    this.cycle = null;

    try {
      this.deps.outcomeMemory?.recordCycleOutcome(outcome);
    } catch (error) {
      this.logger.error('Failed to record cycle outcome', error);
      this.emit('error', toError(error));
    }
    this.persistContext();
    this.emit('cycle_complete', outcome);
  }

  private persistContext(): void {
    try {
      this.deps.contextStore?.save(this.agentId, this.context.snapshot());
    } catch (error) {
      this.logger.error('Failed to persist agent context', error);
      this.emit('error', toError(error));
    }
  }

  private async handleRecovering(): Promise<AgentEventType | null> {
    const result = await this.recovery.recover();
    if (result.status === 'failed') {
      this.emit('recovery_failed', { error: result.error, report: result.report });
      this.halt(`recovery failed: ${result.error}`);
      return null;
    }
    this.emit('recovery_complete', result.report);
    this.beginCycle();
    return 'recovery_finished';
  }

  private async handlePerception(cycle: CycleState): Promise<AgentEventType> {
    const agentCfg = this.config.agent;
    if (this.context.rollDate()) {
      this.logger.info(`New trading day ${this.context.tradeDate}: daily counters reset`);
    }

    if (
      this.context.isSuppressed(
        cycle.assetPair,
        agentCfg.maxAnalysisFailures,
        agentCfg.failureDecaySeconds * 1000
      )
    ) {
      cycle.outcome = 'skipped_policy';
      cycle.reason = 'analysis_suppressed';
      this.logger.warn(
        `Skipping ${cycle.assetPair}: ${this.context.analysisFailureCount(cycle.assetPair)} consecutive analysis failures`
      );
      return 'snapshot_unusable';
    }

    let snapshot: MarketSnapshot;
    try {
      const fetched = await withTimeout(
        `fetchSnapshot ${cycle.assetPair}`,
        this.config.timeouts.snapshotMs,
        (signal) => this.deps.marketData.fetchSnapshot(cycle.assetPair, signal)
      );
      snapshot = Object.freeze({ ...fetched });
    } catch (error) {
      const reason = describeError(error);
      cycle.outcome = 'snapshot_unavailable';
      cycle.reason = reason;
      this.logger.warn(`Market snapshot unavailable for ${cycle.assetPair}: ${reason}`);
      this.emit('snapshot_unavailable', { cycleId: cycle.cycleId, assetPair: cycle.assetPair, reason });
      return 'snapshot_unusable';
    }

    const freshness = checkSnapshotFreshness(snapshot, {
      stalenessSeconds: this.config.risk.stalenessSeconds,
      maxClockSkewSeconds: this.config.risk.maxClockSkewSeconds,
      nowMs: this.now(),
    });
    if (!freshness.fresh) {
      cycle.outcome = 'stale_data';
      cycle.reason = freshness.message;
      this.logger.warn(`Stale market data for ${cycle.assetPair}: ${freshness.message}`);
      this.emit('data_freshness_failed', {
        cycleId: cycle.cycleId,
        assetPair: cycle.assetPair,
        collectedAt: snapshot.collectedAt,
        ageSeconds: freshness.ageSeconds,
        thresholdSeconds: this.config.risk.stalenessSeconds,
      });
      return 'snapshot_unusable';
    }
    cycle.snapshot = snapshot;
    this.deps.venue.markPrice?.(cycle.assetPair, snapshot.price);

    try {
      const venueMs = this.config.timeouts.venueMs;
      const [balance, positions] = await Promise.all([
        withTimeout('getBalance', venueMs, (signal) => this.deps.venue.getBalance(signal)),
        withTimeout('getPositions', venueMs, (signal) => this.deps.venue.getPositions(signal)),
      ]);
      cycle.balance = balance;
      cycle.positions = positions;
    } catch (error) {
      cycle.balance = null;
      cycle.positions = [];
      this.logger.warn(`Portfolio unavailable, continuing in signal-only mode: ${describeError(error)}`);
    }

    cycle.returns = await this.loadReturns(cycle, snapshot);

    const killSwitch = agentCfg.killSwitchLossPct;
    if (killSwitch > 0 && cycle.balance && cycle.balance.equity > 0) {
      const unrealized = cycle.positions.reduce((sum, p) => sum + p.unrealizedPnl, 0);
      const pnlPct = unrealized / cycle.balance.equity;
      if (pnlPct < -killSwitch) {
        cycle.outcome = 'kill_switch';
        cycle.reason = `unrealized P&L ${(pnlPct * 100).toFixed(2)}% below -${(killSwitch * 100).toFixed(2)}%`;
        this.emit('kill_switch_triggered', { unrealizedPnlPct: pnlPct, thresholdPct: killSwitch });
        this.halt(`kill switch: ${cycle.reason}`);
        return 'snapshot_unusable';
      }
    }

    return 'snapshot_fresh';
  }

  private async loadReturns(
    cycle: CycleState,
    snapshot: MarketSnapshot
  ): Promise<Record<string, number[]>> {
    const returns: Record<string, number[]> = {};
    if (snapshot.returns) {
      returns[cycle.assetPair] = [...snapshot.returns];
    }
    const fetchSeries = this.deps.marketData.fetchReturnSeries?.bind(this.deps.marketData);
    if (!fetchSeries) return returns;

    const pairs = [...new Set([cycle.assetPair, ...cycle.positions.map((p) => p.assetPair)])];
    try {
      const series = await withTimeout('fetchReturnSeries', this.config.timeouts.snapshotMs, (signal) =>
        fetchSeries(pairs, signal)
      );
      return { ...returns, ...series };
    } catch (error) {
      this.logger.warn(`Return series unavailable: ${describeError(error)}`);
      return returns;
    }
  }

  private async handleReasoning(cycle: CycleState): Promise<AgentEventType> {
    const snapshot = cycle.snapshot;
    if (!snapshot) {
      cycle.outcome = 'snapshot_unavailable';
      return 'decision_unavailable';
    }
    const portfolio: PortfolioContext = {
      equity: cycle.balance?.equity ?? null,
      positions: cycle.positions,
      providerWeights: this.context.providerWeights,
      signalOnly: cycle.balance === null,
    };

    let decision: Decision | null = null;
    let failure = 'no decision returned';
    try {
      decision = await withTimeout(
        `proposeDecision ${cycle.assetPair}`,
        this.config.timeouts.decisionMs,
        (signal) => this.deps.decisionProvider.proposeDecision(snapshot, portfolio, signal)
      );
    } catch (error) {
      failure = describeError(error);
    }

    if (!decision) {
      const failures = this.context.recordAnalysisFailure(cycle.assetPair);
      cycle.outcome = 'decision_unavailable';
      cycle.reason = failure;
      this.logger.warn(`Decision unavailable for ${cycle.assetPair} (${failures} in a row): ${failure}`);
      this.emit('decision_unavailable', {
        cycleId: cycle.cycleId,
        assetPair: cycle.assetPair,
        reason: failure,
      });
      return 'decision_unavailable';
    }

    this.context.clearAnalysisFailures(cycle.assetPair);
    cycle.decision = Object.freeze({ ...decision, assetPair: cycle.assetPair });
    return 'decision_produced';
  }

  private skip(cycle: CycleState, decision: Decision, reason: SkipReason): AgentEventType {
    cycle.outcome =
      reason === 'hold' ? 'held' : reason === 'signal_only' ? 'signal_only' : 'skipped_policy';
    cycle.reason = reason;
    this.logger.info(`Skipping ${decision.action} ${decision.assetPair}: ${reason}`);
    this.emit('trade_skipped', {
      cycleId: cycle.cycleId,
      assetPair: decision.assetPair,
      decisionId: decision.id,
      action: decision.action,
      reason,
    });
    return 'execution_skipped';
  }

  private handleRiskCheck(cycle: CycleState): AgentEventType {
    const decision = cycle.decision;
    const snapshot = cycle.snapshot;
    if (!decision || !snapshot) {
      cycle.outcome = 'decision_unavailable';
      return 'execution_skipped';
    }
    const agentCfg = this.config.agent;

    if (decision.action === 'HOLD') return this.skip(cycle, decision, 'hold');
    if (!cycle.balance) return this.skip(cycle, decision, 'signal_only');
    if (decision.confidence < agentCfg.minConfidence) {
      return this.skip(cycle, decision, 'low_confidence');
    }
    if (this.context.tradeLimitReached(agentCfg.maxDailyTrades)) {
      return this.skip(cycle, decision, 'daily_trade_limit');
    }
    if (!agentCfg.autonomousExecution) return this.skip(cycle, decision, 'autonomy_disabled');

    const plan = planPosition({
      decision,
      equity: cycle.balance.equity,
      price: snapshot.price,
      limits: this.config.risk,
    });
    if (!plan) return this.skip(cycle, decision, 'invalid_size');

    const verdict = this.gatekeeper.evaluate(
      decision,
      {
        equity: cycle.balance.equity,
        freeMargin: cycle.balance.freeMargin,
        positions: cycle.positions,
        returns: cycle.returns,
        reservedNotional: this.ledger.totalHeld(),
      },
      { snapshot, plan }
    );

    if (verdict.status === 'REJECTED') {
      cycle.outcome = 'rejected';
      cycle.reason = verdict.reason;
      this.emit('risk_rejected', {
        cycleId: cycle.cycleId,
        assetPair: decision.assetPair,
        decisionId: decision.id,
        action: decision.action,
        reason: verdict.reason,
        message: verdict.message,
        telemetry: verdict.telemetry,
      });
      return 'execution_skipped';
    }

    cycle.plan = plan;
    return 'verdict_approved';
  }

  private async handleExecution(cycle: CycleState): Promise<AgentEventType> {
    const decision = cycle.decision;
    const plan = cycle.plan;
    if (!decision || !plan) {
      cycle.outcome = 'failed';
      cycle.reason = 'execution reached without an approved plan';
      return 'execution_finished';
    }

    // A plan is executed at most once, whatever happens after this point.
    cycle.plan = null;
    const result = await this.executionStage.execute(decision, plan);
    if (result.status === 'FILLED') {
      cycle.outcome = 'filled';
      cycle.tradeId = result.tradeId;
      this.emit('trade_executed', {
        cycleId: cycle.cycleId,
        assetPair: decision.assetPair,
        decisionId: decision.id,
        action: decision.action,
        tradeId: result.tradeId,
        reservationId: result.reservationId,
        size: result.filledSize,
        averagePrice: result.averagePrice,
      });
    } else {
      cycle.outcome = 'failed';
      cycle.reason = result.error;
      this.emit('trade_failed', {
        cycleId: cycle.cycleId,
        assetPair: decision.assetPair,
        decisionId: decision.id,
        action: decision.action,
        reservationId: result.reservationId,
        reason: result.error,
        timedOut: result.timedOut,
      });
    }
    return 'execution_finished';
  }

  private async handleLearning(_cycle: CycleState): Promise<AgentEventType> {
    const swept = this.ledger.sweepStale(this.config.execution.reservationMaxAgeSeconds * 1000);
    if (swept.length > 0) {
      this.logger.warn(`Released ${swept.length} stale reservation(s)`);
    }
    this.cooldowns.prune();

    try {
      const closed = await withTimeout('collectClosedTrades', this.config.timeouts.venueMs, (signal) =>
        this.tradeMonitor.collectClosedTrades(signal)
      );
      for (const trade of closed) {
        const weights = this.deps.outcomeMemory?.recordClosedTrade(trade) ?? null;
        if (weights) {
          this.context.providerWeights = weights;
        }
      }
    } catch (error) {
      this.logger.warn(`Closed-trade collection failed: ${describeError(error)}`);
    }

    return 'learning_finished';
  }
}
