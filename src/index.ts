/**
 * tradeloop - risk-gated autonomous trading loop
 *
 * Builds every collaborator from configuration and injects them into the
 * agent. Callers may override any port, e.g. to plug in a real venue client.
 *
 * @example
 * ```typescript
 * import { createAgent, loadConfig } from 'tradeloop';
 *
 * const agent = createAgent(loadConfig('~/.tradeloop/config.yaml'));
 * agent.on('trade_executed', (e) => console.log(e.tradeId));
 * await agent.start();
 * ```
 */

import { TradingLoopAgent, type TradingLoopAgentDeps } from './agent/loop.js';
import type { DecisionProvider, MarketDataSource, TradingVenue } from './agent/ports.js';
import { HttpDecisionProvider, HttpMarketDataSource } from './collaborators/http.js';
import type { TradeLoopConfig } from './core/config.js';
import { ConfigError } from './core/errors.js';
import { Logger } from './core/logger.js';
import { PaperVenue } from './execution/paper-venue.js';
import { SqliteContextStore } from './memory/agent_context.js';
import { SqliteOutcomeMemory } from './memory/cycle_outcomes.js';
import { SqliteReservationJournal } from './memory/reservations.js';
import { TradeMonitor } from './monitoring/trade-monitor.js';

export const VERSION = '0.1.0';

export function createVenue(config: TradeLoopConfig, logger: Logger): TradingVenue {
  switch (config.execution.mode) {
    case 'paper':
      return new PaperVenue(
        {
          startingBalance: config.execution.paper.startingBalance,
          currency: config.execution.paper.currency,
          maxLeverage: config.risk.maxLeverage,
        },
        { logger: logger.child('paper') }
      );
    default:
      throw new ConfigError(`Unsupported execution mode: ${String(config.execution.mode)}`);
  }
}

function requireUrl(value: string | undefined, key: string): string {
  if (!value) {
    throw new ConfigError(`collaborators.${key} is required unless the port is injected`);
  }
  return value;
}

export function createAgent(
  config: TradeLoopConfig,
  overrides: Partial<TradingLoopAgentDeps> = {},
  options?: { agentId?: string }
): TradingLoopAgent {
  const logger = overrides.logger ?? new Logger(config.logging.level);
  const apiKey = config.collaborators.apiKey ?? process.env.TRADELOOP_API_KEY;

  const marketData: MarketDataSource =
    overrides.marketData ??
    new HttpMarketDataSource(requireUrl(config.collaborators.marketDataUrl, 'marketDataUrl'), {
      apiKey,
      logger: logger.child('market-data'),
    });
  const decisionProvider: DecisionProvider =
    overrides.decisionProvider ??
    new HttpDecisionProvider(requireUrl(config.collaborators.decisionUrl, 'decisionUrl'), {
      apiKey,
      logger: logger.child('decision'),
    });
  const venue = overrides.venue ?? createVenue(config, logger);

  const persist = config.memory.persist;
  const dbPath = config.memory.dbPath;

  return new TradingLoopAgent(
    config,
    {
      ...overrides,
      marketData,
      decisionProvider,
      venue,
      logger,
      tradeMonitor:
        overrides.tradeMonitor ?? new TradeMonitor(venue, { logger: logger.child('monitor') }),
      outcomeMemory: overrides.outcomeMemory ?? (persist ? new SqliteOutcomeMemory(dbPath) : undefined),
      contextStore: overrides.contextStore ?? (persist ? new SqliteContextStore(dbPath) : undefined),
      reservationJournal:
        overrides.reservationJournal ?? (persist ? new SqliteReservationJournal(dbPath) : undefined),
    },
    options
  );
}

export { TradingLoopAgent, type TradingLoopAgentDeps } from './agent/loop.js';
export { AgentContext } from './agent/context.js';
export { nextState, reachableFrom, AGENT_STATES, AGENT_EVENTS } from './agent/state.js';
export type { AgentState, AgentEventType } from './agent/state.js';
export type { AgentLifecycleEvents, RecoveryReport, SkipReason } from './agent/events.js';
export * from './agent/ports.js';
export * from './agent/types.js';
export { loadConfig, parseConfig, type TradeLoopConfig } from './core/config.js';
export * from './core/errors.js';
export { Logger, type LogLevel } from './core/logger.js';
export { RiskGatekeeper, type Verdict, type RiskTelemetry } from './risk/gatekeeper.js';
export { RejectionCache } from './risk/rejection-cache.js';
export { ExposureLedger } from './execution/ledger.js';
export { ExecutionStage } from './execution/stage.js';
export { PaperVenue } from './execution/paper-venue.js';
export { RecoveryManager, type RecoveryResult } from './recovery/manager.js';
export { TradeMonitor } from './monitoring/trade-monitor.js';
export { HttpDecisionProvider, HttpMarketDataSource } from './collaborators/http.js';
