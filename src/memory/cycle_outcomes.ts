import type { OutcomeMemory } from '../agent/ports.js';
import type {
  ClosedTrade,
  CycleOutcome,
  CycleOutcomeKind,
  ProviderWeights,
  TradeAction,
} from '../agent/types.js';
import { openDatabase } from './db.js';

type Row = Record<string, unknown>;

export interface ProviderStats {
  wins: number;
  losses: number;
}

/**
 * Weights proportional to each provider's win rate, normalised to sum to 1.
 * Providers with no wins at all share the weight equally.
 */
export function computeProviderWeights(stats: Readonly<Record<string, ProviderStats>>): ProviderWeights {
  const providers = Object.keys(stats);
  if (providers.length === 0) return {};

  const winRates: Record<string, number> = {};
  for (const provider of providers) {
    const { wins, losses } = stats[provider] ?? { wins: 0, losses: 0 };
    const total = wins + losses;
    winRates[provider] = total > 0 ? wins / total : 0;
  }

  const sum = Object.values(winRates).reduce((acc, rate) => acc + rate, 0);
  const weights: ProviderWeights = {};
  for (const provider of providers) {
    weights[provider] = sum > 0 ? (winRates[provider] ?? 0) / sum : 1 / providers.length;
  }
  return weights;
}

function parseProviders(value: unknown): string[] {
  if (typeof value !== 'string') return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((p): p is string => typeof p === 'string') : [];
  } catch {
    return [];
  }
}

const OUTCOME_KINDS: readonly CycleOutcomeKind[] = [
  'filled',
  'failed',
  'rejected',
  'held',
  'signal_only',
  'skipped_policy',
  'stale_data',
  'snapshot_unavailable',
  'decision_unavailable',
  'kill_switch',
];
const ACTIONS: readonly TradeAction[] = ['BUY', 'SELL', 'HOLD'];

function rowToOutcome(row: Row): CycleOutcome {
  const action = ACTIONS.find((a) => a === row.action);
  return {
    cycleId: String(row.cycle_id ?? ''),
    assetPair: String(row.asset_pair ?? ''),
    outcome: OUTCOME_KINDS.find((kind) => kind === row.outcome) ?? 'failed',
    startedAt: String(row.started_at ?? ''),
    finishedAt: String(row.finished_at ?? ''),
    ...(row.decision_id == null ? {} : { decisionId: String(row.decision_id) }),
    ...(action ? { action } : {}),
    ...(row.reason == null ? {} : { reason: String(row.reason) }),
    ...(row.trade_id == null ? {} : { tradeId: String(row.trade_id) }),
  };
}

export class SqliteOutcomeMemory implements OutcomeMemory {
  constructor(private dbPath?: string) {}

  recordCycleOutcome(outcome: CycleOutcome): void {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT OR REPLACE INTO cycle_outcomes (
          cycle_id, asset_pair, outcome, decision_id, action, reason, trade_id, started_at, finished_at
        ) VALUES (
          @cycleId, @assetPair, @outcome, @decisionId, @action, @reason, @tradeId, @startedAt, @finishedAt
        )
      `
    ).run({
      cycleId: outcome.cycleId,
      assetPair: outcome.assetPair,
      outcome: outcome.outcome,
      decisionId: outcome.decisionId ?? null,
      action: outcome.action ?? null,
      reason: outcome.reason ?? null,
      tradeId: outcome.tradeId ?? null,
      startedAt: outcome.startedAt,
      finishedAt: outcome.finishedAt,
    });
  }

  recordClosedTrade(trade: ClosedTrade): ProviderWeights | null {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT OR REPLACE INTO closed_trades (
          trade_id, decision_id, asset_pair, realized_pnl, closed_at, providers
        ) VALUES (
          @tradeId, @decisionId, @assetPair, @realizedPnl, @closedAt, @providers
        )
      `
    ).run({
      tradeId: trade.tradeId,
      decisionId: trade.decisionId,
      assetPair: trade.assetPair,
      realizedPnl: trade.realizedPnl,
      closedAt: trade.closedAt,
      providers: JSON.stringify(trade.providers),
    });

    const rows = db
      .prepare<[], Row>(
        `
          SELECT providers, realized_pnl
          FROM closed_trades
          WHERE realized_pnl IS NOT NULL
        `
      )
      .all();

    const stats: Record<string, ProviderStats> = {};
    for (const row of rows) {
      const win = Number(row.realized_pnl) > 0;
      for (const provider of parseProviders(row.providers)) {
        const entry = stats[provider] ?? { wins: 0, losses: 0 };
        if (win) entry.wins += 1;
        else entry.losses += 1;
        stats[provider] = entry;
      }
    }

    const weights = computeProviderWeights(stats);
    return Object.keys(weights).length > 0 ? weights : null;
  }

  listRecentOutcomes(limit = 20): CycleOutcome[] {
    const db = openDatabase(this.dbPath);
    const rows = db
      .prepare<[number], Row>(
        `
          SELECT cycle_id, asset_pair, outcome, decision_id, action, reason, trade_id, started_at, finished_at
          FROM cycle_outcomes
          ORDER BY finished_at DESC
          LIMIT ?
        `
      )
      .all(limit);
    return rows.map(rowToOutcome);
  }
}
