import type { ContextStore, PersistedAgentContext } from '../agent/ports.js';
import { openDatabase } from './db.js';

type Row = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumberRecord(value: unknown): Record<string, number> {
  if (!isRecord(value)) return {};
  const out: Record<string, number> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'number' && Number.isFinite(raw)) out[key] = raw;
  }
  return out;
}

function toFailures(value: unknown): PersistedAgentContext['analysisFailures'] {
  if (!isRecord(value)) return {};
  const out: PersistedAgentContext['analysisFailures'] = {};
  for (const [pair, raw] of Object.entries(value)) {
    if (!isRecord(raw)) continue;
    const count = Number(raw.count);
    const lastFailureAt = Number(raw.lastFailureAt);
    if (Number.isFinite(count) && Number.isFinite(lastFailureAt)) {
      out[pair] = { count, lastFailureAt };
    }
  }
  return out;
}

export function parsePersistedContext(payload: string): PersistedAgentContext | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.tradeDate !== 'string') return null;
  return {
    dailyTradeCount: Number(parsed.dailyTradeCount ?? 0) || 0,
    tradeDate: parsed.tradeDate,
    cursor: Number(parsed.cursor ?? 0) || 0,
    providerWeights: toNumberRecord(parsed.providerWeights),
    analysisFailures: toFailures(parsed.analysisFailures),
  };
}

export class SqliteContextStore implements ContextStore {
  constructor(private dbPath?: string) {}

  load(agentId: string): PersistedAgentContext | null {
    const db = openDatabase(this.dbPath);
    const row = db
      .prepare<[string], Row>(
        `
          SELECT payload
          FROM agent_context
          WHERE agent_id = ?
        `
      )
      .get(agentId);
    if (!row || typeof row.payload !== 'string') return null;
    return parsePersistedContext(row.payload);
  }

  save(agentId: string, context: PersistedAgentContext): void {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT INTO agent_context (agent_id, payload, updated_at)
        VALUES (@agentId, @payload, datetime('now'))
        ON CONFLICT(agent_id) DO UPDATE SET
          payload = excluded.payload,
          updated_at = excluded.updated_at
      `
    ).run({ agentId, payload: JSON.stringify(context) });
  }
}
