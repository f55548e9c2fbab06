import { beforeEach, describe, expect, it, vi } from 'vitest';

let payloads = new Map<string, string>();

const fakeDb = {
  exec: vi.fn(),
  prepare: (sql: string) => {
    if (sql.includes('INSERT INTO agent_context')) {
      return {
        run: (params: { agentId: string; payload: string }) => {
          payloads.set(params.agentId, params.payload);
        },
      };
    }
    if (sql.includes('FROM agent_context')) {
      return {
        get: (agentId: string) => {
          const payload = payloads.get(agentId);
          return payload === undefined ? undefined : { payload };
        },
      };
    }
    return { run: () => undefined, get: () => undefined, all: () => [] };
  },
};

vi.mock('../../src/memory/db.js', () => ({
  openDatabase: () => fakeDb,
}));

import { SqliteContextStore, parsePersistedContext } from '../../src/memory/agent_context.js';

beforeEach(() => {
  payloads = new Map();
});

describe('parsePersistedContext', () => {
  it('rejects invalid JSON and payloads without a trade date', () => {
    expect(parsePersistedContext('{not json')).toBeNull();
    expect(parsePersistedContext('{"dailyTradeCount":2}')).toBeNull();
  });

  it('drops malformed fields', () => {
    expect(
      parsePersistedContext(
        JSON.stringify({
          tradeDate: '2026-03-01',
          dailyTradeCount: 'many',
          providerWeights: { alpha: 0.5, beta: 'x' },
          analysisFailures: { BTCUSD: { count: 2, lastFailureAt: 5 }, ETHUSD: { count: 'x' } },
        })
      )
    ).toEqual({
      dailyTradeCount: 0,
      tradeDate: '2026-03-01',
      cursor: 0,
      providerWeights: { alpha: 0.5 },
      analysisFailures: { BTCUSD: { count: 2, lastFailureAt: 5 } },
    });
  });
});

describe('SqliteContextStore', () => {
  it('round-trips an agent context by agent id', () => {
    const store = new SqliteContextStore(':memory:');
    const context = {
      dailyTradeCount: 3,
      tradeDate: '2026-03-01',
      cursor: 1,
      providerWeights: { alpha: 1 },
      analysisFailures: {},
    };
    store.save('agent-a', context);
    store.save('agent-a', { ...context, dailyTradeCount: 4 });

    expect(store.load('agent-a')).toEqual({ ...context, dailyTradeCount: 4 });
    expect(store.load('agent-b')).toBeNull();
  });
});
