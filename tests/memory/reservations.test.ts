import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { ExposureReservation } from '../../src/agent/types.js';

let rows = new Map<string, Record<string, unknown>>();

const fakeDb = {
  exec: vi.fn(),
  prepare: (sql: string) => {
    if (sql.includes('INSERT INTO exposure_reservations')) {
      return {
        run: (params: Record<string, unknown>) => {
          const id = String(params.id);
          const existing = rows.get(id);
          rows.set(id, {
            id,
            asset_pair: existing?.asset_pair ?? params.assetPair,
            decision_id: existing?.decision_id ?? params.decisionId,
            amount: existing?.amount ?? params.amount,
            created_at: existing?.created_at ?? params.createdAt,
            status: params.status,
            release_reason: params.releaseReason,
            settled_at: params.settledAt,
          });
        },
      };
    }
    if (sql.includes('FROM exposure_reservations') && sql.includes("status = 'HELD'")) {
      return {
        all: () =>
          [...rows.values()]
            .filter((row) => row.status === 'HELD')
            .sort((a, b) => Number(a.created_at) - Number(b.created_at)),
      };
    }
    return { run: () => undefined, get: () => undefined, all: () => [] };
  },
};

vi.mock('../../src/memory/db.js', () => ({
  openDatabase: () => fakeDb,
}));

import { SqliteReservationJournal } from '../../src/memory/reservations.js';

function reservation(overrides: Partial<ExposureReservation>): ExposureReservation {
  return {
    id: 'r1',
    assetPair: 'BTCUSD',
    decisionId: 'd1',
    amount: 100,
    createdAt: 10,
    status: 'HELD',
    releaseReason: null,
    settledAt: null,
    ...overrides,
  };
}

beforeEach(() => {
  rows = new Map();
});

describe('SqliteReservationJournal', () => {
  it('lists HELD reservations oldest first', () => {
    const journal = new SqliteReservationJournal(':memory:');
    journal.record(reservation({ id: 'r2', assetPair: 'ETHUSD', createdAt: 20 }));
    journal.record(reservation({ id: 'r1', createdAt: 10 }));

    expect(journal.listHeld()).toEqual([
      reservation({ id: 'r1', createdAt: 10 }),
      reservation({ id: 'r2', assetPair: 'ETHUSD', createdAt: 20 }),
    ]);
  });

  it('drops a reservation from the held list once settled', () => {
    const journal = new SqliteReservationJournal(':memory:');
    journal.record(reservation({}));
    journal.record(reservation({ status: 'RELEASED', releaseReason: 'order_timeout', settledAt: 15 }));

    expect(journal.listHeld()).toEqual([]);
    expect(rows.get('r1')).toMatchObject({ status: 'RELEASED', release_reason: 'order_timeout', settled_at: 15 });
  });
});
