import type { ReservationJournal } from '../agent/ports.js';
import type { ExposureReservation, ReleaseReason, ReservationStatus } from '../agent/types.js';
import { openDatabase } from './db.js';

type Row = Record<string, unknown>;

const STATUSES: readonly ReservationStatus[] = ['HELD', 'COMMITTED', 'RELEASED'];
const RELEASE_REASONS: readonly ReleaseReason[] = [
  'order_failed',
  'order_timeout',
  'stale_sweep',
  'recovered_orphan',
];

function toStatus(value: unknown): ReservationStatus {
  return STATUSES.find((status) => status === value) ?? 'HELD';
}

function toReleaseReason(value: unknown): ReleaseReason | null {
  return RELEASE_REASONS.find((reason) => reason === value) ?? null;
}

function rowToReservation(row: Row): ExposureReservation {
  return {
    id: String(row.id ?? ''),
    assetPair: String(row.asset_pair ?? ''),
    decisionId: String(row.decision_id ?? ''),
    amount: Number(row.amount ?? 0),
    createdAt: Number(row.created_at ?? 0),
    status: toStatus(row.status),
    releaseReason: toReleaseReason(row.release_reason),
    settledAt: row.settled_at == null ? null : Number(row.settled_at),
  };
}

/**
 * SQLite journal of reservation transitions. A row left HELD after a crash is
 * an orphan that recovery releases.
 */
export class SqliteReservationJournal implements ReservationJournal {
  constructor(private dbPath?: string) {}

  record(reservation: ExposureReservation): void {
    const db = openDatabase(this.dbPath);
    db.prepare(
      `
        INSERT INTO exposure_reservations (
          id, asset_pair, decision_id, amount, created_at, status, release_reason, settled_at
        ) VALUES (
          @id, @assetPair, @decisionId, @amount, @createdAt, @status, @releaseReason, @settledAt
        )
        ON CONFLICT(id) DO UPDATE SET
          status = excluded.status,
          release_reason = excluded.release_reason,
          settled_at = excluded.settled_at
      `
    ).run({
      id: reservation.id,
      assetPair: reservation.assetPair,
      decisionId: reservation.decisionId,
      amount: reservation.amount,
      createdAt: reservation.createdAt,
      status: reservation.status,
      releaseReason: reservation.releaseReason,
      settledAt: reservation.settledAt,
    });
  }

  listHeld(): ExposureReservation[] {
    const db = openDatabase(this.dbPath);
    const rows = db
      .prepare<[], Row>(
        `
          SELECT id, asset_pair, decision_id, amount, created_at, status, release_reason, settled_at
          FROM exposure_reservations
          WHERE status = 'HELD'
          ORDER BY created_at ASC
        `
      )
      .all();
    return rows.map(rowToReservation);
  }
}
