/**
 * Exposure Ledger
 *
 * Holds capital against in-flight orders so that two cycles can never commit
 * margin for the same instrument at once. Every mutation is synchronous, which
 * makes check-then-reserve atomic on the event loop: nothing can observe the
 * ledger between the conflict check and the insert.
 */

import { randomUUID } from 'node:crypto';

import type { ReservationJournal } from '../agent/ports.js';
import type { ExposureReservation, ReleaseReason } from '../agent/types.js';
import { ReservationConflictError, ReservationStateError } from '../core/errors.js';
import { Logger } from '../core/logger.js';

const normalizePair = (pair: string): string => pair.trim().toUpperCase();

export class ExposureLedger {
  private reservations = new Map<string, ExposureReservation>();
  private heldByPair = new Map<string, string>();
  private logger: Logger;
  private now: () => number;
  private journal: ReservationJournal | null;
  private historyLimit: number;

  constructor(options?: {
    logger?: Logger;
    now?: () => number;
    journal?: ReservationJournal | null;
    /** Settled reservations kept in memory for inspection. */
    historyLimit?: number;
  }) {
    this.logger = options?.logger ?? new Logger('info');
    this.now = options?.now ?? Date.now;
    this.journal = options?.journal ?? null;
    this.historyLimit = Math.max(0, options?.historyLimit ?? 200);
  }

  reserve(params: { assetPair: string; decisionId: string; amount: number }): ExposureReservation {
    const assetPair = normalizePair(params.assetPair);
    const existing = this.heldByPair.get(assetPair);
    if (existing) {
      throw new ReservationConflictError(assetPair, existing);
    }
    if (!(params.amount >= 0) || !Number.isFinite(params.amount)) {
      throw new ReservationStateError('(new)', `invalid reservation amount ${params.amount}`);
    }

    const reservation: ExposureReservation = {
      id: randomUUID(),
      assetPair,
      decisionId: params.decisionId,
      amount: params.amount,
      createdAt: this.now(),
      status: 'HELD',
      releaseReason: null,
      settledAt: null,
    };
    this.reservations.set(reservation.id, reservation);
    this.heldByPair.set(assetPair, reservation.id);
    this.persist(reservation);
    this.logger.info(
      `Reserved exposure ${reservation.amount.toFixed(2)} for ${assetPair} (decision ${params.decisionId})`
    );
    return reservation;
  }

  commit(reservationId: string): ExposureReservation {
    const held = this.requireHeld(reservationId);
    const committed: ExposureReservation = {
      ...held,
      status: 'COMMITTED',
      settledAt: this.now(),
    };
    this.settle(committed);
    this.logger.info(`Committed reservation ${reservationId} for ${held.assetPair}`);
    return committed;
  }

  release(reservationId: string, reason: ReleaseReason): ExposureReservation {
    const held = this.requireHeld(reservationId);
    const released: ExposureReservation = {
      ...held,
      status: 'RELEASED',
      releaseReason: reason,
      settledAt: this.now(),
    };
    this.settle(released);
    this.logger.warn(`Released reservation ${reservationId} for ${held.assetPair} (${reason})`);
    return released;
  }

  /**
   * Release every HELD reservation older than `maxAgeMs`.
   */
  sweepStale(maxAgeMs: number): ExposureReservation[] {
    const cutoff = this.now() - maxAgeMs;
    const stale = this.listHeld().filter((r) => r.createdAt <= cutoff);
    return stale.map((r) => this.release(r.id, 'stale_sweep'));
  }

  /**
   * Settle reservations persisted by a previous process. They cannot be in
   * flight any more, so they are released.
   */
  releaseOrphans(): ExposureReservation[] {
    if (!this.journal) return [];
    const released: ExposureReservation[] = [];
    for (const orphan of this.journal.listHeld()) {
      if (this.reservations.get(orphan.id)?.status === 'HELD') continue;
      const settled: ExposureReservation = {
        ...orphan,
        status: 'RELEASED',
        releaseReason: 'recovered_orphan',
        settledAt: this.now(),
      };
      this.persist(settled);
      released.push(settled);
      this.logger.warn(
        `Released orphaned reservation ${orphan.id} for ${orphan.assetPair} from a previous run`
      );
    }
    return released;
  }

  get(reservationId: string): ExposureReservation | null {
    return this.reservations.get(reservationId) ?? null;
  }

  heldFor(assetPair: string): ExposureReservation | null {
    const id = this.heldByPair.get(normalizePair(assetPair));
    return id ? this.reservations.get(id) ?? null : null;
  }

  listHeld(): ExposureReservation[] {
    return [...this.heldByPair.values()]
      .map((id) => this.reservations.get(id))
      .filter((r): r is ExposureReservation => Boolean(r));
  }

  totalHeld(): number {
    return this.listHeld().reduce((sum, r) => sum + r.amount, 0);
  }

  list(): ExposureReservation[] {
    return [...this.reservations.values()];
  }

  private requireHeld(reservationId: string): ExposureReservation {
    const reservation = this.reservations.get(reservationId);
    if (!reservation) {
      throw new ReservationStateError(reservationId, 'unknown reservation');
    }
    if (reservation.status !== 'HELD') {
      throw new ReservationStateError(reservationId, `already ${reservation.status}`);
    }
    return reservation;
  }

  private settle(reservation: ExposureReservation): void {
    this.reservations.set(reservation.id, reservation);
    if (this.heldByPair.get(reservation.assetPair) === reservation.id) {
      this.heldByPair.delete(reservation.assetPair);
    }
    this.persist(reservation);
    this.trimHistory();
  }

  private trimHistory(): void {
    const settled = [...this.reservations.values()].filter((r) => r.status !== 'HELD');
    const excess = settled.length - this.historyLimit;
    if (excess <= 0) return;
    settled
      .sort((a, b) => (a.settledAt ?? 0) - (b.settledAt ?? 0))
      .slice(0, excess)
      .forEach((r) => this.reservations.delete(r.id));
  }

  private persist(reservation: ExposureReservation): void {
    this.journal?.record(reservation);
  }
}
