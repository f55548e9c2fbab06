import type { RejectionReason, RejectionRecord, TradeAction } from '../agent/types.js';

export function rejectionFingerprint(assetPair: string, action: TradeAction): string {
  return `${assetPair.trim().toUpperCase()}:${action}`;
}

/**
 * Short-lived suppression of decisions that were just rejected.
 *
 * Lookups are keyed by (asset pair, action); the time bucket is kept on the
 * record for telemetry. Mutations are synchronous, so the cache is
 * single-writer on the event loop.
 */
export class RejectionCache {
  private entries = new Map<string, RejectionRecord>();

  constructor(
    private cooldownMs: number,
    private now: () => number = Date.now
  ) {}

  get size(): number {
    return this.entries.size;
  }

  record(assetPair: string, action: TradeAction, reason: RejectionReason): RejectionRecord {
    const at = this.now();
    const fingerprint = rejectionFingerprint(assetPair, action);
    const bucketSize = Math.max(1, this.cooldownMs);
    const entry: RejectionRecord = {
      fingerprint,
      timeBucket: Math.floor(at / bucketSize),
      reason,
      expiresAt: at + this.cooldownMs,
    };
    this.entries.set(fingerprint, entry);
    return entry;
  }

  /**
   * Unexpired record for the fingerprint, if any. Expired entries are evicted
   * on read.
   */
  active(assetPair: string, action: TradeAction): RejectionRecord | null {
    const fingerprint = rejectionFingerprint(assetPair, action);
    const entry = this.entries.get(fingerprint);
    if (!entry) return null;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(fingerprint);
      return null;
    }
    return entry;
  }

  prune(): number {
    const at = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (at >= entry.expiresAt) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  list(): RejectionRecord[] {
    return [...this.entries.values()];
  }
}
