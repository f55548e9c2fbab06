import { describe, expect, it } from 'vitest';

import { RejectionCache, rejectionFingerprint } from '../../src/risk/rejection-cache.js';

describe('RejectionCache', () => {
  it('keys records by asset pair and action', () => {
    expect(rejectionFingerprint(' ethusd ', 'BUY')).toBe('ETHUSD:BUY');
  });

  it('records the expiry and time bucket of a rejection', () => {
    const now = 1_000_000;
    const cache = new RejectionCache(60_000, () => now);
    const record = cache.record('BTCUSD', 'SELL', 'margin_limit');
    expect(record).toEqual({
      fingerprint: 'BTCUSD:SELL',
      timeBucket: 16,
      reason: 'margin_limit',
      expiresAt: 1_060_000,
    });
    expect(cache.active('BTCUSD', 'SELL')).toEqual(record);
    expect(cache.active('BTCUSD', 'BUY')).toBeNull();
  });

  it('evicts an entry once it expires', () => {
    let now = 0;
    const cache = new RejectionCache(1_000, () => now);
    cache.record('BTCUSD', 'BUY', 'var_limit');
    now = 999;
    expect(cache.active('BTCUSD', 'BUY')).not.toBeNull();
    now = 1_000;
    expect(cache.active('BTCUSD', 'BUY')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('prunes expired entries in bulk', () => {
    let now = 0;
    const cache = new RejectionCache(1_000, () => now);
    cache.record('BTCUSD', 'BUY', 'var_limit');
    now = 500;
    cache.record('ETHUSD', 'BUY', 'var_limit');
    now = 1_200;
    expect(cache.prune()).toBe(1);
    expect(cache.list().map((r) => r.fingerprint)).toEqual(['ETHUSD:BUY']);
  });
});
