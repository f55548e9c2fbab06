/**
 * Risk Gatekeeper
 *
 * Validates a proposed decision against portfolio constraints. Checks run in a
 * fixed order and the first failure short-circuits:
 * 1. cooldown on a recently rejected (asset pair, action)
 * 2. snapshot freshness
 * 3. correlated exposure
 * 4. portfolio Value-at-Risk including the candidate
 * 5. margin headroom
 *
 * A rejection puts the fingerprint into the cooldown cache; an approval never does.
 */

import type {
  Decision,
  ExecutionPlan,
  MarketSnapshot,
  PortfolioSnapshot,
  RejectionReason,
} from '../agent/types.js';
import { Logger } from '../core/logger.js';
import { findCorrelatedHoldings } from './correlation.js';
import { checkSnapshotFreshness } from './freshness.js';
import type { RejectionCache } from './rejection-cache.js';
import { historicalVar, type VarDataQuality } from './var.js';

export interface GatekeeperLimits {
  stalenessSeconds: number;
  maxClockSkewSeconds: number;
  correlationThreshold: number;
  maxCorrelatedAssets: number;
  minCorrelationObservations: number;
  varConfidence: number;
  maxVarPct: number;
  minVarObservations: number;
  maxLeverage: number;
  marginBufferPct: number;
}

export interface RiskTelemetry {
  snapshotAgeSeconds?: number | null;
  cooldownExpiresAt?: string;
  correlatedAssets?: string[];
  varPct?: number;
  varObservations?: number;
  varDataQuality?: VarDataQuality;
  requiredMargin?: number;
  availableMargin?: number;
}

export type Verdict =
  | { status: 'APPROVED'; reason: 'approved'; telemetry: RiskTelemetry }
  | { status: 'REJECTED'; reason: RejectionReason; message: string; telemetry: RiskTelemetry };

export interface CandidateTrade {
  snapshot: Pick<MarketSnapshot, 'collectedAt'>;
  plan: ExecutionPlan;
}

function signedNotional(side: 'LONG' | 'SHORT', notional: number): number {
  return side === 'LONG' ? Math.abs(notional) : -Math.abs(notional);
}

export class RiskGatekeeper {
  private logger: Logger;
  private now: () => number;

  constructor(
    private limits: GatekeeperLimits,
    private cooldowns: RejectionCache,
    options?: { logger?: Logger; now?: () => number }
  ) {
    this.logger = options?.logger ?? new Logger('info');
    this.now = options?.now ?? Date.now;
  }

  evaluate(decision: Decision, portfolio: PortfolioSnapshot, candidate: CandidateTrade): Verdict {
    const telemetry: RiskTelemetry = {};

    const cooldown = this.cooldowns.active(decision.assetPair, decision.action);
    if (cooldown) {
      telemetry.cooldownExpiresAt = new Date(cooldown.expiresAt).toISOString();
      // A cooldown hit is not re-recorded, otherwise the entry would never expire.
      return this.reject(
        decision,
        'cooldown_active',
        `Cooldown active until ${telemetry.cooldownExpiresAt} (previous: ${cooldown.reason})`,
        telemetry,
        false
      );
    }

    const freshness = checkSnapshotFreshness(candidate.snapshot, {
      stalenessSeconds: this.limits.stalenessSeconds,
      maxClockSkewSeconds: this.limits.maxClockSkewSeconds,
      nowMs: this.now(),
    });
    telemetry.snapshotAgeSeconds = freshness.ageSeconds;
    if (!freshness.fresh) {
      return this.reject(decision, 'stale_data', freshness.message, telemetry);
    }

    const correlated = findCorrelatedHoldings({
      candidate: decision.assetPair,
      holdings: portfolio.positions.map((p) => p.assetPair),
      returns: portfolio.returns,
      threshold: this.limits.correlationThreshold,
      minObservations: this.limits.minCorrelationObservations,
    });
    telemetry.correlatedAssets = correlated.map((c) => c.assetPair);
    if (correlated.length + 1 > this.limits.maxCorrelatedAssets) {
      return this.reject(
        decision,
        'correlation_limit',
        `${correlated.length} open position(s) correlated above ${this.limits.correlationThreshold} with ${decision.assetPair} (max ${this.limits.maxCorrelatedAssets} correlated assets)`,
        telemetry
      );
    }

    const exposures: Record<string, number> = {};
    for (const position of portfolio.positions) {
      exposures[position.assetPair] =
        (exposures[position.assetPair] ?? 0) +
        signedNotional(position.side, position.size * position.currentPrice);
    }
    if (decision.action !== 'HOLD') {
      exposures[decision.assetPair] =
        (exposures[decision.assetPair] ?? 0) +
        signedNotional(decision.action === 'BUY' ? 'LONG' : 'SHORT', candidate.plan.notional);
    }
    const estimate = historicalVar({
      exposures,
      returns: portfolio.returns,
      confidence: this.limits.varConfidence,
      minObservations: this.limits.minVarObservations,
    });
    telemetry.varObservations = estimate.observations;
    telemetry.varDataQuality = estimate.dataQuality;
    if (estimate.dataQuality === 'insufficient_history') {
      this.logger.debug(
        `VaR check skipped for ${decision.assetPair}: ${estimate.observations} shared observation(s)`
      );
    } else if (portfolio.equity > 0) {
      const varPct = estimate.valueAtRisk / portfolio.equity;
      telemetry.varPct = varPct;
      if (varPct > this.limits.maxVarPct) {
        return this.reject(
          decision,
          'var_limit',
          `Portfolio VaR ${(varPct * 100).toFixed(2)}% exceeds ${(this.limits.maxVarPct * 100).toFixed(2)}% at ${(this.limits.varConfidence * 100).toFixed(0)}% confidence`,
          telemetry
        );
      }
    }

    const leverage = Math.max(1, this.limits.maxLeverage);
    const requiredMargin = candidate.plan.notional / leverage;
    const availableMargin =
      portfolio.freeMargin -
      portfolio.reservedNotional / leverage -
      portfolio.equity * this.limits.marginBufferPct;
    telemetry.requiredMargin = requiredMargin;
    telemetry.availableMargin = availableMargin;
    if (requiredMargin > availableMargin) {
      return this.reject(
        decision,
        'margin_limit',
        `Required margin ${requiredMargin.toFixed(2)} exceeds available ${availableMargin.toFixed(2)} after safety buffer`,
        telemetry
      );
    }

    this.logger.info(`Trade approved by RiskGatekeeper: ${decision.action} ${decision.assetPair}`);
    return { status: 'APPROVED', reason: 'approved', telemetry };
  }

  private reject(
    decision: Decision,
    reason: RejectionReason,
    message: string,
    telemetry: RiskTelemetry,
    recordCooldown = true
  ): Verdict {
    if (recordCooldown) {
      this.cooldowns.record(decision.assetPair, decision.action, reason);
    }
    this.logger.warn(
      `Trade rejected by RiskGatekeeper (${reason}): ${decision.action} ${decision.assetPair} - ${message}`
    );
    return { status: 'REJECTED', reason, message, telemetry };
  }
}
