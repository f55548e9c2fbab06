import type { Decision, ExecutionPlan } from '../agent/types.js';

export interface SizingLimits {
  riskPerTradePct: number;
  defaultStopLossFraction: number;
  maxPositionPct: number;
}

/**
 * Position size for a decision. A provider-recommended size is honoured; else
 * the size risks `riskPerTradePct` of equity at the stop-loss distance. Both
 * are capped at `maxPositionPct` of equity in notional terms.
 */
export function planPosition(params: {
  decision: Pick<Decision, 'recommendedPositionSize' | 'stopLossFraction'>;
  equity: number;
  price: number;
  limits: SizingLimits;
}): ExecutionPlan | null {
  const { decision, equity, price, limits } = params;
  if (!(price > 0) || !(equity > 0)) return null;

  let size: number;
  const recommended = decision.recommendedPositionSize;
  if (recommended != null && recommended > 0) {
    size = recommended;
  } else {
    const stopLoss =
      decision.stopLossFraction != null && decision.stopLossFraction > 0
        ? decision.stopLossFraction
        : limits.defaultStopLossFraction;
    const riskBudget = equity * limits.riskPerTradePct;
    size = riskBudget / stopLoss / price;
  }

  const maxNotional = equity * limits.maxPositionPct;
  if (size * price > maxNotional) {
    size = maxNotional / price;
  }
  if (!(size > 0) || !Number.isFinite(size)) return null;

  return { size, price, notional: size * price };
}
