import type { RiskThresholds, RiskTier } from '../types.js';

export const DEFAULT_RISK_THRESHOLDS: Readonly<RiskThresholds> = Object.freeze({
  high: 0.8,
  medium: 0.6,
  low: 0.3
});

export function assertThresholdOrder(thresholds: RiskThresholds) {
  const { high, medium, low } = thresholds;
  if (!(high >= medium && medium >= low)) {
    throw new RangeError(
      `Risk thresholds must satisfy high >= medium >= low (received ${high}, ${medium}, ${low})`
    );
  }
}

/**
 * Inclusive comparisons, highest tier first. There is no "none" tier: callers
 * decide upstream whether a score warrants classification at all.
 */
export function classifyRisk(score: number, thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS): RiskTier {
  if (score >= thresholds.high) {
    return 'high';
  }
  if (score >= thresholds.medium) {
    return 'medium';
  }
  return 'low';
}
