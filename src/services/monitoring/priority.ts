import type { PriorityTier } from './types.js';

export interface TierThresholds {
  highMin: number;
  mediumMin: number;
  lowMin: number;
}

export const DEFAULT_TIER_THRESHOLDS: Readonly<TierThresholds> = Object.freeze({
  highMin: 8,
  mediumMin: 6,
  lowMin: 4,
});

/** Lower bounds are inclusive. `null` means the thread is discarded. */
export function classifyTier(
  score: number,
  thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS,
): PriorityTier | null {
  if (score >= thresholds.highMin) return 'high';
  if (score >= thresholds.mediumMin) return 'medium';
  if (score >= thresholds.lowMin) return 'low';
  return null;
}
