/**
 * Pace tiers - the one classification behind gauge and text colors
 */

import type { PaceTier, ThemeRole } from '../types.js';

/** Below this ratio a window is critical, above it (and below 1) caution */
export const CAUTION_RATIO = 0.75;

/** At or above this ratio a window is comfortably ahead */
export const AHEAD_RATIO = 1 / CAUTION_RATIO;

export function classifyPace(ratio: number): PaceTier {
  if (ratio >= AHEAD_RATIO) return 'ahead';
  if (ratio >= 1) return 'onTrack';
  if (ratio >= CAUTION_RATIO) return 'caution';
  return 'critical';
}

export function tierRole(tier: PaceTier): ThemeRole {
  switch (tier) {
    case 'ahead':
      return 'paceAhead';
    case 'onTrack':
      return 'paceOnTrack';
    case 'caution':
      return 'paceCaution';
    case 'critical':
      return 'paceCritical';
  }
}
