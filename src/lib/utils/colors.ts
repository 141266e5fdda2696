import { PULSE_THRESHOLDS } from '@/lib/constants';
import type { PulseStatus } from '@/types/pulse';

export const PULSE_COLORS: Record<PulseStatus, string> = {
  Bullish: '#22C55E',  // Green
  Neutral: '#EAB308',  // Yellow
  Bearish: '#EF4444',  // Red
};

/**
 * Get the status label for a score
 * @param score - Pulse or sector score from 0 to 100
 */
export function getPulseStatus(score: number): PulseStatus {
  if (score >= PULSE_THRESHOLDS.bullish) return 'Bullish';
  if (score >= PULSE_THRESHOLDS.neutral) return 'Neutral';
  return 'Bearish';
}

export function getPulseColor(score: number): string {
  return PULSE_COLORS[getPulseStatus(score)];
}

/**
 * Get a CSS glow for the pulse card based on the score
 */
export function getPulseGlow(score: number): string {
  const color = getPulseColor(score);
  return `0 0 24px ${color}66`;
}
