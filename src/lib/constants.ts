import type { WeightBounds } from '@/types/pulse';

function envNumber(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const API_URL = process.env.PULSE_API_URL || 'http://localhost:8000';

export const SCORE_REFRESH_INTERVAL_MS = envNumber(
  process.env.PULSE_SCORE_REFRESH_MS,
  24 * 60 * 60 * 1000 // daily
);

export const STALE_TIME_MS = envNumber(process.env.PULSE_STALE_TIME_MS, 5 * 60 * 1000);

export const WEIGHT_TOTAL = 100;

export const WEIGHT_EPSILON = 0.01;

export const NEUTRAL_PULSE_SCORE = 50;

export const DEFAULT_WEIGHT_BOUNDS: WeightBounds = { minWeight: 1, maxWeight: 100 };

// Variant that lets a sector be edited down to nothing
export const ZERO_FLOOR_WEIGHT_BOUNDS: WeightBounds = { minWeight: 0, maxWeight: 100 };

export const PULSE_THRESHOLDS = {
  bullish: 60,
  neutral: 30,
} as const;

export const DEFAULT_SECTORS: readonly string[] = [
  'SMB SaaS',
  'Enterprise SaaS',
  'Cloud Infrastructure',
  'AdTech',
  'Fintech',
  'Consumer Internet',
  'eCommerce',
  'Cybersecurity',
  'Dev Tools / Analytics',
  'Semiconductors',
  'AI Infrastructure',
  'Vertical SaaS',
  'IT Services / Legacy Tech',
  'Hardware / Devices',
];

export const LOCAL_STORAGE_KEYS = {
  weights: 'sector_pulse_weights',
} as const;
