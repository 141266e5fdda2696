import {
  DEFAULT_WEIGHT_BOUNDS,
  NEUTRAL_PULSE_SCORE,
  WEIGHT_EPSILON,
  WEIGHT_TOTAL,
} from '@/lib/constants';
import type { SectorScores, SectorWeights, WeightBounds } from '@/types/pulse';
import { InvalidWeightError, UnknownSectorError } from './errors';

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Round to a fixed number of decimal places (2 by default, the precision weights are shown at)
 */
export function roundTo(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function sumWeights(weights: SectorWeights): number {
  return Object.values(weights).reduce((total, weight) => total + weight, 0);
}

export function isNormalized(weights: SectorWeights): boolean {
  return Math.abs(sumWeights(weights) - WEIGHT_TOTAL) <= WEIGHT_EPSILON;
}

/**
 * Weight-normalized average of the sector scores.
 *
 * Only sectors present in `scores` take part. A sector missing from `weights`
 * contributes nothing, and when no weight is left at all the neutral score is
 * returned instead of dividing by zero.
 */
export function computePulse(scores: SectorScores, weights: SectorWeights): number {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const [sector, score] of Object.entries(scores)) {
    const weight = weights[sector];
    if (weight === undefined || !Number.isFinite(weight) || weight <= 0) continue;
    if (!Number.isFinite(score)) continue;

    weightedSum += score * weight;
    totalWeight += weight;
  }

  if (totalWeight <= 0) {
    return NEUTRAL_PULSE_SCORE;
  }

  return clamp(weightedSum / totalWeight, 0, 100);
}

/**
 * Set one sector's weight and rescale every other sector so the map sums to 100.
 *
 * The new value is clamped to `bounds`. Others are scaled by
 * `(100 - newValue) / otherTotal`, weights are rounded to two decimals, and any
 * remaining residual is added to the first other sector.
 *
 * @throws UnknownSectorError when `editedSector` is not in `weights`
 * @throws InvalidWeightError when `newValue` is not a finite number
 */
export function applyWeightEdit(
  weights: SectorWeights,
  editedSector: string,
  newValue: number,
  bounds: WeightBounds = DEFAULT_WEIGHT_BOUNDS
): SectorWeights {
  if (!Object.hasOwn(weights, editedSector)) {
    throw new UnknownSectorError(editedSector);
  }
  if (!Number.isFinite(newValue)) {
    throw new InvalidWeightError(editedSector, newValue);
  }

  const otherSectors = Object.keys(weights).filter((sector) => sector !== editedSector);

  // A lone sector has nowhere to send the remainder
  if (otherSectors.length === 0) {
    return { [editedSector]: WEIGHT_TOTAL };
  }

  const value = clamp(newValue, bounds.minWeight, bounds.maxWeight);
  const next: SectorWeights = { ...weights, [editedSector]: roundTo(value) };

  const otherTotal = otherSectors.reduce((total, sector) => total + weights[sector], 0);
  if (otherTotal > 0) {
    const scaleFactor = (WEIGHT_TOTAL - value) / otherTotal;
    for (const sector of otherSectors) {
      next[sector] = roundTo(weights[sector] * scaleFactor);
    }
  }

  return settleResidual(next, otherSectors[0]);
}

/**
 * Equal split of 100 across the given sectors. Duplicates are counted once.
 */
export function resetToEqualWeights(sectors: Iterable<string>): SectorWeights {
  const unique = Array.from(new Set(sectors));
  const share = WEIGHT_TOTAL / unique.length;

  return Object.fromEntries(unique.map((sector) => [sector, share]));
}

/**
 * Push whatever is left between the total and 100 onto a single sector.
 */
export function settleResidual(weights: SectorWeights, absorbingSector: string): SectorWeights {
  // Rounded first so float noise below a cent never moves a weight
  const residual = roundTo(WEIGHT_TOTAL - sumWeights(weights));
  if (residual === 0) {
    return weights;
  }

  return {
    ...weights,
    [absorbingSector]: roundTo(weights[absorbingSector] + residual),
  };
}

/**
 * One-decimal Pulse score for display and history
 */
export function roundPulseScore(score: number): number {
  return roundTo(score, 1);
}
