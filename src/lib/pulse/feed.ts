import { WEIGHT_TOTAL } from '@/lib/constants';
import type {
  SectorMarketCaps,
  SectorScoreEntry,
  SectorScores,
  SectorWeights,
} from '@/types/pulse';
import { clamp, resetToEqualWeights, roundTo, settleResidual } from './calculator';

/**
 * Normalize a feed snapshot into a score map.
 * Accepts both the record form and the `{ sector, score }[]` list form.
 */
export function toScoreMap(input: SectorScores | SectorScoreEntry[]): SectorScores {
  const entries: [string, number][] = Array.isArray(input)
    ? input.map(({ sector, score }) => [sector, score])
    : Object.entries(input);

  const scores: SectorScores = {};
  for (const [sector, score] of entries) {
    if (!Number.isFinite(score)) {
      console.warn(`[feed] Dropping non-numeric score for ${sector}:`, score);
      continue;
    }
    scores[sector] = clamp(score, 0, 100);
  }
  return scores;
}

/**
 * Map a raw sentiment value from -1..1 onto the 0-100 Pulse scale
 */
export function rescaleRawSentiment(raw: number): number {
  return clamp(((raw + 1) / 2) * 100, 0, 100);
}

/**
 * Percentage weights proportional to each sector's market capitalization.
 *
 * When `sectors` is given only those sectors are weighted, and any of them
 * without a market cap gets 0.
 */
export function weightsFromMarketCaps(
  marketCaps: SectorMarketCaps,
  sectors: readonly string[] = Object.keys(marketCaps)
): SectorWeights {
  if (sectors.length === 0) return {};

  const caps = sectors.map((sector): [string, number] => {
    const cap = marketCaps[sector];
    return [sector, cap !== undefined && Number.isFinite(cap) && cap > 0 ? cap : 0];
  });
  const totalCap = caps.reduce((total, [, cap]) => total + cap, 0);

  if (totalCap <= 0) {
    return resetToEqualWeights(sectors);
  }

  const weights: SectorWeights = Object.fromEntries(
    caps.map(([sector, cap]) => [sector, roundTo((cap / totalCap) * WEIGHT_TOTAL)])
  );
  // Largest share absorbs the residual; a zero-cap sector stays at 0
  const [absorber] = caps.reduce((largest, entry) => (entry[1] > largest[1] ? entry : largest));
  return settleResidual(weights, absorber);
}
