/** Sector name → sentiment on the 0-100 scale (50 = neutral). */
export type SectorScores = Record<string, number>;

/** Sector name → percentage contribution to the Pulse score. */
export type SectorWeights = Record<string, number>;

/** Sector name → market capitalization in USD. */
export type SectorMarketCaps = Record<string, number>;

export interface SectorScoreEntry {
  sector: string;
  score: number;
}

export interface WeightBounds {
  minWeight: number;
  maxWeight: number;
}

export type PulseStatus = 'Bullish' | 'Neutral' | 'Bearish';

export interface SectorScoresResponse {
  sectors: SectorScoreEntry[];
  updatedAt: string;          // ISO 8601
}

export interface SectorMarketCapsResponse {
  marketCaps: SectorMarketCaps;
  asOf: string;               // ISO 8601
}
