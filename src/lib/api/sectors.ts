import { api } from './client';
import type { SectorMarketCapsResponse, SectorScoresResponse } from '@/types/pulse';

export const sectorsApi = {
  /**
   * Latest sentiment score for every tracked sector
   */
  getScores: () => api.get<SectorScoresResponse>('/api/v1/sectors/scores'),

  /**
   * Latest market capitalization per sector, used to derive default weights
   */
  getMarketCaps: (date?: string) =>
    api.get<SectorMarketCapsResponse>('/api/v1/sectors/market-caps', {
      params: { date },
    }),
};
