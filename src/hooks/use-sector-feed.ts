'use client';

import { useEffect } from 'react';
import { useQuery, useMutation } from '@tanstack/react-query';
import { sectorsApi } from '@/lib/api/sectors';
import { toScoreMap } from '@/lib/pulse';
import { SCORE_REFRESH_INTERVAL_MS, STALE_TIME_MS } from '@/lib/constants';
import { usePulseStore } from '@/stores/pulse-store';
import type { SectorMarketCapsResponse, SectorScoresResponse } from '@/types/pulse';

export const SECTOR_SCORES_QUERY_KEY = ['sector-scores'] as const;

/**
 * Poll the sector score feed and swap each snapshot into the pulse store
 */
export function useSectorFeed(options: { refetchIntervalMs?: number } = {}) {
  const { refetchIntervalMs = SCORE_REFRESH_INTERVAL_MS } = options;
  const replaceScores = usePulseStore((state) => state.replaceScores);

  const query = useQuery<SectorScoresResponse>({
    queryKey: SECTOR_SCORES_QUERY_KEY,
    queryFn: sectorsApi.getScores,
    staleTime: STALE_TIME_MS,
    refetchInterval: refetchIntervalMs,
  });

  useEffect(() => {
    if (query.data) {
      replaceScores(toScoreMap(query.data.sectors), query.data.updatedAt);
    }
  }, [query.data, replaceScores]);

  useEffect(() => {
    if (query.error) {
      console.error('[useSectorFeed] Failed to load sector scores:', query.error);
    }
  }, [query.error]);

  return {
    isLoading: query.isLoading,
    isError: query.isError,
    error: query.error,
    updatedAt: query.data?.updatedAt ?? null,
    refetch: query.refetch,
  };
}

/**
 * Fetch sector market caps and make them the current weights
 */
export function useMarketCapWeights() {
  const applyMarketCapWeights = usePulseStore((state) => state.applyMarketCapWeights);

  return useMutation<SectorMarketCapsResponse, Error, void>({
    mutationFn: () => sectorsApi.getMarketCaps(),
    onSuccess: (data) => {
      applyMarketCapWeights(data.marketCaps);
    },
    onError: (error) => {
      console.error('[useMarketCapWeights] Failed to load market caps:', error);
    },
  });
}
