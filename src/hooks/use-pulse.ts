'use client';

import { useMemo } from 'react';
import { usePulseStore } from '@/stores/pulse-store';
import { sumWeights } from '@/lib/pulse';
import { getPulseColor, getPulseStatus } from '@/lib/utils';

/**
 * Everything the presentation layer needs to render the pulse and edit weights
 */
export function usePulse() {
  const pulseScore = usePulseStore((state) => state.pulseScore);
  const weights = usePulseStore((state) => state.weights);
  const scores = usePulseStore((state) => state.scores);
  const scoresUpdatedAt = usePulseStore((state) => state.scoresUpdatedAt);
  const error = usePulseStore((state) => state.error);
  const editWeight = usePulseStore((state) => state.editWeight);
  const resetWeights = usePulseStore((state) => state.resetWeights);
  const clearError = usePulseStore((state) => state.clearError);

  const totalWeight = useMemo(() => sumWeights(weights), [weights]);

  return {
    pulseScore,
    status: getPulseStatus(pulseScore),
    color: getPulseColor(pulseScore),
    weights,
    scores,
    totalWeight,
    scoresUpdatedAt,
    error,

    editWeight,
    resetWeights,
    clearError,
  };
}
