import { create } from 'zustand';
import { persist, createJSONStorage } from 'zustand/middleware';
import { DEFAULT_SECTORS, LOCAL_STORAGE_KEYS } from '@/lib/constants';
import {
  PulseCalculationError,
  applyWeightEdit,
  computePulse,
  isNormalized,
  resetToEqualWeights,
  roundPulseScore,
  weightsFromMarketCaps,
} from '@/lib/pulse';
import type { SectorMarketCaps, SectorScores, SectorWeights } from '@/types/pulse';

interface PulseState {
  scores: SectorScores;
  weights: SectorWeights;
  pulseScore: number;
  scoresUpdatedAt: string | null;
  lastEditedSector: string | null;
  error: string | null;
}

interface PulseActions {
  // Feed
  replaceScores: (scores: SectorScores, updatedAt?: string) => void;

  // Weights
  editWeight: (sector: string, value: number) => boolean;
  resetWeights: () => void;
  applyMarketCapWeights: (marketCaps: SectorMarketCaps) => void;

  // State
  clearError: () => void;
  reset: () => void;
}

type PulseStore = PulseState & PulseActions;

// Kept at the one-decimal precision the card displays
function pulseFor(scores: SectorScores, weights: SectorWeights): number {
  return roundPulseScore(computePulse(scores, weights));
}

function createInitialState(): PulseState {
  const weights = resetToEqualWeights(DEFAULT_SECTORS);
  return {
    scores: {},
    weights,
    pulseScore: pulseFor({}, weights),
    scoresUpdatedAt: null,
    lastEditedSector: null,
    error: null,
  };
}

function hasSameSectors(weights: SectorWeights, scores: SectorScores): boolean {
  const weightSectors = Object.keys(weights);
  const scoreSectors = Object.keys(scores);
  return (
    weightSectors.length === scoreSectors.length &&
    scoreSectors.every((sector) => Object.hasOwn(weights, sector))
  );
}

function isWeightMap(value: unknown): value is SectorWeights {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(
      (weight) => typeof weight === 'number' && Number.isFinite(weight) && weight >= 0
    )
  );
}

/**
 * Single owner of the current weights.
 *
 * Every action derives its weights and the matching pulse score inside one
 * `set` call, so subscribers never observe one without the other and two
 * edits cannot interleave on the same snapshot.
 */
export const usePulseStore = create<PulseStore>()(
  persist(
    (set) => ({
      ...createInitialState(),

      replaceScores: (scores, updatedAt) =>
        set((state) => {
          let weights = state.weights;
          if (Object.keys(scores).length > 0 && !hasSameSectors(weights, scores)) {
            console.warn(
              '[pulseStore] Sector list changed, resetting to equal weights:',
              Object.keys(scores)
            );
            weights = resetToEqualWeights(Object.keys(scores));
          }
          return {
            scores,
            weights,
            pulseScore: pulseFor(scores, weights),
            scoresUpdatedAt: updatedAt ?? new Date().toISOString(),
          };
        }),

      editWeight: (sector, value) => {
        try {
          set((state) => {
            const weights = applyWeightEdit(state.weights, sector, value);
            return {
              weights,
              pulseScore: pulseFor(state.scores, weights),
              lastEditedSector: sector,
              error: null,
            };
          });
          return true;
        } catch (error) {
          if (error instanceof PulseCalculationError) {
            console.warn('[pulseStore] Rejected weight edit:', error.message);
            set({ error: error.message });
            return false;
          }
          throw error;
        }
      },

      resetWeights: () =>
        set((state) => {
          const sectors = Object.keys(state.scores);
          const weights = resetToEqualWeights(
            sectors.length > 0 ? sectors : Object.keys(state.weights)
          );
          return {
            weights,
            pulseScore: pulseFor(state.scores, weights),
            lastEditedSector: null,
            error: null,
          };
        }),

      applyMarketCapWeights: (marketCaps) =>
        set((state) => {
          const weights = weightsFromMarketCaps(marketCaps, Object.keys(state.weights));
          return {
            weights,
            pulseScore: pulseFor(state.scores, weights),
            lastEditedSector: null,
            error: null,
          };
        }),

      // State
      clearError: () => set({ error: null }),

      reset: () => set(createInitialState()),
    }),
    {
      name: LOCAL_STORAGE_KEYS.weights,
      storage: createJSONStorage(() => localStorage),
      partialize: (state) => ({
        weights: state.weights,
      }),
      merge: (persisted, current) => {
        if (
          typeof persisted !== 'object' ||
          persisted === null ||
          !('weights' in persisted) ||
          !isWeightMap(persisted.weights)
        ) {
          return current;
        }
        if (!isNormalized(persisted.weights)) {
          console.warn('[pulseStore] Ignoring stored weights that do not sum to 100');
          return current;
        }
        const weights = persisted.weights;
        return {
          ...current,
          weights,
          pulseScore: pulseFor(current.scores, weights),
        };
      },
    }
  )
);

// Selector hooks
export const usePulseScore = () => usePulseStore((state) => state.pulseScore);
export const useSectorWeights = () => usePulseStore((state) => state.weights);
export const useScoreMap = () => usePulseStore((state) => state.scores);
export const usePulseError = () => usePulseStore((state) => state.error);
