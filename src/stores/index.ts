export {
  usePulseStore,
  usePulseScore,
  useSectorWeights,
  useScoreMap,
  usePulseError,
} from './pulse-store';
