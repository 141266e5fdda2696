export * from './lib/pulse';
export { sectorsApi, setAccessToken, ApiClientError } from './lib/api';
export { usePulseStore, usePulseScore, useSectorWeights, useScoreMap, usePulseError } from './stores';
export { usePulse, useSectorFeed, useMarketCapWeights } from './hooks';
export { PulseCard, SectorWeightEditor, PulseDashboard } from './components/pulse';
export { QueryProvider } from './components/providers/query-provider';
export { DEFAULT_SECTORS, DEFAULT_WEIGHT_BOUNDS, ZERO_FLOOR_WEIGHT_BOUNDS } from './lib/constants';
export type * from './types/pulse';
