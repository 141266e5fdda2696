export { usePulse } from './use-pulse';
export { useSectorFeed, useMarketCapWeights, SECTOR_SCORES_QUERY_KEY } from './use-sector-feed';
