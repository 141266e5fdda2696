export {
  applyWeightEdit,
  clamp,
  computePulse,
  isNormalized,
  resetToEqualWeights,
  roundPulseScore,
  roundTo,
  settleResidual,
  sumWeights,
} from './calculator';
export { rescaleRawSentiment, toScoreMap, weightsFromMarketCaps } from './feed';
export {
  InvalidWeightError,
  PulseCalculationError,
  UnknownSectorError,
} from './errors';
export type { PulseErrorCode } from './errors';
