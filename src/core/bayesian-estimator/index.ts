export { estimatePosterior, validatePrior } from './bayesian-estimator';
export { createRangeEvidence, createStateEvidence, createTrendEvidence } from './evidence';
export { CONDITION_SOURCES } from './conditions';
export type {
  EvidenceReadings,
  EvidenceContext,
  EvidenceSource,
  EvidenceSide,
  RangeEvidenceOptions,
  StateEvidenceOptions,
  TrendEvidenceOptions,
  PosteriorValue,
  InsufficientData,
  PosteriorEstimate
} from './types';
