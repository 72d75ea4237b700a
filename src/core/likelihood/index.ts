export { falloff, interpolateLogRatio, clampRatio, validateLikelihoodConfig } from './likelihood';
