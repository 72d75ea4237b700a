export { createGateState, updateGate, validateGateConfig } from './hysteresis-gate';
export { classifyPosterior, dwellElapsed } from './helpers';
export type { GateConfig, GateState, GateVerdict, GateUpdate, RawClassification } from './types';
