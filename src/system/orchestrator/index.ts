export { createOrchestrator } from './orchestrator';
export { collectEvidenceReadings, normalizeSensorValue, phaseFor } from './helpers';
export type {
  Orchestrator,
  OrchestratorDeps,
  GrowspaceSnapshot,
  SensorUpdate,
  StageChange,
  LightChange
} from './types';
