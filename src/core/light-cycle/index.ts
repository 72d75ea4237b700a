export {
  createLightCycleState,
  recordLightChange,
  advanceLightCycle,
  changeStage,
  getLightVerdict,
  validateLightCycleConfig
} from './light-cycle';
export { sumOnSeconds, judgeWindow } from './helpers';
export type {
  LightPhase,
  PhaseRecord,
  LightScheduleStatus,
  LightWindowResult,
  LightCycleConfig,
  LightCycleState,
  LightCycleVerdict
} from './types';
