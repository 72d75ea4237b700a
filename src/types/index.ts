export type {
  GrowthStage,
  DayNightPhase,
  NumericVariable,
  StateVariable,
  VariableName,
  ConditionName,
  SensorValue,
  SensorReading,
  ReadingSnapshot
} from './common';

export type {
  LikelihoodShape,
  LikelihoodConfig,
  ConditionConfig,
  SensorBindings,
  LightScheduleConfig,
  GrowspaceConfig
} from './config';

export {
  ConfigurationError,
  PriorValidationError,
  GateValidationError,
  ProfileValidationError,
  LightCycleValidationError
} from './errors';
