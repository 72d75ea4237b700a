/**
 * Global constants used throughout the application
 */

import type { ConditionName, GrowthStage, NumericVariable, StateVariable, TrendVariable } from '$types/common';

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_MINUTE: 60,
  SECONDS_PER_HOUR: 3600,
  SECONDS_PER_DAY: 86400,
} as const;

export const GROWTH_STAGES: readonly GrowthStage[] = ['seedling', 'clone', 'mother', 'veg', 'flower', 'dry', 'cure'];

export const NUMERIC_VARIABLES: readonly NumericVariable[] = ['temperature', 'humidity', 'vpd', 'co2'];

export const STATE_VARIABLES: readonly StateVariable[] = ['fan_state', 'dehumidifier_state', 'humidifier_state'];

export const TREND_VARIABLES: readonly TrendVariable[] = ['temperature', 'humidity', 'vpd'];

export const CONDITION_NAMES: readonly ConditionName[] = ['stress', 'mold', 'optimal'];
