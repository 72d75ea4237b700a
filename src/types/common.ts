/**
 * Common type definitions used throughout the project
 */

/**
 * Cultivation lifecycle stage, owned by the growspace record
 */
export type GrowthStage = 'seedling' | 'clone' | 'mother' | 'veg' | 'flower' | 'dry' | 'cure';

/**
 * Day/night phase derived from the light state
 */
export type DayNightPhase = 'day' | 'night';

/**
 * Variables compared against a threshold profile
 */
export type NumericVariable = 'temperature' | 'humidity' | 'vpd' | 'co2';

/**
 * On/off equipment states used as evidence
 */
export type StateVariable = 'fan_state' | 'dehumidifier_state' | 'humidifier_state';

export type VariableName = NumericVariable | StateVariable;

/**
 * Numeric variables whose recent movement counts as evidence
 */
export type TrendVariable = 'temperature' | 'humidity' | 'vpd';

/**
 * Conditions the engine publishes a verdict for
 */
export type ConditionName = 'stress' | 'mold' | 'optimal';

/**
 * Raw reading value - null when the sensor reports unavailable
 */
export type SensorValue = number | boolean | null;

/**
 * Last reading received for a variable
 */
export interface SensorReading {
  variable: VariableName;
  value: SensorValue;
  /** Unix seconds */
  timestamp: number;
}

/**
 * Latest reading per variable (absent = never reported)
 */
export type ReadingSnapshot = Partial<Record<VariableName, SensorReading>>;
