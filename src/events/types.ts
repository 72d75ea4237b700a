/**
 * Event types exchanged with the engine
 *
 * Collaborators push input events; the engine publishes output events to
 * registered listeners. All timestamps are Unix seconds.
 */

import type { ConditionName, GrowthStage, SensorValue, VariableName } from '$types/common';
import type { LightScheduleStatus } from '@core/light-cycle';

// ═══════════════════════════════════════════════════════════════
// INPUT EVENTS
// ═══════════════════════════════════════════════════════════════

/**
 * New reading for one variable (value null = unavailable)
 */
export interface SensorUpdateEvent {
  type: 'sensor_update';
  growspaceId: string;
  variable: VariableName;
  value: SensorValue;
  timestamp: number;
}

/**
 * Growth stage transition, pushed on every change
 */
export interface StageChangeEvent {
  type: 'stage_change';
  growspaceId: string;
  stage: GrowthStage;
  /** When the stage began (null when unknown) */
  stageStart: number | null;
  timestamp: number;
}

/**
 * Light or light-switch state change (on null = unavailable)
 */
export interface LightChangeEvent {
  type: 'light_change';
  growspaceId: string;
  on: boolean | null;
  timestamp: number;
}

export type InputEvent = SensorUpdateEvent | StageChangeEvent | LightChangeEvent;

// ═══════════════════════════════════════════════════════════════
// OUTPUT EVENTS
// ═══════════════════════════════════════════════════════════════

/**
 * Published verdict for one condition
 */
export interface VerdictUpdateEvent {
  type: 'verdict';
  growspaceId: string;
  condition: ConditionName;
  value: boolean | 'unknown';
  /** Current posterior, null when evidence is insufficient */
  probability: number | null;
  contributingVariables: VariableName[];
  /** Why the posterior moved, strongest evidence first */
  reasons: string[];
  lowConfidence: boolean;
  stale: boolean;
  changedAt: number | null;
  timestamp: number;
}

/**
 * Published light schedule verdict
 */
export interface LightScheduleEvent {
  type: 'light_schedule';
  growspaceId: string;
  status: LightScheduleStatus;
  observedOnSec: number | null;
  expectedOnSec: number;
  timestamp: number;
}

export type OutputEvent = VerdictUpdateEvent | LightScheduleEvent;

export type OutputListener = (event: OutputEvent) => void;

/**
 * Event type names
 */
export const EVENT_TYPES = {
  SENSOR_UPDATE: 'sensor_update',
  STAGE_CHANGE: 'stage_change',
  LIGHT_CHANGE: 'light_change',
  VERDICT: 'verdict',
  LIGHT_SCHEDULE: 'light_schedule'
} as const;
