/**
 * Type definitions for the per-growspace inference orchestrator
 */

import type { ConditionName, DayNightPhase, GrowthStage } from '$types/common';
import type { Logger } from '@logging';
import type { ProfileTable } from '@core/threshold-profile';
import type { LightCycleVerdict } from '@core/light-cycle';
import type {
  LightChangeEvent,
  OutputListener,
  SensorUpdateEvent,
  StageChangeEvent,
  VerdictUpdateEvent
} from '@events';

// ═══════════════════════════════════════════════════════════════
// INPUTS
// Event payloads once routed to a growspace
// ═══════════════════════════════════════════════════════════════

export type SensorUpdate = Omit<SensorUpdateEvent, 'type' | 'growspaceId'>;

export type StageChange = Omit<StageChangeEvent, 'type' | 'growspaceId'>;

export type LightChange = Omit<LightChangeEvent, 'type' | 'growspaceId'>;

/**
 * Work item waiting in the per-growspace queue
 */
export type QueuedWork =
  | { kind: 'sensor'; update: SensorUpdate }
  | { kind: 'stage'; change: StageChange }
  | { kind: 'light'; change: LightChange }
  | { kind: 'tick'; now: number };

// ═══════════════════════════════════════════════════════════════
// DEPENDENCIES & API
// ═══════════════════════════════════════════════════════════════

export interface OrchestratorDeps {
  logger: Logger;
  /** Profile table override (defaults to the shipped table) */
  profiles?: ProfileTable;
}

/**
 * Published state of one growspace
 */
export interface GrowspaceSnapshot {
  growspaceId: string;
  stage: GrowthStage;
  /** Whole days in the current stage (undefined when the start is unknown) */
  stageAgeDays: number | undefined;
  phase: DayNightPhase;
  /** Latest verdict per enabled condition */
  verdicts: Partial<Record<ConditionName, VerdictUpdateEvent>>;
  light: LightCycleVerdict;
}

export interface Orchestrator {
  readonly id: string;
  handleSensorUpdate(update: SensorUpdate): void;
  handleStageChange(change: StageChange): void;
  handleLightChange(change: LightChange): void;
  /** Advance time without new input */
  tick(now: number): void;
  getSnapshot(): GrowspaceSnapshot;
  /**
   * Register an output listener
   * @returns Unsubscribe function
   */
  on(listener: OutputListener): () => void;
  /** Drop state and listeners; later calls are ignored */
  dispose(): void;
}
