/**
 * Type definitions for configuration defaults and engine bootstrap
 */

import type { ConditionName, DayNightPhase, GrowthStage, TrendVariable } from '$types/common';
import type {
  ConditionConfig,
  GrowspaceConfig,
  LightScheduleConfig,
  LikelihoodConfig,
  LikelihoodShape,
  SensorBindings
} from '$types/config';
import type { ConsoleAPI, Logger, LogLevel, LogLevels, TimerAPI } from '@logging';
import type { ProfileTable } from '@core/threshold-profile';
import type { Registry } from '@system/registry';

// ═══════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════

export interface GrowspaceUserConfig {
  INITIAL_STAGE: GrowthStage;
  STRESS_ENABLED: boolean;
  STRESS_PRIOR: number;
  MOLD_ENABLED: boolean;
  MOLD_PRIOR: number;
  OPTIMAL_ENABLED: boolean;
  OPTIMAL_PRIOR: number;
  TURN_ON_THRESHOLD: number;
  TURN_OFF_THRESHOLD: number;
  MIN_DWELL_SEC: number;
  LIKELIHOOD_SHAPE: LikelihoodShape;
  SATURATION_DISTANCE: number;
  MIN_LIKELIHOOD_RATIO: number;
  MAX_LIKELIHOOD_RATIO: number;
  LIGHT_HOURS: Readonly<Record<GrowthStage, number>>;
  LIGHT_TOLERANCE_SEC: number;
  LIGHT_ROLLOVER_HOUR_UTC: number | null;
  LIGHT_DEBOUNCE_SEC: number;
  MAX_READING_AGE_SEC: number;
  TREND_WINDOW_SEC: number;
  TREND_MIN_CHANGE: Readonly<Record<TrendVariable, number>>;
  DERIVE_VPD: boolean;
  DEFAULT_PHASE: DayNightPhase;
  CONSOLE_LOG_LEVEL: LogLevel;
  GLOBAL_LOG_LEVEL: LogLevel;
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

export interface GrowspaceAppConstants {
  LOG_LEVELS: LogLevels;
  CONSOLE_BUFFER_SIZE: number;
  CONSOLE_INTERVAL_MS: number;
  CONSOLE_DRAIN_BATCH: number;
}

/**
 * Partial settings merged over the defaults by createGrowspaceConfig
 */
export interface GrowspaceConfigOverrides {
  initialStage?: GrowthStage;
  conditions?: Partial<Record<ConditionName, Partial<ConditionConfig>>>;
  sensors?: Partial<SensorBindings>;
  light?: Partial<Omit<LightScheduleConfig, 'hours'>> & { hours?: Partial<Record<GrowthStage, number>> };
  likelihood?: Partial<LikelihoodConfig>;
  trend?: { windowSec?: number; minChange?: Partial<Record<TrendVariable, number>> };
  maxReadingAgeSec?: number;
  deriveVpd?: boolean;
  defaultPhase?: DayNightPhase;
}

// ═══════════════════════════════════════════════════════════════
// BOOTSTRAP
// ═══════════════════════════════════════════════════════════════

export interface InitOptions {
  /** Logger level (defaults to GLOBAL_LOG_LEVEL) */
  logLevel?: LogLevel;
  consoleApi?: ConsoleAPI;
  timerApi?: TimerAPI;
  /** Clock for log demotion, in seconds */
  timeSource?: () => number;
  profiles?: ProfileTable;
}

/**
 * Running engine returned by initialize()
 */
export interface Engine {
  registry: Registry;
  logger: Logger;
  /** Dispose every growspace and flush the console sink */
  dispose(): void;
}

export type { GrowspaceConfig };
