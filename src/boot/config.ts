import type { ConditionName } from '$types/common';
import type { ConditionConfig, GrowspaceConfig } from '$types/config';
import type { GrowspaceAppConstants, GrowspaceConfigOverrides, GrowspaceUserConfig } from './types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Defaults every growspace starts from. Per-growspace
//   overrides go through createGrowspaceConfig().
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<GrowspaceUserConfig> = {
  // INITIAL_STAGE
  //   Role: Growth stage assumed until the first stage event arrives.
  //   Critical: One of seedling, clone, mother, veg, flower, dry, cure.
  //   Recommended: veg; stage events normally arrive right after startup.
  INITIAL_STAGE: 'veg',

  // STRESS_ENABLED / STRESS_PRIOR
  //   Role: Plant stress verdict and its prior probability.
  //   Critical: Prior strictly inside (0, 1) (error at 0 or 1).
  //   Recommended: 0.1–0.2; 0.15 keeps ideal conditions well below the turn-on threshold.
  STRESS_ENABLED: true,
  STRESS_PRIOR: 0.15,

  // MOLD_ENABLED / MOLD_PRIOR
  //   Role: Mold risk verdict and its prior probability.
  //   Critical: Prior strictly inside (0, 1).
  //   Recommended: 0.05–0.15; mold is rare in a well-run space.
  MOLD_ENABLED: true,
  MOLD_PRIOR: 0.1,

  // OPTIMAL_ENABLED / OPTIMAL_PRIOR
  //   Role: Optimal conditions verdict and its prior probability.
  //   Critical: Prior strictly inside (0, 1).
  //   Recommended: 0.3–0.5; in-range readings push it up quickly.
  OPTIMAL_ENABLED: true,
  OPTIMAL_PRIOR: 0.4,

  // TURN_ON_THRESHOLD / TURN_OFF_THRESHOLD
  //   Role: Dead-band for every verdict: on at or above, off at or below.
  //   Critical: Both inside (0, 1), TURN_ON_THRESHOLD > TURN_OFF_THRESHOLD.
  //   Recommended: 0.7 / 0.3; a wide band keeps verdicts from chattering.
  TURN_ON_THRESHOLD: 0.7,
  TURN_OFF_THRESHOLD: 0.3,

  // MIN_DWELL_SEC
  //   Role: Time a raw classification must hold before the verdict follows.
  //   Critical: 0–86400 s.
  //   Recommended: 300 s; rejects single noisy samples without hiding real trends.
  MIN_DWELL_SEC: 300,

  // LIKELIHOOD_SHAPE / SATURATION_DISTANCE
  //   Role: Falloff from ideal range to extreme ratio ('linear' or 'gaussian');
  //   SATURATION_DISTANCE is where the linear curve reaches the extreme.
  //   Critical: SATURATION_DISTANCE > 0.
  //   Recommended: 'gaussian' with 3 tolerance units.
  LIKELIHOOD_SHAPE: 'gaussian',
  SATURATION_DISTANCE: 3,

  // MIN_LIKELIHOOD_RATIO / MAX_LIKELIHOOD_RATIO
  //   Role: Clamp on any single variable's likelihood ratio.
  //   Critical: 0 < MIN < 1 < MAX.
  //   Recommended: 0.05 / 20; one outlier cannot saturate the posterior.
  MIN_LIKELIHOOD_RATIO: 0.05,
  MAX_LIKELIHOOD_RATIO: 20,

  // LIGHT_HOURS
  //   Role: Expected light-on hours per 24h window, per stage.
  //   Critical: 0–24 for every stage.
  //   Recommended: 18 for vegetative stages, 12 for flower, 0 for dry and cure.
  LIGHT_HOURS: {
    seedling: 18,
    clone: 18,
    mother: 18,
    veg: 18,
    flower: 12,
    dry: 0,
    cure: 0
  },

  // LIGHT_TOLERANCE_SEC
  //   Role: Allowed deviation of observed on-time per window.
  //   Critical: 0–7200 s.
  //   Recommended: 900 s (15 min); timers drift a few minutes a day.
  LIGHT_TOLERANCE_SEC: 900,

  // LIGHT_ROLLOVER_HOUR_UTC
  //   Role: UTC hour light windows roll over at; null anchors windows to the first transition.
  //   Critical: Integer 0–23 or null.
  //   Recommended: null unless reports must line up with calendar days.
  LIGHT_ROLLOVER_HOUR_UTC: null,

  // LIGHT_DEBOUNCE_SEC
  //   Role: Minimum hold before a raw light change is accepted.
  //   Critical: 0–3600 s.
  //   Recommended: 0; flapping is the fault the light verdict exists to surface.
  LIGHT_DEBOUNCE_SEC: 0,

  // MAX_READING_AGE_SEC
  //   Role: Readings older than this count as unavailable (offline sensor).
  //   Critical: 0–86400 s; 0 disables the check.
  //   Recommended: 1800 s; several missed reports before evidence is dropped.
  MAX_READING_AGE_SEC: 1800,

  // TREND_WINDOW_SEC / TREND_MIN_CHANGE
  //   Role: History kept for trend evidence, and the first-to-last change per
  //   variable that counts as rising or falling.
  //   Critical: Window 0–86400 s (0 disables); every minimum change > 0.
  //   Recommended: 1800 s; 1 °C, 1 %RH and 0.2 kPa ignore sensor jitter.
  TREND_WINDOW_SEC: 1800,
  TREND_MIN_CHANGE: {
    temperature: 1,
    humidity: 1,
    vpd: 0.2
  },

  // DERIVE_VPD
  //   Role: Compute VPD from temperature and humidity when no VPD reading exists.
  //   Critical: Boolean only.
  //   Recommended: false; turn on only when no VPD sensor is wired, since the
  //   derived value adds a second vote from the same two readings.
  DERIVE_VPD: false,

  // DEFAULT_PHASE
  //   Role: Day/night phase used without a known light state.
  //   Critical: 'day' or 'night'.
  //   Recommended: 'day'.
  DEFAULT_PHASE: 'day',

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to the console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_LOG_LEVEL: 1,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 (DEBUG) only while tuning.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Uptime after which INFO logs are suppressed (0 disables).
  //   Critical: 0–720 h.
  //   Recommended: 24 h for long-running hosts.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<GrowspaceAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3
  },

  // CONSOLE_BUFFER_SIZE
  //   Role: Maximum number of queued console log messages.
  //   Critical: > 0.
  //   Recommended: 200; enough for a verdict burst across many growspaces.
  CONSOLE_BUFFER_SIZE: 200,

  // CONSOLE_INTERVAL_MS / CONSOLE_DRAIN_BATCH
  //   Role: Drain period and messages written per drain.
  //   Critical: Both > 0.
  //   Recommended: 50 ms / 20 messages.
  CONSOLE_INTERVAL_MS: 50,
  CONSOLE_DRAIN_BATCH: 20
};

/**
 * Condition settings from the defaults
 * @param condition - Condition name
 * @returns Enabled flag, prior, thresholds and dwell
 */
function defaultCondition(condition: ConditionName): ConditionConfig {
  const enabled = {
    stress: USER_CONFIG.STRESS_ENABLED,
    mold: USER_CONFIG.MOLD_ENABLED,
    optimal: USER_CONFIG.OPTIMAL_ENABLED
  };
  const prior = {
    stress: USER_CONFIG.STRESS_PRIOR,
    mold: USER_CONFIG.MOLD_PRIOR,
    optimal: USER_CONFIG.OPTIMAL_PRIOR
  };

  return {
    enabled: enabled[condition],
    prior: prior[condition],
    turnOnThreshold: USER_CONFIG.TURN_ON_THRESHOLD,
    turnOffThreshold: USER_CONFIG.TURN_OFF_THRESHOLD,
    minDwellSec: USER_CONFIG.MIN_DWELL_SEC
  };
}

/**
 * Build a complete growspace configuration from the defaults
 *
 * @param id - Growspace identifier
 * @param overrides - Settings to change; nested objects merge per key
 * @returns Configuration ready for validation
 *
 * @example
 * ```typescript
 * const tent = createGrowspaceConfig('tent-a', {
 *   sensors: { co2: false },
 *   conditions: { mold: { minDwellSec: 600 } }
 * });
 * ```
 */
export function createGrowspaceConfig(id: string, overrides: GrowspaceConfigOverrides = {}): GrowspaceConfig {
  const conditions = overrides.conditions ?? {};
  const light = overrides.light ?? {};
  const trend = overrides.trend ?? {};

  return {
    id: id,
    initialStage: overrides.initialStage ?? USER_CONFIG.INITIAL_STAGE,
    conditions: {
      stress: { ...defaultCondition('stress'), ...conditions.stress },
      mold: { ...defaultCondition('mold'), ...conditions.mold },
      optimal: { ...defaultCondition('optimal'), ...conditions.optimal }
    },
    sensors: {
      temperature: true,
      humidity: true,
      vpd: true,
      co2: true,
      fan_state: true,
      dehumidifier_state: true,
      humidifier_state: true,
      light: true,
      ...overrides.sensors
    },
    light: {
      hours: { ...USER_CONFIG.LIGHT_HOURS, ...light.hours },
      toleranceSec: light.toleranceSec ?? USER_CONFIG.LIGHT_TOLERANCE_SEC,
      rolloverHourUtc: light.rolloverHourUtc !== undefined ? light.rolloverHourUtc : USER_CONFIG.LIGHT_ROLLOVER_HOUR_UTC,
      debounceSec: light.debounceSec ?? USER_CONFIG.LIGHT_DEBOUNCE_SEC
    },
    likelihood: {
      shape: USER_CONFIG.LIKELIHOOD_SHAPE,
      saturationDistance: USER_CONFIG.SATURATION_DISTANCE,
      minRatio: USER_CONFIG.MIN_LIKELIHOOD_RATIO,
      maxRatio: USER_CONFIG.MAX_LIKELIHOOD_RATIO,
      ...overrides.likelihood
    },
    trend: {
      windowSec: trend.windowSec ?? USER_CONFIG.TREND_WINDOW_SEC,
      minChange: { ...USER_CONFIG.TREND_MIN_CHANGE, ...trend.minChange }
    },
    maxReadingAgeSec: overrides.maxReadingAgeSec ?? USER_CONFIG.MAX_READING_AGE_SEC,
    deriveVpd: overrides.deriveVpd ?? USER_CONFIG.DERIVE_VPD,
    defaultPhase: overrides.defaultPhase ?? USER_CONFIG.DEFAULT_PHASE
  };
}
