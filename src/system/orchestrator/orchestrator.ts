/**
 * Per-growspace inference orchestrator
 *
 * Owns the readings, one hysteresis gate per enabled condition, the light
 * debounce and the light cycle verifier of a single growspace. Every input
 * goes through one FIFO queue and is applied synchronously, using the
 * event timestamp as the current time.
 */

import { ConfigurationError } from '$types/errors';
import { CONDITION_NAMES, GROWTH_STAGES, TIME_CONSTANTS, TREND_VARIABLES } from '@utils/constants';
import { isFiniteNumber } from '@utils/number';
import { daysSince } from '@utils/time';
import { DEFAULT_PROFILE_TABLE, resolveProfile } from '@core/threshold-profile';
import { validateLikelihoodConfig } from '@core/likelihood';
import { CONDITION_SOURCES, estimatePosterior, validatePrior } from '@core/bayesian-estimator';
import { createGateState, updateGate, validateGateConfig } from '@core/hysteresis-gate';
import {
  advanceLightCycle,
  changeStage,
  createLightCycleState,
  getLightVerdict,
  recordLightChange,
  validateLightCycleConfig
} from '@core/light-cycle';
import { createLightDebounceState, updateLightDebounce } from '@features/light-debounce';
import { recordTrendSample } from '@features/trend';
import { fmtProbability } from '@logging';
import {
  collectEvidenceReadings,
  isTrendVariable,
  lightVerdictChanged,
  normalizeSensorValue,
  phaseFor,
  verdictChanged
} from './helpers';

import type { ConditionName, GrowthStage, ReadingSnapshot } from '$types/common';
import type { GrowspaceConfig } from '$types/config';
import type { GateState } from '@core/hysteresis-gate';
import type { LightCycleConfig, LightCycleState } from '@core/light-cycle';
import type { LightDebounceResult } from '@features/light-debounce';
import type { OutputEvent, OutputListener, VerdictUpdateEvent } from '@events';
import type { TrendHistory } from './helpers';
import type { Orchestrator, OrchestratorDeps, QueuedWork } from './types';

const INITIAL_VIEW = { value: 'unknown', stale: true, probability: null } as const;

/**
 * Check everything the orchestrator relies on before it starts
 * @param config - Growspace configuration
 * @throws {ConfigurationError} Subclass naming the first bad field
 */
function validateSetup(config: GrowspaceConfig): void {
  if (typeof config.id !== 'string' || config.id.trim() === '') {
    throw new ConfigurationError('growspace: id must be a non-empty string (got "' + String(config.id) + '")');
  }

  for (const condition of CONDITION_NAMES) {
    const cc = config.conditions[condition];
    if (!cc.enabled) continue;
    validatePrior(cc.prior, condition);
    validateGateConfig(cc, config.id + '.' + condition);
  }

  validateLikelihoodConfig(config.likelihood, config.id + '.likelihood');

  const lightConfig: LightCycleConfig = {
    toleranceSec: config.light.toleranceSec,
    rolloverHourUtc: config.light.rolloverHourUtc
  };
  for (const stage of GROWTH_STAGES) {
    validateLightCycleConfig(lightConfig, config.light.hours[stage] * TIME_CONSTANTS.SECONDS_PER_HOUR);
  }

  if (!isFiniteNumber(config.light.debounceSec) || config.light.debounceSec < 0) {
    throw new ConfigurationError(config.id + '.light: debounce must be non-negative (got ' + config.light.debounceSec + ')');
  }
  if (!isFiniteNumber(config.trend.windowSec) || config.trend.windowSec < 0) {
    throw new ConfigurationError(config.id + '.trend: window must be non-negative (got ' + config.trend.windowSec + ')');
  }
  for (const variable of TREND_VARIABLES) {
    const minChange = config.trend.minChange[variable];
    if (!isFiniteNumber(minChange) || minChange <= 0) {
      throw new ConfigurationError(config.id + '.trend: ' + variable + ' minimum change must be positive (got ' + minChange + ')');
    }
  }
  if (!isFiniteNumber(config.maxReadingAgeSec) || config.maxReadingAgeSec < 0) {
    throw new ConfigurationError(config.id + ': maximum reading age must be non-negative (got ' + config.maxReadingAgeSec + ')');
  }
}

/**
 * Create the orchestrator for one growspace
 *
 * @param config - Growspace configuration
 * @param deps - Logger and optional profile table
 * @returns Orchestrator handle
 * @throws {ConfigurationError} When the configuration is invalid
 *
 * @remarks
 * Calls made from inside a listener are queued behind the event being
 * applied. A sensor update still waiting in the queue is replaced by a
 * newer one for the same variable. Timestamps never run backwards: an
 * older timestamp is evaluated at the latest time seen.
 *
 * @example
 * ```typescript
 * const tent = createOrchestrator(createGrowspaceConfig('tent-a'), { logger });
 * tent.on((event) => publish(event));
 * tent.handleSensorUpdate({ variable: 'temperature', value: 30, timestamp: now() });
 * ```
 */
export function createOrchestrator(config: GrowspaceConfig, deps: OrchestratorDeps): Orchestrator {
  validateSetup(config);

  const logger = deps.logger;
  const table = deps.profiles ?? DEFAULT_PROFILE_TABLE;
  const tag = '[' + config.id + '] ';
  const lightConfig: LightCycleConfig = {
    toleranceSec: config.light.toleranceSec,
    rolloverHourUtc: config.light.rolloverHourUtc
  };
  const enabled = CONDITION_NAMES.filter((c) => config.conditions[c].enabled);

  let stage: GrowthStage = config.initialStage;
  let stageStart: number | null = null;
  let clock: number | null = null;
  let readings: ReadingSnapshot = {};
  let history: TrendHistory = {};
  const gates: Record<ConditionName, GateState> = {
    stress: createGateState(),
    mold: createGateState(),
    optimal: createGateState()
  };
  let latest: Partial<Record<ConditionName, VerdictUpdateEvent>> = {};
  let lightOn: boolean | null = null;
  let debounce = createLightDebounceState();
  let light: LightCycleState = createLightCycleState(expectedOnSec(stage));
  let publishedLight = getLightVerdict(light);

  let listeners: OutputListener[] = [];
  const queue: QueuedWork[] = [];
  let draining = false;
  let disposed = false;

  function expectedOnSec(s: GrowthStage): number {
    return config.light.hours[s] * TIME_CONSTANTS.SECONDS_PER_HOUR;
  }

  /**
   * Move the clock forward to an event timestamp
   * @param timestamp - Event time in seconds
   * @returns Time to evaluate at
   */
  function advanceClock(timestamp: number): number {
    clock = clock === null ? timestamp : Math.max(clock, timestamp);
    return clock;
  }

  function emit(event: OutputEvent): void {
    const current = listeners.slice();
    for (let i = 0; i < current.length; i++) {
      try {
        current[i](event);
      } catch (err) {
        logger.warning(tag + 'listener error: ' + String(err));
      }
    }
  }

  /**
   * Apply a debounce result, then close every light window due by now
   *
   * @remarks
   * A released change keeps the time it began. When a window closed while
   * the change was pending, the verifier moves the change up to the new
   * window's start; the closed window keeps the on-time it was judged with.
   */
  function applyDebounced(result: LightDebounceResult, now: number): void {
    debounce = result.state;
    if (result.accepted) {
      light = recordLightChange(light, result.accepted.on, result.accepted.timestamp, lightConfig);
      lightOn = result.accepted.on;
      logger.debug(tag + 'light ' + (lightOn === null ? 'unavailable' : lightOn ? 'on' : 'off'));
    }
    light = advanceLightCycle(light, now, lightConfig);
  }

  /**
   * Re-run every enabled condition and the light verdict at a time
   * @param now - Evaluation timestamp
   */
  function evaluate(now: number): void {
    const phase = phaseFor(lightOn, config.sensors.light, config.defaultPhase);
    const profile = resolveProfile(table, stage, phase, daysSince(stageStart, now));
    const context = {
      readings: collectEvidenceReadings(readings, config, now, history),
      profile: profile,
      phase: phase,
      likelihood: config.likelihood
    };

    for (const condition of enabled) {
      const cc = config.conditions[condition];
      const estimate = estimatePosterior(condition, cc.prior, CONDITION_SOURCES[condition], context);
      const update = updateGate(gates[condition], estimate, now, cc);
      gates[condition] = update.state;

      const event: VerdictUpdateEvent = {
        type: 'verdict',
        growspaceId: config.id,
        condition: condition,
        value: update.verdict.value,
        probability: update.verdict.probability,
        contributingVariables: estimate.kind === 'estimate' ? estimate.contributing : [],
        reasons: estimate.kind === 'estimate' ? estimate.reasons : [],
        lowConfidence: estimate.kind === 'estimate' && estimate.lowConfidence,
        stale: update.verdict.stale,
        changedAt: update.verdict.changedAt,
        timestamp: now
      };
      const prev = latest[condition];
      latest[condition] = event;

      if (update.verdict.changed) {
        logger.info(tag + condition + ' -> ' + String(event.value) + ' (p=' + fmtProbability(event.probability) + ')');
      }
      if (verdictChanged(prev ?? INITIAL_VIEW, event)) {
        emit(event);
      }
    }

    const lightVerdict = getLightVerdict(light);
    if (lightVerdictChanged(publishedLight, lightVerdict)) {
      if (lightVerdict.status === 'incorrect' && publishedLight.status !== 'incorrect') {
        logger.warning(tag + 'light schedule incorrect: ' + String(lightVerdict.observedOnSec) +
          's on, expected ' + lightVerdict.expectedOnSec + 's');
      }
      publishedLight = lightVerdict;
      emit({
        type: 'light_schedule',
        growspaceId: config.id,
        status: lightVerdict.status,
        observedOnSec: lightVerdict.observedOnSec,
        expectedOnSec: lightVerdict.expectedOnSec,
        timestamp: now
      });
    }
  }

  /**
   * Release a held light change and close due windows before any evaluation
   * @param now - Evaluation timestamp
   */
  function catchUpLight(now: number): void {
    if (config.sensors.light) {
      applyDebounced(updateLightDebounce(debounce, undefined, now, config.light.debounceSec), now);
    }
  }

  function apply(work: QueuedWork): void {
    switch (work.kind) {
      case 'sensor': {
        const update = work.update;
        if (!config.sensors[update.variable]) {
          logger.debug(tag + 'ignoring unbound variable ' + update.variable);
          return;
        }
        const value = normalizeSensorValue(update.variable, update.value);
        if (value === null && update.value !== null) {
          logger.debug(tag + update.variable + ': unusable value treated as unavailable (got ' + String(update.value) + ')');
        }
        const next: ReadingSnapshot = { ...readings };
        next[update.variable] = { variable: update.variable, value: value, timestamp: update.timestamp };
        readings = next;
        const variable = update.variable;
        if (isTrendVariable(variable) && typeof value === 'number') {
          const nextHistory: TrendHistory = { ...history };
          nextHistory[variable] = recordTrendSample(history[variable] ?? [], value, update.timestamp, config.trend.windowSec);
          history = nextHistory;
        }
        const now = advanceClock(update.timestamp);
        catchUpLight(now);
        evaluate(now);
        return;
      }
      case 'stage': {
        const now = advanceClock(work.change.timestamp);
        catchUpLight(now);
        const previous = stage;
        stage = work.change.stage;
        stageStart = work.change.stageStart;
        if (stage !== previous) {
          light = changeStage(light, expectedOnSec(stage), now, lightConfig);
          logger.info(tag + 'stage ' + previous + ' -> ' + stage);
        }
        evaluate(now);
        return;
      }
      case 'light': {
        if (!config.sensors.light) {
          logger.debug(tag + 'ignoring light change: no light sensor bound');
          return;
        }
        const now = advanceClock(work.change.timestamp);
        applyDebounced(updateLightDebounce(debounce, work.change.on, now, config.light.debounceSec), now);
        evaluate(now);
        return;
      }
      case 'tick': {
        const now = advanceClock(work.now);
        catchUpLight(now);
        evaluate(now);
        return;
      }
    }
  }

  function drain(): void {
    draining = true;
    try {
      let work = queue.shift();
      while (work && !disposed) {
        apply(work);
        work = queue.shift();
      }
    } finally {
      draining = false;
    }
  }

  function enqueue(work: QueuedWork, timestamp: number): void {
    if (disposed) {
      return;
    }
    if (!isFiniteNumber(timestamp)) {
      logger.warning(tag + 'dropping ' + work.kind + ' event with invalid timestamp (got ' + String(timestamp) + ')');
      return;
    }

    if (work.kind === 'sensor') {
      const variable = work.update.variable;
      const pending = queue.findIndex((w) => w.kind === 'sensor' && w.update.variable === variable);
      if (pending >= 0) {
        queue[pending] = work;
        return;
      }
    }

    queue.push(work);
    if (!draining) {
      drain();
    }
  }

  return {
    id: config.id,

    handleSensorUpdate(update) {
      enqueue({ kind: 'sensor', update: update }, update.timestamp);
    },

    handleStageChange(change) {
      enqueue({ kind: 'stage', change: change }, change.timestamp);
    },

    handleLightChange(change) {
      enqueue({ kind: 'light', change: change }, change.timestamp);
    },

    tick(now) {
      enqueue({ kind: 'tick', now: now }, now);
    },

    getSnapshot() {
      const now = clock;
      return {
        growspaceId: config.id,
        stage: stage,
        stageAgeDays: now === null ? undefined : daysSince(stageStart, now),
        phase: phaseFor(lightOn, config.sensors.light, config.defaultPhase),
        verdicts: { ...latest },
        light: getLightVerdict(light)
      };
    },

    on(listener) {
      if (disposed) {
        return function noop() {};
      }
      listeners.push(listener);
      return function unsubscribe() {
        listeners = listeners.filter((l) => l !== listener);
      };
    },

    dispose() {
      if (disposed) return;
      disposed = true;
      queue.length = 0;
      listeners = [];
      readings = {};
      history = {};
      latest = {};
      logger.debug(tag + 'disposed');
    }
  };
}
