/**
 * Input event parsing
 *
 * Turns untrusted values (e.g. a line of JSON from a recording) into typed
 * input events. Parsing never throws; failures are returned as messages.
 */

import { GROWTH_STAGES, NUMERIC_VARIABLES, STATE_VARIABLES } from '@utils/constants';
import { isFiniteNumber } from '@utils/number';
import { EVENT_TYPES } from './types';

import type { GrowthStage, SensorValue, VariableName } from '$types/common';
import type { InputEvent } from './types';

export type ParseResult =
  | { ok: true; event: InputEvent }
  | { ok: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVariableName(value: unknown): value is VariableName {
  return NUMERIC_VARIABLES.some(function(v) { return v === value; }) ||
    STATE_VARIABLES.some(function(v) { return v === value; });
}

function isGrowthStage(value: unknown): value is GrowthStage {
  return GROWTH_STAGES.some(function(s) { return s === value; });
}

function isSensorValue(value: unknown): value is SensorValue {
  return value === null || typeof value === 'number' || typeof value === 'boolean';
}

function isOptionalTimestamp(value: unknown): value is number | null {
  return value === null || isFiniteNumber(value);
}

function isOptionalBoolean(value: unknown): value is boolean | null {
  return value === null || typeof value === 'boolean';
}

function fail(error: string): ParseResult {
  return { ok: false, error: error };
}

/**
 * Validate an untrusted value as an input event
 *
 * @param raw - Candidate event
 * @returns Parsed event or an error message
 *
 * @remarks
 * Sensor values are accepted as number, boolean or null; whether the kind
 * matches the variable is decided by the orchestrator.
 */
export function parseInputEvent(raw: unknown): ParseResult {
  if (!isRecord(raw)) {
    return fail('event must be an object');
  }

  const growspaceId = raw.growspaceId;
  if (typeof growspaceId !== 'string' || growspaceId.length === 0) {
    return fail('growspaceId must be a non-empty string');
  }

  const timestamp = raw.timestamp;
  if (!isFiniteNumber(timestamp)) {
    return fail('timestamp must be a finite number');
  }

  switch (raw.type) {
    case EVENT_TYPES.SENSOR_UPDATE: {
      const variable = raw.variable;
      if (!isVariableName(variable)) {
        return fail('unknown variable ' + JSON.stringify(variable));
      }
      const value = raw.value === undefined ? null : raw.value;
      if (!isSensorValue(value)) {
        return fail('value must be a number, boolean or null');
      }
      return { ok: true, event: { type: 'sensor_update', growspaceId: growspaceId, variable: variable, value: value, timestamp: timestamp } };
    }

    case EVENT_TYPES.STAGE_CHANGE: {
      const stage = raw.stage;
      if (!isGrowthStage(stage)) {
        return fail('unknown stage ' + JSON.stringify(stage));
      }
      const stageStart = raw.stageStart === undefined ? null : raw.stageStart;
      if (!isOptionalTimestamp(stageStart)) {
        return fail('stageStart must be a finite number or null');
      }
      return { ok: true, event: { type: 'stage_change', growspaceId: growspaceId, stage: stage, stageStart: stageStart, timestamp: timestamp } };
    }

    case EVENT_TYPES.LIGHT_CHANGE: {
      const on = raw.on === undefined ? null : raw.on;
      if (!isOptionalBoolean(on)) {
        return fail('on must be a boolean or null');
      }
      return { ok: true, event: { type: 'light_change', growspaceId: growspaceId, on: on, timestamp: timestamp } };
    }

    default:
      return fail('unknown event type ' + JSON.stringify(raw.type));
  }
}
