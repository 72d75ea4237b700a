/**
 * Threshold profile table loading and validation
 *
 * The shipped table lives in profiles.json. Every stage, phase and variable is
 * checked once at load so that resolveProfile never has to fail.
 */

import { ProfileValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';
import rawProfiles from './profiles.json';

import type { GrowthStage } from '$types/common';
import type { LateVariant, StageProfileEntry, ThresholdProfile, VariableRange } from './types';

export type ProfileTable = Readonly<Record<GrowthStage, StageProfileEntry>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function show(value: unknown): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

function readNumber(raw: Record<string, unknown>, key: string, context: string): number {
  const value = raw[key];
  if (!isFiniteNumber(value)) {
    throw new ProfileValidationError(context + '.' + key + ': must be a finite number (got ' + show(value) + ')');
  }
  return value;
}

function parseRange(raw: unknown, context: string): VariableRange {
  if (!isRecord(raw)) {
    throw new ProfileValidationError(context + ': missing range (got ' + show(raw) + ')');
  }

  const min = readNumber(raw, 'min', context);
  const max = readNumber(raw, 'max', context);
  const tolerance = readNumber(raw, 'tolerance', context);

  if (min > max) {
    throw new ProfileValidationError(context + ': min must not exceed max (got ' + min + ' > ' + max + ')');
  }
  if (tolerance <= 0) {
    throw new ProfileValidationError(context + ': tolerance must be positive (got ' + tolerance + ')');
  }

  return { min: min, max: max, tolerance: tolerance };
}

function parseProfile(raw: unknown, context: string): ThresholdProfile {
  if (!isRecord(raw)) {
    throw new ProfileValidationError(context + ': missing profile (got ' + show(raw) + ')');
  }

  return {
    temperature: parseRange(raw.temperature, context + '.temperature'),
    humidity: parseRange(raw.humidity, context + '.humidity'),
    vpd: parseRange(raw.vpd, context + '.vpd'),
    co2: parseRange(raw.co2, context + '.co2')
  };
}

function parseLate(raw: unknown, context: string): LateVariant | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    throw new ProfileValidationError(context + ': must be an object (got ' + show(raw) + ')');
  }

  const afterDays = readNumber(raw, 'afterDays', context);
  if (afterDays < 1) {
    throw new ProfileValidationError(context + '.afterDays: must be at least 1 (got ' + afterDays + ')');
  }

  return {
    afterDays: afterDays,
    day: parseProfile(raw.day, context + '.day'),
    night: raw.night === undefined ? undefined : parseProfile(raw.night, context + '.night')
  };
}

function parseEntry(raw: unknown, stage: GrowthStage): StageProfileEntry {
  if (!isRecord(raw)) {
    throw new ProfileValidationError(stage + ': missing profile for configured stage (got ' + show(raw) + ')');
  }

  return {
    day: parseProfile(raw.day, stage + '.day'),
    night: raw.night === undefined ? undefined : parseProfile(raw.night, stage + '.night'),
    late: parseLate(raw.late, stage + '.late')
  };
}

/**
 * Validate raw profile data into a typed table
 *
 * @param raw - Parsed JSON (or any untrusted value)
 * @returns Table with an entry for every growth stage
 * @throws {ProfileValidationError} On the first missing or malformed entry
 */
export function parseProfileTable(raw: unknown): ProfileTable {
  if (!isRecord(raw)) {
    throw new ProfileValidationError('profiles: must be an object (got ' + show(raw) + ')');
  }

  return {
    seedling: parseEntry(raw.seedling, 'seedling'),
    clone: parseEntry(raw.clone, 'clone'),
    mother: parseEntry(raw.mother, 'mother'),
    veg: parseEntry(raw.veg, 'veg'),
    flower: parseEntry(raw.flower, 'flower'),
    dry: parseEntry(raw.dry, 'dry'),
    cure: parseEntry(raw.cure, 'cure')
  };
}

export const DEFAULT_PROFILE_TABLE: ProfileTable = parseProfileTable(rawProfiles);
