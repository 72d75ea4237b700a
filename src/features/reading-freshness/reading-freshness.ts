/**
 * Reading freshness
 *
 * A sensor that stops reporting leaves its last value behind. Once that value
 * is older than maxAgeSec it is treated as offline and stops counting as
 * evidence.
 */

import type { SensorReading } from '$types/common';
import type { ReadingAgeResult } from './types';

/**
 * Check the age of a reading
 *
 * @param reading - Last reading for a variable
 * @param now - Current timestamp in seconds
 * @param maxAgeSec - Maximum usable age (0 disables the check)
 * @returns Freshness and age
 */
export function checkReadingAge(reading: SensorReading, now: number, maxAgeSec: number): ReadingAgeResult {
  const ageSec = Math.max(0, now - reading.timestamp);

  if (maxAgeSec <= 0) {
    return { fresh: true, ageSec: ageSec };
  }

  return { fresh: ageSec <= maxAgeSec, ageSec: ageSec };
}
