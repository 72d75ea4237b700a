/**
 * Vapor-pressure deficit derivation
 *
 * Used when a growspace has temperature and humidity sensors but no VPD
 * sensor. Saturation pressure follows the Tetens equation (kPa).
 */

import { clamp, roundTo } from '@utils/number';

/**
 * Saturation vapor pressure of air
 * @param temperatureC - Air temperature in °C
 * @returns Saturation pressure in kPa
 */
export function saturationVaporPressure(temperatureC: number): number {
  return 0.6108 * Math.exp((17.27 * temperatureC) / (temperatureC + 237.3));
}

/**
 * Derive VPD from air temperature and relative humidity
 *
 * @param temperatureC - Air temperature in °C
 * @param humidityPct - Relative humidity in % (clamped into 0-100)
 * @returns VPD in kPa, rounded to 2 decimals
 *
 * @example
 * ```typescript
 * deriveVpd(25, 60); // 1.27
 * ```
 */
export function deriveVpd(temperatureC: number, humidityPct: number): number {
  const rh = clamp(humidityPct, 0, 100);
  return roundTo(saturationVaporPressure(temperatureC) * (1 - rh / 100), 2);
}
