/**
 * Reading freshness type definitions
 */

/**
 * Result of a reading age check
 */
export interface ReadingAgeResult {
  /** Reading is young enough to use as evidence */
  fresh: boolean;
  /** Seconds since the reading was taken (0 for future timestamps) */
  ageSec: number;
}
