/**
 * Trend type definitions
 */

/**
 * One usable reading kept for trend detection
 */
export interface TrendSample {
  value: number;
  /** Unix seconds */
  timestamp: number;
}

export type TrendDirection = 'rising' | 'falling' | 'stable';

/**
 * Movement of one variable over the trend window
 */
export interface TrendSummary {
  direction: TrendDirection;
  /** Last value minus first value */
  change: number;
  /** Lowest value in the window */
  low: number;
  /** Highest value in the window */
  high: number;
  /** Samples the summary was built from */
  samples: number;
}
