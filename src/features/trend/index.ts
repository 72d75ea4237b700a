export { recordTrendSample, summarizeTrend } from './trend';
export type { TrendSample, TrendDirection, TrendSummary } from './types';
