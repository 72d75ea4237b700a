export { checkReadingAge } from './reading-freshness';
export type { ReadingAgeResult } from './types';
