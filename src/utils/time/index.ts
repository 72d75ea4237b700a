export { now } from './time';
export { formatDateUTC, nextRolloverBoundary, daysSince } from './helpers';
