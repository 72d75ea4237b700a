/**
 * Tests for time helper functions
 */

import { formatDateUTC, nextRolloverBoundary, daysSince } from './helpers';

// 2024-03-10T00:00:00Z
const MIDNIGHT = 1710028800;

describe('formatDateUTC', () => {
  it('should format midnight as the same day', () => {
    expect(formatDateUTC(MIDNIGHT)).toBe('2024-03-10');
  });

  it('should stay on the same day until the last second', () => {
    expect(formatDateUTC(MIDNIGHT + 86399)).toBe('2024-03-10');
    expect(formatDateUTC(MIDNIGHT + 86400)).toBe('2024-03-11');
  });

  it('should zero-pad month and day', () => {
    // 2024-01-05T12:00:00Z
    expect(formatDateUTC(1704456000)).toBe('2024-01-05');
  });
});

describe('nextRolloverBoundary', () => {
  it('should return the same day boundary when before the hour', () => {
    expect(nextRolloverBoundary(MIDNIGHT + 3600, 6)).toBe(MIDNIGHT + 6 * 3600);
  });

  it('should return the next day boundary when after the hour', () => {
    expect(nextRolloverBoundary(MIDNIGHT + 7 * 3600, 6)).toBe(MIDNIGHT + 86400 + 6 * 3600);
  });

  it('should be strictly after a timestamp that sits on a boundary', () => {
    expect(nextRolloverBoundary(MIDNIGHT, 0)).toBe(MIDNIGHT + 86400);
  });
});

describe('daysSince', () => {
  it('should return undefined without a start', () => {
    expect(daysSince(null, MIDNIGHT)).toBeUndefined();
  });

  it('should count whole days', () => {
    expect(daysSince(MIDNIGHT, MIDNIGHT + 86399)).toBe(0);
    expect(daysSince(MIDNIGHT, MIDNIGHT + 42 * 86400)).toBe(42);
  });

  it('should never go negative', () => {
    expect(daysSince(MIDNIGHT + 100, MIDNIGHT)).toBe(0);
  });
});
