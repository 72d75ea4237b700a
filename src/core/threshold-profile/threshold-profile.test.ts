import { resolveProfile } from './threshold-profile';
import { DEFAULT_PROFILE_TABLE } from './table';

describe('threshold-profile', () => {
  describe('resolveProfile', () => {
    it('should return the day profile during the day', () => {
      const profile = resolveProfile(DEFAULT_PROFILE_TABLE, 'veg', 'day');
      expect(profile.temperature).toEqual({ min: 22, max: 26, tolerance: 2 });
      expect(profile.humidity).toEqual({ min: 50, max: 70, tolerance: 10 });
    });

    it('should return the explicit night profile at night', () => {
      const profile = resolveProfile(DEFAULT_PROFILE_TABLE, 'flower', 'night');
      expect(profile.temperature).toEqual({ min: 18, max: 22, tolerance: 2 });
    });

    it('should fall back to the day profile when a stage has no night profile', () => {
      const day = resolveProfile(DEFAULT_PROFILE_TABLE, 'dry', 'day');
      const night = resolveProfile(DEFAULT_PROFILE_TABLE, 'dry', 'night');
      expect(night).toBe(day);
    });

    it('should resolve every stage in both phases', () => {
      const stages = ['seedling', 'clone', 'mother', 'veg', 'flower', 'dry', 'cure'] as const;
      for (const stage of stages) {
        expect(resolveProfile(DEFAULT_PROFILE_TABLE, stage, 'day').temperature.tolerance).toBeGreaterThan(0);
        expect(resolveProfile(DEFAULT_PROFILE_TABLE, stage, 'night').humidity.tolerance).toBeGreaterThan(0);
      }
    });

    it('should reflect a stage change on the very next call', () => {
      expect(resolveProfile(DEFAULT_PROFILE_TABLE, 'veg', 'day').humidity.max).toBe(70);
      expect(resolveProfile(DEFAULT_PROFILE_TABLE, 'flower', 'day').humidity.max).toBe(55);
    });
  });

  describe('late variant', () => {
    it('should use the base flower profile before day 42', () => {
      const profile = resolveProfile(DEFAULT_PROFILE_TABLE, 'flower', 'day', 41);
      expect(profile.humidity).toEqual({ min: 45, max: 55, tolerance: 10 });
    });

    it('should use the late flower profile from day 42', () => {
      const profile = resolveProfile(DEFAULT_PROFILE_TABLE, 'flower', 'day', 42);
      expect(profile.humidity).toEqual({ min: 40, max: 50, tolerance: 10 });
    });

    it('should use the late night profile at night', () => {
      const profile = resolveProfile(DEFAULT_PROFILE_TABLE, 'flower', 'night', 50);
      expect(profile.humidity).toEqual({ min: 35, max: 45, tolerance: 10 });
    });

    it('should ignore the late variant when stage age is unknown', () => {
      const profile = resolveProfile(DEFAULT_PROFILE_TABLE, 'veg', 'day');
      expect(profile.vpd).toEqual({ min: 0.8, max: 1.2, tolerance: 0.3 });
    });

    it('should fall back to the late day profile when the variant has no night', () => {
      const table = {
        ...DEFAULT_PROFILE_TABLE,
        cure: {
          day: DEFAULT_PROFILE_TABLE.cure.day,
          late: { afterDays: 14, day: DEFAULT_PROFILE_TABLE.dry.day }
        }
      };
      expect(resolveProfile(table, 'cure', 'night', 20)).toBe(DEFAULT_PROFILE_TABLE.dry.day);
    });
  });
});
