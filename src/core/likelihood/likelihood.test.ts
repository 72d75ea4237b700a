import { falloff, interpolateLogRatio, clampRatio, validateLikelihoodConfig } from './likelihood';
import { ConfigurationError } from '$types/errors';
import type { LikelihoodConfig } from '$types/config';

const GAUSSIAN: LikelihoodConfig = { shape: 'gaussian', saturationDistance: 3, minRatio: 0.05, maxRatio: 20 };
const LINEAR: LikelihoodConfig = { shape: 'linear', saturationDistance: 3, minRatio: 0.05, maxRatio: 20 };

describe('likelihood', () => {
  describe('falloff', () => {
    it('should be zero at the ideal range for every shape', () => {
      expect(falloff(0, GAUSSIAN)).toBe(0);
      expect(falloff(0, LINEAR)).toBe(0);
    });

    it('should treat NaN distance as ideal', () => {
      expect(falloff(NaN, GAUSSIAN)).toBe(0);
    });

    it('should follow the linear ramp until saturation', () => {
      expect(falloff(1.5, LINEAR)).toBe(0.5);
      expect(falloff(3, LINEAR)).toBe(1);
      expect(falloff(30, LINEAR)).toBe(1);
    });

    it('should follow the gaussian curve', () => {
      expect(falloff(2, GAUSSIAN)).toBeCloseTo(1 - Math.exp(-2), 10);
      expect(falloff(100, GAUSSIAN)).toBe(1);
    });

    it('should be monotonic in distance', () => {
      for (const config of [GAUSSIAN, LINEAR]) {
        let previous = -1;
        for (let d = 0; d <= 6; d += 0.25) {
          const f = falloff(d, config);
          expect(f).toBeGreaterThanOrEqual(previous);
          expect(f).toBeLessThanOrEqual(1);
          previous = f;
        }
      }
    });
  });

  describe('interpolateLogRatio', () => {
    it('should return the ideal ratio at zero falloff', () => {
      expect(Math.exp(interpolateLogRatio(0, 3, 0.25))).toBeCloseTo(3, 10);
    });

    it('should return the extreme ratio at full falloff', () => {
      expect(Math.exp(interpolateLogRatio(1, 3, 0.25))).toBeCloseTo(0.25, 10);
    });

    it('should be exactly neutral for a neutral ideal at zero falloff', () => {
      expect(interpolateLogRatio(0, 1, 6)).toBe(0);
    });

    it('should interpolate geometrically', () => {
      expect(Math.exp(interpolateLogRatio(0.5, 1, 4))).toBeCloseTo(2, 10);
    });
  });

  describe('clampRatio', () => {
    it('should keep ratios inside the bounds', () => {
      expect(clampRatio(4, GAUSSIAN)).toBe(4);
    });

    it('should clamp extreme ratios', () => {
      expect(clampRatio(1000, GAUSSIAN)).toBe(20);
      expect(clampRatio(0, GAUSSIAN)).toBe(0.05);
    });

    it('should neutralize NaN', () => {
      expect(clampRatio(NaN, GAUSSIAN)).toBe(1);
    });
  });

  describe('validateLikelihoodConfig', () => {
    it('should accept the shipped shapes', () => {
      expect(() => validateLikelihoodConfig(GAUSSIAN, 'tent')).not.toThrow();
      expect(() => validateLikelihoodConfig(LINEAR, 'tent')).not.toThrow();
    });

    it('should reject a clamp that excludes a neutral ratio', () => {
      expect(() => validateLikelihoodConfig({ ...GAUSSIAN, minRatio: 1.2 }, 'tent'))
        .toThrow('tent: minimum ratio must be between 0 and 1 (got 1.2)');
      expect(() => validateLikelihoodConfig({ ...GAUSSIAN, maxRatio: 1 }, 'tent')).toThrow(ConfigurationError);
    });

    it('should reject a non-positive saturation distance', () => {
      expect(() => validateLikelihoodConfig({ ...LINEAR, saturationDistance: 0 }, 'tent'))
        .toThrow('tent: saturation distance must be positive (got 0)');
    });
  });
});
