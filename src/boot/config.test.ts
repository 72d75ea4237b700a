/**
 * Tests for configuration module
 */

import { USER_CONFIG, APP_CONSTANTS, createGrowspaceConfig } from './config';
import { validateGrowspaceConfig } from '@validation';

describe('Configuration', () => {
  describe('USER_CONFIG', () => {
    it('should keep priors strictly inside (0, 1)', () => {
      for (const prior of [USER_CONFIG.STRESS_PRIOR, USER_CONFIG.MOLD_PRIOR, USER_CONFIG.OPTIMAL_PRIOR]) {
        expect(prior).toBeGreaterThan(0);
        expect(prior).toBeLessThan(1);
      }
    });

    it('should leave a dead-band between the thresholds', () => {
      expect(USER_CONFIG.TURN_ON_THRESHOLD).toBeGreaterThan(USER_CONFIG.TURN_OFF_THRESHOLD);
    });

    it('should clamp likelihood ratios around 1', () => {
      expect(USER_CONFIG.MIN_LIKELIHOOD_RATIO).toBeLessThan(1);
      expect(USER_CONFIG.MAX_LIKELIHOOD_RATIO).toBeGreaterThan(1);
    });

    it('should expect 12 light hours in flower and none while drying', () => {
      expect(USER_CONFIG.LIGHT_HOURS.flower).toBe(12);
      expect(USER_CONFIG.LIGHT_HOURS.dry).toBe(0);
      expect(USER_CONFIG.LIGHT_HOURS.cure).toBe(0);
    });

    it('should use valid log levels', () => {
      const levels = Object.values(APP_CONSTANTS.LOG_LEVELS);
      expect(levels).toContain(USER_CONFIG.GLOBAL_LOG_LEVEL);
      expect(levels).toContain(USER_CONFIG.CONSOLE_LOG_LEVEL);
    });
  });

  describe('APP_CONSTANTS', () => {
    it('should have distinct log levels', () => {
      expect(new Set(Object.values(APP_CONSTANTS.LOG_LEVELS)).size).toBe(4);
    });

    it('should drain no more than the buffer holds', () => {
      expect(APP_CONSTANTS.CONSOLE_DRAIN_BATCH).toBeLessThanOrEqual(APP_CONSTANTS.CONSOLE_BUFFER_SIZE);
    });
  });

  describe('createGrowspaceConfig', () => {
    it('should build a valid configuration from the defaults', () => {
      const config = createGrowspaceConfig('tent-a');

      expect(config.id).toBe('tent-a');
      expect(config.initialStage).toBe('veg');
      expect(config.conditions.mold).toEqual({
        enabled: true,
        prior: 0.1,
        turnOnThreshold: 0.7,
        turnOffThreshold: 0.3,
        minDwellSec: 300
      });
      expect(config.sensors.light).toBe(true);
      expect(config.sensors.humidifier_state).toBe(true);
      expect(config.deriveVpd).toBe(false);
      expect(config.trend).toEqual({ windowSec: 1800, minChange: { temperature: 1, humidity: 1, vpd: 0.2 } });
      expect(config.light.rolloverHourUtc).toBeNull();
      expect(validateGrowspaceConfig(config).valid).toBe(true);
    });

    it('should merge nested overrides per key', () => {
      const config = createGrowspaceConfig('tent-b', {
        conditions: { mold: { minDwellSec: 600 } },
        sensors: { co2: false },
        light: { hours: { flower: 11 }, rolloverHourUtc: 6 },
        likelihood: { shape: 'linear' }
      });

      expect(config.conditions.mold.minDwellSec).toBe(600);
      expect(config.conditions.mold.prior).toBe(0.1);
      expect(config.conditions.stress.minDwellSec).toBe(300);
      expect(config.sensors.co2).toBe(false);
      expect(config.sensors.temperature).toBe(true);
      expect(config.light.hours.flower).toBe(11);
      expect(config.light.hours.veg).toBe(18);
      expect(config.light.rolloverHourUtc).toBe(6);
      expect(config.likelihood).toEqual({ shape: 'linear', saturationDistance: 3, minRatio: 0.05, maxRatio: 20 });
    });

    it('should merge trend overrides per variable', () => {
      const config = createGrowspaceConfig('tent-b', { trend: { minChange: { vpd: 0.1 } } });

      expect(config.trend).toEqual({ windowSec: 1800, minChange: { temperature: 1, humidity: 1, vpd: 0.1 } });
      expect(USER_CONFIG.TREND_MIN_CHANGE.vpd).toBe(0.2);
    });

    it('should not share state between configurations', () => {
      const a = createGrowspaceConfig('tent-a');
      const b = createGrowspaceConfig('tent-b');

      a.light.hours.veg = 20;
      a.conditions.stress.prior = 0.5;

      expect(b.light.hours.veg).toBe(18);
      expect(b.conditions.stress.prior).toBe(0.15);
      expect(USER_CONFIG.LIGHT_HOURS.veg).toBe(18);
    });
  });
});
