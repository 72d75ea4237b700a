import { createGateState, updateGate, validateGateConfig } from './hysteresis-gate';
import { GateValidationError } from '$types/errors';

import type { PosteriorEstimate } from '@core/bayesian-estimator';
import type { GateConfig, GateState } from './types';

const CONFIG: GateConfig = { turnOnThreshold: 0.7, turnOffThreshold: 0.5, minDwellSec: 0 };

function estimate(probability: number): PosteriorEstimate {
  return {
    kind: 'estimate',
    condition: 'stress',
    probability: probability,
    prior: 0.15,
    observed: ['temperature'],
    contributing: ['temperature'],
    lowConfidence: true,
    ratios: {},
    reasons: []
  };
}

const INSUFFICIENT: PosteriorEstimate = { kind: 'insufficient', condition: 'stress', probability: null, prior: 0.15 };

/**
 * Feed a sequence of probabilities at 10 s spacing
 */
function feed(probabilities: number[], config: GateConfig = CONFIG, start = 1000): GateState {
  let state = createGateState();
  probabilities.forEach(function(p, i) {
    state = updateGate(state, estimate(p), start + i * 10, config).state;
  });
  return state;
}

describe('hysteresis-gate', () => {
  describe('validateGateConfig', () => {
    it('should accept a proper dead-band', () => {
      expect(() => validateGateConfig(CONFIG, 'stress')).not.toThrow();
    });

    it('should reject turn-on at or below turn-off', () => {
      expect(() => validateGateConfig({ ...CONFIG, turnOnThreshold: 0.5 }, 'stress'))
        .toThrow('stress: turn-on threshold must exceed turn-off threshold (got 0.5 <= 0.5)');
    });

    it('should reject thresholds outside (0, 1)', () => {
      expect(() => validateGateConfig({ ...CONFIG, turnOnThreshold: 1 }, 'mold')).toThrow(GateValidationError);
      expect(() => validateGateConfig({ ...CONFIG, turnOffThreshold: 0 }, 'mold')).toThrow(GateValidationError);
    });

    it('should reject negative dwell', () => {
      expect(() => validateGateConfig({ ...CONFIG, minDwellSec: -1 }, 'optimal'))
        .toThrow('optimal: minimum dwell must be non-negative (got -1)');
    });
  });

  describe('initial state', () => {
    it('should start false and stale with an unknown published value', () => {
      const result = updateGate(createGateState(), INSUFFICIENT, 1000, CONFIG);
      expect(result.verdict.value).toBe('unknown');
      expect(result.verdict.stale).toBe(true);
      expect(result.state.verdict).toBe(false);
    });

    it('should publish false once evidence arrives below the band', () => {
      const result = updateGate(createGateState(), estimate(0.2), 1000, CONFIG);
      expect(result.verdict.value).toBe(false);
      expect(result.verdict.stale).toBe(false);
      expect(result.verdict.probability).toBe(0.2);
      expect(result.verdict.changedAt).toBeNull();
    });
  });

  describe('dead-band', () => {
    it('should turn on at the turn-on threshold', () => {
      const result = updateGate(createGateState(), estimate(0.7), 1000, CONFIG);
      expect(result.verdict.value).toBe(true);
      expect(result.verdict.changed).toBe(true);
      expect(result.verdict.changedAt).toBe(1000);
    });

    it('should stay true for posteriors strictly inside the band', () => {
      const state = feed([0.8, 0.69, 0.51, 0.6, 0.55]);
      expect(state.verdict).toBe(true);
      expect(state.changedAt).toBe(1000);
    });

    it('should stay false for posteriors strictly inside the band', () => {
      const state = feed([0.2, 0.51, 0.69, 0.6]);
      expect(state.verdict).toBe(false);
      expect(state.changedAt).toBeNull();
    });

    it('should turn off at the turn-off threshold', () => {
      const state = feed([0.8, 0.6, 0.5]);
      expect(state.verdict).toBe(false);
      expect(state.changedAt).toBe(1020);
    });

    it('should not flap while hovering around a single boundary', () => {
      let state = createGateState();
      let changes = 0;
      [0.71, 0.69, 0.71, 0.69, 0.71, 0.69].forEach(function(p, i) {
        const result = updateGate(state, estimate(p), 1000 + i, CONFIG);
        if (result.verdict.changed) changes++;
        state = result.state;
      });
      expect(changes).toBe(1);
      expect(state.verdict).toBe(true);
    });
  });

  describe('minimum dwell', () => {
    const DWELL: GateConfig = { ...CONFIG, minDwellSec: 30 };

    it('should not turn on before the dwell has elapsed', () => {
      // high at 1000, 1010, 1020: held 20 s
      const state = feed([0.9, 0.9, 0.9], DWELL);
      expect(state.verdict).toBe(false);
      expect(state.raw).toBe('high');
      expect(state.rawSince).toBe(1000);
    });

    it('should turn on once the dwell has elapsed', () => {
      const state = feed([0.9, 0.9, 0.9, 0.9], DWELL);
      expect(state.verdict).toBe(true);
      expect(state.changedAt).toBe(1030);
    });

    it('should reject a single noisy sample', () => {
      const state = feed([0.2, 0.95, 0.2, 0.2, 0.2, 0.2], DWELL);
      expect(state.verdict).toBe(false);
    });

    it('should restart the dwell when the classification changes', () => {
      // high 1000-1020, band at 1030, high again from 1040
      const state = feed([0.9, 0.9, 0.9, 0.6, 0.9, 0.9, 0.9], DWELL);
      expect(state.verdict).toBe(false);
      expect(state.rawSince).toBe(1040);
    });

    it('should require dwell to turn off as well', () => {
      let state = feed([0.9, 0.9, 0.9, 0.9], DWELL);
      state = updateGate(state, estimate(0.1), 2000, DWELL).state;
      expect(state.verdict).toBe(true);
      state = updateGate(state, estimate(0.1), 2030, DWELL).state;
      expect(state.verdict).toBe(false);
      expect(state.changedAt).toBe(2030);
    });
  });

  describe('insufficient data', () => {
    it('should hold a true verdict and mark it stale', () => {
      const held = feed([0.9]);
      const result = updateGate(held, INSUFFICIENT, 2000, CONFIG);
      expect(result.verdict.value).toBe(true);
      expect(result.verdict.stale).toBe(true);
      expect(result.verdict.changed).toBe(false);
      expect(result.verdict.probability).toBeNull();
    });

    it('should become fresh again on the next estimate', () => {
      const stale = updateGate(feed([0.9]), INSUFFICIENT, 2000, CONFIG).state;
      const result = updateGate(stale, estimate(0.6), 2010, CONFIG);
      expect(result.verdict.stale).toBe(false);
      expect(result.verdict.value).toBe(true);
    });

    it('should break dwell continuity', () => {
      const DWELL: GateConfig = { ...CONFIG, minDwellSec: 30 };
      let state = feed([0.9, 0.9], DWELL);
      state = updateGate(state, INSUFFICIENT, 1020, DWELL).state;
      state = updateGate(state, estimate(0.9), 1030, DWELL).state;
      expect(state.verdict).toBe(false);
      expect(state.rawSince).toBe(1030);
    });

    it('should not mutate the input state', () => {
      const state = createGateState();
      updateGate(state, estimate(0.9), 1000, CONFIG);
      expect(state).toEqual(createGateState());
    });
  });
});
