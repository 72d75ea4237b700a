import { createLightDebounceState, updateLightDebounce } from './light-debounce';

describe('light-debounce', () => {
  describe('disabled (minPhaseSec = 0)', () => {
    it('should pass every change straight through', () => {
      let result = updateLightDebounce(createLightDebounceState(), true, 100, 0);
      expect(result.accepted).toEqual({ on: true, timestamp: 100 });
      result = updateLightDebounce(result.state, false, 105, 0);
      expect(result.accepted).toEqual({ on: false, timestamp: 105 });
    });

    it('should not release a repeat of the accepted state', () => {
      const first = updateLightDebounce(createLightDebounceState(), true, 100, 0);
      const second = updateLightDebounce(first.state, true, 200, 0);
      expect(second.accepted).toBeNull();
    });
  });

  describe('enabled', () => {
    it('should hold a change until it has lasted minPhaseSec', () => {
      const result = updateLightDebounce(createLightDebounceState(), true, 100, 60);
      expect(result.accepted).toBeNull();
      expect(result.state.pending).toEqual({ on: true, since: 100 });
    });

    it('should release a held change back-dated to when it began', () => {
      const first = updateLightDebounce(createLightDebounceState(), true, 100, 60);
      const tick = updateLightDebounce(first.state, undefined, 160, 60);
      expect(tick.accepted).toEqual({ on: true, timestamp: 100 });
      expect(tick.state).toEqual({ accepted: true, pending: null });
    });

    it('should suppress a change that reverts within the hold time', () => {
      let state = updateLightDebounce(createLightDebounceState(), true, 0, 0).state;
      state = updateLightDebounce(state, false, 100, 60).state;
      const revert = updateLightDebounce(state, true, 130, 60);
      expect(revert.accepted).toBeNull();
      expect(revert.state).toEqual({ accepted: true, pending: null });
      expect(updateLightDebounce(revert.state, undefined, 500, 60).accepted).toBeNull();
    });

    it('should keep the original start while the same change repeats', () => {
      let state = updateLightDebounce(createLightDebounceState(), false, 100, 60).state;
      state = updateLightDebounce(state, false, 130, 60).state;
      expect(state.pending).toEqual({ on: false, since: 100 });
    });
  });

  describe('unavailable', () => {
    it('should release unavailable immediately', () => {
      const on = updateLightDebounce(createLightDebounceState(), true, 100, 60);
      const accepted = updateLightDebounce(on.state, undefined, 200, 60);
      const lost = updateLightDebounce(accepted.state, null, 300, 60);
      expect(lost.accepted).toEqual({ on: null, timestamp: 300 });
      expect(lost.state).toEqual({ accepted: null, pending: null });
    });

    it('should not release unavailable twice', () => {
      const result = updateLightDebounce(createLightDebounceState(), null, 100, 60);
      expect(result.accepted).toBeNull();
    });
  });
});
