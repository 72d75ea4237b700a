import { parseInputEvent } from './parse';

describe('parseInputEvent', () => {
  describe('sensor_update', () => {
    it('should parse a numeric reading', () => {
      const result = parseInputEvent({ type: 'sensor_update', growspaceId: 'tent-a', variable: 'humidity', value: 62.5, timestamp: 1000 });
      expect(result).toEqual({
        ok: true,
        event: { type: 'sensor_update', growspaceId: 'tent-a', variable: 'humidity', value: 62.5, timestamp: 1000 }
      });
    });

    it('should treat a missing value as unavailable', () => {
      const result = parseInputEvent({ type: 'sensor_update', growspaceId: 'tent-a', variable: 'fan_state', timestamp: 1000 });
      expect(result.ok && result.event.type === 'sensor_update' && result.event.value).toBeNull();
    });

    it('should reject an unknown variable', () => {
      const result = parseInputEvent({ type: 'sensor_update', growspaceId: 'tent-a', variable: 'pressure', value: 1, timestamp: 1000 });
      expect(result).toEqual({ ok: false, error: 'unknown variable "pressure"' });
    });

    it('should reject a string value', () => {
      const result = parseInputEvent({ type: 'sensor_update', growspaceId: 'tent-a', variable: 'co2', value: '900', timestamp: 1000 });
      expect(result).toEqual({ ok: false, error: 'value must be a number, boolean or null' });
    });
  });

  describe('stage_change', () => {
    it('should parse a stage change', () => {
      const result = parseInputEvent({ type: 'stage_change', growspaceId: 'tent-a', stage: 'flower', stageStart: 500, timestamp: 1000 });
      expect(result).toEqual({
        ok: true,
        event: { type: 'stage_change', growspaceId: 'tent-a', stage: 'flower', stageStart: 500, timestamp: 1000 }
      });
    });

    it('should reject an unknown stage', () => {
      const result = parseInputEvent({ type: 'stage_change', growspaceId: 'tent-a', stage: 'harvest', timestamp: 1000 });
      expect(result).toEqual({ ok: false, error: 'unknown stage "harvest"' });
    });
  });

  describe('light_change', () => {
    it('should parse on, off and unavailable', () => {
      for (const on of [true, false, null]) {
        const result = parseInputEvent({ type: 'light_change', growspaceId: 'tent-a', on: on, timestamp: 1000 });
        expect(result).toEqual({ ok: true, event: { type: 'light_change', growspaceId: 'tent-a', on: on, timestamp: 1000 } });
      }
    });

    it('should reject a non-boolean state', () => {
      const result = parseInputEvent({ type: 'light_change', growspaceId: 'tent-a', on: 'yes', timestamp: 1000 });
      expect(result).toEqual({ ok: false, error: 'on must be a boolean or null' });
    });
  });

  describe('envelope', () => {
    it('should reject non-objects', () => {
      expect(parseInputEvent([1, 2])).toEqual({ ok: false, error: 'event must be an object' });
    });

    it('should require a growspace id', () => {
      expect(parseInputEvent({ type: 'light_change', on: true, timestamp: 1 })).toEqual({ ok: false, error: 'growspaceId must be a non-empty string' });
    });

    it('should require a numeric timestamp', () => {
      expect(parseInputEvent({ type: 'light_change', growspaceId: 'tent-a', on: true, timestamp: '1' }))
        .toEqual({ ok: false, error: 'timestamp must be a finite number' });
    });

    it('should reject an unknown type', () => {
      expect(parseInputEvent({ type: 'reboot', growspaceId: 'tent-a', timestamp: 1 })).toEqual({ ok: false, error: 'unknown event type "reboot"' });
    });
  });
});
