export { EVENT_TYPES } from './types';
export { parseInputEvent } from './parse';
export type { ParseResult } from './parse';
export type {
  SensorUpdateEvent,
  StageChangeEvent,
  LightChangeEvent,
  InputEvent,
  VerdictUpdateEvent,
  LightScheduleEvent,
  OutputEvent,
  OutputListener
} from './types';
