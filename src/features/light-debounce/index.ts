export { createLightDebounceState, updateLightDebounce } from './light-debounce';
export type { LightDebounceState, PendingLightChange, AcceptedLightChange, LightDebounceResult } from './types';
