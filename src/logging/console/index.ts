export { createConsoleSink } from './console-sink';
export { nodeTimers } from './node-timers';
