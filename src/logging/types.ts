/**
 * Logging types
 *
 * The engine logs through a single Logger shared by every growspace.
 * Sinks receive lines that are already tagged and filtered.
 */

// ═══════════════════════════════════════════════════════════════
// LEVELS
// ═══════════════════════════════════════════════════════════════

/** 0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL */
export type LogLevel = 0 | 1 | 2 | 3;

/**
 * Named level codes, handed to the pure helpers so they stay config-free
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Run each sink's initialize hook; reports once all have answered */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
}

export interface LoggerConfig {
  level: LogLevel;
  /** Uptime in hours after which INFO lines are dropped (0 keeps them) */
  demoteHours: number;
}

export interface SinkWithLevel {
  sink: LogSink;
  /** Lines below this level never reach the sink */
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  /** Clock in Unix seconds, used for demotion */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

/**
 * Inputs to shouldLog()
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** Seconds since the logger was created */
  uptime: number;
  demoteHours: number;
}

/**
 * One sink's answer to initialize()
 */
export interface InitMessage {
  success: boolean;
  message: string;
}

// ═══════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════

export interface LogSink {
  write(formattedMessage: string): void;
  initialize?(callback: (success: boolean, message: string) => void): void;
}

/**
 * Buffered console output, written out in batches on a timer
 */
export interface ConsoleSink extends LogSink {
  /** Start the drain timer (idempotent) */
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Lines waiting to be written */
  getBufferSize(): number;
  flush(): void;
  /** Flush, then stop the drain timer */
  dispose(): void;
}

export interface ConsoleSinkConfig {
  /** Lines held before the buffer is written out synchronously */
  bufferSize: number;
  /** Milliseconds between drains */
  drainInterval: number;
  /** Lines written per drain */
  drainBatch: number;
}

/**
 * The part of the global console the sink writes to
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * Timer scheduling used by the console sink; nodeTimers is the Node
 * implementation, tests pass a fake.
 */
export interface TimerAPI {
  /**
   * @param intervalMs - Delay or period in milliseconds
   * @param repeat - Fire every interval instead of once
   * @param callback - Work to run
   * @returns Cancels the timer
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): () => void;
}
