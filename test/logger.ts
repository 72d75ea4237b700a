/**
 * Logger that records formatted lines in memory
 */

import { createLogger } from '@logging';
import { APP_CONSTANTS } from '@boot/config';

import type { Logger, LogLevel } from '@logging';

export interface TestLogger {
  logger: Logger;
  lines: string[];
}

export function createTestLogger(level: LogLevel = 0): TestLogger {
  const lines: string[] = [];
  const logger = createLogger(
    { level: level, demoteHours: 0 },
    {
      timeSource: () => 0,
      sinks: [{ sink: { write: (msg: string) => { lines.push(msg); } }, minLevel: 0 }]
    },
    APP_CONSTANTS.LOG_LEVELS
  );
  return { logger: logger, lines: lines };
}
