/**
 * Logger that keeps its output in memory, for assertions in tests
 */

import { createLogger, formatConsoleLine, LOG_LEVELS } from '@logging';
import type { Logger, LogRecord } from '@logging';

export interface TestLogger {
  logger: Logger;
  records: LogRecord[];
  /** Records as "LEVEL  | message" lines */
  lines(): string[];
  /** Messages logged at one level */
  messages(levelName: LogRecord['levelName']): string[];
}

export function createTestLogger(): TestLogger {
  const records: LogRecord[] = [];
  const logger = createLogger(
    { level: LOG_LEVELS.DEBUG },
    {
      timeSource: () => 0,
      sinks: [{ sink: { write: (record) => { records.push(record); } }, minLevel: LOG_LEVELS.DEBUG }]
    },
    LOG_LEVELS
  );

  return {
    logger: logger,
    records: records,
    lines: () => records.map((r) => formatConsoleLine(r.levelName, r.message)),
    messages: (levelName) => records.filter((r) => r.levelName === levelName).map((r) => r.message)
  };
}
