/**
 * Logger that keeps every line for assertions
 */

import type { Logger, LogLevel } from '../../src/utils/logger.js';

export interface RecordingLogger extends Logger {
  /** `<level>: <message>` in order; truncate to forget earlier output */
  lines: string[];
  /** Messages of one level, in order */
  messages(level: LogLevel): string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const record = (level: LogLevel) => (message: string): void => {
    lines.push(`${level}: ${message}`);
  };
  return {
    lines,
    messages: level => lines
      .filter(line => line.startsWith(`${level}: `))
      .map(line => line.slice(level.length + 2)),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error')
  };
}
