import fs from 'fs';
import path from 'path';
import { getLogFilePath } from './paths.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type Logger = (level: LogLevel, message: string, data?: unknown) => void;

let reportedWriteFailure = false;

export function formatLogEntry(
  timestamp: string,
  level: LogLevel,
  component: string,
  message: string,
  data?: unknown
): string {
  const payload = data === undefined ? '' : '\n' + JSON.stringify(data, null, 2);
  return `[${timestamp}] ${level} [${component}]: ${message}${payload}\n`;
}

/**
 * Creates a component-scoped logger that appends to the debug log file.
 * The file path is resolved on every call so tests can redirect it via env.
 */
export function createLogger(component: string): Logger {
  return (level, message, data) => {
    const logFile = getLogFilePath();
    const entry = formatLogEntry(new Date().toISOString(), level, component, message, data);
    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      fs.appendFileSync(logFile, entry);
    } catch (error) {
      if (!reportedWriteFailure) {
        reportedWriteFailure = true;
        console.error(
          `Warning: could not write debug log ${logFile}: ${error instanceof Error ? error.message : error}`
        );
      }
    }
  };
}
