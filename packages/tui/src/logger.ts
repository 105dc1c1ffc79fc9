/**
 * Structured Logger
 *
 * Logs to console and <root>/.tessera/logs/session-<timestamp>.jsonl
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_PRIORITY, value);
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

const envLevel = process.env.LOG_LEVEL;

let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let consoleEnabled = true;
let logFileStream: fs.WriteStream | null = null;
let logFilePath: string | null = null;

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatConsoleMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `${timestamp} [${level.toUpperCase()}]: ${message}`;
}

function writeToFile(entry: LogEntry): void {
  if (logFileStream) {
    logFileStream.write(JSON.stringify(entry) + '\n');
  }
}

function log(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(data !== undefined && { data })
  };

  writeToFile(entry);

  if (consoleEnabled) {
    console[level](formatConsoleMessage(level, message));
  }
}

export const logger = {
  /**
   * Open a JSONL session log under `<root>/.tessera/logs`
   */
  init(root: string): string | null {
    if (logFileStream) return logFilePath;

    try {
      const logsDir = path.join(root, '.tessera', 'logs');
      fs.mkdirSync(logsDir, { recursive: true });

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      logFilePath = path.join(logsDir, `session-${timestamp}.jsonl`);
      logFileStream = fs.createWriteStream(logFilePath, { flags: 'a' });

      this.debug('Logger initialized', { logFile: logFilePath });
    } catch (error) {
      logFilePath = null;
      console.error('Failed to initialize logger:', error);
    }
    return logFilePath;
  },

  debug(message: string, data?: unknown): void {
    log('debug', message, data);
  },

  info(message: string, data?: unknown): void {
    log('info', message, data);
  },

  warn(message: string, data?: unknown): void {
    log('warn', message, data);
  },

  error(message: string, data?: unknown): void {
    log('error', message, data);
  },

  close(): void {
    if (logFileStream) {
      logFileStream.end();
      logFileStream = null;
      logFilePath = null;
    }
  }
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Full-screen apps turn console output off so log lines do not land on the
 * drawn screen. The session file keeps receiving entries.
 */
export function setConsoleLoggingEnabled(enabled: boolean): void {
  consoleEnabled = enabled;
}
