/**
 * Simple structured logger for the extractor.
 * Uses console with level filtering, plus an optional plain-text log file.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_PRIORITY;
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
let logFile: string | undefined;
let stderrOnly = false;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Route debug and info lines to stderr so stdout carries only command output.
 */
export function setLogToStderr(enabled: boolean): void {
  stderrOnly = enabled;
}

/**
 * Mirror every emitted line to a file. Pass undefined to stop.
 */
export function setLogFile(path: string | undefined): void {
  if (path) {
    mkdirSync(dirname(path), { recursive: true });
  }
  logFile = path;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatMessage(level: LogLevel, component: string, message: string): string {
  const timestamp = new Date().toISOString().substring(11, 23);
  const color = LEVEL_COLORS[level];
  const levelTag = level.toUpperCase().padEnd(5);
  return `${RESET}${timestamp} ${color}${levelTag}${RESET} [${component}] ${message}`;
}

function writeToFile(level: LogLevel, component: string, message: string, data: unknown): void {
  if (!logFile) return;
  const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  const line = `${new Date().toISOString()} - ${component} - ${level.toUpperCase()} - ${message}${suffix}\n`;
  try {
    appendFileSync(logFile, line, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.error(formatMessage('error', 'logger', `Cannot write log file ${logFile}: ${reason}`));
    logFile = undefined;
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(component: string): Logger {
  return {
    debug: (message: string, data?: unknown) => {
      if (shouldLog('debug')) {
        const line = formatMessage('debug', component, message);
        if (stderrOnly) console.error(line, data ?? '');
        else console.debug(line, data ?? '');
        writeToFile('debug', component, message, data);
      }
    },
    info: (message: string, data?: unknown) => {
      if (shouldLog('info')) {
        const line = formatMessage('info', component, message);
        if (stderrOnly) console.error(line, data ?? '');
        else console.info(line, data ?? '');
        writeToFile('info', component, message, data);
      }
    },
    warn: (message: string, data?: unknown) => {
      if (shouldLog('warn')) {
        console.warn(formatMessage('warn', component, message), data ?? '');
        writeToFile('warn', component, message, data);
      }
    },
    error: (message: string, data?: unknown) => {
      if (shouldLog('error')) {
        console.error(formatMessage('error', component, message), data ?? '');
        writeToFile('error', component, message, data);
      }
    },
  };
}
