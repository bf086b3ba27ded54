/**
 * Install log: <SUBTIS_INSTALLER_DIR>/logs/subtis-installer.log, appended on every run.
 * Terminal output goes through src/ui/.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { LOG_DIR, LOG_FILE } from './config-constants.js';

const SEVERITY = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
} as const;

export type LogLevel = keyof typeof SEVERITY;
export type EntryLevel = Exclude<LogLevel, 'SILENT'>;

/** Receives every entry that passes the level filter */
export type LogSink = (level: EntryLevel, message: string, context: unknown[]) => void;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(SEVERITY, value);
}

/**
 * LOG_LEVEL from the environment wins over the requested level.
 */
export function resolveLogLevel(requested: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env.LOG_LEVEL?.toUpperCase();
  return isLogLevel(fromEnv) ? fromEnv : requested;
}

export function formatEntry(level: EntryLevel, message: string, context: unknown[], at: Date = new Date()): string {
  const details = context.map((value) => (typeof value === 'string' ? value : JSON.stringify(value)));
  return [`[${at.toISOString()}] [${level}] ${message}`, ...details].join(' ');
}

const fileSink: LogSink = (level, message, context) => {
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    appendFileSync(LOG_FILE, formatEntry(level, message, context) + '\n', 'utf-8');
  } catch {
    // An unwritable log directory must not fail the install
  }
};

class InstallLogger {
  private requested: LogLevel = 'INFO';
  private sink: LogSink = fileSink;

  setLevel(level: LogLevel): void {
    this.requested = level;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  debug(message: string, ...context: unknown[]): void {
    this.write('DEBUG', message, context);
  }

  info(message: string, ...context: unknown[]): void {
    this.write('INFO', message, context);
  }

  warn(message: string, ...context: unknown[]): void {
    this.write('WARN', message, context);
  }

  error(message: string, ...context: unknown[]): void {
    this.write('ERROR', message, context);
  }

  private write(level: EntryLevel, message: string, context: unknown[]): void {
    if (SEVERITY[level] < SEVERITY[resolveLogLevel(this.requested)]) return;
    this.sink(level, message, context);
  }
}

const logger = new InstallLogger();

/** --verbose raises the file log to DEBUG */
export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level);
}

export function setMockLogger(sink: LogSink | null): void {
  logger.setSink(sink ?? fileSink);
}

export default logger;
