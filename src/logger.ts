// Structured logging utility with log level filtering

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

export type LogFields = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export type LogWriter = (line: string) => void;

// Log level hierarchy: DEBUG < INFO < WARN < ERROR < NONE
const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4
};

let currentLogLevel: LogLevel = 'INFO'; // Default log level

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export function shouldLog(entryLevel: LogLevel = 'INFO'): boolean {
  return LOG_LEVELS[entryLevel] >= LOG_LEVELS[currentLogLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toUpperCase();
  return level && isLogLevel(level) ? level : 'INFO';
}

const consoleWriter: LogWriter = (line) => console.log(line);

/**
 * Immutable structured logger. Fields given to `with()` are carried by
 * every entry the child logger writes.
 */
export class Logger {
  constructor(
    private readonly fields: LogFields = {},
    private readonly write: LogWriter = consoleWriter
  ) {}

  with(fields: LogFields): Logger {
    return new Logger({ ...this.fields, ...fields }, this.write);
  }

  debug(message: string, fields?: LogFields): void {
    this.log('DEBUG', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('INFO', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('WARN', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('ERROR', message, fields);
  }

  log(level: LogLevel, message: string, fields?: LogFields): void {
    if (level === 'NONE' || !shouldLog(level)) {
      return;
    }
    const entry: LogEntry = {
      ...this.fields,
      ...fields,
      timestamp: new Date().toISOString(),
      level,
      message
    };
    this.write(JSON.stringify(entry));
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const rootLogger = new Logger();
