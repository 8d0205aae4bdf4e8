/**
 * Structured logging contract shared by services and middleware.
 */

/** Severities in ascending order. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

export type LogFields = Record<string, unknown>;

export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601; providers stamp it when missing. */
  timestamp?: string;
  fields?: LogFields;
}

/** One handled HTTP request. */
export interface RequestLogEvent extends LogEvent {
  method: string;
  path: string;
  status: number;
  durationMs: number;
  requestId?: string;
}

export interface ILogProvider {
  /** Never blocks; delivery may be deferred until `flush`. */
  log(event: LogEvent): void;
  flush(): Promise<void>;

  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}
