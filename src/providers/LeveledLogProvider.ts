import { shouldLog, type ILogProvider, type LogEvent, type LogFields, type LogLevel } from './ILogProvider.js';

export interface LeveledLogProviderOptions {
  minLevel?: LogLevel;
  /** Merged beneath each event's own fields, e.g. `{ service: 'incident-rca' }`. */
  baseFields?: LogFields;
}

/**
 * Level filtering, timestamping and base-field merging for concrete sinks.
 * Subclasses only decide where an accepted event goes.
 */
export abstract class LeveledLogProvider implements ILogProvider {
  private readonly minLevel: LogLevel;
  private readonly baseFields: LogFields | undefined;

  protected constructor(options: LeveledLogProviderOptions, defaultLevel: LogLevel) {
    this.minLevel = options.minLevel ?? defaultLevel;
    this.baseFields = options.baseFields;
  }

  protected abstract write(event: LogEvent): void;

  abstract flush(): Promise<void>;

  log(event: LogEvent): void {
    if (!shouldLog(event.level, this.minLevel)) return;

    const merged = this.baseFields ? { ...this.baseFields, ...event.fields } : event.fields;
    this.write({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(merged && { fields: merged }),
    });
  }

  debug(message: string, fields?: LogFields): void {
    this.log({ level: 'debug', message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.log({ level: 'error', message, fields });
  }
}
