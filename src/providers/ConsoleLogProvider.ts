/**
 * In-process log sink. Tests read `events`; local runs can echo to stdout.
 */

import type { LogEvent, LogLevel } from './ILogProvider.js';
import { LeveledLogProvider, type LeveledLogProviderOptions } from './LeveledLogProvider.js';

export interface ConsoleLogProviderOptions extends LeveledLogProviderOptions {
  /** Echo each accepted event to console.log. */
  outputToConsole?: boolean;
  /** Retained events; older ones are dropped first. Default 1000. */
  maxEvents?: number;
}

export class ConsoleLogProvider extends LeveledLogProvider {
  readonly events: LogEvent[] = [];
  private readonly echo: boolean;
  private readonly maxEvents: number;

  constructor(options: ConsoleLogProviderOptions = {}) {
    super(options, 'debug');
    this.echo = options.outputToConsole ?? false;
    this.maxEvents = options.maxEvents ?? 1000;
  }

  protected write(event: LogEvent): void {
    this.events.push(event);
    if (this.events.length > this.maxEvents) this.events.shift();
    if (!this.echo) return;

    const suffix = event.fields ? ` ${JSON.stringify(event.fields)}` : '';
    console.log(`[${event.level.toUpperCase()}] ${event.message}${suffix}`);
  }

  async flush(): Promise<void> {
    // nothing buffered
  }

  messages(level: LogLevel): string[] {
    return this.events.filter((e) => e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.events.length = 0;
  }
}
