/**
 * Ships log events to an Axiom dataset in batches.
 *
 * Events collect in memory until `flushThreshold` is reached or the interval
 * timer fires. One batch is in flight at a time. A batch Axiom does not accept
 * goes back to the front of the queue; while Axiom is unreachable the queue
 * keeps at most `maxBufferSize` events, dropping the oldest. An empty
 * `apiToken` turns the provider into a no-op.
 */

import type { LogEvent } from './ILogProvider.js';
import { LeveledLogProvider, type LeveledLogProviderOptions } from './LeveledLogProvider.js';

export interface AxiomLogProviderOptions extends LeveledLogProviderOptions {
  apiToken: string;
  dataset: string;
  /** Default 50. */
  flushThreshold?: number;
  /** Default 10s; 0 disables the timer. */
  flushIntervalMs?: number;
  /** Default 1000. */
  maxBufferSize?: number;
}

const INGEST_BASE = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider extends LeveledLogProvider {
  private queue: LogEvent[] = [];
  private readonly ingestUrl: string;
  private readonly authorization: string;
  private readonly enabled: boolean;
  private readonly flushThreshold: number;
  private readonly maxBufferSize: number;
  private timer: ReturnType<typeof setInterval> | undefined;
  private inFlight: Promise<void> | undefined;

  constructor(options: AxiomLogProviderOptions) {
    super(options, 'info');
    this.enabled = options.apiToken.length > 0;
    this.ingestUrl = `${INGEST_BASE}/${options.dataset}/ingest`;
    this.authorization = `Bearer ${options.apiToken}`;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferSize = options.maxBufferSize ?? 1000;

    const interval = options.flushIntervalMs ?? 10_000;
    if (this.enabled && interval > 0) {
      this.timer = setInterval(() => void this.flush(), interval);
      this.timer.unref();
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  protected write(event: LogEvent): void {
    if (!this.enabled) return;

    this.queue.push(event);
    this.trim();

    if (this.queue.length >= this.flushThreshold) void this.flush();
  }

  /** Sends queued events; a call made while a send is in flight waits for it, then sends the rest. */
  async flush(): Promise<void> {
    while (this.inFlight) await this.inFlight;
    if (!this.enabled || this.queue.length === 0) return;

    const batch = this.queue;
    this.queue = [];
    this.inFlight = this.send(batch).finally(() => {
      this.inFlight = undefined;
    });
    await this.inFlight;
  }

  private async send(batch: LogEvent[]): Promise<void> {
    let delivered = false;
    try {
      const res = await fetch(this.ingestUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: this.authorization },
        body: JSON.stringify(batch),
      });
      delivered = res.ok;
    } catch {
      delivered = false; // network failure
    }

    if (!delivered) {
      this.queue = [...batch, ...this.queue];
      this.trim();
    }
  }

  /** Drops the oldest events beyond `maxBufferSize`. */
  private trim(): void {
    const overflow = this.queue.length - this.maxBufferSize;
    if (overflow > 0) this.queue.splice(0, overflow);
  }

  /** Stops the timer and sends whatever is queued. */
  async dispose(): Promise<void> {
    clearInterval(this.timer);
    this.timer = undefined;
    await this.flush();
  }
}
