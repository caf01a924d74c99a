import type { RawTelemetry, TelemetrySnapshot } from '@flightbridge/shared';
import { createSnapshot } from '../engine/SnapshotFactory.js';
import type { TelemetrySource } from './TelemetrySource.js';

export type PollerEvent =
  | { type: 'connected'; source: string }
  | { type: 'snapshot'; snapshot: TelemetrySnapshot }
  | { type: 'disconnected'; reason: string };

export type PollerHandler = (event: PollerEvent) => void | Promise<void>;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PollerOptions {
  tickIntervalMs: number;
  reconnectIntervalMs: number;
  /** Timestamp source for snapshots (epoch ms) */
  clock?: () => number;
  sleep?: Sleep;
}

/** Resolves after `ms`, or as soon as `signal` aborts */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Drives a TelemetrySource: connect (retrying), sample once per tick, and
 * hand each event to the handler. The handler is awaited, so ticks never
 * overlap.
 */
export class TelemetryPoller {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private connected = false;
  private clock: () => number;
  private sleep: Sleep;

  constructor(
    private source: TelemetrySource,
    private handler: PollerHandler,
    private options: PollerOptions
  ) {
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get sourceName(): string {
    return this.source.name;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    console.log(`[TelemetryPoller] Started (${this.source.name}, every ${this.options.tickIntervalMs}ms)`);
  }

  /** Stop polling. Resolves once the loop has exited; no events follow. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop || !this.controller) return;
    this.controller.abort();
    await loop;
    this.loop = null;
    this.controller = null;
    console.log('[TelemetryPoller] Stopped');
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (!this.connected) {
        const ok = await this.tryConnect(signal);
        if (!ok) await this.sleep(this.options.reconnectIntervalMs, signal);
        continue;
      }

      let raw: RawTelemetry | null;
      try {
        raw = await this.source.sample();
      } catch (e) {
        await this.dropConnection(`sample failed: ${errorText(e)}`, signal);
        continue;
      }
      if (signal.aborted) break;

      if (raw === null) {
        await this.dropConnection('source ended', signal);
        continue;
      }

      await this.emit({ type: 'snapshot', snapshot: createSnapshot(raw, this.clock()) }, signal);
      await this.sleep(this.options.tickIntervalMs, signal);
    }

    if (this.connected) {
      this.connected = false;
      await this.closeSource();
    }
  }

  private async tryConnect(signal: AbortSignal): Promise<boolean> {
    try {
      await this.source.connect();
    } catch (e) {
      console.warn(`[TelemetryPoller] ${this.source.name} unavailable: ${errorText(e)}`);
      return false;
    }
    if (signal.aborted) {
      await this.closeSource();
      return true;
    }
    this.connected = true;
    console.log(`[TelemetryPoller] Connected to ${this.source.name}`);
    await this.emit({ type: 'connected', source: this.source.name }, signal);
    return true;
  }

  private async dropConnection(reason: string, signal: AbortSignal): Promise<void> {
    console.warn(`[TelemetryPoller] Disconnected from ${this.source.name}: ${reason}`);
    this.connected = false;
    await this.closeSource();
    await this.emit({ type: 'disconnected', reason }, signal);
    await this.sleep(this.options.reconnectIntervalMs, signal);
  }

  private async closeSource(): Promise<void> {
    try {
      await this.source.disconnect();
    } catch (e) {
      console.warn(`[TelemetryPoller] Disconnect from ${this.source.name} failed: ${errorText(e)}`);
    }
  }

  private async emit(event: PollerEvent, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    try {
      await this.handler(event);
    } catch (e) {
      console.error(`[TelemetryPoller] Handler failed on ${event.type}:`, e);
    }
  }
}
