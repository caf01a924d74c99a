import { readFile } from 'fs/promises';
import type { RawTelemetry } from '@flightbridge/shared';
import type { TelemetrySource } from './TelemetrySource.js';
import { parseRawSample } from './RawSample.js';

/**
 * Plays back a recorded session: a JSON array of raw samples, one per tick.
 * Reaching the end of the file ends the connection.
 */
export class ReplayTelemetrySource implements TelemetrySource {
  readonly name: string;
  private samples: RawTelemetry[] = [];
  private cursor = 0;

  constructor(private filePath: string) {
    this.name = `replay:${filePath}`;
  }

  async connect(): Promise<void> {
    const parsed: unknown = JSON.parse(await readFile(this.filePath, 'utf-8'));
    if (!Array.isArray(parsed)) {
      throw new Error(`${this.filePath} does not contain a JSON array`);
    }

    const samples: RawTelemetry[] = [];
    for (const entry of parsed) {
      const raw = parseRawSample(entry);
      if (raw) samples.push(raw);
    }
    if (samples.length === 0) {
      throw new Error(`${this.filePath} has no samples`);
    }

    this.samples = samples;
    this.cursor = 0;
    console.log(`[Replay] Loaded ${samples.length} samples from ${this.filePath}`);
  }

  async sample(): Promise<RawTelemetry | null> {
    if (this.cursor >= this.samples.length) return null;
    const raw = this.samples[this.cursor];
    this.cursor++;
    return raw ?? null;
  }

  async disconnect(): Promise<void> {
    this.samples = [];
    this.cursor = 0;
  }
}
