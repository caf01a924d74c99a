import type { RawTelemetry } from '@flightbridge/shared';

/**
 * A simulator connection. The poller calls these strictly in sequence, never
 * concurrently.
 */
export interface TelemetrySource {
  readonly name: string;
  /** Establish the connection; rejects if the simulator is unavailable */
  connect(): Promise<void>;
  /** Read one sample. Resolves null when the source has ended. */
  sample(): Promise<RawTelemetry | null>;
  disconnect(): Promise<void>;
}
