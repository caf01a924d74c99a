/**
 * Shared builders for engine and bridge tests
 */
import type { TelemetrySnapshot } from '@flightbridge/shared';
import { EARTH_RADIUS_NM } from '@flightbridge/shared';
import { createSnapshot } from '../engine/SnapshotFactory.js';
import type { FlightEngineDeps } from '../engine/FlightTypes.js';
import { createEmptyRawTelemetry } from '../telemetry/RawSample.js';
import type { ClientConnection } from '../hub/ConnectionRegistry.js';

export const T0 = Date.parse('2024-05-01T12:00:00.000Z');

const NM_PER_DEGREE_LAT = (EARTH_RADIUS_NM * Math.PI) / 180;
const BASE_LAT = 50;
const BASE_LON = 8;

/** Latitude `nm` nautical miles north of the test origin (same meridian) */
export function north(nm: number): number {
  return BASE_LAT + nm / NM_PER_DEGREE_LAT;
}

/** Snapshot at the test origin, at rest in the air, 1 G */
export function makeSnapshot(overrides: Partial<TelemetrySnapshot> = {}): TelemetrySnapshot {
  return {
    ...createSnapshot(createEmptyRawTelemetry(), T0),
    latitude: BASE_LAT,
    longitude: BASE_LON,
    ...overrides,
  };
}

/** On-ground sample `seconds` after T0 */
export function ground(seconds: number, overrides: Partial<TelemetrySnapshot> = {}): TelemetrySnapshot {
  return makeSnapshot({ timestamp: T0 + seconds * 1000, onGround: true, ...overrides });
}

/** Airborne sample `seconds` after T0, `nm` north of the origin */
export function air(
  seconds: number,
  nm: number,
  overrides: Partial<TelemetrySnapshot> = {}
): TelemetrySnapshot {
  return makeSnapshot({
    timestamp: T0 + seconds * 1000,
    onGround: false,
    latitude: north(nm),
    ...overrides,
  });
}

/**
 * A plausible 200 s, 10 NM hop: liftoff at T0+1s, touchdown at T0+201s,
 * peak 3500 ft AGL / 5000 ft MSL.
 */
export function normalFlight(): TelemetrySnapshot[] {
  return [
    ground(0, { groundSpeed: 0, altitude: 360 }),
    air(1, 0, { groundSpeed: 150, altitudeAgl: 50, altitude: 400, verticalSpeed: 1500, gpsWpPrevId: 'EDDM' }),
    air(60, 5, { groundSpeed: 250, altitudeAgl: 3500, altitude: 5000 }),
    air(120, 8, { groundSpeed: 180, altitudeAgl: 2500, altitude: 2900, verticalSpeed: -800 }),
    air(200, 10, {
      groundSpeed: 140,
      altitudeAgl: 20,
      altitude: 420,
      verticalSpeed: -150,
      gForce: 1.1,
      pitch: 3.14,
      bank: -1.26,
      headingMagnetic: 254.6,
      lateralG: 0.031,
      longitudinalG: -0.128,
    }),
    ground(201, {
      latitude: north(10),
      groundSpeed: 135,
      verticalSpeed: -20,
      gpsApproachAirportId: 'EDDF',
    }),
  ];
}

export const noAirports: FlightEngineDeps = { findNearestAirport: () => null };

/** In-memory ClientConnection that records what it is sent */
export class FakeConnection implements ClientConnection {
  readonly sent: string[] = [];
  isOpen = true;
  bufferedAmount = 0;
  closed = false;
  failSends = false;

  constructor(
    readonly id: string,
    readonly remote = `fake-${id}`
  ) {}

  send(data: string): void {
    if (this.failSends) throw new Error('socket reset');
    this.sent.push(data);
  }

  close(): void {
    this.closed = true;
    this.isOpen = false;
  }

  /** Parsed frames, in order */
  messages(): unknown[] {
    return this.sent.map((raw) => JSON.parse(raw));
  }
}
