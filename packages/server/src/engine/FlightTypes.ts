import type {
  ApproachSample,
  FlightRecord,
  LandingEvent,
  Position,
  RouteSpec,
  TelemetrySnapshot,
} from '@flightbridge/shared';
import type { RecordRejection } from './FlightRecord.js';

/** Liftoff bookkeeping, kept from the moment the wheels leave the ground */
export interface TakeoffInfo {
  /** epoch ms */
  takeoffAt: number;
  /** Ground speed at liftoff (kts) */
  liftoffSpeed: number;
  /** Monotonic maxima since liftoff */
  maxAltitudeAgl: number;
  maxGForce: number;
}

/** Per-flight accumulator, only exists for validated flights */
export interface FlightState {
  /** epoch ms when tracking began (liftoff, or promotion for slow starts) */
  startedAt: number;
  origin: string | null;
  destination: string | null;
  aircraftType: string | null;
  /** ft MSL */
  maxAltitudeFt: number;
  lastPosition: Position;
  distanceNm: number;
  approach: readonly ApproachSample[];
}

export type FlightPhase =
  /** No sample seen yet; the first one only sets the baseline */
  | { kind: 'uninitialized' }
  /** No flight tracked. Airborne idle happens after a spawn or a mid-air start. */
  | { kind: 'idle'; onGround: boolean }
  /** Off the ground, takeoff plausibility not confirmed yet */
  | { kind: 'airborneUnvalidated'; takeoff: TakeoffInfo }
  /** Real flight, accumulating distance and approach data */
  | { kind: 'airborneValidated'; takeoff: TakeoffInfo; flight: FlightState };

export type FlightPhaseKind = FlightPhase['kind'];

export interface FlightEngineState {
  phase: FlightPhase;
  /** Last snapshot processed; supplies the pre-touchdown values */
  previous: TelemetrySnapshot | null;
  /** epoch ms of the last accepted landing */
  lastLandingAt: number | null;
  /** Route hint from viewers, used when GPS data has no airport */
  route: RouteSpec;
}

/** Nearest-airport collaborator */
export type NearestAirportLookup = (position: Position, maxDistanceNm: number) => string | null;

export interface FlightEngineDeps {
  findNearestAirport: NearestAirportLookup;
}

export type TakeoffVerdict = 'valid' | 'missionStart' | 'inAirSpawn';

export type LandingRejection =
  | 'noValidTakeoff'
  | 'tooShort'
  | 'tooLow'
  | 'implausibleGForce'
  | 'tooClose'
  | 'bounce';

export type FlightEvent =
  | { type: 'baseline'; onGround: boolean; groundSpeed: number; altitude: number }
  | { type: 'takeoff'; verdict: TakeoffVerdict; groundSpeed: number }
  | { type: 'flightStarted'; origin: string | null; retroactive: boolean }
  | { type: 'flightValidated'; groundSpeed: number }
  | { type: 'landing'; landing: LandingEvent }
  | { type: 'landingRejected'; reasons: LandingRejection[]; message: string }
  | { type: 'flightCompleted'; record: FlightRecord }
  | { type: 'flightDiscarded'; reasons: RecordRejection[]; message: string }
  | { type: 'flightAborted' };

export interface FlightStep {
  state: FlightEngineState;
  events: FlightEvent[];
}
