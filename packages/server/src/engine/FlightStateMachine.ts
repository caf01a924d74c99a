import type { LandingEvent, Position, RouteSpec, TelemetrySnapshot } from '@flightbridge/shared';
import { normalizeIcao, normalizeIdentifier, roundTo } from '@flightbridge/shared';
import { accumulateDistance } from './DistanceAccumulator.js';
import { appendApproachSample, buildApproachTrace, isApproachAltitude } from './ApproachRecorder.js';
import { rateLanding } from './LandingRating.js';
import { buildFlightRecord } from './FlightRecord.js';
import type {
  FlightEngineDeps,
  FlightEngineState,
  FlightEvent,
  FlightPhase,
  FlightPhaseKind,
  FlightState,
  FlightStep,
  LandingRejection,
  TakeoffInfo,
} from './FlightTypes.js';

// Plausibility thresholds. Empirical values, kept for behavioural compatibility.
export const MIN_TAKEOFF_SPEED_KTS = 40;
export const MAX_TAKEOFF_SPEED_KTS = 250;
export const MIN_FLIGHT_SECONDS = 180;
export const MIN_ALTITUDE_AGL_FT = 100;
export const MIN_G_FORCE = 0.5;
export const MIN_FLIGHT_DISTANCE_NM = 5;
export const LANDING_DEBOUNCE_MS = 5000;
export const NEAREST_AIRPORT_RADIUS_NM = 10;

export function createFlightEngineState(): FlightEngineState {
  return {
    phase: { kind: 'uninitialized' },
    previous: null,
    lastLandingAt: null,
    route: { origin: null, destination: null },
  };
}

function positionOf(snapshot: TelemetrySnapshot): Position {
  return { lat: snapshot.latitude, lon: snapshot.longitude };
}

/**
 * Airport resolution order: GPS identifier (if it is a real ICAO code),
 * then the viewers' route hint, then the nearest known airport.
 */
function resolveAirport(
  gpsId: string | null,
  hint: string | null,
  position: Position,
  deps: FlightEngineDeps
): string | null {
  const fromGps = normalizeIcao(gpsId);
  if (fromGps) return fromGps;
  if (hint) return hint;
  return deps.findNearestAirport(position, NEAREST_AIRPORT_RADIUS_NM);
}

function startFlight(
  snapshot: TelemetrySnapshot,
  route: RouteSpec,
  deps: FlightEngineDeps
): FlightState {
  const position = positionOf(snapshot);
  return {
    startedAt: snapshot.timestamp,
    origin: resolveAirport(snapshot.gpsWpPrevId, route.origin, position, deps),
    destination: route.destination,
    aircraftType: snapshot.aircraftTitle,
    maxAltitudeFt: snapshot.altitude,
    lastPosition: position,
    distanceNm: 0,
    approach: [],
  };
}

function updateMaxima(takeoff: TakeoffInfo, snapshot: TelemetrySnapshot): TakeoffInfo {
  return {
    ...takeoff,
    maxAltitudeAgl: Math.max(takeoff.maxAltitudeAgl, snapshot.altitudeAgl),
    maxGForce: Math.max(takeoff.maxGForce, snapshot.gForce),
  };
}

function trackFlight(flight: FlightState, snapshot: TelemetrySnapshot): FlightState {
  const position = positionOf(snapshot);
  const approach = isApproachAltitude(snapshot.altitudeAgl)
    ? appendApproachSample(flight.approach, {
        timestamp: snapshot.timestamp,
        altitudeAgl: snapshot.altitudeAgl,
        lat: snapshot.latitude,
        lon: snapshot.longitude,
        verticalSpeed: snapshot.verticalSpeed,
        groundSpeed: snapshot.groundSpeed,
      })
    : flight.approach;

  return {
    ...flight,
    maxAltitudeFt: Math.max(flight.maxAltitudeFt, snapshot.altitude),
    distanceNm: accumulateDistance(flight.distanceNm, flight.lastPosition, position),
    lastPosition: position,
    approach,
  };
}

/** Ground → air transition */
function handleLiftoff(
  state: FlightEngineState,
  snapshot: TelemetrySnapshot,
  deps: FlightEngineDeps,
  events: FlightEvent[]
): FlightPhase {
  const groundSpeed = snapshot.groundSpeed;
  const takeoff: TakeoffInfo = {
    takeoffAt: snapshot.timestamp,
    liftoffSpeed: groundSpeed,
    maxAltitudeAgl: 0,
    maxGForce: snapshot.gForce,
  };

  if (groundSpeed > MAX_TAKEOFF_SPEED_KTS) {
    events.push({ type: 'takeoff', verdict: 'inAirSpawn', groundSpeed });
    return { kind: 'idle', onGround: false };
  }

  if (groundSpeed < MIN_TAKEOFF_SPEED_KTS) {
    events.push({ type: 'takeoff', verdict: 'missionStart', groundSpeed });
    return { kind: 'airborneUnvalidated', takeoff };
  }

  events.push({ type: 'takeoff', verdict: 'valid', groundSpeed });
  const flight = startFlight(snapshot, state.route, deps);
  events.push({ type: 'flightStarted', origin: flight.origin, retroactive: false });
  return { kind: 'airborneValidated', takeoff, flight };
}

/** Per-tick bookkeeping while off the ground */
function handleAirborne(
  phase: FlightPhase,
  state: FlightEngineState,
  snapshot: TelemetrySnapshot,
  deps: FlightEngineDeps,
  events: FlightEvent[]
): FlightPhase {
  if (phase.kind === 'airborneUnvalidated') {
    const takeoff = updateMaxima(phase.takeoff, snapshot);
    if (snapshot.groundSpeed < MIN_TAKEOFF_SPEED_KTS) {
      return { kind: 'airborneUnvalidated', takeoff };
    }
    // Slow mission starts become real flights once flying speed develops
    events.push({ type: 'flightValidated', groundSpeed: snapshot.groundSpeed });
    const flight = startFlight(snapshot, state.route, deps);
    events.push({ type: 'flightStarted', origin: flight.origin, retroactive: true });
    return { kind: 'airborneValidated', takeoff, flight: trackFlight(flight, snapshot) };
  }

  if (phase.kind === 'airborneValidated') {
    return {
      kind: 'airborneValidated',
      takeoff: updateMaxima(phase.takeoff, snapshot),
      flight: trackFlight(phase.flight, snapshot),
    };
  }

  return phase;
}

function landingRejections(
  phase: FlightPhase,
  state: FlightEngineState,
  touchdownAt: number
): { reasons: LandingRejection[]; message: string } {
  const reasons: LandingRejection[] = [];
  const messages: string[] = [];

  if (phase.kind !== 'airborneValidated') {
    const liftoff = phase.kind === 'airborneUnvalidated' ? phase.takeoff.liftoffSpeed : null;
    reasons.push('noValidTakeoff');
    messages.push(
      liftoff === null ? 'no valid takeoff' : `no valid takeoff (GS at liftoff: ${liftoff} kts)`
    );
  }

  if (phase.kind === 'airborneUnvalidated' || phase.kind === 'airborneValidated') {
    const { takeoff } = phase;
    const seconds = (touchdownAt - takeoff.takeoffAt) / 1000;
    const distance = phase.kind === 'airborneValidated' ? phase.flight.distanceNm : 0;

    if (seconds < MIN_FLIGHT_SECONDS) {
      reasons.push('tooShort');
      messages.push(`too short (${Math.round(seconds)}s < ${MIN_FLIGHT_SECONDS}s)`);
    }
    if (takeoff.maxAltitudeAgl < MIN_ALTITUDE_AGL_FT) {
      reasons.push('tooLow');
      messages.push(`too low (${Math.round(takeoff.maxAltitudeAgl)}ft < ${MIN_ALTITUDE_AGL_FT}ft)`);
    }
    if (takeoff.maxGForce < MIN_G_FORCE) {
      reasons.push('implausibleGForce');
      messages.push(`G-force unrealistic (${takeoff.maxGForce.toFixed(2)} < ${MIN_G_FORCE})`);
    }
    if (distance < MIN_FLIGHT_DISTANCE_NM) {
      reasons.push('tooClose');
      messages.push(`too short distance (${distance.toFixed(1)}NM < ${MIN_FLIGHT_DISTANCE_NM}NM)`);
    }
  }

  if (state.lastLandingAt !== null && touchdownAt - state.lastLandingAt < LANDING_DEBOUNCE_MS) {
    reasons.push('bounce');
    messages.push('bounce (previous landing less than 5s ago)');
  }

  return { reasons, message: messages.join(', ') };
}

/** Air → ground transition: the landing decision point */
function handleTouchdown(
  phase: FlightPhase,
  state: FlightEngineState,
  snapshot: TelemetrySnapshot,
  deps: FlightEngineDeps,
  events: FlightEvent[]
): number | null {
  const touchdownAt = snapshot.timestamp;
  const { reasons, message } = landingRejections(phase, state, touchdownAt);

  if (reasons.length > 0 || phase.kind !== 'airborneValidated') {
    events.push({ type: 'landingRejected', reasons, message });
    return state.lastLandingAt;
  }

  const { takeoff, flight } = phase;
  // Values from the last airborne tick; the touchdown tick is already damped
  const pre = state.previous ?? snapshot;
  const touchdown = positionOf(snapshot);
  const rating = rateLanding(pre.verticalSpeed);
  const airport = resolveAirport(
    snapshot.gpsApproachAirportId,
    state.route.destination,
    touchdown,
    deps
  );
  const destination = airport ?? flight.destination;
  const durationSeconds = Math.floor((touchdownAt - takeoff.takeoffAt) / 1000);

  const landing: LandingEvent = {
    timestamp: new Date(touchdownAt).toISOString(),
    verticalSpeed: pre.verticalSpeed,
    gForce: pre.gForce,
    groundSpeed: pre.groundSpeed,
    rating: rating.label,
    ratingScore: rating.score,
    aircraftTitle: snapshot.aircraftTitle,
    airport,
    pitch: roundTo(pre.pitch, 1),
    bank: roundTo(pre.bank, 1),
    angleOfAttack: roundTo(pre.angleOfAttack, 1),
    sideslip: roundTo(pre.sideslip, 1),
    headingMagnetic: Math.round(pre.headingMagnetic),
    lateralG: roundTo(pre.lateralG, 2),
    longitudinalG: roundTo(pre.longitudinalG, 2),
    approachData: buildApproachTrace(flight.approach, touchdownAt, touchdown),
    origin: flight.origin,
    destination,
    flightDurationSeconds: durationSeconds,
    distanceNm: roundTo(flight.distanceNm, 1),
  };
  events.push({ type: 'landing', landing });

  const result = buildFlightRecord({
    origin: flight.origin,
    destination,
    aircraftType: flight.aircraftType,
    takeoffAt: takeoff.takeoffAt,
    touchdownAt,
    distanceNm: flight.distanceNm,
    maxAltitudeFt: flight.maxAltitudeFt,
    landingRatingScore: rating.score,
    landingVs: pre.verticalSpeed,
    landingGforce: pre.gForce,
  });
  if (result.success) {
    events.push({ type: 'flightCompleted', record: result.record });
  } else {
    events.push({ type: 'flightDiscarded', reasons: result.reasons, message: result.message });
  }

  return touchdownAt;
}

/**
 * Advance the engine by one snapshot. Pure: the input state is not modified.
 * Ticks must be fed strictly in order.
 */
export function stepFlight(
  state: FlightEngineState,
  snapshot: TelemetrySnapshot,
  deps: FlightEngineDeps
): FlightStep {
  const events: FlightEvent[] = [];
  const onGround = snapshot.onGround;

  if (state.phase.kind === 'uninitialized') {
    events.push({
      type: 'baseline',
      onGround,
      groundSpeed: snapshot.groundSpeed,
      altitude: snapshot.altitude,
    });
    return {
      state: { ...state, phase: { kind: 'idle', onGround }, previous: snapshot },
      events,
    };
  }

  let phase: FlightPhase = state.phase;
  let lastLandingAt = state.lastLandingAt;
  const wasOnGround = phase.kind === 'idle' && phase.onGround;

  if (wasOnGround && !onGround) {
    phase = handleLiftoff(state, snapshot, deps, events);
  }

  if (!onGround) {
    phase = handleAirborne(phase, state, snapshot, deps, events);
  }

  if (!wasOnGround && onGround) {
    lastLandingAt = handleTouchdown(phase, state, snapshot, deps, events);
    phase = { kind: 'idle', onGround: true };
  }

  return {
    state: { ...state, phase, previous: snapshot, lastLandingAt },
    events,
  };
}

/**
 * Record the viewers' route. An active flight only takes the parts it has
 * not resolved yet; the first airport resolved for a flight wins.
 */
export function applyRouteHint(state: FlightEngineState, route: RouteSpec): FlightEngineState {
  const normalized: RouteSpec = {
    origin: normalizeIdentifier(route.origin),
    destination: normalizeIdentifier(route.destination),
  };

  if (state.phase.kind !== 'airborneValidated') {
    return { ...state, route: normalized };
  }

  const { flight } = state.phase;
  return {
    ...state,
    route: normalized,
    phase: {
      ...state.phase,
      flight: {
        ...flight,
        origin: flight.origin ?? normalized.origin,
        destination: flight.destination ?? normalized.destination,
      },
    },
  };
}

/**
 * Drop any tracked flight without emitting a landing (telemetry source lost).
 * The next sample re-establishes the ground/air baseline.
 */
export function resetFlight(state: FlightEngineState): FlightStep {
  const events: FlightEvent[] =
    state.phase.kind === 'airborneValidated' || state.phase.kind === 'airborneUnvalidated'
      ? [{ type: 'flightAborted' }]
      : [];
  return {
    state: { ...state, phase: { kind: 'uninitialized' }, previous: null },
    events,
  };
}

/**
 * Holds the engine state between ticks. All transitions go through the pure
 * functions above.
 */
export class FlightStateMachine {
  private state: FlightEngineState = createFlightEngineState();

  constructor(private deps: FlightEngineDeps) {}

  /** Feed one snapshot, returning what happened */
  update(snapshot: TelemetrySnapshot): FlightEvent[] {
    const step = stepFlight(this.state, snapshot, this.deps);
    this.state = step.state;
    return step.events;
  }

  /** Route hint from viewers */
  setRoute(route: RouteSpec): void {
    this.state = applyRouteHint(this.state, route);
  }

  /** Abandon tracking (source disconnected) */
  reset(): FlightEvent[] {
    const step = resetFlight(this.state);
    this.state = step.state;
    return step.events;
  }

  get phase(): FlightPhaseKind {
    return this.state.phase.kind;
  }

  get isTracking(): boolean {
    return this.state.phase.kind === 'airborneValidated';
  }

  /** Current flight accumulator, null when no validated flight exists */
  get flight(): FlightState | null {
    return this.state.phase.kind === 'airborneValidated' ? this.state.phase.flight : null;
  }

  getState(): FlightEngineState {
    return this.state;
  }
}
