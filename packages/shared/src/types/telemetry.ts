/** Geographic position (decimal degrees) */
export interface Position {
  lat: number;
  lon: number;
}

/**
 * One raw sample as delivered by the simulator's variable interface.
 * Flags are numeric (> 0 means set), strings may contain padding or garbage.
 */
export interface RawTelemetry {
  simulationRate: number;
  simOnGround: number;
  /** ft MSL */
  altitude: number;
  /** ft above ground (radio altitude) */
  altitudeAgl: number;
  /** kts */
  groundSpeed: number;
  /** degrees true */
  heading: number;
  latitude: number;
  longitude: number;
  /** ft/min, negative when descending */
  verticalSpeed: number;
  gForce: number;

  planePitchDegrees: number;
  planeBankDegrees: number;
  angleOfAttack: number;
  sideSlip: number;
  planeHeadingMagnetic: number;
  /** Lateral body acceleration (G) */
  accelerationBodyX: number;
  /** Longitudinal body acceleration (G) */
  accelerationBodyZ: number;

  engCombustion1: number;
  engCombustion2: number;
  flapsPosition: number;
  gearPosition: number;
  parkingBrake: number;

  lightNav: number;
  lightBeacon: number;
  lightLanding: number;
  lightTaxi: number;
  lightStrobe: number;

  battery1: number;
  avionicsMaster: number;
  apuSwitch: number;
  apuPctRpm: number;

  engine1N1: number;
  engine1N2: number;
  engine2N1: number;
  engine2N2: number;
  throttle1: number;
  throttle2: number;

  spoilersArmed: number;
  spoilersPosition: number;
  autopilotMaster: number;
  autothrottleArmed: number;
  seatbeltSign: number;
  transponderState: number;

  gpsIsActiveFlightPlan: number;
  gpsFlightPlanWpCount: number;
  gpsFlightPlanWpIndex: number;
  /** meters */
  gpsWpDistance: number;
  /** seconds */
  gpsWpEte: number;
  /** seconds */
  gpsEte: number;

  aircraftTitle?: string | null;
  atcId?: string | null;
  atcAirline?: string | null;
  atcFlightNumber?: string | null;
  gpsWpNextId?: string | null;
  gpsWpPrevId?: string | null;
  gpsApproachAirportId?: string | null;
}

/**
 * Cleaned telemetry sample for one tick. Immutable once created.
 * Sent to clients as-is (it has no `type` field, which is how clients tell it
 * apart from the other message kinds).
 */
export interface TelemetrySnapshot {
  /** Sampling time, epoch ms */
  timestamp: number;
  simRate: number;

  onGround: boolean;
  /** ft MSL */
  altitude: number;
  /** ft AGL */
  altitudeAgl: number;
  latitude: number;
  longitude: number;
  /** kts */
  groundSpeed: number;
  /** ft/min */
  verticalSpeed: number;
  gForce: number;
  heading: number;
  headingMagnetic: number;

  pitch: number;
  bank: number;
  angleOfAttack: number;
  sideslip: number;
  lateralG: number;
  longitudinalG: number;

  enginesRunning: boolean;
  flapsPosition: number;
  gearDown: boolean;
  parkingBrake: boolean;

  lightNav: boolean;
  lightBeacon: boolean;
  lightLanding: boolean;
  lightTaxi: boolean;
  lightStrobe: boolean;

  battery: boolean;
  avionicsMaster: boolean;
  apuMaster: boolean;
  apuRunning: boolean;
  apuPctRpm: number;

  engineMaster1: boolean;
  engineMaster2: boolean;
  engine1N1: number;
  engine1N2: number;
  engine2N1: number;
  engine2N2: number;
  throttle1: number;
  throttle2: number;

  spoilersArmed: boolean;
  spoilersPosition: number;
  autopilotMaster: boolean;
  autothrottleArmed: boolean;
  seatbeltSign: boolean;
  transponderState: number;

  gpsIsActiveFlightPlan: boolean;
  gpsFlightPlanWpCount: number;
  gpsFlightPlanWpIndex: number;
  /** NM */
  gpsWpDistance: number;
  gpsWpEte: number;
  gpsEte: number;

  aircraftTitle: string | null;
  atcId: string | null;
  atcAirline: string | null;
  atcFlightNumber: string | null;
  gpsWpNextId: string | null;
  gpsWpPrevId: string | null;
  /** Only set when it is a plausible ICAO code (uppercased) */
  gpsApproachAirportId: string | null;
}
