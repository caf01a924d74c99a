import type { RawTelemetry } from '@flightbridge/shared';

type NumericField = {
  [K in keyof RawTelemetry]-?: RawTelemetry[K] extends number ? K : never;
}[keyof RawTelemetry];

type StringField = Exclude<keyof RawTelemetry, NumericField>;

const STRING_FIELDS: readonly StringField[] = [
  'aircraftTitle',
  'atcId',
  'atcAirline',
  'atcFlightNumber',
  'gpsWpNextId',
  'gpsWpPrevId',
  'gpsApproachAirportId',
];

/** A sample with every numeric variable at zero and no strings */
export function createEmptyRawTelemetry(): RawTelemetry {
  return {
    simulationRate: 1,
    simOnGround: 0,
    altitude: 0,
    altitudeAgl: 0,
    groundSpeed: 0,
    heading: 0,
    latitude: 0,
    longitude: 0,
    verticalSpeed: 0,
    gForce: 1,
    planePitchDegrees: 0,
    planeBankDegrees: 0,
    angleOfAttack: 0,
    sideSlip: 0,
    planeHeadingMagnetic: 0,
    accelerationBodyX: 0,
    accelerationBodyZ: 0,
    engCombustion1: 0,
    engCombustion2: 0,
    flapsPosition: 0,
    gearPosition: 0,
    parkingBrake: 0,
    lightNav: 0,
    lightBeacon: 0,
    lightLanding: 0,
    lightTaxi: 0,
    lightStrobe: 0,
    battery1: 0,
    avionicsMaster: 0,
    apuSwitch: 0,
    apuPctRpm: 0,
    engine1N1: 0,
    engine1N2: 0,
    engine2N1: 0,
    engine2N2: 0,
    throttle1: 0,
    throttle2: 0,
    spoilersArmed: 0,
    spoilersPosition: 0,
    autopilotMaster: 0,
    autothrottleArmed: 0,
    seatbeltSign: 0,
    transponderState: 0,
    gpsIsActiveFlightPlan: 0,
    gpsFlightPlanWpCount: 0,
    gpsFlightPlanWpIndex: 0,
    gpsWpDistance: 0,
    gpsWpEte: 0,
    gpsEte: 0,
  };
}

const NUMERIC_FIELDS = new Set<string>(Object.keys(createEmptyRawTelemetry()));

function isNumericField(key: string): key is NumericField {
  return NUMERIC_FIELDS.has(key);
}

/**
 * Read a recorded sample. Unknown keys are ignored; missing or non-finite
 * numbers keep their defaults. Returns null if the value is not an object.
 */
export function parseRawSample(value: unknown): RawTelemetry | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;

  const raw = createEmptyRawTelemetry();
  const fields = new Map<string, unknown>(Object.entries(value));
  for (const [key, field] of fields) {
    if (isNumericField(key)) {
      if (typeof field === 'number' && Number.isFinite(field)) raw[key] = field;
      else if (typeof field === 'boolean') raw[key] = field ? 1 : 0;
    }
  }
  for (const key of STRING_FIELDS) {
    const field = fields.get(key);
    if (typeof field === 'string') raw[key] = field;
  }
  return raw;
}
