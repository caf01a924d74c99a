import type { RawTelemetry, TelemetrySnapshot } from '@flightbridge/shared';
import { cleanString, metersToNm, normalizeIcao, roundTo } from '@flightbridge/shared';

const APU_RUNNING_RPM = 90;

function flag(value: number): boolean {
  return value > 0;
}

/**
 * Build the immutable per-tick snapshot from a raw simulator sample.
 * Rounding here is what viewers and the flight engine both see.
 */
export function createSnapshot(raw: RawTelemetry, timestamp: number): TelemetrySnapshot {
  const snapshot: TelemetrySnapshot = {
    timestamp,
    simRate: roundTo(raw.simulationRate, 1),

    onGround: flag(raw.simOnGround),
    altitude: Math.round(raw.altitude),
    altitudeAgl: raw.altitudeAgl,
    latitude: raw.latitude,
    longitude: raw.longitude,
    groundSpeed: Math.round(raw.groundSpeed),
    verticalSpeed: Math.round(raw.verticalSpeed),
    gForce: roundTo(raw.gForce, 2),
    heading: Math.round(raw.heading),
    headingMagnetic: raw.planeHeadingMagnetic,

    pitch: raw.planePitchDegrees,
    bank: raw.planeBankDegrees,
    angleOfAttack: raw.angleOfAttack,
    sideslip: raw.sideSlip,
    lateralG: raw.accelerationBodyX,
    longitudinalG: raw.accelerationBodyZ,

    enginesRunning: flag(raw.engCombustion1) || flag(raw.engCombustion2),
    flapsPosition: Math.round(raw.flapsPosition),
    gearDown: flag(raw.gearPosition),
    parkingBrake: flag(raw.parkingBrake),

    lightNav: flag(raw.lightNav),
    lightBeacon: flag(raw.lightBeacon),
    lightLanding: flag(raw.lightLanding),
    lightTaxi: flag(raw.lightTaxi),
    lightStrobe: flag(raw.lightStrobe),

    battery: flag(raw.battery1),
    avionicsMaster: flag(raw.avionicsMaster),
    apuMaster: flag(raw.apuSwitch),
    apuRunning: raw.apuPctRpm > APU_RUNNING_RPM,
    apuPctRpm: Math.round(raw.apuPctRpm),

    engineMaster1: flag(raw.engCombustion1),
    engineMaster2: flag(raw.engCombustion2),
    engine1N1: roundTo(raw.engine1N1, 1),
    engine1N2: roundTo(raw.engine1N2, 1),
    engine2N1: roundTo(raw.engine2N1, 1),
    engine2N2: roundTo(raw.engine2N2, 1),
    throttle1: Math.round(raw.throttle1),
    throttle2: Math.round(raw.throttle2),

    spoilersArmed: flag(raw.spoilersArmed),
    spoilersPosition: Math.round(raw.spoilersPosition),
    autopilotMaster: flag(raw.autopilotMaster),
    autothrottleArmed: flag(raw.autothrottleArmed),
    seatbeltSign: flag(raw.seatbeltSign),
    transponderState: Math.trunc(raw.transponderState),

    gpsIsActiveFlightPlan: flag(raw.gpsIsActiveFlightPlan),
    gpsFlightPlanWpCount: Math.trunc(raw.gpsFlightPlanWpCount),
    gpsFlightPlanWpIndex: Math.trunc(raw.gpsFlightPlanWpIndex),
    gpsWpDistance: roundTo(metersToNm(raw.gpsWpDistance), 1),
    gpsWpEte: Math.round(raw.gpsWpEte),
    gpsEte: Math.round(raw.gpsEte),

    aircraftTitle: cleanString(raw.aircraftTitle),
    atcId: cleanString(raw.atcId),
    atcAirline: cleanString(raw.atcAirline),
    atcFlightNumber: cleanString(raw.atcFlightNumber),
    gpsWpNextId: cleanString(raw.gpsWpNextId),
    gpsWpPrevId: cleanString(raw.gpsWpPrevId),
    gpsApproachAirportId: normalizeIcao(raw.gpsApproachAirportId),
  };

  return Object.freeze(snapshot);
}
