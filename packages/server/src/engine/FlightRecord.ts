import type { FlightRecord } from '@flightbridge/shared';
import { roundTo, secondsToCover } from '@flightbridge/shared';

/** Cruise speed assumed when judging whether a flight took a realistic time */
export const ASSUMED_CRUISE_SPEED_KTS = 400;

/** Logbook minimums, independent of the landing acceptance rules */
export const MIN_RECORD_DURATION_SECONDS = 120;
export const MIN_RECORD_DISTANCE_NM = 5;

export type RecordRejection = 'tooShort' | 'tooClose' | 'noAirports';

/** Everything the engine knows about a flight at touchdown */
export interface FlightSummary {
  origin: string | null;
  destination: string | null;
  aircraftType: string | null;
  /** epoch ms */
  takeoffAt: number;
  /** epoch ms */
  touchdownAt: number;
  distanceNm: number;
  maxAltitudeFt: number;
  landingRatingScore: number;
  landingVs: number;
  landingGforce: number;
}

export type FlightRecordResult =
  | { success: true; record: FlightRecord }
  | { success: false; reasons: RecordRejection[]; message: string };

/**
 * Flight score:
 *   round(distance * timeFactor) + ratingScore * 10
 * where timeFactor = min(1, actual / expected) and expected is the time at
 * ASSUMED_CRUISE_SPEED_KTS. Flying faster than that (time acceleration) cuts
 * the distance reward; flying slower never adds to it.
 */
export function calculateFlightScore(
  distanceNm: number,
  durationSeconds: number,
  landingRatingScore: number
): number {
  const expectedSeconds = secondsToCover(distanceNm, ASSUMED_CRUISE_SPEED_KTS);
  const timeFactor = expectedSeconds > 0 ? Math.min(1, durationSeconds / expectedSeconds) : 1;
  return Math.round(distanceNm * timeFactor) + landingRatingScore * 10;
}

/**
 * Materialize the logbook record for a landed flight, or explain why it is
 * not worth keeping. The landing itself may still have been shown to viewers.
 */
export function buildFlightRecord(summary: FlightSummary): FlightRecordResult {
  const durationSeconds = Math.floor((summary.touchdownAt - summary.takeoffAt) / 1000);
  const distanceNm = roundTo(summary.distanceNm, 2);

  const reasons: RecordRejection[] = [];
  const messages: string[] = [];

  if (durationSeconds < MIN_RECORD_DURATION_SECONDS) {
    reasons.push('tooShort');
    messages.push(`too short (${durationSeconds}s < ${MIN_RECORD_DURATION_SECONDS}s)`);
  }
  if (distanceNm < MIN_RECORD_DISTANCE_NM) {
    reasons.push('tooClose');
    messages.push(`distance too small (${distanceNm.toFixed(1)} NM < ${MIN_RECORD_DISTANCE_NM} NM)`);
  }
  if (!summary.origin && !summary.destination) {
    reasons.push('noAirports');
    messages.push('no origin or destination known');
  }

  if (reasons.length > 0) {
    return { success: false, reasons, message: messages.join(', ') };
  }

  return {
    success: true,
    record: {
      userId: null,
      sessionCode: null,
      origin: summary.origin,
      destination: summary.destination,
      aircraftType: summary.aircraftType,
      departureTime: new Date(summary.takeoffAt).toISOString(),
      arrivalTime: new Date(summary.touchdownAt).toISOString(),
      flightDurationSeconds: durationSeconds,
      distanceNm,
      maxAltitudeFt: Math.trunc(summary.maxAltitudeFt),
      landingRating: summary.landingRatingScore,
      landingVs: summary.landingVs,
      landingGforce: summary.landingGforce,
      score: calculateFlightScore(distanceNm, durationSeconds, summary.landingRatingScore),
    },
  };
}
