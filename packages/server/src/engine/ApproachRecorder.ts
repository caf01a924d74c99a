import type { ApproachPoint, ApproachSample, Position } from '@flightbridge/shared';
import { haversineDistance, roundTo } from '@flightbridge/shared';

/** Samples kept for the glide-path trace (about one minute at 1 Hz) */
export const APPROACH_BUFFER_SIZE = 60;

/** Samples are only taken below this height */
export const APPROACH_CEILING_AGL = 3000;

export function isApproachAltitude(altitudeAgl: number): boolean {
  return altitudeAgl > 0 && altitudeAgl < APPROACH_CEILING_AGL;
}

/**
 * Append a sample, evicting the oldest ones beyond APPROACH_BUFFER_SIZE.
 * Returns a new buffer; the input is left untouched.
 */
export function appendApproachSample(
  buffer: readonly ApproachSample[],
  sample: ApproachSample
): ApproachSample[] {
  const next = [...buffer, sample];
  return next.length > APPROACH_BUFFER_SIZE
    ? next.slice(next.length - APPROACH_BUFFER_SIZE)
    : next;
}

/**
 * Convert the buffer into a glide-path trace relative to the touchdown.
 * Points are ordered oldest first (most negative secondsBeforeTouchdown).
 */
export function buildApproachTrace(
  buffer: readonly ApproachSample[],
  touchdownAt: number,
  touchdown: Position
): ApproachPoint[] {
  return buffer
    .map((raw) => ({
      secondsBeforeTouchdown: roundTo((raw.timestamp - touchdownAt) / 1000, 1),
      altitudeAgl: Math.round(raw.altitudeAgl),
      distanceToTouchdown: roundTo(
        haversineDistance({ lat: raw.lat, lon: raw.lon }, touchdown),
        2
      ),
      verticalSpeed: Math.round(raw.verticalSpeed),
      groundSpeed: Math.round(raw.groundSpeed),
    }))
    .sort((a, b) => a.secondsBeforeTouchdown - b.secondsBeforeTouchdown);
}
