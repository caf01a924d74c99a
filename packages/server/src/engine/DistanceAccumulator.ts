import type { Position } from '@flightbridge/shared';
import { haversineDistance, isNullIsland } from '@flightbridge/shared';

/** Largest per-tick increment accepted; anything above is slew/warp */
export const MAX_STEP_DISTANCE_NM = 10;

/** Great-circle step between two fixes; zero when there is no previous fix */
export function stepDistance(previous: Position | null, current: Position): number {
  if (!previous || isNullIsland(previous)) return 0;
  return haversineDistance(previous, current);
}

/**
 * Add the step from `previous` to `current` to a running total.
 * Steps of MAX_STEP_DISTANCE_NM or more are dropped entirely.
 */
export function accumulateDistance(
  totalNm: number,
  previous: Position | null,
  current: Position
): number {
  const step = stepDistance(previous, current);
  return step < MAX_STEP_DISTANCE_NM ? totalNm + step : totalNm;
}
