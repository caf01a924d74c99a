import type { LandingRating } from '@flightbridge/shared';

/**
 * Touchdown rating from vertical speed (ft/min). Sign is ignored.
 *
 *   |VS| < 100  Perfect     5
 *   |VS| < 200  Good        4
 *   |VS| < 300  Acceptable  3
 *   |VS| < 500  Hard        2
 *   otherwise   Very Hard   1
 */
export function rateLanding(verticalSpeedFpm: number): LandingRating {
  const vs = Math.abs(verticalSpeedFpm);

  if (vs < 100) return { label: 'Perfect', score: 5 };
  if (vs < 200) return { label: 'Good', score: 4 };
  if (vs < 300) return { label: 'Acceptable', score: 3 };
  if (vs < 500) return { label: 'Hard', score: 2 };
  return { label: 'Very Hard', score: 1 };
}
