const METERS_PER_NM = 1852;

/** Convert meters to nautical miles */
export function metersToNm(meters: number): number {
  return meters / METERS_PER_NM;
}

/** Seconds needed to cover a distance (nm) at a ground speed (kts) */
export function secondsToCover(distanceNm: number, speedKts: number): number {
  if (speedKts <= 0) return Infinity;
  return (distanceNm / speedKts) * 3600;
}
