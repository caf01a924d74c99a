import type { AirportCoords } from '@flightbridge/shared';

export type CoordLookup = (icao: string) => Promise<AirportCoords | null>;

/**
 * Coordinate cache shared by every connection.
 *
 * Only successful lookups are cached. Concurrent requests for the same
 * identifier share one pending lookup instead of racing to fill the cache.
 */
export class AirportCoordService {
  private cache = new Map<string, AirportCoords>();
  private pending = new Map<string, Promise<AirportCoords | null>>();

  constructor(private lookup: CoordLookup) {}

  get cachedCount(): number {
    return this.cache.size;
  }

  getCached(icao: string): AirportCoords | null {
    return this.cache.get(icao.toUpperCase()) ?? null;
  }

  resolve(icao: string): Promise<AirportCoords | null> {
    const key = icao.toUpperCase();
    const cached = this.cache.get(key);
    if (cached) return Promise.resolve(cached);

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const request = this.runLookup(key).finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, request);
    return request;
  }

  private async runLookup(key: string): Promise<AirportCoords | null> {
    try {
      const coords = await this.lookup(key);
      if (coords) this.cache.set(key, coords);
      return coords;
    } catch (e) {
      console.warn(`[AirportCoords] Lookup for ${key} failed:`, e instanceof Error ? e.message : e);
      return null;
    }
  }
}
