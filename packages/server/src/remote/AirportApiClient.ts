import type { AirportCoords } from '@flightbridge/shared';
import { isValidIcao } from '@flightbridge/shared';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AirportApiOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/** Fields of interest in the airport-info endpoint response */
interface AirportInfoResponse {
  latitude: number;
  longitude: number;
}

function toCoordinate(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * The endpoint returns latitude/longitude as numbers or numeric strings, and an
 * error object without them for unknown identifiers.
 */
export function parseAirportInfo(body: unknown): AirportInfoResponse | null {
  if (typeof body !== 'object' || body === null) return null;
  if (!('latitude' in body) || !('longitude' in body)) return null;

  const latitude = toCoordinate(body.latitude);
  const longitude = toCoordinate(body.longitude);
  if (latitude === null || longitude === null) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;

  return { latitude, longitude };
}

/**
 * Look up an airport's coordinates over HTTP. Network failures, timeouts and
 * unusable responses all come back as null.
 */
export async function fetchAirportCoords(
  icao: string,
  options: AirportApiOptions
): Promise<AirportCoords | null> {
  if (!isValidIcao(icao)) return null;

  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `${options.baseUrl}?icao=${encodeURIComponent(icao.trim().toUpperCase())}`;

  try {
    const res = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
    if (!res.ok) {
      console.warn(`[AirportApi] ${icao}: HTTP ${res.status}`);
      return null;
    }
    const info = parseAirportInfo(await res.json());
    return info ? { lat: info.latitude, lon: info.longitude } : null;
  } catch (e) {
    console.warn(`[AirportApi] Lookup for ${icao} failed:`, e instanceof Error ? e.message : e);
    return null;
  }
}
