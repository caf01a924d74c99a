import type { FlightRecord } from '@flightbridge/shared';
import type { FetchLike } from './AirportApiClient.js';

/** Persistence sink for completed flights */
export interface FlightStore {
  readonly isConfigured: boolean;
  save(record: FlightRecord): Promise<boolean>;
  /** Viewer's access token; null falls back to the project key */
  setUserToken(token: string | null): void;
}

/** Column layout of the `flights` table */
export interface FlightRow {
  user_id: string | null;
  session_code: string | null;
  origin: string | null;
  destination: string | null;
  aircraft_type: string | null;
  departure_time: string;
  arrival_time: string;
  flight_duration_seconds: number;
  distance_nm: number;
  max_altitude_ft: number;
  landing_rating: number;
  landing_vs: number;
  landing_gforce: number;
  score: number;
}

export function toFlightRow(record: FlightRecord): FlightRow {
  return {
    user_id: record.userId,
    session_code: record.sessionCode,
    origin: record.origin,
    destination: record.destination,
    aircraft_type: record.aircraftType,
    departure_time: record.departureTime,
    arrival_time: record.arrivalTime,
    flight_duration_seconds: record.flightDurationSeconds,
    distance_nm: record.distanceNm,
    max_altitude_ft: record.maxAltitudeFt,
    landing_rating: record.landingRating,
    landing_vs: record.landingVs,
    landing_gforce: record.landingGforce,
    score: record.score,
  };
}

export interface RestFlightStoreOptions {
  /** Project URL, e.g. https://xyz.supabase.co; null disables the store */
  url: string | null;
  apiKey: string | null;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/** Writes flights through the database's REST endpoint */
export class RestFlightStore implements FlightStore {
  private userToken: string | null = null;
  private fetchImpl: FetchLike;

  constructor(private options: RestFlightStoreOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get isConfigured(): boolean {
    return Boolean(this.options.url && this.options.apiKey);
  }

  setUserToken(token: string | null): void {
    this.userToken = token ? token : null;
  }

  async save(record: FlightRecord): Promise<boolean> {
    const { url, apiKey } = this.options;
    if (!url || !apiKey) {
      console.log('[FlightStore] Not configured, flight not saved');
      return false;
    }

    try {
      const res = await this.fetchImpl(`${url.replace(/\/+$/, '')}/rest/v1/flights`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          apikey: apiKey,
          Authorization: `Bearer ${this.userToken ?? apiKey}`,
          Prefer: 'return=representation',
        },
        body: JSON.stringify(toFlightRow(record)),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
      });

      if (!res.ok) {
        console.error(`[FlightStore] Save failed: HTTP ${res.status} ${await res.text()}`);
        return false;
      }
      console.log(`[FlightStore] Saved flight ${record.origin ?? '----'} -> ${record.destination ?? '----'}`);
      return true;
    } catch (e) {
      console.error('[FlightStore] Save failed:', e instanceof Error ? e.message : e);
      return false;
    }
  }
}
