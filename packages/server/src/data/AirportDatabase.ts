import { readFileSync, existsSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { AirportCoords, Position } from '@flightbridge/shared';
import { haversineDistance } from '@flightbridge/shared';

function findDataDir(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(process.cwd(), 'data'),
    resolve('data'),
    join(__dirname, '../../../../data'), // src/data -> src -> server -> packages -> root
    join(__dirname, '../../../../../data'), // dist/packages/server/src/data (compiled)
  ];
  for (const dir of candidates) {
    if (existsSync(join(dir, 'airports.json'))) return dir;
  }
  return join(process.cwd(), 'data');
}

function isCoords(value: unknown): value is AirportCoords {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'lat' in value &&
    'lon' in value &&
    typeof value.lat === 'number' &&
    typeof value.lon === 'number'
  );
}

/** Static airport table used when GPS data carries no airport */
export class AirportDatabase {
  private airports = new Map<string, AirportCoords>();

  constructor(entries?: Iterable<[string, AirportCoords]>) {
    if (entries) {
      for (const [icao, coords] of entries) {
        this.airports.set(icao.toUpperCase(), coords);
      }
    }
  }

  /** Load data/airports.json ({ "EDDF": { "lat": .., "lon": .. }, ... }) */
  static load(filePath = join(findDataDir(), 'airports.json')): AirportDatabase {
    const db = new AirportDatabase();
    if (!existsSync(filePath)) {
      console.warn(`[AirportDatabase] ${filePath} not found, nearest-airport lookup disabled`);
      return db;
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null) {
        for (const [icao, coords] of Object.entries(parsed)) {
          if (isCoords(coords)) {
            db.airports.set(icao.toUpperCase(), { lat: coords.lat, lon: coords.lon });
          }
        }
      }
    } catch (e) {
      console.warn(`[AirportDatabase] Failed to parse ${filePath}:`, e);
    }

    console.log(`[AirportDatabase] Loaded ${db.size} airports`);
    return db;
  }

  get size(): number {
    return this.airports.size;
  }

  getCoords(icao: string): AirportCoords | null {
    return this.airports.get(icao.toUpperCase()) ?? null;
  }

  /** Closest known airport within `maxDistanceNm`, or null */
  findNearest(position: Position, maxDistanceNm = 10): string | null {
    let nearestIcao: string | null = null;
    let nearestDistance = Infinity;

    for (const [icao, coords] of this.airports) {
      const distance = haversineDistance(position, coords);
      if (distance < nearestDistance && distance <= maxDistanceNm) {
        nearestDistance = distance;
        nearestIcao = icao;
      }
    }

    return nearestIcao;
  }
}
