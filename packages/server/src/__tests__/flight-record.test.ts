import { describe, it, expect } from 'vitest';
import { buildFlightRecord, calculateFlightScore, type FlightSummary } from '../engine/FlightRecord.js';
import { T0 } from './fixtures.js';

function summary(overrides: Partial<FlightSummary> = {}): FlightSummary {
  return {
    origin: 'EDDF',
    destination: 'LIRF',
    aircraftType: 'Airbus A320neo',
    takeoffAt: T0,
    touchdownAt: T0 + 3_600_000,
    distanceNm: 100,
    maxAltitudeFt: 36000,
    landingRatingScore: 4,
    landingVs: -140,
    landingGforce: 1.18,
    ...overrides,
  };
}

describe('calculateFlightScore', () => {
  it('pays full distance for a realistic duration', () => {
    // 100 NM at 400 kts = 900 s
    expect(calculateFlightScore(100, 900, 5)).toBe(150);
  });

  it('never rewards flying slower than cruise', () => {
    expect(calculateFlightScore(100, 5000, 5)).toBe(150);
  });

  it('scales the distance reward down for time-accelerated flights', () => {
    expect(calculateFlightScore(100, 450, 3)).toBe(80);
  });

  it('handles zero distance', () => {
    expect(calculateFlightScore(0, 600, 4)).toBe(40);
  });
});

describe('buildFlightRecord', () => {
  it('rejects a 200 s flight of 4.9 NM on distance', () => {
    const result = buildFlightRecord(summary({ touchdownAt: T0 + 200_000, distanceNm: 4.9 }));
    expect(result).toEqual({
      success: false,
      reasons: ['tooClose'],
      message: 'distance too small (4.9 NM < 5 NM)',
    });
  });

  it('reports every failed minimum', () => {
    const result = buildFlightRecord(
      summary({ touchdownAt: T0 + 119_900, distanceNm: 20, origin: null, destination: null })
    );
    expect(result).toEqual({
      success: false,
      reasons: ['tooShort', 'noAirports'],
      message: 'too short (119s < 120s), no origin or destination known',
    });
  });

  it('accepts a flight with only a destination', () => {
    const result = buildFlightRecord(
      summary({
        origin: null,
        touchdownAt: T0 + 3_600_500,
        distanceNm: 123.456,
        maxAltitudeFt: 36999.9,
        landingRatingScore: 3,
      })
    );

    expect(result).toEqual({
      success: true,
      record: {
        userId: null,
        sessionCode: null,
        origin: null,
        destination: 'LIRF',
        aircraftType: 'Airbus A320neo',
        departureTime: '2024-05-01T12:00:00.000Z',
        arrivalTime: '2024-05-01T13:00:00.500Z',
        flightDurationSeconds: 3600,
        distanceNm: 123.46,
        maxAltitudeFt: 36999,
        landingRating: 3,
        landingVs: -140,
        landingGforce: 1.18,
        score: 153,
      },
    });
  });
});
