/**
 * Snapshot construction from raw simulator samples
 */
import { describe, it, expect } from 'vitest';
import { createSnapshot } from '../engine/SnapshotFactory.js';
import { createEmptyRawTelemetry, parseRawSample } from '../telemetry/RawSample.js';
import { T0 } from './fixtures.js';

describe('createSnapshot', () => {
  const raw = {
    ...createEmptyRawTelemetry(),
    simulationRate: 4,
    simOnGround: 1,
    altitude: 35012.6,
    altitudeAgl: 12.345,
    groundSpeed: 451.5,
    heading: 359.6,
    verticalSpeed: -1234.4,
    gForce: 1.236,
    engCombustion2: 1,
    engine1N1: 87.46,
    flapsPosition: 2.4,
    apuPctRpm: 95.2,
    transponderState: 4.9,
    gpsWpDistance: 18520,
    aircraftTitle: '  Airbus A320neo  ',
    atcId: 'D-AI\u0001',
    gpsWpNextId: '',
    gpsApproachAirportId: ' eddf ',
  };

  it('rounds values the way viewers see them', () => {
    const snapshot = createSnapshot(raw, T0);

    expect(snapshot).toMatchObject({
      timestamp: T0,
      simRate: 4,
      onGround: true,
      altitude: 35013,
      altitudeAgl: 12.345,
      groundSpeed: 452,
      heading: 360,
      verticalSpeed: -1234,
      gForce: 1.24,
      engine1N1: 87.5,
      flapsPosition: 2,
      apuPctRpm: 95,
      transponderState: 4,
      gpsWpDistance: 10,
    });
  });

  it('derives engine and APU state', () => {
    const snapshot = createSnapshot(raw, T0);

    expect(snapshot.enginesRunning).toBe(true);
    expect(snapshot.engineMaster1).toBe(false);
    expect(snapshot.engineMaster2).toBe(true);
    expect(snapshot.apuRunning).toBe(true);
    expect(createSnapshot({ ...raw, apuPctRpm: 90 }, T0).apuRunning).toBe(false);
  });

  it('cleans strings and keeps only ICAO approach airports', () => {
    const snapshot = createSnapshot(raw, T0);

    expect(snapshot.aircraftTitle).toBe('Airbus A320neo');
    expect(snapshot.atcId).toBeNull();
    expect(snapshot.gpsWpNextId).toBeNull();
    expect(snapshot.gpsApproachAirportId).toBe('EDDF');
    expect(createSnapshot({ ...raw, gpsApproachAirportId: 'ED07' }, T0).gpsApproachAirportId).toBeNull();
  });

  it('returns a frozen object with no type field', () => {
    const snapshot = createSnapshot(raw, T0);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect('type' in snapshot).toBe(false);
  });
});

describe('parseRawSample', () => {
  it('reads numbers, booleans and strings and ignores the rest', () => {
    const raw = parseRawSample({
      altitude: 1200,
      simOnGround: true,
      groundSpeed: 'fast',
      verticalSpeed: Number.NaN,
      aircraftTitle: 'Cessna 172',
      atcId: 42,
      unknownField: 7,
    });

    expect(raw).toEqual({
      ...createEmptyRawTelemetry(),
      altitude: 1200,
      simOnGround: 1,
      aircraftTitle: 'Cessna 172',
    });
  });

  it('rejects non-objects', () => {
    expect(parseRawSample(null)).toBeNull();
    expect(parseRawSample([1, 2])).toBeNull();
    expect(parseRawSample('sample')).toBeNull();
  });
});
