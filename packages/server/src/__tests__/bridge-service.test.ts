/**
 * BridgeService Tests
 *
 * Wires a real engine and hub to an in-memory store and viewer, then feeds
 * poller events the way the telemetry loop does.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FlightRecord } from '@flightbridge/shared';
import { BridgeService } from '../bridge/BridgeService.js';
import { FlightStateMachine } from '../engine/FlightStateMachine.js';
import { AirportCoordService } from '../hub/AirportCoordService.js';
import { BroadcastHub } from '../hub/BroadcastHub.js';
import { ConnectionRegistry } from '../hub/ConnectionRegistry.js';
import type { FlightStore } from '../remote/RestFlightStore.js';
import { FakeConnection, air, ground, noAirports, normalFlight } from './fixtures.js';

class MemoryStore implements FlightStore {
  readonly isConfigured = true;
  readonly saved: FlightRecord[] = [];
  token: string | null = null;
  fail = false;

  async save(record: FlightRecord): Promise<boolean> {
    if (this.fail) throw new Error('connection reset');
    this.saved.push(record);
    return true;
  }

  setUserToken(token: string | null): void {
    this.token = token;
  }
}

function setup() {
  const engine = new FlightStateMachine(noAirports);
  const hub = new BroadcastHub(new ConnectionRegistry(), {
    coords: new AirportCoordService(async () => null),
  });
  const store = new MemoryStore();
  const publish = vi.fn();
  const service = new BridgeService({ engine, hub, store, publish });
  const viewer = new FakeConnection('viewer');
  hub.handleConnection(viewer);
  return { engine, hub, store, publish, service, viewer };
}

describe('BridgeService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tracks the source connection', () => {
    const { service } = setup();

    service.handlePollerEvent({ type: 'connected', source: 'replay:test.json' });
    expect(service.isSourceConnected).toBe(true);

    service.handlePollerEvent({ type: 'disconnected', reason: 'source ended' });
    expect(service.isSourceConnected).toBe(false);
  });

  it('broadcasts and publishes every snapshot', () => {
    const { service, publish, viewer } = setup();
    const snapshot = ground(0, { altitude: 360 });

    service.handlePollerEvent({ type: 'snapshot', snapshot });

    expect(viewer.messages()).toEqual([{ ...snapshot, connected: true }]);
    expect(publish).toHaveBeenCalledWith(snapshot);
  });

  it('broadcasts the landing and saves the tagged record', async () => {
    const { service, hub, store, viewer } = setup();
    hub.setSessionCode('ABCD-EFGH');
    service.setAuth('user-1', 'test-secret');

    for (const snapshot of normalFlight()) {
      service.handlePollerEvent({ type: 'snapshot', snapshot });
    }
    await service.flush();

    const landings = viewer.messages().filter((m) => typeof m === 'object' && m !== null && 'type' in m);
    expect(landings).toHaveLength(1);
    expect(landings[0]).toMatchObject({ type: 'landing', landing: { airport: 'EDDF', rating: 'Good' } });

    expect(store.token).toBe('test-secret');
    expect(store.saved).toHaveLength(1);
    expect(store.saved[0]).toMatchObject({
      userId: 'user-1',
      sessionCode: 'ABCD-EFGH',
      origin: 'EDDM',
      destination: 'EDDF',
    });
  });

  it('survives a failing store', async () => {
    const { service, store } = setup();
    store.fail = true;

    for (const snapshot of normalFlight()) {
      service.handlePollerEvent({ type: 'snapshot', snapshot });
    }

    await expect(service.flush()).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('aborts the flight and reports the status when the source drops', () => {
    const { service, engine, store, viewer } = setup();
    service.handlePollerEvent({ type: 'snapshot', snapshot: ground(0) });
    service.handlePollerEvent({ type: 'snapshot', snapshot: air(1, 0, { groundSpeed: 150, altitudeAgl: 50 }) });
    viewer.sent.length = 0;

    service.handlePollerEvent({ type: 'disconnected', reason: 'sample failed: pipe closed' });

    expect(engine.phase).toBe('uninitialized');
    expect(viewer.messages()).toEqual([{ connected: false }]);
    expect(store.saved).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('[FlightEngine] Flight tracking aborted');
  });

  it('clears the viewer identity on logout', () => {
    const { service, store } = setup();

    service.setAuth('user-1', 'test-secret');
    service.setAuth(null, null);

    expect(service.currentUserId).toBeNull();
    expect(store.token).toBeNull();
  });
});
