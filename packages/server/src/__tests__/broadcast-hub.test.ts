/**
 * BroadcastHub Tests
 *
 * Covers: welcome payloads, ping/route/getAirport/auth handling, malformed
 * input, broadcast isolation and shutdown. Connections are in-memory fakes.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { AirportCoords } from '@flightbridge/shared';
import { AirportCoordService } from '../hub/AirportCoordService.js';
import { BroadcastHub } from '../hub/BroadcastHub.js';
import { ConnectionRegistry } from '../hub/ConnectionRegistry.js';
import { FakeConnection, makeSnapshot } from './fixtures.js';

const EDDF: AirportCoords = { lat: 50.0379, lon: 8.5622 };

function setup(lookup = vi.fn(async (icao: string) => (icao === 'EDDF' ? EDDF : null))) {
  const registry = new ConnectionRegistry();
  const onRoute = vi.fn();
  const onAuth = vi.fn();
  const hub = new BroadcastHub(registry, {
    coords: new AirportCoordService(lookup),
    onRoute,
    onAuth,
  });
  return { hub, registry, lookup, onRoute, onAuth };
}

function connect(hub: BroadcastHub, id: string): FakeConnection {
  const conn = new FakeConnection(id);
  hub.handleConnection(conn);
  return conn;
}

describe('BroadcastHub', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ─── Connections ───────────────────────────────────────────────────────────

  describe('connections', () => {
    it('sends nothing to the first viewer when there is no context yet', () => {
      const { hub } = setup();
      const conn = connect(hub, 'a');
      expect(conn.sent).toEqual([]);
      expect(hub.clientCount).toBe(1);
    });

    it('welcomes late joiners with the session code and current route', async () => {
      const { hub } = setup();
      hub.setSessionCode('ABCD-EFGH');
      const first = connect(hub, 'a');
      await hub.handleMessage(first, JSON.stringify({ type: 'route', data: { origin: 'EDDF', destination: 'LIRF' } }));

      const late = connect(hub, 'b');

      expect(late.messages()).toEqual([
        { connected: false, sessionCode: 'ABCD-EFGH' },
        { type: 'route', route: { origin: 'EDDF', destination: 'LIRF' } },
      ]);
    });

    it('forgets disconnected viewers', () => {
      const { hub } = setup();
      const conn = connect(hub, 'a');
      hub.handleDisconnect(conn);
      expect(hub.clientCount).toBe(0);
    });
  });

  // ─── Messages ──────────────────────────────────────────────────────────────

  describe('messages', () => {
    it('answers ping with pong to the sender only', async () => {
      const { hub } = setup();
      const a = connect(hub, 'a');
      const b = connect(hub, 'b');

      await hub.handleMessage(a, '{"type":"ping"}');

      expect(a.messages()).toEqual([{ type: 'pong' }]);
      expect(b.sent).toEqual([]);
    });

    it('broadcasts route updates to everyone, including the sender', async () => {
      const { hub, onRoute } = setup();
      const a = connect(hub, 'a');
      const b = connect(hub, 'b');

      await hub.handleMessage(a, JSON.stringify({ type: 'route', data: { origin: ' eddf ', destination: '' } }));

      const expected = { type: 'route', route: { origin: 'EDDF', destination: null } };
      expect(a.messages()).toEqual([expected]);
      expect(b.messages()).toEqual([expected]);
      expect(onRoute).toHaveBeenCalledWith({ origin: 'EDDF', destination: null });
      expect(hub.getRoute()).toEqual({ origin: 'EDDF', destination: null });
    });

    it('looks an airport up once and answers both requests from the cache', async () => {
      const { hub, lookup } = setup();
      const a = connect(hub, 'a');
      const b = connect(hub, 'b');

      await hub.handleMessage(a, '{"type":"getAirport","data":"EDDF"}');
      await hub.handleMessage(a, '{"type":"getAirport","data":"EDDF"}');

      expect(lookup).toHaveBeenCalledTimes(1);
      expect(a.messages()).toEqual([
        { type: 'airportCoords', icao: 'EDDF', coords: EDDF },
        { type: 'airportCoords', icao: 'EDDF', coords: EDDF },
      ]);
      expect(b.sent).toEqual([]);
    });

    it('reports unknown airports as not found', async () => {
      const { hub } = setup();
      const a = connect(hub, 'a');

      await hub.handleMessage(a, '{"type":"getAirport","data":"zzzz"}');

      expect(a.messages()).toEqual([{ type: 'airportCoords', icao: 'ZZZZ', coords: null, error: 'not_found' }]);
    });

    it('ignores airport identifiers that are not 3-4 characters', async () => {
      const { hub, lookup } = setup();
      const a = connect(hub, 'a');

      await hub.handleMessage(a, '{"type":"getAirport","data":"EDDFX"}');
      await hub.handleMessage(a, '{"type":"getAirport","data":"ED"}');

      expect(lookup).not.toHaveBeenCalled();
      expect(a.sent).toEqual([]);
    });

    it('passes auth to the callback without broadcasting it', async () => {
      const { hub, onAuth } = setup();
      const a = connect(hub, 'a');
      const b = connect(hub, 'b');

      await hub.handleMessage(a, JSON.stringify({ type: 'auth', data: 'user-1', token: 'test-secret' }));
      await hub.handleMessage(a, JSON.stringify({ type: 'auth', data: '' }));

      expect(onAuth).toHaveBeenNthCalledWith(1, 'user-1', 'test-secret');
      expect(onAuth).toHaveBeenNthCalledWith(2, null, null);
      expect(a.sent).toEqual([]);
      expect(b.sent).toEqual([]);
    });

    it('never logs the auth token', async () => {
      const { hub } = setup();
      const a = connect(hub, 'a');

      await hub.handleMessage(a, JSON.stringify({ type: 'auth', data: 'user-1', token: 'test-secret' }));

      const logged = vi.mocked(console.log).mock.calls.flat().map(String);
      expect(logged.some((line) => line.includes('test-secret'))).toBe(false);
    });

    it('ignores messages from a connection the registry dropped', async () => {
      const registry = new ConnectionRegistry({ maxBufferedBytes: 100, maxConsecutiveDrops: 1 });
      const onRoute = vi.fn();
      const hub = new BroadcastHub(registry, {
        coords: new AirportCoordService(async () => null),
        onRoute,
      });
      const slow = connect(hub, 'slow');
      slow.bufferedAmount = 500;
      hub.broadcastStatus();
      expect(hub.clientCount).toBe(0);

      await hub.handleMessage(slow, JSON.stringify({ type: 'route', data: { origin: 'KJFK', destination: 'EGLL' } }));

      expect(onRoute).not.toHaveBeenCalled();
      expect(hub.getRoute()).toBeNull();
    });

    it('ignores malformed and unknown messages', async () => {
      const { hub, onRoute, onAuth } = setup();
      const a = connect(hub, 'a');

      await hub.handleMessage(a, 'not json');
      await hub.handleMessage(a, '{"type":"launchMissiles"}');
      await hub.handleMessage(a, '{"type":"route","data":"EDDF"}');
      await hub.handleMessage(a, '[1,2,3]');

      expect(a.sent).toEqual([]);
      expect(onRoute).not.toHaveBeenCalled();
      expect(onAuth).not.toHaveBeenCalled();
    });
  });

  // ─── Broadcasts ────────────────────────────────────────────────────────────

  describe('broadcasts', () => {
    it('tags telemetry with the session code', () => {
      const { hub } = setup();
      const a = connect(hub, 'a');
      hub.setSessionCode('WXYZ-2345');

      hub.broadcastTelemetry(makeSnapshot({ altitude: 8000 }));

      const [frame] = a.messages();
      expect(frame).toMatchObject({ connected: true, sessionCode: 'WXYZ-2345', altitude: 8000 });
      expect(frame).not.toHaveProperty('type');
    });

    it('keeps delivering when one of three viewers fails', () => {
      const { hub } = setup();
      const a = connect(hub, 'a');
      const broken = connect(hub, 'broken');
      const c = connect(hub, 'c');
      broken.failSends = true;

      hub.broadcastStatus();

      expect(a.messages()).toEqual([{ connected: false }]);
      expect(c.messages()).toEqual([{ connected: false }]);
      expect(hub.clientCount).toBe(2);
    });

    it('close() disconnects every viewer and refuses new ones', () => {
      const { hub } = setup();
      const a = connect(hub, 'a');

      hub.close();
      const late = new FakeConnection('late');
      const accepted = hub.handleConnection(late);

      expect(accepted).toBe(false);
      expect(a.closed).toBe(true);
      expect(late.closed).toBe(true);
      expect(hub.clientCount).toBe(0);
    });

    it('lets a refused connection change nothing', async () => {
      const { hub, onRoute } = setup();
      hub.close();
      const late = new FakeConnection('late');
      hub.handleConnection(late);

      await hub.handleMessage(late, JSON.stringify({ type: 'route', data: { origin: 'KJFK', destination: 'EGLL' } }));
      await hub.handleMessage(late, '{"type":"ping"}');

      expect(onRoute).not.toHaveBeenCalled();
      expect(hub.getRoute()).toBeNull();
      expect(late.sent).toEqual([]);
    });
  });
});
