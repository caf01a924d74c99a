import express from 'express';
import { createServer } from 'http';
import { WebSocketServer } from 'ws';
import { loadConfig } from './config.js';
import { AirportDatabase } from './data/AirportDatabase.js';
import { FlightStateMachine } from './engine/FlightStateMachine.js';
import { AirportCoordService } from './hub/AirportCoordService.js';
import { BroadcastHub } from './hub/BroadcastHub.js';
import { ConnectionRegistry } from './hub/ConnectionRegistry.js';
import { attachWebSocketServer } from './hub/WsTransport.js';
import { fetchAirportCoords } from './remote/AirportApiClient.js';
import { RealtimeRelay } from './remote/RealtimeRelay.js';
import { RestFlightStore } from './remote/RestFlightStore.js';
import { BridgeService } from './bridge/BridgeService.js';
import { ReplayTelemetrySource } from './telemetry/ReplayTelemetrySource.js';
import { TelemetryPoller } from './telemetry/TelemetryPoller.js';

const config = loadConfig();

// ─── Collaborators ─────────────────────────────────────────────────────────
const airports = AirportDatabase.load();

const coords = new AirportCoordService(async (icao) => {
  const local = airports.getCoords(icao);
  if (local) return local;
  return fetchAirportCoords(icao, {
    baseUrl: config.airportApiUrl,
    timeoutMs: config.airportLookupTimeoutMs,
  });
});

const store = new RestFlightStore({ url: config.supabaseUrl, apiKey: config.supabaseKey });
const relay = new RealtimeRelay({
  url: config.supabaseUrl,
  apiKey: config.supabaseKey,
  onClosed: () => hub.setSessionCode(null),
});

const engine = new FlightStateMachine({
  findNearestAirport: (position, maxDistanceNm) => airports.findNearest(position, maxDistanceNm),
});

const registry = new ConnectionRegistry({ maxBufferedBytes: config.sendBufferLimitBytes });

const hub = new BroadcastHub(registry, {
  coords,
  onRoute: (route) => service.setRoute(route),
  onAuth: (userId, token) => service.setAuth(userId, token),
});
const service = new BridgeService({
  engine,
  hub,
  store,
  publish: (snapshot) => relay.publish(snapshot),
});

const poller = config.replayFile
  ? new TelemetryPoller(
      new ReplayTelemetrySource(config.replayFile),
      (event) => service.handlePollerEvent(event),
      {
        tickIntervalMs: config.tickIntervalMs,
        reconnectIntervalMs: config.reconnectIntervalMs,
      }
    )
  : null;

// ─── Express app ───────────────────────────────────────────────────────────
const app = express();

// Health check (used by liveness/readiness probes)
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok' });
});

app.get('/api/status', (_req, res) => {
  res.json({
    telemetry: {
      source: poller?.sourceName ?? null,
      running: poller?.isRunning ?? false,
      connected: service.isSourceConnected,
    },
    flight: engine.phase,
    clients: hub.clientCount,
    route: hub.getRoute(),
    sessionCode: hub.getSessionCode(),
    relayActive: relay.isActive,
    storeConfigured: store.isConfigured,
  });
});

// ─── HTTP + WebSocket server ───────────────────────────────────────────────
const server = createServer(app);
const wss = new WebSocketServer({ server });
attachWebSocketServer(wss, hub);

// ─── Shutdown ──────────────────────────────────────────────────────────────
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Server] ${signal} received, shutting down`);

  await poller?.stop();
  relay.stop();
  hub.close();
  await service.flush();
  wss.close();
  server.close(() => {
    console.log('[Server] Closed');
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[Server] Shutdown failed:', err);
      process.exitCode = 1;
    });
  });
}

// ─── Start server ──────────────────────────────────────────────────────────
server.listen(config.port, () => {
  console.log(`[Server] Flight telemetry bridge running on port ${config.port}`);
  console.log(`[Server] WebSocket: ws://localhost:${config.port}`);
  console.log(`[Server] Status: http://localhost:${config.port}/api/status`);

  relay
    .start()
    .then((code) => {
      hub.setSessionCode(code);
      if (code) console.log(`[Server] Session code: ${code}`);
    })
    .catch((err: unknown) => {
      console.error('[Server] Relay start failed:', err);
    });

  if (poller) {
    poller.start();
  } else {
    console.log('[Server] No telemetry source configured (set TELEMETRY_REPLAY_FILE)');
  }
});
