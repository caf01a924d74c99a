import type {
  ClientMessage,
  LandingEvent,
  RouteSpec,
  ServerMessage,
  TelemetrySnapshot,
} from '@flightbridge/shared';
import { normalizeIdentifier } from '@flightbridge/shared';
import type { AirportCoordService } from './AirportCoordService.js';
import type { ClientConnection, ConnectionRegistry } from './ConnectionRegistry.js';
import { parseClientMessage } from './ClientProtocol.js';

export interface BroadcastHubOptions {
  coords: AirportCoordService;
  /** Route hint changed by a viewer */
  onRoute?: (route: RouteSpec) => void;
  /** Viewer login/logout; nulls mean logged out */
  onAuth?: (userId: string | null, token: string | null) => void;
}

/**
 * Fans telemetry out to viewers and answers their requests.
 * Transport details live behind ClientConnection.
 */
export class BroadcastHub {
  private route: RouteSpec | null = null;
  private sessionCode: string | null = null;

  constructor(
    private registry: ConnectionRegistry,
    private options: BroadcastHubOptions
  ) {}

  get clientCount(): number {
    return this.registry.size;
  }

  getRoute(): RouteSpec | null {
    return this.route;
  }

  getSessionCode(): string | null {
    return this.sessionCode;
  }

  setSessionCode(code: string | null): void {
    this.sessionCode = code;
  }

  /** Returns false when the hub is closed and the connection was refused */
  handleConnection(connection: ClientConnection): boolean {
    if (!this.registry.add(connection)) {
      console.log(`[BroadcastHub] Refused ${connection.remote}: hub is closed`);
      return false;
    }
    console.log(`[BroadcastHub] Client connected: ${connection.remote} (${this.registry.size} total)`);

    // Late joiners get the context everyone else already has
    if (this.sessionCode) {
      this.sendTo(connection, { connected: false, sessionCode: this.sessionCode });
    }
    if (this.route) {
      this.sendTo(connection, { type: 'route', route: this.route });
    }
    return true;
  }

  handleDisconnect(connection: ClientConnection): void {
    if (this.registry.remove(connection)) {
      console.log(`[BroadcastHub] Client disconnected: ${connection.remote} (${this.registry.size} total)`);
    }
  }

  /**
   * Handle one inbound frame. Malformed or unknown messages are ignored, and
   * so is anything from a connection that is not registered (refused, or
   * already dropped while its close handshake runs).
   */
  async handleMessage(connection: ClientConnection, raw: string): Promise<void> {
    if (!this.registry.has(connection)) return;
    const message = parseClientMessage(raw);
    if (!message) return;
    await this.dispatch(connection, message);
  }

  broadcastTelemetry(snapshot: TelemetrySnapshot): void {
    this.broadcast(
      this.sessionCode
        ? { ...snapshot, connected: true, sessionCode: this.sessionCode }
        : { ...snapshot, connected: true }
    );
  }

  /** Tell viewers no telemetry is flowing */
  broadcastStatus(): void {
    this.broadcast(
      this.sessionCode ? { connected: false, sessionCode: this.sessionCode } : { connected: false }
    );
  }

  broadcastLanding(landing: LandingEvent): void {
    console.log(
      `[BroadcastHub] Landing: ${landing.verticalSpeed} fpm, ${landing.rating} at ${landing.airport ?? 'unknown'}`
    );
    this.broadcast({ type: 'landing', landing });
  }

  close(): void {
    console.log(`[BroadcastHub] Closing ${this.registry.size} connection(s)`);
    this.registry.closeAll();
  }

  private async dispatch(connection: ClientConnection, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'ping':
        this.sendTo(connection, { type: 'pong' });
        break;

      case 'route': {
        const route: RouteSpec = {
          origin: normalizeIdentifier(message.data.origin),
          destination: normalizeIdentifier(message.data.destination),
        };
        this.route = route;
        console.log(`[BroadcastHub] Route: ${route.origin ?? '----'} -> ${route.destination ?? '----'}`);
        this.options.onRoute?.(route);
        this.broadcast({ type: 'route', route });
        break;
      }

      case 'getAirport':
        await this.answerAirport(connection, message.data);
        break;

      case 'auth': {
        const userId = message.data ? message.data : null;
        const token = message.token ? message.token : null;
        console.log(`[BroadcastHub] Auth: ${userId ? `user ${userId}` : 'logged out'}`);
        this.options.onAuth?.(userId, token);
        break;
      }
    }
  }

  private async answerAirport(connection: ClientConnection, requested: string): Promise<void> {
    const icao = requested.trim().toUpperCase();
    if (icao.length < 3 || icao.length > 4) return;

    const cached = this.options.coords.getCached(icao);
    const coords = cached ?? (await this.options.coords.resolve(icao));
    this.sendTo(
      connection,
      coords
        ? { type: 'airportCoords', icao, coords }
        : { type: 'airportCoords', icao, coords: null, error: 'not_found' }
    );
  }

  private sendTo(connection: ClientConnection, message: ServerMessage): void {
    this.registry.send(connection, JSON.stringify(message));
  }

  private broadcast(message: ServerMessage): void {
    if (this.registry.size === 0) return;
    const report = this.registry.broadcast(JSON.stringify(message));
    if (report.removed > 0) {
      console.log(`[BroadcastHub] Removed ${report.removed} failed connection(s)`);
    }
  }
}
