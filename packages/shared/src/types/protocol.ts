import type { TelemetrySnapshot } from './telemetry.js';
import type { AirportCoords, LandingEvent, RouteSpec } from './flight.js';

/** ===== Server → Client Messages ===== */

/** Live telemetry frame. Deliberately has no `type` discriminator. */
export type TelemetryMessage = TelemetrySnapshot & {
  connected: true;
  sessionCode?: string;
};

/** Sent when no telemetry is flowing (welcome placeholder, source lost) */
export interface StatusMessage {
  connected: false;
  sessionCode?: string;
}

export interface LandingMessage {
  type: 'landing';
  landing: LandingEvent;
}

export interface RouteMessage {
  type: 'route';
  route: RouteSpec;
}

export interface AirportCoordsMessage {
  type: 'airportCoords';
  icao: string;
  coords: AirportCoords | null;
  error?: 'not_found';
}

export interface PongMessage {
  type: 'pong';
}

export type ServerMessage =
  | TelemetryMessage
  | StatusMessage
  | LandingMessage
  | RouteMessage
  | AirportCoordsMessage
  | PongMessage;

/** ===== Client → Server Messages ===== */

export interface PingMessage {
  type: 'ping';
}

export interface RouteUpdateMessage {
  type: 'route';
  data: {
    origin?: string | null;
    destination?: string | null;
  };
}

export interface GetAirportMessage {
  type: 'getAirport';
  data: string;
}

export interface AuthMessage {
  type: 'auth';
  /** User id; absent or empty means logout */
  data?: string | null;
  token?: string | null;
}

export type ClientMessage =
  | PingMessage
  | RouteUpdateMessage
  | GetAirportMessage
  | AuthMessage;
