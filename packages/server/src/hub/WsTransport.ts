import { WebSocket, type RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import type { ClientConnection } from './ConnectionRegistry.js';
import type { BroadcastHub } from './BroadcastHub.js';

/** The parts of a ws socket the transport uses */
export interface WsSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/** Where a socket came from; IncomingMessage in production */
export interface UpgradeRequest {
  socket: { remoteAddress?: string };
}

export interface WsServer {
  on(event: 'connection', listener: (ws: WsSocket, request: UpgradeRequest) => void): unknown;
}

/** ClientConnection backed by a ws socket */
export class WsClientConnection implements ClientConnection {
  readonly id = uuidv4();
  readonly remote: string;

  constructor(
    private ws: WsSocket,
    request?: UpgradeRequest
  ) {
    const address = request?.socket.remoteAddress ?? 'unknown';
    this.remote = `${address} [${this.id.slice(0, 8)}]`;
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  get bufferedAmount(): number {
    return this.ws.bufferedAmount;
  }

  send(data: string): void {
    this.ws.send(data, (err) => {
      // Write errors surface asynchronously; dropping the socket fires 'close'
      if (err) {
        console.warn(`[WS] Write to ${this.remote} failed: ${err.message}`);
        this.ws.terminate();
      }
    });
  }

  close(): void {
    this.ws.close(1001, 'server shutting down');
  }
}

export function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

/** Route every socket accepted by `wss` through the hub */
export function attachWebSocketServer(wss: WsServer, hub: BroadcastHub): void {
  wss.on('connection', (ws, request) => {
    const connection = new WsClientConnection(ws, request);
    // Refused sockets are already closing; they get no listeners
    if (!hub.handleConnection(connection)) return;

    ws.on('message', (data, isBinary) => {
      if (isBinary) return;
      hub.handleMessage(connection, rawToString(data)).catch((err: unknown) => {
        console.error(`[WS] Message from ${connection.remote} failed:`, err);
      });
    });

    ws.on('close', () => {
      hub.handleDisconnect(connection);
    });

    ws.on('error', (err) => {
      console.error(`[WS] Error on ${connection.remote}:`, err.message);
    });
  });
}
