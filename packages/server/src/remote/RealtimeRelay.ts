import { WebSocket } from 'ws';
import type { TelemetrySnapshot } from '@flightbridge/shared';
import { generateSessionCode } from '@flightbridge/shared';

/** Minimal socket surface the relay needs */
export interface RelaySocket {
  readonly isOpen: boolean;
  send(data: string): void;
  close(): void;
  onMessage(listener: (data: string) => void): void;
  onClose(listener: () => void): void;
}

export type RelaySocketFactory = (url: string) => Promise<RelaySocket>;

/** Channel protocol frame */
export interface ChannelFrame {
  topic: string;
  event: string;
  payload: unknown;
  ref: string;
}

export const HEARTBEAT_INTERVAL_MS = 25_000;

export const connectWebSocket: RelaySocketFactory = (url) =>
  new Promise<RelaySocket>((resolve, reject) => {
    const ws = new WebSocket(url);
    const onError = (err: Error): void => reject(err);
    ws.once('error', onError);
    ws.once('open', () => {
      ws.off('error', onError);
      ws.on('error', (err) => console.warn('[RealtimeRelay] Socket error:', err.message));
      resolve({
        get isOpen() {
          return ws.readyState === WebSocket.OPEN;
        },
        send: (data) => ws.send(data),
        close: () => ws.close(),
        onMessage: (listener) => ws.on('message', (data) => listener(data.toString())),
        onClose: (listener) => ws.on('close', listener),
      });
    });
  });

/** wss://host/realtime/v1/websocket?apikey=KEY&vsn=1.0.0 */
export function buildRealtimeUrl(projectUrl: string, apiKey: string): string {
  const base = projectUrl.replace(/^https:\/\//, 'wss://').replace(/^http:\/\//, 'ws://');
  const withSlash = base.endsWith('/') ? base : `${base}/`;
  return `${withSlash}realtime/v1/websocket?apikey=${encodeURIComponent(apiKey)}&vsn=1.0.0`;
}

export interface RealtimeRelayOptions {
  url: string | null;
  apiKey: string | null;
  heartbeatIntervalMs?: number;
  socketFactory?: RelaySocketFactory;
  /** Random source for the session code */
  random?: () => number;
  /** The server closed the socket; the session code is gone */
  onClosed?: () => void;
}

/**
 * Mirrors telemetry into a hosted broadcast channel so viewers can follow a
 * session by its code instead of connecting to this machine.
 */
export class RealtimeRelay {
  private socket: RelaySocket | null = null;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private code: string | null = null;
  private ref = 0;

  constructor(private options: RealtimeRelayOptions) {}

  get isConfigured(): boolean {
    return Boolean(this.options.url && this.options.apiKey);
  }

  get isActive(): boolean {
    return this.socket?.isOpen ?? false;
  }

  get sessionCode(): string | null {
    return this.code;
  }

  get topic(): string | null {
    return this.code ? `realtime:session:${this.code}` : null;
  }

  /** Connect and join the session channel. Returns the session code, or null on failure. */
  async start(): Promise<string | null> {
    const { url, apiKey } = this.options;
    if (!url || !apiKey) return null;
    if (this.socket) return this.code;

    const code = generateSessionCode(this.options.random);
    const factory = this.options.socketFactory ?? connectWebSocket;

    let socket: RelaySocket;
    try {
      socket = await factory(buildRealtimeUrl(url, apiKey));
    } catch (e) {
      console.warn('[RealtimeRelay] Connect failed:', e instanceof Error ? e.message : e);
      return null;
    }

    this.socket = socket;
    this.code = code;
    socket.onMessage((data) => this.handleFrame(data));
    socket.onClose(() => {
      // Also fires after stop(); only report sockets we still own
      if (this.socket !== socket) return;
      console.log(`[RealtimeRelay] Connection closed, session ${code} ended`);
      this.teardown();
      this.options.onClosed?.();
    });

    this.send({
      topic: `realtime:session:${code}`,
      event: 'phx_join',
      payload: { config: { broadcast: { self: false } } },
      ref: this.nextRef(),
    });
    this.heartbeat = setInterval(() => {
      this.send({ topic: 'phoenix', event: 'heartbeat', payload: {}, ref: this.nextRef() });
    }, this.options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS);

    console.log(`[RealtimeRelay] Joined session ${code}`);
    return code;
  }

  publish(snapshot: TelemetrySnapshot): void {
    const topic = this.topic;
    if (!topic || !this.isActive) return;
    this.send({
      topic,
      event: 'broadcast',
      payload: { type: 'broadcast', event: 'simdata', payload: { ...snapshot, connected: true } },
      ref: this.nextRef(),
    });
  }

  stop(): void {
    const socket = this.socket;
    this.teardown();
    if (socket) {
      try {
        socket.close();
      } catch (e) {
        console.warn('[RealtimeRelay] Close failed:', e instanceof Error ? e.message : e);
      }
    }
  }

  private teardown(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    this.socket = null;
    this.code = null;
  }

  private handleFrame(data: string): void {
    let frame: unknown;
    try {
      frame = JSON.parse(data);
    } catch {
      return;
    }
    if (typeof frame !== 'object' || frame === null || !('event' in frame)) return;
    if (frame.event === 'phx_error' || frame.event === 'phx_close') {
      console.warn(`[RealtimeRelay] Channel ${String(frame.event)}`);
    }
  }

  private send(frame: ChannelFrame): void {
    const socket = this.socket;
    if (!socket?.isOpen) return;
    try {
      socket.send(JSON.stringify(frame));
    } catch (e) {
      console.warn('[RealtimeRelay] Send failed:', e instanceof Error ? e.message : e);
    }
  }

  private nextRef(): string {
    this.ref++;
    return String(this.ref);
  }
}
