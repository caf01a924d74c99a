/**
 * Transport-neutral handle for one viewer connection. The ws adapter
 * implements it for real sockets; tests implement it in memory.
 */
export interface ClientConnection {
  readonly id: string;
  /** Peer description for logs */
  readonly remote: string;
  readonly isOpen: boolean;
  /** Bytes queued by the transport but not yet written to the socket */
  readonly bufferedAmount: number;
  /** Queue a text frame. May throw if the socket is broken. */
  send(data: string): void;
  close(): void;
}

export interface RegistryOptions {
  /** Frames are dropped for a connection whose send buffer exceeds this */
  maxBufferedBytes: number;
  /** A connection that drops this many frames in a row is closed */
  maxConsecutiveDrops: number;
}

export type DeliveryOutcome = 'delivered' | 'dropped' | 'removed';

export interface BroadcastReport {
  delivered: number;
  dropped: number;
  removed: number;
}

interface RegistryEntry {
  connection: ClientConnection;
  /** Consecutive frames skipped because the client is not keeping up */
  droppedFrames: number;
}

const DEFAULT_OPTIONS: RegistryOptions = {
  maxBufferedBytes: 1024 * 1024,
  maxConsecutiveDrops: 10,
};

/**
 * Set of open viewer connections plus per-connection delivery state.
 *
 * Sends never wait on a socket: the transport buffers, and a connection whose
 * buffer keeps growing is skipped and eventually closed, so one slow viewer
 * cannot hold up the others.
 */
export class ConnectionRegistry {
  private entries = new Map<string, RegistryEntry>();
  private closed = false;
  private options: RegistryOptions;

  constructor(options: Partial<RegistryOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get size(): number {
    return this.entries.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Register a connection. After closeAll() new connections are closed at once. */
  add(connection: ClientConnection): boolean {
    if (this.closed) {
      this.closeQuietly(connection);
      return false;
    }
    this.entries.set(connection.id, { connection, droppedFrames: 0 });
    return true;
  }

  remove(connection: ClientConnection): boolean {
    return this.entries.delete(connection.id);
  }

  has(connection: ClientConnection): boolean {
    return this.entries.has(connection.id);
  }

  /** Send to one registered connection */
  send(connection: ClientConnection, data: string): DeliveryOutcome {
    const entry = this.entries.get(connection.id);
    if (!entry) return 'removed';
    return this.deliver(entry, data);
  }

  /** Send to every registered connection; failures only affect their own connection */
  broadcast(data: string): BroadcastReport {
    const report: BroadcastReport = { delivered: 0, dropped: 0, removed: 0 };
    // Copy first: failed connections are removed while we iterate
    for (const entry of Array.from(this.entries.values())) {
      report[this.deliver(entry, data)]++;
    }
    return report;
  }

  /** Close and forget every connection; later add() calls are refused */
  closeAll(): void {
    this.closed = true;
    const entries = Array.from(this.entries.values());
    this.entries.clear();
    for (const { connection } of entries) {
      this.closeQuietly(connection);
    }
  }

  private deliver(entry: RegistryEntry, data: string): DeliveryOutcome {
    const { connection } = entry;

    if (!connection.isOpen) {
      this.entries.delete(connection.id);
      return 'removed';
    }

    if (connection.bufferedAmount > this.options.maxBufferedBytes) {
      entry.droppedFrames++;
      if (entry.droppedFrames >= this.options.maxConsecutiveDrops) {
        console.warn(
          `[ConnectionRegistry] ${connection.remote} not keeping up (${entry.droppedFrames} frames dropped), closing`
        );
        this.entries.delete(connection.id);
        this.closeQuietly(connection);
        return 'removed';
      }
      return 'dropped';
    }

    try {
      connection.send(data);
      entry.droppedFrames = 0;
      return 'delivered';
    } catch (e) {
      console.warn(`[ConnectionRegistry] Send to ${connection.remote} failed:`, errorMessage(e));
      this.entries.delete(connection.id);
      this.closeQuietly(connection);
      return 'removed';
    }
  }

  private closeQuietly(connection: ClientConnection): void {
    try {
      connection.close();
    } catch (e) {
      console.warn(`[ConnectionRegistry] Close of ${connection.remote} failed:`, errorMessage(e));
    }
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
