export interface BridgeConfig {
  port: number;
  tickIntervalMs: number;
  reconnectIntervalMs: number;
  airportApiUrl: string;
  airportLookupTimeoutMs: number;
  sendBufferLimitBytes: number;
  /** Recorded session to play back; no telemetry source when unset */
  replayFile: string | null;
  supabaseUrl: string | null;
  /** Service key if set, otherwise the anon key */
  supabaseKey: string | null;
}

export const DEFAULT_CONFIG: BridgeConfig = {
  port: 8500,
  tickIntervalMs: 1000,
  reconnectIntervalMs: 5000,
  airportApiUrl: 'https://airport-data.com/api/ap_info.json',
  airportLookupTimeoutMs: 5000,
  sendBufferLimitBytes: 1024 * 1024,
  replayFile: null,
  supabaseUrl: null,
  supabaseKey: null,
};

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`[Config] Ignoring ${name}=${raw}: expected a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env = process.env): BridgeConfig {
  return {
    port: readInt(env, 'WEBSOCKET_PORT', DEFAULT_CONFIG.port),
    tickIntervalMs: readInt(env, 'TICK_INTERVAL_MS', DEFAULT_CONFIG.tickIntervalMs),
    reconnectIntervalMs: readInt(env, 'RECONNECT_INTERVAL_MS', DEFAULT_CONFIG.reconnectIntervalMs),
    airportApiUrl: readString(env, 'AIRPORT_API_URL') ?? DEFAULT_CONFIG.airportApiUrl,
    airportLookupTimeoutMs: readInt(
      env,
      'AIRPORT_LOOKUP_TIMEOUT_MS',
      DEFAULT_CONFIG.airportLookupTimeoutMs
    ),
    sendBufferLimitBytes: readInt(env, 'SEND_BUFFER_LIMIT_BYTES', DEFAULT_CONFIG.sendBufferLimitBytes),
    replayFile: readString(env, 'TELEMETRY_REPLAY_FILE'),
    supabaseUrl: readString(env, 'SUPABASE_URL'),
    supabaseKey: readString(env, 'SUPABASE_SERVICE_KEY') ?? readString(env, 'SUPABASE_ANON_KEY'),
  };
}
