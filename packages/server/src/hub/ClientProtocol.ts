import type { ClientMessage } from '@flightbridge/shared';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse one inbound frame. Returns null for anything that is not valid JSON
 * or not a known message shape; callers ignore those.
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  switch (parsed.type) {
    case 'ping':
      return { type: 'ping' };

    case 'route': {
      if (!isRecord(parsed.data)) return null;
      return {
        type: 'route',
        data: {
          origin: optionalString(parsed.data.origin) ?? null,
          destination: optionalString(parsed.data.destination) ?? null,
        },
      };
    }

    case 'getAirport':
      return typeof parsed.data === 'string' ? { type: 'getAirport', data: parsed.data } : null;

    case 'auth':
      return {
        type: 'auth',
        data: optionalString(parsed.data) ?? null,
        token: optionalString(parsed.token) ?? null,
      };

    default:
      return null;
  }
}
