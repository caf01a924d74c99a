/**
 * Identifier and string hygiene for values read from the simulator
 */

const ICAO_PATTERN = /^[A-Za-z]{3,4}$/;

/**
 * Non-blank and printable ASCII only. Fixed-size sim string buffers often
 * carry control characters or uninitialised bytes.
 */
export function isPrintableString(value: string | null | undefined): value is string {
  if (value == null || value.trim() === '') return false;
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code < 32 || code > 126) return false;
  }
  return true;
}

/** Trimmed string, or null when it is blank or contains garbage */
export function cleanString(value: string | null | undefined): string | null {
  return isPrintableString(value) ? value.trim() : null;
}

/**
 * Plausible airport ICAO code: 3-4 letters. Codes containing digits
 * (DE02, ED07) are local field identifiers and are rejected.
 */
export function isValidIcao(value: string | null | undefined): value is string {
  if (value == null) return false;
  return ICAO_PATTERN.test(value.trim());
}

/** Uppercased ICAO code, or null when the value is not one */
export function normalizeIcao(value: string | null | undefined): string | null {
  return isValidIcao(value) ? value.trim().toUpperCase() : null;
}

/** Uppercased, trimmed identifier; empty input becomes null */
export function normalizeIdentifier(value: string | null | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed.toUpperCase();
}
