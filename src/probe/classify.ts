export interface Classification {
  available: boolean;
  statusLabel: string;
  statusCode: number;
}

const REACHABLE_CODES = new Set([200, 301, 302]);
const REACHABLE_ERROR_CODES = new Set([401, 404]);

export const CONNECTION_FAILED: Classification = {
  available: false,
  statusLabel: 'connection failed',
  statusCode: 0,
};

/**
 * Maps an HTTP status onto mirror availability. Returns null when the
 * status says nothing either way, so the caller moves on to the next URL
 * variant.
 */
export function classifyStatus(statusCode: number): Classification | null {
  if (REACHABLE_CODES.has(statusCode)) {
    return { available: true, statusLabel: 'available', statusCode };
  }
  if (statusCode === 403) {
    return { available: true, statusLabel: 'available (requires auth)', statusCode };
  }
  if (REACHABLE_ERROR_CODES.has(statusCode)) {
    return { available: true, statusLabel: `available (HTTP ${statusCode})`, statusCode };
  }
  if (statusCode >= 400) {
    return { available: false, statusLabel: `HTTP error: ${statusCode}`, statusCode };
  }
  return null;
}
