import type { AuthRequest, RequestHeaders } from './types.js';

/**
 * Build a framework-neutral request from raw headers.
 */
export function createAuthRequest(headers: RequestHeaders = {}): AuthRequest {
  return { headers, context: {} };
}

/**
 * Read a header case-insensitively. Repeated headers yield their first value.
 */
export function getHeader(request: AuthRequest, name: string): string | undefined {
  const wanted = name.toLowerCase();

  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() !== wanted) {
      continue;
    }
    if (Array.isArray(value)) {
      return value[0];
    }
    return value;
  }

  return undefined;
}

/**
 * Extract the credential of an `Authorization: Bearer <token>` header.
 *
 * The header must consist of exactly two space-separated parts.
 */
export function extractBearerToken(request: AuthRequest): string | null {
  const header = getHeader(request, 'authorization');
  if (!header) {
    return null;
  }

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}
