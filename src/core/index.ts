/**
 * Core Module Public API
 *
 * One-way dependency: core → providers → http. Nothing here imports from the
 * provider or HTTP layers.
 */

// ============================================================================
// Services
// ============================================================================

export { AuthService, type AuthServiceOptions } from './authentication-service.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

// ============================================================================
// Primitives
// ============================================================================

export {
  systemClock,
  cryptoRandomSource,
  toEpochSeconds,
  type Clock,
  type RandomSource,
} from './clock.js';

export { intIdCodec, uuidIdCodec, type IdCodec } from './id-codec.js';

export { createAuthRequest, getHeader, extractBearerToken } from './request.js';

// ============================================================================
// Types
// ============================================================================

export { ROLE_ADMIN, ROLE_USER } from './types.js';
export type {
  AuditEntry,
  AuthContext,
  AuthProvider,
  AuthRequest,
  AuthScheme,
  Principal,
  PrincipalId,
  PrincipalLookup,
  RequestHeaders,
  Role,
} from './types.js';
