/**
 * Core Authentication Types
 *
 * Types shared by the orchestrator, the providers and the HTTP layer.
 *
 * Architectural Rule: core → providers → http
 * Files in src/core/ MUST NOT import from src/providers/ or src/http/
 */

// ============================================================================
// Role Constants
// ============================================================================

export const ROLE_ADMIN = 'admin';
export const ROLE_USER = 'user';

export type Role = string;

// ============================================================================
// Principal
// ============================================================================

/** Principal identifiers are either integers or UUID strings. */
export type PrincipalId = number | string;

/**
 * The authenticated identity a request acts as.
 *
 * Principals are owned by the host application; the framework only reads them
 * through a {@link PrincipalLookup}.
 */
export interface Principal<ID extends PrincipalId = PrincipalId> {
  id: ID;
  username: string;
  isActive: boolean;
  role: Role;
  /** Only needed by lookups that verify passwords themselves */
  passwordHash?: string;
}

/**
 * Lookup contract the providers consume.
 *
 * `getById` and `getByName` raise PrincipalNotFoundError rather than
 * returning null.
 */
export interface PrincipalLookup<ID extends PrincipalId = PrincipalId> {
  getById(id: ID): Promise<Principal<ID>>;
  getByName(username: string): Promise<Principal<ID>>;
  verifyPassword(principal: Principal<ID>, plaintext: string): Promise<boolean>;
}

// ============================================================================
// Request model
// ============================================================================

export type RequestHeaders = Record<string, string | string[] | undefined>;

/**
 * Per-request state filled in by the orchestrator on success.
 */
export interface AuthContext {
  principal?: Principal;
  /** Name of the provider that authenticated the request */
  provider?: string;
}

/**
 * Framework-neutral view of an inbound request.
 *
 * Header names are matched case-insensitively.
 */
export interface AuthRequest {
  headers: RequestHeaders;
  context: AuthContext;
}

// ============================================================================
// Supported schemes
// ============================================================================

/**
 * Static description of a credential scheme, in the shape of an OpenAPI
 * security scheme object.
 */
export type AuthScheme =
  | { type: 'http'; scheme: 'bearer'; bearerFormat: 'JWT' }
  | { type: 'apiKey'; in: 'header'; name: string };

// ============================================================================
// Provider contract
// ============================================================================

/**
 * A pluggable authentication mechanism (JWT, API key, and future ones such
 * as OAuth2). The orchestrator only ever talks to this interface.
 */
export interface AuthProvider<ID extends PrincipalId = PrincipalId> {
  /** Stable registry name (e.g. 'jwt', 'api_key') */
  readonly name: string;

  /** Credential scheme this provider reads, for documentation surfaces */
  readonly scheme: AuthScheme;

  /**
   * Cheap synchronous check of request metadata. Must not perform I/O.
   */
  canHandle(request: AuthRequest): boolean;

  /**
   * Resolve the request's principal.
   *
   * Returns null for every expected credential failure (malformed, expired,
   * revoked, unknown, inactive) so the orchestrator can try the next
   * provider. Only unexpected errors are thrown.
   */
  authenticate(request: AuthRequest, lookup: PrincipalLookup<ID>): Promise<Principal<ID> | null>;
}

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field identifying the component
 * that produced them (e.g. 'auth:service', 'auth:registry', 'auth:api-key').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Principal id associated with the event (if applicable) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}
