/**
 * Error taxonomy
 *
 * Every error raised by the framework derives from AuthgateError and carries a
 * stable machine-readable code plus the HTTP status the HTTP layer maps it to.
 *
 * Propagation rules:
 * - Providers swallow expected credential failures during chained authentication
 *   and return null instead.
 * - Dedicated issuance/refresh/logout operations surface the same conditions as
 *   the typed errors below.
 * - Anything that is not an AuthgateError (storage outages, programmer errors)
 *   always propagates.
 */

/**
 * Shape shared by all framework errors (used by the HTTP response helpers)
 */
export interface FrameworkError extends Error {
  code: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

export class AuthgateError extends Error implements FrameworkError {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================================================
// 401 - Authentication
// ============================================================================

export class AuthenticationError extends AuthgateError {
  constructor(
    message: string = 'Authentication failed',
    code: string = 'AUTHENTICATION_FAILED',
    details?: Record<string, unknown>
  ) {
    super(code, message, 401, details);
  }
}

export class InvalidTokenError extends AuthenticationError {
  constructor(message: string = 'Invalid token', details?: Record<string, unknown>) {
    super(message, 'INVALID_TOKEN', details);
  }
}

export class TokenExpiredError extends AuthenticationError {
  constructor(message: string = 'Token has expired', details?: Record<string, unknown>) {
    super(message, 'TOKEN_EXPIRED', details);
  }
}

/** Unknown username and wrong password look the same. */
export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Invalid username or password', 'INVALID_CREDENTIALS');
  }
}

export class InvalidAPIKeyError extends AuthenticationError {
  constructor(message: string = 'Invalid API key') {
    super(message, 'INVALID_API_KEY');
  }
}

export class APIKeyExpiredError extends AuthenticationError {
  constructor() {
    super('API key has expired', 'API_KEY_EXPIRED');
  }
}

// ============================================================================
// 403 - Authorization
// ============================================================================

export class AuthorizationError extends AuthgateError {
  constructor(
    message: string = 'Not authorized',
    code: string = 'AUTHORIZATION_FAILED',
    details?: Record<string, unknown>
  ) {
    super(code, message, 403, details);
  }
}

export class InsufficientRoleError extends AuthorizationError {
  constructor(
    public readonly requiredRoles: readonly string[],
    public readonly actualRole: string
  ) {
    super(
      `Role '${actualRole}' is not permitted. Required one of: ${requiredRoles.join(', ')}`,
      'INSUFFICIENT_ROLE',
      { requiredRoles: [...requiredRoles], actualRole }
    );
  }
}

export class InactivePrincipalError extends AuthorizationError {
  constructor() {
    super('Account is inactive', 'PRINCIPAL_INACTIVE');
  }
}

// ============================================================================
// 404 - Not found
// ============================================================================

export class NotFoundError extends AuthgateError {
  constructor(message: string = 'Resource not found', code: string = 'NOT_FOUND') {
    super(code, message, 404);
  }
}

export class PrincipalNotFoundError extends NotFoundError {
  constructor(message: string = 'Principal not found') {
    super(message, 'PRINCIPAL_NOT_FOUND');
  }
}

/** Same message whether the key is missing or belongs to someone else. */
export class APIKeyNotFoundError extends NotFoundError {
  constructor() {
    super('API key not found', 'API_KEY_NOT_FOUND');
  }
}

// ============================================================================
// 400 / 409 - Limits and conflicts
// ============================================================================

export class ConflictError extends AuthgateError {
  constructor(message: string = 'Resource conflict', code: string = 'CONFLICT') {
    super(code, message, 409);
  }
}

export class APIKeyConflictError extends ConflictError {
  constructor() {
    super('API key could not be stored, please retry', 'API_KEY_CONFLICT');
  }
}

export class LimitExceededError extends AuthgateError {
  constructor(
    message: string = 'Limit exceeded',
    code: string = 'LIMIT_EXCEEDED',
    details?: Record<string, unknown>
  ) {
    super(code, message, 400, details);
  }
}

export class APIKeyLimitExceededError extends LimitExceededError {
  constructor(public readonly maxPerOwner: number) {
    super(`Maximum number of API keys (${maxPerOwner}) reached`, 'API_KEY_LIMIT_EXCEEDED', {
      maxPerOwner,
    });
  }
}

// ============================================================================
// Input validation
// ============================================================================

export class ValidationError extends AuthgateError {
  constructor(
    message: string = 'Validation failed',
    details?: Record<string, unknown>,
    code: string = 'VALIDATION_ERROR',
    statusCode: number = 422
  ) {
    super(code, message, statusCode, details);
  }
}

export class InvalidIdentifierError extends ValidationError {
  constructor(kind: string) {
    super(`Invalid ${kind} identifier`, undefined, 'INVALID_IDENTIFIER', 400);
  }
}

// ============================================================================
// Configuration (startup only)
// ============================================================================

export class ConfigurationError extends AuthgateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500, details);
  }
}

// ============================================================================
// Repository taxonomy
// ============================================================================

export class RepositoryError extends AuthgateError {
  constructor(
    message: string = 'Database operation failed',
    code: string = 'DATABASE_ERROR',
    statusCode: number = 500,
    public readonly originalError?: unknown
  ) {
    super(code, message, statusCode);
  }
}

export class RepositoryNotFoundError extends RepositoryError {
  constructor(entity: string, id: string | number) {
    super(`${entity} with id '${id}' not found`, 'RECORD_NOT_FOUND', 404);
  }
}

export class RepositoryIntegrityError extends RepositoryError {
  constructor(message: string = 'Integrity constraint violated', originalError?: unknown) {
    super(message, 'INTEGRITY_ERROR', 409, originalError);
  }
}

export class RepositoryTransientError extends RepositoryError {
  constructor(message: string = 'Database temporarily unavailable', originalError?: unknown) {
    super(message, 'DATABASE_UNAVAILABLE', 503, originalError);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isAuthgateError(error: unknown): error is AuthgateError {
  return error instanceof AuthgateError;
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof AuthgateError) {
    return {
      type: 'AuthgateError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && error.details && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper
export function createErrorResponse(error: FrameworkError): {
  statusCode: number;
  body: Record<string, unknown>;
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        statusCode: error.statusCode,
        // Only include details in development
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
