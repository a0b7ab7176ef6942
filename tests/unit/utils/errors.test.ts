/**
 * Error taxonomy tests
 *
 * Codes, status codes and the response/log helpers.
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  APIKeyConflictError,
  APIKeyExpiredError,
  APIKeyLimitExceededError,
  APIKeyNotFoundError,
  AuthenticationError,
  AuthgateError,
  AuthorizationError,
  ConfigurationError,
  InactivePrincipalError,
  InsufficientRoleError,
  InvalidAPIKeyError,
  InvalidCredentialsError,
  InvalidIdentifierError,
  InvalidTokenError,
  PrincipalNotFoundError,
  RepositoryError,
  RepositoryIntegrityError,
  RepositoryTransientError,
  TokenExpiredError,
  createErrorResponse,
  isAuthgateError,
  sanitizeError,
} from '../../../src/utils/errors.js';

describe('errors', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.NODE_ENV;
    } else {
      process.env.NODE_ENV = originalEnv;
    }
  });

  describe('taxonomy', () => {
    it.each([
      [new InvalidTokenError(), 'INVALID_TOKEN', 401],
      [new TokenExpiredError(), 'TOKEN_EXPIRED', 401],
      [new InvalidCredentialsError(), 'INVALID_CREDENTIALS', 401],
      [new InvalidAPIKeyError(), 'INVALID_API_KEY', 401],
      [new APIKeyExpiredError(), 'API_KEY_EXPIRED', 401],
      [new InsufficientRoleError(['admin'], 'user'), 'INSUFFICIENT_ROLE', 403],
      [new InactivePrincipalError(), 'PRINCIPAL_INACTIVE', 403],
      [new PrincipalNotFoundError(), 'PRINCIPAL_NOT_FOUND', 404],
      [new APIKeyNotFoundError(), 'API_KEY_NOT_FOUND', 404],
      [new APIKeyConflictError(), 'API_KEY_CONFLICT', 409],
      [new APIKeyLimitExceededError(5), 'API_KEY_LIMIT_EXCEEDED', 400],
      [new InvalidIdentifierError('integer'), 'INVALID_IDENTIFIER', 400],
      [new ConfigurationError('bad'), 'CONFIGURATION_ERROR', 500],
      [new RepositoryIntegrityError(), 'INTEGRITY_ERROR', 409],
      [new RepositoryTransientError(), 'DATABASE_UNAVAILABLE', 503],
    ])('should give %s code and status', (error, code, statusCode) => {
      expect(error).toBeInstanceOf(AuthgateError);
      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(statusCode);
    });

    it('should keep the subclass name and hierarchy', () => {
      const error = new TokenExpiredError();

      expect(error.name).toBe('TokenExpiredError');
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(new InactivePrincipalError()).toBeInstanceOf(AuthorizationError);
      expect(new RepositoryTransientError()).toBeInstanceOf(RepositoryError);
    });

    it('should describe the role mismatch', () => {
      const error = new InsufficientRoleError(['admin', 'owner'], 'user');

      expect(error.message).toBe("Role 'user' is not permitted. Required one of: admin, owner");
      expect(error.details).toEqual({ requiredRoles: ['admin', 'owner'], actualRole: 'user' });
    });

    it('should report the quota in the limit error', () => {
      expect(new APIKeyLimitExceededError(3).message).toBe('Maximum number of API keys (3) reached');
    });

    it('should keep the original error on repository errors', () => {
      const cause = new Error('connection reset');

      expect(new RepositoryTransientError('Database unavailable', cause).originalError).toBe(cause);
    });
  });

  describe('isAuthgateError', () => {
    it('should recognise framework errors only', () => {
      expect(isAuthgateError(new InvalidTokenError())).toBe(true);
      expect(isAuthgateError(new Error('plain'))).toBe(false);
      expect(isAuthgateError('string')).toBe(false);
    });
  });

  describe('createErrorResponse', () => {
    it('should build the error envelope', () => {
      process.env.NODE_ENV = 'production';

      expect(createErrorResponse(new APIKeyLimitExceededError(5))).toEqual({
        statusCode: 400,
        body: {
          error: {
            code: 'API_KEY_LIMIT_EXCEEDED',
            message: 'Maximum number of API keys (5) reached',
            statusCode: 400,
          },
        },
      });
    });

    it('should include details in development', () => {
      process.env.NODE_ENV = 'development';

      expect(createErrorResponse(new APIKeyLimitExceededError(5)).body).toEqual({
        error: {
          code: 'API_KEY_LIMIT_EXCEEDED',
          message: 'Maximum number of API keys (5) reached',
          statusCode: 400,
          details: { maxPerOwner: 5 },
        },
      });
    });
  });

  describe('sanitizeError', () => {
    it('should drop details in production', () => {
      process.env.NODE_ENV = 'production';

      expect(sanitizeError(new APIKeyLimitExceededError(5))).toEqual({
        type: 'AuthgateError',
        code: 'API_KEY_LIMIT_EXCEEDED',
        message: 'Maximum number of API keys (5) reached',
        statusCode: 400,
      });
    });

    it('should reduce plain errors to name and message outside development', () => {
      process.env.NODE_ENV = 'test';

      expect(sanitizeError(new TypeError('boom'))).toEqual({
        type: 'Error',
        message: 'boom',
        name: 'TypeError',
      });
    });

    it('should hide non-errors', () => {
      expect(sanitizeError(42)).toEqual({ type: 'Unknown', message: 'An unknown error occurred' });
    });
  });
});
