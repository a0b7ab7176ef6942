/**
 * Express adapters for the auth orchestrator
 *
 * - toAuthRequest: Express request → framework-neutral AuthRequest
 * - createAuthGuards: route guards that authenticate/authorize and expose the
 *   principal to handlers
 * - errorHandler: maps framework errors to JSON responses
 */

import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import type { AuthService } from '../core/authentication-service.js';
import { createAuthRequest } from '../core/request.js';
import type { AuthRequest, Principal, PrincipalId, Role } from '../core/types.js';
import {
  AuthenticationError,
  createErrorResponse,
  isAuthgateError,
  sanitizeError,
} from '../utils/errors.js';

export function toAuthRequest(req: Request): AuthRequest {
  return createAuthRequest({ ...req.headers });
}

// ============================================================================
// Guards
// ============================================================================

export interface AuthGuards<ID extends PrincipalId> {
  /** Any authenticated principal */
  requireUser: RequestHandler;

  /** Authenticated principal whose role is one of `roles` */
  requireRoles(...roles: Role[]): RequestHandler;

  /**
   * Principal stored by a guard earlier in the chain.
   *
   * @throws AuthenticationError if no guard ran for this response
   */
  principalOf(res: Response): Principal<ID>;
}

/**
 * Usage:
 * ```typescript
 * const guards = createAuthGuards(authService);
 * app.get('/me', guards.requireUser, (req, res) => {
 *   res.json(guards.principalOf(res));
 * });
 * ```
 *
 * The principal is also stored in `res.locals.principal` for handlers that
 * do not hold the guards.
 */
export function createAuthGuards<ID extends PrincipalId>(
  authService: AuthService<ID>
): AuthGuards<ID> {
  const principals = new WeakMap<Response, Principal<ID>>();

  const guard =
    (resolve: (request: AuthRequest) => Promise<Principal<ID>>): RequestHandler =>
    (req, res, next) => {
      resolve(toAuthRequest(req))
        .then((principal) => {
          principals.set(res, principal);
          res.locals.principal = principal;
          next();
        })
        .catch(next);
    };

  return {
    requireUser: guard((request) => authService.authenticate(request)),
    requireRoles: (...roles) => guard((request) => authService.authorize(request, roles)),
    principalOf(res) {
      const principal = principals.get(res);
      if (!principal) {
        throw new AuthenticationError('Not authenticated');
      }
      return principal;
    },
  };
}

// ============================================================================
// Error handler
// ============================================================================

function clientErrorStatus(error: unknown): number | undefined {
  // body-parser attaches `status` to malformed payload errors
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return status;
    }
  }
  return undefined;
}

/**
 * Terminal error middleware. Register after every router.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isAuthgateError(error)) {
    const { statusCode, body } = createErrorResponse(error);
    if (statusCode === 401) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }
    if (statusCode >= 500) {
      console.error('[HTTP] Request failed', sanitizeError(error));
    }
    res.status(statusCode).json(body);
    return;
  }

  if (error instanceof ZodError) {
    res.status(422).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        statusCode: 422,
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    res.status(status).json({
      error: { code: 'BAD_REQUEST', message: 'Malformed request', statusCode: status },
    });
    return;
  }

  console.error('[HTTP] Unhandled error', sanitizeError(error));
  res.status(500).json({
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error', statusCode: 500 },
  });
};
