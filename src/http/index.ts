export { createAuthServer, startAuthServer, type AuthServerOptions } from './server.js';
export {
  createAuthGuards,
  errorHandler,
  toAuthRequest,
  type AuthGuards,
} from './middleware.js';
export {
  createJWTRouter,
  LoginBodySchema,
  RefreshBodySchema,
  type JWTRouterOptions,
} from './jwt-router.js';
export {
  createAPIKeyRouter,
  CreateAPIKeyBodySchema,
  toAPIKeyResponse,
  type APIKeyCreateResponse,
  type APIKeyResponse,
  type APIKeyRouterOptions,
} from './api-key-router.js';
