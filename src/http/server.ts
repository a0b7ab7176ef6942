/**
 * HTTP server for the auth endpoints
 *
 * Sets up:
 * - POST /auth/jwt/{login,refresh,logout} when the JWT provider is active
 * - /api-keys management routes when the API key provider is active
 * - GET /auth/schemes - credential schemes of the active providers
 * - GET /health
 * - Error handler with WWW-Authenticate on 401
 */

import express from 'express';
import { createServer, type Server } from 'node:http';
import type { AuthService } from '../core/authentication-service.js';
import type { IdCodec } from '../core/id-codec.js';
import type { PrincipalId } from '../core/types.js';
import { findAPIKeyProvider, findJWTProvider } from '../providers/setup.js';
import { createAPIKeyRouter } from './api-key-router.js';
import { createJWTRouter } from './jwt-router.js';
import { errorHandler } from './middleware.js';

export interface AuthServerOptions<ID extends PrincipalId> {
  authService: AuthService<ID>;
  idCodec: IdCodec<ID>;
  /** Reported by /health (default: 'authgate') */
  serviceName?: string;
}

export function createAuthServer<ID extends PrincipalId>(
  options: AuthServerOptions<ID>
): express.Application {
  const { authService, idCodec } = options;
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  const providers = authService.getProviders();

  const jwtProvider = findJWTProvider(providers);
  if (jwtProvider) {
    app.use(
      '/auth/jwt',
      createJWTRouter({ provider: jwtProvider, principalLookup: authService.getPrincipalLookup() })
    );
  }

  const apiKeyProvider = findAPIKeyProvider(providers);
  if (apiKeyProvider) {
    app.use(
      '/api-keys',
      createAPIKeyRouter({
        authService,
        serviceFactory: (request) => apiKeyProvider.getService(request),
        idCodec,
      })
    );
  }

  app.get('/auth/schemes', (_req, res) => {
    res.json({ schemes: authService.supportedSchemes() });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      service: options.serviceName ?? 'authgate',
      providers: providers.map((provider) => provider.name),
      timestamp: new Date().toISOString(),
    });
  });

  app.use(errorHandler);

  return app;
}

/**
 * Start listening on `port`.
 *
 * @returns the listening server; rejects if the port is taken
 */
export function startAuthServer(app: express.Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`[HTTP Server] Listening on port ${port}`);
      resolve(server);
    });
  });
}
