/**
 * JWT endpoints: login, refresh (rotation) and logout.
 *
 * Mounted under /auth/jwt by createAuthServer.
 */

import express, { type Router } from 'express';
import { z } from 'zod';
import { extractBearerToken } from '../core/request.js';
import type { PrincipalId, PrincipalLookup } from '../core/types.js';
import type { JWTAuthProvider } from '../providers/jwt/provider.js';
import { AuthenticationError } from '../utils/errors.js';
import { toAuthRequest } from './middleware.js';

// Login accepts JSON or an OAuth2 password form body
export const LoginBodySchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const RefreshBodySchema = z.object({
  refresh_token: z.string().min(1),
});

export interface JWTRouterOptions<ID extends PrincipalId> {
  provider: JWTAuthProvider<ID>;
  principalLookup: PrincipalLookup<ID>;
}

export function createJWTRouter<ID extends PrincipalId>(options: JWTRouterOptions<ID>): Router {
  const { provider, principalLookup } = options;
  const router = express.Router();

  router.post('/login', async (req, res, next) => {
    try {
      const { username, password } = LoginBodySchema.parse(req.body);
      const tokens = await provider.login(username, password, principalLookup);
      console.log('[JWTRouter] Login successful', { username });
      res.json(tokens);
    } catch (error) {
      next(error);
    }
  });

  router.post('/refresh', async (req, res, next) => {
    try {
      const { refresh_token: refreshToken } = RefreshBodySchema.parse(req.body);
      res.json(await provider.refresh(refreshToken, principalLookup));
    } catch (error) {
      next(error);
    }
  });

  router.post('/logout', async (req, res, next) => {
    try {
      const token = extractBearerToken(toAuthRequest(req));
      if (!token) {
        throw new AuthenticationError('Missing bearer token');
      }
      await provider.logout(token);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
