/**
 * API key management endpoints.
 *
 * Owner routes:
 *   POST   /api-keys            create (secret returned once)
 *   GET    /api-keys            list own keys
 *   DELETE /api-keys/:keyId     delete own key
 *
 * Admin routes:
 *   GET    /api-keys/users/:ownerId
 *   DELETE /api-keys/users/:ownerId/:keyId
 */

import express, { type Request, type Router } from 'express';
import { z } from 'zod';
import type { AuthService } from '../core/authentication-service.js';
import { intIdCodec, type IdCodec } from '../core/id-codec.js';
import { ROLE_ADMIN, type AuthRequest, type PrincipalId } from '../core/types.js';
import type { APIKeyService, APIKeySummary } from '../providers/api-key/service.js';
import { createAuthGuards, toAuthRequest } from './middleware.js';

export const CreateAPIKeyBodySchema = z.object({
  name: z.string().trim().min(1).max(100),
  expires_in_days: z.coerce.number().int().min(1).max(365).optional(),
});

export interface APIKeyResponse {
  id: number;
  name: string;
  key_prefix: string;
  created_at: string;
  expires_at: string | null;
  last_used_at: string | null;
}

export interface APIKeyCreateResponse extends APIKeyResponse {
  secret_key: string;
}

export function toAPIKeyResponse(key: APIKeySummary): APIKeyResponse {
  return {
    id: key.id,
    name: key.name,
    key_prefix: key.keyPrefix,
    created_at: key.createdAt.toISOString(),
    expires_at: key.expiresAt ? key.expiresAt.toISOString() : null,
    last_used_at: key.lastUsedAt ? key.lastUsedAt.toISOString() : null,
  };
}

export interface APIKeyRouterOptions<ID extends PrincipalId> {
  authService: AuthService<ID>;
  /** Resolves the key service for the current request */
  serviceFactory: (request: AuthRequest) => APIKeyService;
  /** Codec of the principal ids keys are owned by */
  idCodec: IdCodec<ID>;
}

export function createAPIKeyRouter<ID extends PrincipalId>(options: APIKeyRouterOptions<ID>): Router {
  const { authService, serviceFactory, idCodec } = options;
  const guards = createAuthGuards(authService);
  const router = express.Router();

  const serviceFor = (req: Request): APIKeyService => serviceFactory(toAuthRequest(req));
  // API key ids are integers regardless of the principal id type
  const parseKeyId = (raw: string): number => intIdCodec.parse(raw);

  // Admin routes first so /users/... is never read as a key id
  router.get('/users/:ownerId', guards.requireRoles(ROLE_ADMIN), async (req, res, next) => {
    try {
      const ownerId = idCodec.format(idCodec.parse(req.params.ownerId));
      const keys = await serviceFor(req).listKeys(ownerId);
      res.json(keys.map(toAPIKeyResponse));
    } catch (error) {
      next(error);
    }
  });

  router.delete(
    '/users/:ownerId/:keyId',
    guards.requireRoles(ROLE_ADMIN),
    async (req, res, next) => {
      try {
        const admin = guards.principalOf(res);
        const keyId = parseKeyId(req.params.keyId);
        await serviceFor(req).deleteKeyAdmin(keyId, idCodec.format(admin.id));
        console.log('[APIKeyRouter] Key deleted by admin', {
          adminId: admin.id,
          targetOwnerId: req.params.ownerId,
          keyId,
        });
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  router.post('/', guards.requireUser, async (req, res, next) => {
    try {
      const body = CreateAPIKeyBodySchema.parse(req.body);
      const ownerId = idCodec.format(guards.principalOf(res).id);
      const { secretKey, key } = await serviceFor(req).createKey(
        ownerId,
        body.name,
        body.expires_in_days
      );

      const response: APIKeyCreateResponse = { ...toAPIKeyResponse(key), secret_key: secretKey };
      res.status(201).json(response);
    } catch (error) {
      next(error);
    }
  });

  router.get('/', guards.requireUser, async (req, res, next) => {
    try {
      const ownerId = idCodec.format(guards.principalOf(res).id);
      const keys = await serviceFor(req).listKeys(ownerId);
      res.json(keys.map(toAPIKeyResponse));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:keyId', guards.requireUser, async (req, res, next) => {
    try {
      const ownerId = idCodec.format(guards.principalOf(res).id);
      await serviceFor(req).deleteKey(parseKeyId(req.params.keyId), ownerId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
