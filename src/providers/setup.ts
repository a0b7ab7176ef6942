/**
 * Composition root
 *
 * Registers the built-in provider factories explicitly and builds the
 * AuthService from settings.
 *
 * Usage:
 * ```typescript
 * const authService = createAuthService({
 *   settings,
 *   principalLookup: users,
 *   dependencies: {
 *     idCodec: intIdCodec,
 *     apiKeyServiceFactory: () => apiKeyService,
 *   },
 * });
 * ```
 */

import type { AuditService } from '../core/audit-service.js';
import { AuthService } from '../core/authentication-service.js';
import type { AuthProvider, PrincipalId, PrincipalLookup } from '../core/types.js';
import type { AuthSettings } from '../config/schemas/auth.js';
import { apiKeyProviderFactory } from './api-key/factory.js';
import { APIKeyAuthProvider } from './api-key/provider.js';
import type { ProviderDependencies } from './base.js';
import { jwtProviderFactory } from './jwt/factory.js';
import { JWTAuthProvider } from './jwt/provider.js';
import { ProviderRegistry } from './registry.js';

export const API_KEY_PROVIDER_PRIORITY = 50;
export const JWT_PROVIDER_PRIORITY = 100;

export function registerBuiltInProviders(registry: ProviderRegistry): void {
  registry.register('api_key', API_KEY_PROVIDER_PRIORITY, apiKeyProviderFactory);
  registry.register('jwt', JWT_PROVIDER_PRIORITY, jwtProviderFactory);
}

export interface CreateAuthServiceOptions<ID extends PrincipalId> {
  settings: AuthSettings;
  principalLookup: PrincipalLookup<ID>;
  dependencies: ProviderDependencies<ID>;
  /** Pre-populated registry; built-in providers are registered when omitted */
  registry?: ProviderRegistry;
  auditService?: AuditService;
}

export function createAuthService<ID extends PrincipalId>(
  options: CreateAuthServiceOptions<ID>
): AuthService<ID> {
  const auditService = options.auditService ?? options.dependencies.auditService;

  let registry = options.registry;
  if (!registry) {
    registry = new ProviderRegistry(auditService);
    registerBuiltInProviders(registry);
  }

  const providers = registry.instantiate(options.settings, {
    ...options.dependencies,
    auditService,
  });

  console.log('[Setup] Auth providers active', {
    providers: providers.map((provider) => provider.name),
  });

  return new AuthService<ID>(providers, options.principalLookup, {
    auditService,
    clock: options.dependencies.clock,
  });
}

export function findJWTProvider<ID extends PrincipalId>(
  providers: readonly AuthProvider<ID>[]
): JWTAuthProvider<ID> | undefined {
  return providers.find((provider): provider is JWTAuthProvider<ID> => provider instanceof JWTAuthProvider);
}

export function findAPIKeyProvider<ID extends PrincipalId>(
  providers: readonly AuthProvider<ID>[]
): APIKeyAuthProvider<ID> | undefined {
  return providers.find(
    (provider): provider is APIKeyAuthProvider<ID> => provider instanceof APIKeyAuthProvider
  );
}
