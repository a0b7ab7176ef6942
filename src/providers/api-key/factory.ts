import type { AuditService } from '../../core/audit-service.js';
import type { Clock } from '../../core/clock.js';
import type { PrincipalId } from '../../core/types.js';
import type { APIKeySettings, AuthSettings } from '../../config/schemas/auth.js';
import {
  requireDependency,
  type AuthProvider,
  type ProviderDependencies,
  type ProviderFactory,
} from '../base.js';
import { BcryptAPIKeyHasher } from './hasher.js';
import { APIKeyAuthProvider } from './provider.js';
import type { APIKeyRepository } from './repository.js';
import { APIKeyService } from './service.js';

/**
 * The API key provider needs a request-scoped APIKeyService, supplied as the
 * `apiKeyServiceFactory` dependency.
 */
export const apiKeyProviderFactory: ProviderFactory = {
  requires: ['apiKeyServiceFactory'],

  isEnabled: (settings) => settings.apiKey.enabled,

  create<ID extends PrincipalId>(
    settings: AuthSettings,
    dependencies: ProviderDependencies<ID>
  ): AuthProvider<ID> {
    return new APIKeyAuthProvider<ID>({
      headerName: settings.apiKey.headerName,
      serviceFactory: requireDependency(dependencies.apiKeyServiceFactory, 'apiKeyServiceFactory'),
      idCodec: dependencies.idCodec,
    });
  },
};

/**
 * Build an APIKeyService over `repository` with the quota, expiry and hash
 * cost from settings.
 */
export function createAPIKeyService(
  repository: APIKeyRepository,
  settings: APIKeySettings,
  options: { clock?: Clock; auditService?: AuditService } = {}
): APIKeyService {
  return new APIKeyService(repository, new BcryptAPIKeyHasher(settings.hashRounds), {
    maxPerOwner: settings.maxPerOwner,
    defaultExpirationDays: settings.defaultExpirationDays,
    clock: options.clock,
    auditService: options.auditService,
  });
}
