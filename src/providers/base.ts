/**
 * Provider factories
 *
 * A factory turns settings plus collaborators into a live AuthProvider. The
 * registry decides whether it runs at all (isEnabled) and checks the
 * dependencies it declares (requires) before calling create().
 */

import type { AuditService } from '../core/audit-service.js';
import type { Clock, RandomSource } from '../core/clock.js';
import type { IdCodec } from '../core/id-codec.js';
import type { AuthProvider, AuthRequest, PrincipalId } from '../core/types.js';
import type { AuthSettings } from '../config/schemas/auth.js';
import { ConfigurationError } from '../utils/errors.js';
import type { APIKeyService } from './api-key/service.js';
import type { TokenBlacklistStore } from './jwt/blacklist/types.js';

export type { AuthProvider };

// ============================================================================
// Factories and dependencies
// ============================================================================

/**
 * Collaborators a factory may need. Which ones are mandatory is declared by
 * each factory's `requires` list and checked by the registry.
 */
export interface ProviderDependencies<ID extends PrincipalId = PrincipalId> {
  idCodec: IdCodec<ID>;

  /** Resolves the request-scoped API key service */
  apiKeyServiceFactory?: (request: AuthRequest) => APIKeyService;

  /** Overrides the blacklist store built from settings */
  blacklistStore?: TokenBlacklistStore;

  clock?: Clock;
  random?: RandomSource;
  auditService?: AuditService;
}

export type DependencyKey = keyof ProviderDependencies;

export interface ProviderFactory {
  /** Dependencies that must be present when the provider is enabled */
  readonly requires: readonly DependencyKey[];

  isEnabled(settings: AuthSettings): boolean;

  create<ID extends PrincipalId>(
    settings: AuthSettings,
    dependencies: ProviderDependencies<ID>
  ): AuthProvider<ID>;
}

/**
 * Narrow an optional dependency the registry has already checked.
 */
export function requireDependency<T>(value: T | undefined, key: DependencyKey): T {
  if (value === undefined) {
    throw new ConfigurationError(`Missing required provider dependency: ${key}`);
  }
  return value;
}
