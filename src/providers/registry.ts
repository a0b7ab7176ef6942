/**
 * Provider Registry - catalogue of authentication provider factories
 *
 * An explicit object built by the composition root (see setup.ts) and passed
 * to whatever needs it. Nothing registers itself at import time.
 *
 * Usage:
 * ```typescript
 * const registry = new ProviderRegistry(auditService);
 * registry.register('jwt', 100, jwtProviderFactory);
 * const providers = registry.instantiate(settings, { idCodec: intIdCodec });
 * ```
 */

import type { AuditService } from '../core/audit-service.js';
import type { PrincipalId } from '../core/types.js';
import type { AuthSettings } from '../config/schemas/auth.js';
import { ConfigurationError } from '../utils/errors.js';
import type { AuthProvider, ProviderDependencies, ProviderFactory } from './base.js';

export interface ProviderRegistration {
  name: string;
  /** Lower runs earlier */
  priority: number;
  factory: ProviderFactory;
}

export class ProviderRegistry {
  // Map preserves insertion order, which breaks priority ties.
  private registrations: Map<string, ProviderRegistration> = new Map();

  constructor(private readonly auditService?: AuditService) {}

  /**
   * @throws ConfigurationError if a provider with the same name is registered
   */
  register(name: string, priority: number, factory: ProviderFactory): void {
    if (this.registrations.has(name)) {
      throw new ConfigurationError(`Auth provider already registered: ${name}`);
    }

    this.registrations.set(name, { name, priority, factory });
    this.audit('provider_registered', { providerName: name, priority });
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  /**
   * Registered provider names in trial order
   */
  listRegistered(): string[] {
    return this.ordered().map((registration) => registration.name);
  }

  /**
   * Build the active providers for `settings`, in trial order.
   *
   * @throws ConfigurationError when an enabled provider misses a required
   *         dependency, or when authentication is enabled but no provider is
   */
  instantiate<ID extends PrincipalId>(
    settings: AuthSettings,
    dependencies: ProviderDependencies<ID>
  ): AuthProvider<ID>[] {
    if (!settings.enabled) {
      console.log('[ProviderRegistry] Authentication disabled, no providers instantiated');
      return [];
    }

    const providers: AuthProvider<ID>[] = [];

    for (const { name, factory } of this.ordered()) {
      if (!factory.isEnabled(settings)) {
        console.log(`[ProviderRegistry] Provider '${name}' disabled by configuration`);
        continue;
      }

      const missing = factory.requires.filter((key) => dependencies[key] === undefined);
      if (missing.length > 0) {
        throw new ConfigurationError(
          `Provider '${name}' is enabled but missing dependencies: ${missing.join(', ')}`,
          { provider: name, missing }
        );
      }

      providers.push(factory.create(settings, dependencies));
      console.log(`[ProviderRegistry] Provider '${name}' enabled`);
    }

    if (providers.length === 0) {
      throw new ConfigurationError(
        'Authentication is enabled but no auth provider is enabled'
      );
    }

    return providers;
  }

  /**
   * Remove every registration (test isolation)
   */
  clear(): void {
    this.registrations.clear();
  }

  private ordered(): ProviderRegistration[] {
    // Array.prototype.sort is stable.
    return [...this.registrations.values()].sort((a, b) => a.priority - b.priority);
  }

  private audit(action: string, metadata: Record<string, unknown>): void {
    this.auditService
      ?.log({
        timestamp: new Date(),
        source: 'auth:registry',
        action,
        success: true,
        metadata,
      })
      .catch((error: unknown) => {
        console.error('[ProviderRegistry] Failed to write audit entry', error);
      });
  }
}
