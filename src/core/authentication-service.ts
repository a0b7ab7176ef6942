/**
 * Authentication Service - Orchestrates the active auth providers
 *
 * Policy: first success, ordered fallback.
 * - Providers are tried one at a time in registry order.
 * - Only providers whose canHandle() is true are asked to authenticate.
 * - The first principal returned wins; later providers are not consulted.
 * - Exhaustion fails with a generic AuthenticationError that never says which
 *   provider was tried or why it failed.
 *
 * Audit entries use source 'auth:service'.
 */

import { AuditService } from './audit-service.js';
import { systemClock, type Clock } from './clock.js';
import type {
  AuthProvider,
  AuthRequest,
  AuthScheme,
  Principal,
  PrincipalId,
  PrincipalLookup,
  Role,
} from './types.js';
import { AuthenticationError, InsufficientRoleError } from '../utils/errors.js';

export interface AuthServiceOptions {
  /** Audit service for security events (Null Object when omitted) */
  auditService?: AuditService;
  /** Source of audit timestamps (default: system clock) */
  clock?: Clock;
}

export class AuthService<ID extends PrincipalId = PrincipalId> {
  private readonly providers: readonly AuthProvider<ID>[];
  private readonly auditService: AuditService;
  private readonly clock: Clock;

  constructor(
    providers: readonly AuthProvider<ID>[],
    private readonly principalLookup: PrincipalLookup<ID>,
    options: AuthServiceOptions = {}
  ) {
    this.providers = [...providers];
    this.auditService = options.auditService ?? new AuditService();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Resolve the request's principal.
   *
   * On success the principal and provider name are stored in
   * `request.context`.
   *
   * @throws AuthenticationError when no provider authenticates the request
   */
  async authenticate(request: AuthRequest): Promise<Principal<ID>> {
    for (const provider of this.providers) {
      if (!provider.canHandle(request)) {
        continue;
      }

      const principal = await provider.authenticate(request, this.principalLookup);
      if (principal) {
        request.context.principal = principal;
        request.context.provider = provider.name;

        await this.auditService.log({
          timestamp: this.clock.now(),
          source: 'auth:service',
          userId: String(principal.id),
          action: 'authenticate',
          success: true,
          metadata: { provider: provider.name, role: principal.role },
        });
        return principal;
      }
    }

    await this.auditService.log({
      timestamp: this.clock.now(),
      source: 'auth:service',
      action: 'authenticate',
      success: false,
      reason: 'No provider authenticated the request',
    });
    throw new AuthenticationError('Authentication failed');
  }

  /**
   * Authenticate, then require the principal's role to be one of
   * `requiredRoles`. Authentication failures short-circuit before any role
   * information is evaluated.
   *
   * @throws AuthenticationError when authentication fails
   * @throws InsufficientRoleError when the role is not permitted
   */
  async authorize(request: AuthRequest, requiredRoles: readonly Role[]): Promise<Principal<ID>> {
    const principal = await this.authenticate(request);

    if (!requiredRoles.includes(principal.role)) {
      await this.auditService.log({
        timestamp: this.clock.now(),
        source: 'auth:service',
        userId: String(principal.id),
        action: 'authorize',
        success: false,
        reason: 'Role not permitted',
        metadata: { requiredRoles: [...requiredRoles], actualRole: principal.role },
      });
      throw new InsufficientRoleError(requiredRoles, principal.role);
    }

    return principal;
  }

  getProviders(): readonly AuthProvider<ID>[] {
    return this.providers;
  }

  hasProviders(): boolean {
    return this.providers.length > 0;
  }

  /**
   * Credential schemes of the active providers, in trial order
   */
  supportedSchemes(): AuthScheme[] {
    return this.providers.map((provider) => provider.scheme);
  }

  getPrincipalLookup(): PrincipalLookup<ID> {
    return this.principalLookup;
  }
}
