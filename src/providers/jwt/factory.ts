import type { AuthSettings } from '../../config/schemas/auth.js';
import type { PrincipalId } from '../../core/types.js';
import type { AuthProvider, ProviderDependencies, ProviderFactory } from '../base.js';
import { createBlacklistStore } from './blacklist/factory.js';
import { JWTAuthProvider } from './provider.js';

/**
 * Builds the bearer-token provider from `settings.jwt`. A blacklist store
 * passed as a dependency wins over the one described in settings.
 */
export const jwtProviderFactory: ProviderFactory = {
  requires: [],

  isEnabled: (settings) => settings.jwt.enabled,

  create<ID extends PrincipalId>(
    settings: AuthSettings,
    dependencies: ProviderDependencies<ID>
  ): AuthProvider<ID> {
    const jwt = settings.jwt;
    const blacklist =
      dependencies.blacklistStore ?? createBlacklistStore(jwt.blacklist, dependencies.clock);

    return new JWTAuthProvider<ID>({
      secretKey: jwt.secretKey,
      algorithm: jwt.algorithm,
      accessTokenTtlSeconds: jwt.accessTokenExpireMinutes * 60,
      refreshTokenTtlSeconds: jwt.refreshTokenExpireDays * 24 * 60 * 60,
      idCodec: dependencies.idCodec,
      blacklist,
      clock: dependencies.clock,
      random: dependencies.random,
      auditService: dependencies.auditService,
    });
  },
};
