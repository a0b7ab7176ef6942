export {
  requireDependency,
  type DependencyKey,
  type ProviderDependencies,
  type ProviderFactory,
} from './base.js';
export { ProviderRegistry, type ProviderRegistration } from './registry.js';
export {
  registerBuiltInProviders,
  createAuthService,
  findJWTProvider,
  findAPIKeyProvider,
  API_KEY_PROVIDER_PRIORITY,
  JWT_PROVIDER_PRIORITY,
  type CreateAuthServiceOptions,
} from './setup.js';
export * from './jwt/index.js';
export * from './api-key/index.js';
