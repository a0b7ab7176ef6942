export {
  BcryptAPIKeyHasher,
  API_KEY_PREFIX,
  API_KEY_LENGTH,
  API_KEY_LOOKUP_PREFIX_LENGTH,
  API_KEY_SECRET_LENGTH,
  type APIKeyHasher,
  type GeneratedAPIKey,
} from './hasher.js';
export type { APIKeyRecord, APIKeyRepository, NewAPIKeyRecord } from './repository.js';
export { InMemoryAPIKeyRepository } from './memory-repository.js';
export {
  PostgresAPIKeyRepository,
  createPostgresPool,
  mapDatabaseError,
  type PostgresConnectionConfig,
  type SqlClient,
  type SqlPool,
  type SqlResult,
} from './postgres-repository.js';
export {
  APIKeyService,
  type APIKeyServiceOptions,
  type APIKeySummary,
  type CreatedAPIKey,
  type ValidatedAPIKey,
} from './service.js';
export {
  APIKeyAuthProvider,
  DEFAULT_API_KEY_HEADER,
  type APIKeyProviderOptions,
} from './provider.js';
export { apiKeyProviderFactory, createAPIKeyService } from './factory.js';
