export {
  JWT_ALGORITHMS,
  JWTAlgorithmSchema,
  BlacklistSettingsSchema,
  JWTSettingsSchema,
  APIKeySettingsSchema,
  AuthSettingsSchema,
  type JWTAlgorithm,
  type BlacklistSettings,
  type JWTSettings,
  type APIKeySettings,
  type AuthSettings,
  type AuthSettingsInput,
} from './auth.js';
