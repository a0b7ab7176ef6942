export * from './blacklist/index.js';
export {
  HmacTokenCodec,
  TokenClaimsSchema,
  MIN_SECRET_LENGTH,
  type TokenClaims,
  type TokenType,
  type TokenCodecOptions,
} from './token-codec.js';
export {
  JWTAuthProvider,
  type JWTProviderOptions,
  type TokenResponse,
  type VerifiedToken,
} from './provider.js';
export { jwtProviderFactory } from './factory.js';
