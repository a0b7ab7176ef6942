/**
 * HMAC token codec
 *
 * Signs and verifies the framework's own access/refresh tokens with jose.
 * Only the HMAC family (HS256/HS384/HS512) is accepted; anything else is a
 * configuration error raised at construction time.
 */

import { SignJWT, jwtVerify, errors, type JWTPayload } from 'jose';
import { z } from 'zod';
import { systemClock, type Clock } from '../../core/clock.js';
import { JWTAlgorithmSchema, type JWTAlgorithm } from '../../config/schemas/auth.js';
import {
  AuthgateError,
  ConfigurationError,
  InvalidTokenError,
  TokenExpiredError,
} from '../../utils/errors.js';

export const MIN_SECRET_LENGTH = 32;

// ============================================================================
// Claims
// ============================================================================

const baseClaims = {
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
};

/**
 * Access tokens carry the denormalized username and role; refresh tokens
 * carry no authorization data at all.
 */
export const TokenClaimsSchema = z.discriminatedUnion('type', [
  z.object({ ...baseClaims, type: z.literal('access'), username: z.string(), role: z.string() }),
  z.object({ ...baseClaims, type: z.literal('refresh') }),
]);

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;
export type TokenType = TokenClaims['type'];

const REQUIRED_CLAIMS = ['sub', 'iat', 'exp', 'jti', 'type'];

// ============================================================================
// Codec
// ============================================================================

export interface TokenCodecOptions {
  secretKey: string;
  algorithm: string;
  clock?: Clock;
}

export class HmacTokenCodec {
  readonly algorithm: JWTAlgorithm;
  private readonly key: Uint8Array;
  private readonly clock: Clock;

  constructor(options: TokenCodecOptions) {
    const algorithm = JWTAlgorithmSchema.safeParse(options.algorithm);
    if (!algorithm.success) {
      throw new ConfigurationError(
        `Unsupported JWT algorithm '${options.algorithm}'. Allowed: ${JWTAlgorithmSchema.options.join(', ')}`
      );
    }

    if (options.secretKey.length < MIN_SECRET_LENGTH) {
      throw new ConfigurationError(
        `JWT secret key must be at least ${MIN_SECRET_LENGTH} characters`
      );
    }

    this.algorithm = algorithm.data;
    this.key = new TextEncoder().encode(options.secretKey);
    this.clock = options.clock ?? systemClock;
  }

  async encode(claims: TokenClaims): Promise<string> {
    const payload: JWTPayload =
      claims.type === 'access'
        ? { type: claims.type, username: claims.username, role: claims.role }
        : { type: claims.type };

    return new SignJWT(payload)
      .setProtectedHeader({ alg: this.algorithm, typ: 'JWT' })
      .setSubject(claims.sub)
      .setIssuedAt(claims.iat)
      .setExpirationTime(claims.exp)
      .setJti(claims.jti)
      .sign(this.key);
  }

  /**
   * Verify signature, algorithm and expiry, then validate the claim set.
   *
   * @throws TokenExpiredError when `exp` has passed
   * @throws InvalidTokenError for every other signature, format or claim problem
   */
  async decode(token: string): Promise<TokenClaims> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [this.algorithm],
        currentDate: this.clock.now(),
        requiredClaims: REQUIRED_CLAIMS,
      });

      const claims = TokenClaimsSchema.safeParse(payload);
      if (!claims.success) {
        throw new InvalidTokenError('Token claims validation failed', {
          issues: claims.error.issues.map((issue) => issue.path.join('.') || issue.message),
        });
      }
      return claims.data;
    } catch (error) {
      if (error instanceof AuthgateError) {
        throw error;
      }
      if (error instanceof errors.JWTExpired) {
        throw new TokenExpiredError();
      }
      if (error instanceof errors.JOSEError) {
        throw new InvalidTokenError('Invalid token', { reason: error.code });
      }
      throw error;
    }
  }
}
