/**
 * JWT provider
 *
 * Token lifecycle for the framework's own bearer tokens:
 *
 *   Issued(access|refresh) -> Verified -> { Expired | Revoked | RotatedAway }
 *
 * - Access tokens are revoked by logout (their `jti` is blacklisted).
 * - Refresh tokens are single use: rotation blacklists the presented token's
 *   `jti` with an atomic add-if-absent, so of two concurrent rotations of the
 *   same token at most one succeeds.
 *
 * During chained authentication every expected failure yields null. The
 * dedicated login/refresh/logout operations throw the typed errors instead.
 */

import { AuditService } from '../../core/audit-service.js';
import {
  cryptoRandomSource,
  systemClock,
  toEpochSeconds,
  type Clock,
  type RandomSource,
} from '../../core/clock.js';
import type { IdCodec } from '../../core/id-codec.js';
import { extractBearerToken } from '../../core/request.js';
import type {
  AuthRequest,
  AuthScheme,
  Principal,
  PrincipalId,
  PrincipalLookup,
} from '../../core/types.js';
import {
  AuthenticationError,
  InactivePrincipalError,
  InvalidCredentialsError,
  InvalidIdentifierError,
  InvalidTokenError,
  PrincipalNotFoundError,
} from '../../utils/errors.js';
import { BcryptPasswordHasher, type PasswordHasher } from '../../security/password-hasher.js';
import type { AuthProvider } from '../base.js';
import { InMemoryTokenBlacklistStore } from './blacklist/memory-store.js';
import type { TokenBlacklistStore } from './blacklist/types.js';
import { HmacTokenCodec, type TokenType } from './token-codec.js';

// ============================================================================
// Types
// ============================================================================

export interface JWTProviderOptions<ID extends PrincipalId> {
  secretKey: string;
  /** HS256 (default), HS384 or HS512 */
  algorithm?: string;
  /** Access token lifetime (default: 15 minutes) */
  accessTokenTtlSeconds?: number;
  /** Refresh token lifetime (default: 7 days) */
  refreshTokenTtlSeconds?: number;
  idCodec: IdCodec<ID>;
  /** Default: a process-local in-memory store */
  blacklist?: TokenBlacklistStore;
  clock?: Clock;
  random?: RandomSource;
  auditService?: AuditService;
  /**
   * Burns a password comparison on unknown usernames so they cost the same
   * as a wrong password (default: bcrypt, cost 12)
   */
  passwordHasher?: PasswordHasher;
}

/**
 * Body returned by every token-issuing operation.
 */
export interface TokenResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'bearer';
  /** Access token lifetime in seconds */
  expires_in: number;
}

export interface VerifiedToken {
  subject: string;
  tokenId: string;
  type: TokenType;
  issuedAt: Date;
  expiresAt: Date;
  /** Access tokens only */
  username?: string;
  /** Access tokens only */
  role?: string;
}

// ============================================================================
// Provider
// ============================================================================

export class JWTAuthProvider<ID extends PrincipalId> implements AuthProvider<ID> {
  readonly name = 'jwt';
  readonly scheme: AuthScheme = { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' };

  readonly accessTokenTtlSeconds: number;
  readonly refreshTokenTtlSeconds: number;

  private readonly codec: HmacTokenCodec;
  private readonly idCodec: IdCodec<ID>;
  private readonly blacklist: TokenBlacklistStore;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly auditService: AuditService;
  private readonly passwordHasher: PasswordHasher;
  private decoyHash?: Promise<string>;

  constructor(options: JWTProviderOptions<ID>) {
    this.clock = options.clock ?? systemClock;
    this.codec = new HmacTokenCodec({
      secretKey: options.secretKey,
      algorithm: options.algorithm ?? 'HS256',
      clock: this.clock,
    });
    this.accessTokenTtlSeconds = options.accessTokenTtlSeconds ?? 15 * 60;
    this.refreshTokenTtlSeconds = options.refreshTokenTtlSeconds ?? 7 * 24 * 60 * 60;
    this.idCodec = options.idCodec;
    this.blacklist = options.blacklist ?? new InMemoryTokenBlacklistStore({ clock: this.clock });
    this.random = options.random ?? cryptoRandomSource;
    this.auditService = options.auditService ?? new AuditService();
    this.passwordHasher = options.passwordHasher ?? new BcryptPasswordHasher();
  }

  // ==========================================================================
  // Issuance
  // ==========================================================================

  async createAccessToken(subject: string, username: string, role: string): Promise<string> {
    const iat = toEpochSeconds(this.clock.now());
    return this.codec.encode({
      sub: subject,
      username,
      role,
      type: 'access',
      iat,
      exp: iat + this.accessTokenTtlSeconds,
      jti: this.random.uuid(),
    });
  }

  async createRefreshToken(subject: string): Promise<string> {
    const iat = toEpochSeconds(this.clock.now());
    return this.codec.encode({
      sub: subject,
      type: 'refresh',
      iat,
      exp: iat + this.refreshTokenTtlSeconds,
      jti: this.random.uuid(),
    });
  }

  async createTokenResponse(principal: Principal<ID>): Promise<TokenResponse> {
    const subject = this.idCodec.format(principal.id);
    const [accessToken, refreshToken] = await Promise.all([
      this.createAccessToken(subject, principal.username, principal.role),
      this.createRefreshToken(subject),
    ]);

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: 'bearer',
      expires_in: this.accessTokenTtlSeconds,
    };
  }

  // ==========================================================================
  // Verification
  // ==========================================================================

  /**
   * @throws TokenExpiredError when the token is past `exp`
   * @throws InvalidTokenError on bad signature, missing claims, type mismatch
   *         or revocation
   */
  async verifyToken(token: string, expectedType: TokenType): Promise<VerifiedToken> {
    const claims = await this.codec.decode(token);

    if (claims.type !== expectedType) {
      throw new InvalidTokenError('Invalid token type', {
        expected: expectedType,
        actual: claims.type,
      });
    }

    if (await this.blacklist.isBlacklisted(claims.jti)) {
      throw new InvalidTokenError('Token has been revoked');
    }

    return {
      subject: claims.sub,
      tokenId: claims.jti,
      type: claims.type,
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
      ...(claims.type === 'access' && { username: claims.username, role: claims.role }),
    };
  }

  canHandle(request: AuthRequest): boolean {
    return extractBearerToken(request) !== null;
  }

  async authenticate(
    request: AuthRequest,
    lookup: PrincipalLookup<ID>
  ): Promise<Principal<ID> | null> {
    const token = extractBearerToken(request);
    if (!token) {
      return null;
    }

    try {
      const verified = await this.verifyToken(token, 'access');
      const principal = await lookup.getById(this.idCodec.parse(verified.subject));

      if (!principal.isActive) {
        console.warn('[JWTAuthProvider] Token presented for inactive principal', {
          subject: verified.subject,
        });
        return null;
      }
      return principal;
    } catch (error) {
      if (isExpectedFailure(error)) {
        return null;
      }
      throw error;
    }
  }

  // ==========================================================================
  // Login / rotation / revocation
  // ==========================================================================

  /**
   * Exchange credentials for a token pair.
   *
   * Unknown usernames and wrong passwords raise the same InvalidCredentialsError.
   */
  async login(
    username: string,
    password: string,
    lookup: PrincipalLookup<ID>
  ): Promise<TokenResponse> {
    let principal: Principal<ID>;
    try {
      principal = await lookup.getByName(username);
    } catch (error) {
      if (error instanceof PrincipalNotFoundError) {
        await this.compareWithDecoy(password);
        await this.audit('login', false, undefined, 'unknown principal');
        throw new InvalidCredentialsError();
      }
      throw error;
    }

    const userId = this.idCodec.format(principal.id);
    if (!(await lookup.verifyPassword(principal, password))) {
      await this.audit('login', false, userId, 'password mismatch');
      throw new InvalidCredentialsError();
    }

    if (!principal.isActive) {
      await this.audit('login', false, userId, 'inactive principal');
      throw new InactivePrincipalError();
    }

    await this.audit('login', true, userId);
    return this.createTokenResponse(principal);
  }

  /**
   * Rotate a refresh token into a new token pair. The presented token is
   * consumed: a second presentation fails.
   */
  async refresh(refreshToken: string, lookup: PrincipalLookup<ID>): Promise<TokenResponse> {
    const verified = await this.verifyToken(refreshToken, 'refresh');

    let principal: Principal<ID>;
    try {
      principal = await lookup.getById(this.idCodec.parse(verified.subject));
    } catch (error) {
      if (error instanceof PrincipalNotFoundError || error instanceof InvalidIdentifierError) {
        throw new InvalidTokenError('Token subject not found');
      }
      throw error;
    }

    if (!principal.isActive) {
      throw new InactivePrincipalError();
    }

    const claimed = await this.blacklist.addIfAbsent(verified.tokenId, this.remainingTtl(verified));
    if (!claimed) {
      await this.audit('refresh', false, verified.subject, 'refresh token replayed');
      throw new InvalidTokenError('Token has been revoked');
    }

    await this.audit('refresh', true, verified.subject, undefined, { rotatedTokenId: verified.tokenId });
    return this.createTokenResponse(principal);
  }

  /**
   * Revoke an access token for the rest of its lifetime. Refresh tokens are
   * not affected.
   */
  async logout(accessToken: string): Promise<void> {
    const verified = await this.verifyToken(accessToken, 'access');
    await this.blacklist.add(verified.tokenId, this.remainingTtl(verified));
    await this.audit('logout', true, verified.subject, undefined, { tokenId: verified.tokenId });
  }

  async close(): Promise<void> {
    await this.blacklist.close();
  }

  private async compareWithDecoy(password: string): Promise<void> {
    if (!this.decoyHash) {
      this.decoyHash = this.passwordHasher.hash('decoy-password');
    }
    await this.passwordHasher.verify(password, await this.decoyHash);
  }

  private remainingTtl(token: VerifiedToken): number {
    const remaining = toEpochSeconds(token.expiresAt) - toEpochSeconds(this.clock.now());
    return Math.max(1, remaining);
  }

  private async audit(
    action: string,
    success: boolean,
    userId?: string,
    reason?: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.auditService.log({
      timestamp: this.clock.now(),
      source: 'auth:jwt',
      userId,
      action: `jwt:${action}`,
      success,
      reason,
      metadata,
    });
  }
}

/**
 * Failures that mean "these credentials do not authenticate anyone".
 */
function isExpectedFailure(error: unknown): boolean {
  return (
    error instanceof AuthenticationError ||
    error instanceof PrincipalNotFoundError ||
    error instanceof InvalidIdentifierError
  );
}
