/**
 * HmacTokenCodec Tests
 *
 * Signing, verification failures and claim validation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SignJWT } from 'jose';
import { HmacTokenCodec, type TokenClaims } from '../../../../src/providers/jwt/token-codec.js';
import { toEpochSeconds } from '../../../../src/core/clock.js';
import {
  ConfigurationError,
  InvalidTokenError,
  TokenExpiredError,
} from '../../../../src/utils/errors.js';
import { ManualClock, TEST_SECRET_KEY } from '../../../../src/testing/index.js';

function flipFirstSignatureChar(token: string): string {
  const [header, payload, signature] = token.split('.');
  const replacement = signature[0] === 'A' ? 'B' : 'A';
  return `${header}.${payload}.${replacement}${signature.slice(1)}`;
}

describe('HmacTokenCodec', () => {
  let clock: ManualClock;
  let codec: HmacTokenCodec;
  let iat: number;

  const accessClaims = (): TokenClaims => ({
    sub: '42',
    username: 'alice',
    role: 'user',
    type: 'access',
    iat,
    exp: iat + 60,
    jti: '0b0c1c9e-2f0d-4f7e-8a55-6f7d8f1a2b3c',
  });

  beforeEach(() => {
    clock = new ManualClock();
    codec = new HmacTokenCodec({ secretKey: TEST_SECRET_KEY, algorithm: 'HS256', clock });
    iat = toEpochSeconds(clock.now());
  });

  describe('construction', () => {
    it('should reject secrets shorter than 32 characters', () => {
      expect(
        () => new HmacTokenCodec({ secretKey: 'short-secret', algorithm: 'HS256' })
      ).toThrow(ConfigurationError);
    });

    it('should reject non-HMAC algorithms', () => {
      expect(() => new HmacTokenCodec({ secretKey: TEST_SECRET_KEY, algorithm: 'RS256' })).toThrow(
        "Configuration error: Unsupported JWT algorithm 'RS256'. Allowed: HS256, HS384, HS512"
      );
    });

    it('should accept HS384 and HS512', () => {
      expect(new HmacTokenCodec({ secretKey: TEST_SECRET_KEY, algorithm: 'HS384' }).algorithm).toBe(
        'HS384'
      );
      expect(new HmacTokenCodec({ secretKey: TEST_SECRET_KEY, algorithm: 'HS512' }).algorithm).toBe(
        'HS512'
      );
    });
  });

  describe('encode/decode', () => {
    it('should return the claims it signed', async () => {
      const token = await codec.encode(accessClaims());

      expect(await codec.decode(token)).toEqual(accessClaims());
    });

    it('should leave authorization data out of refresh tokens', async () => {
      const token = await codec.encode({
        sub: '42',
        type: 'refresh',
        iat,
        exp: iat + 60,
        jti: 'refresh-jti',
      });

      const claims = await codec.decode(token);

      expect(claims).toEqual({ sub: '42', type: 'refresh', iat, exp: iat + 60, jti: 'refresh-jti' });
      expect('username' in claims).toBe(false);
    });

    it('should put alg and typ in the protected header', async () => {
      const token = await codec.encode(accessClaims());
      const header: unknown = JSON.parse(Buffer.from(token.split('.')[0], 'base64url').toString());

      expect(header).toEqual({ alg: 'HS256', typ: 'JWT' });
    });
  });

  describe('failures', () => {
    it('should accept a token one second before expiry', async () => {
      const token = await codec.encode(accessClaims());

      clock.advanceSeconds(59);

      await expect(codec.decode(token)).resolves.toMatchObject({ sub: '42' });
    });

    it('should raise TokenExpiredError at expiry', async () => {
      const token = await codec.encode(accessClaims());

      clock.advanceSeconds(60);

      await expect(codec.decode(token)).rejects.toBeInstanceOf(TokenExpiredError);
    });

    it('should reject a tampered signature', async () => {
      const token = await codec.encode(accessClaims());

      await expect(codec.decode(flipFirstSignatureChar(token))).rejects.toThrow(
        new InvalidTokenError('Invalid token')
      );
    });

    it('should reject tokens signed with another secret', async () => {
      const other = new HmacTokenCodec({
        secretKey: 'another-secret-key-that-is-32-chars-long',
        algorithm: 'HS256',
        clock,
      });
      const token = await other.encode(accessClaims());

      await expect(codec.decode(token)).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should reject tokens signed with a different algorithm', async () => {
      const hs512 = new HmacTokenCodec({ secretKey: TEST_SECRET_KEY, algorithm: 'HS512', clock });
      const token = await hs512.encode(accessClaims());

      await expect(codec.decode(token)).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should reject malformed tokens', async () => {
      await expect(codec.decode('not-a-jwt')).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should reject tokens without a jti', async () => {
      const token = await new SignJWT({ type: 'refresh' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('42')
        .setIssuedAt(iat)
        .setExpirationTime(iat + 60)
        .sign(new TextEncoder().encode(TEST_SECRET_KEY));

      await expect(codec.decode(token)).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should reject access tokens without username and role', async () => {
      const token = await new SignJWT({ type: 'access' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('42')
        .setIssuedAt(iat)
        .setExpirationTime(iat + 60)
        .setJti('jti-1')
        .sign(new TextEncoder().encode(TEST_SECRET_KEY));

      await expect(codec.decode(token)).rejects.toThrow('Token claims validation failed');
    });

    it('should reject unknown token types', async () => {
      const token = await new SignJWT({ type: 'id' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('42')
        .setIssuedAt(iat)
        .setExpirationTime(iat + 60)
        .setJti('jti-1')
        .sign(new TextEncoder().encode(TEST_SECRET_KEY));

      await expect(codec.decode(token)).rejects.toThrow('Token claims validation failed');
    });
  });
});
