/**
 * Authentication Configuration Schema
 *
 * Settings for the provider registry, the JWT lifecycle, the token blacklist
 * and API keys. Every field has a default except the Redis URL, which is only
 * required when the Redis blacklist backend is selected.
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';

// ============================================================================
// JWT
// ============================================================================

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export const JWTAlgorithmSchema = z.enum(JWT_ALGORITHMS);

/**
 * Token blacklist backend
 *
 * The in-memory backend is per process and only suits single-instance
 * deployments.
 */
export const BlacklistSettingsSchema = z
  .object({
    backend: z
      .enum(['memory', 'redis'])
      .default('memory')
      .describe('Where revoked token ids are stored'),
    redisUrl: z
      .string()
      .url()
      .optional()
      .describe('Connection string for the redis backend (e.g. redis://localhost:6379/0)'),
    keyPrefix: z
      .string()
      .min(1)
      .default('jwt:blacklist:')
      .describe('Namespace for blacklist keys in a shared store'),
    cleanupThreshold: z
      .number()
      .int()
      .min(1)
      .default(1000)
      .describe('In-memory entry count above which add() sweeps expired entries'),
  })
  .refine((value) => value.backend !== 'redis' || value.redisUrl !== undefined, {
    message: 'redisUrl is required when backend is "redis"',
    path: ['redisUrl'],
  });

export const JWTSettingsSchema = z.object({
  enabled: z.boolean().default(true).describe('Enable the JWT bearer provider'),
  secretKey: z
    .string()
    .min(32, 'secretKey must be at least 32 characters')
    .default(() => randomBytes(32).toString('base64url'))
    .describe('HMAC signing secret (random per process when omitted)'),
  algorithm: JWTAlgorithmSchema.default('HS256').describe('HMAC signing algorithm'),
  accessTokenExpireMinutes: z
    .number()
    .int()
    .min(1)
    .default(15)
    .describe('Access token lifetime in minutes'),
  refreshTokenExpireDays: z
    .number()
    .int()
    .min(1)
    .default(7)
    .describe('Refresh token lifetime in days'),
  blacklist: BlacklistSettingsSchema.default({}),
});

// ============================================================================
// API keys
// ============================================================================

export const APIKeySettingsSchema = z.object({
  enabled: z.boolean().default(false).describe('Enable the API key provider'),
  headerName: z
    .string()
    .min(1)
    .default('X-API-Key')
    .describe('Request header carrying the API key'),
  maxPerOwner: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(5)
    .describe('Maximum number of keys a principal may hold'),
  defaultExpirationDays: z
    .number()
    .int()
    .min(1)
    .max(365)
    .default(30)
    .describe('Expiration applied when a key is created without one'),
  hashRounds: z
    .number()
    .int()
    .min(4)
    .max(15)
    .default(12)
    .describe('bcrypt cost factor for key hashes'),
});

// ============================================================================
// Root
// ============================================================================

export const AuthSettingsSchema = z.object({
  enabled: z
    .boolean()
    .default(true)
    .describe('When true, at least one provider must end up enabled'),
  jwt: JWTSettingsSchema.default({}),
  apiKey: APIKeySettingsSchema.default({}),
});

export type JWTAlgorithm = z.infer<typeof JWTAlgorithmSchema>;
export type BlacklistSettings = z.infer<typeof BlacklistSettingsSchema>;
export type JWTSettings = z.infer<typeof JWTSettingsSchema>;
export type APIKeySettings = z.infer<typeof APIKeySettingsSchema>;
export type AuthSettings = z.infer<typeof AuthSettingsSchema>;
/** Input shape accepted by the schema (defaults not yet applied) */
export type AuthSettingsInput = z.input<typeof AuthSettingsSchema>;
