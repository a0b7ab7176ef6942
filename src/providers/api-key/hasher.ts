import bcrypt from 'bcrypt';
import { cryptoRandomSource, type RandomSource } from '../../core/clock.js';

export const API_KEY_PREFIX = 'sk_';
/** Characters of the plaintext key stored for indexed lookup */
export const API_KEY_LOOKUP_PREFIX_LENGTH = 12;
/** 32 random bytes, hex encoded */
export const API_KEY_SECRET_LENGTH = 64;
export const API_KEY_LENGTH = API_KEY_PREFIX.length + API_KEY_SECRET_LENGTH;

const SECRET_PATTERN = /^[0-9a-f]+$/i;

export interface GeneratedAPIKey {
  /** Shown to the caller once, never stored */
  plaintext: string;
  hash: string;
  prefix: string;
}

/**
 * Generation and one-way hashing of API key secrets.
 */
export interface APIKeyHasher {
  generateKey(): Promise<GeneratedAPIKey>;
  hashKey(key: string): Promise<string>;
  verifyKey(key: string, hash: string): Promise<boolean>;
  extractPrefix(key: string): string;
  /** Format gate: `sk_` followed by 64 hex characters */
  isWellFormed(key: string): boolean;
}

/**
 * bcrypt-backed hasher. Hashing is deliberately slow and runs on the libuv
 * thread pool through bcrypt's async API.
 */
export class BcryptAPIKeyHasher implements APIKeyHasher {
  constructor(
    private readonly rounds: number = 12,
    private readonly random: RandomSource = cryptoRandomSource
  ) {}

  async generateKey(): Promise<GeneratedAPIKey> {
    const plaintext = API_KEY_PREFIX + this.random.bytes(API_KEY_SECRET_LENGTH / 2).toString('hex');
    return {
      plaintext,
      hash: await this.hashKey(plaintext),
      prefix: this.extractPrefix(plaintext),
    };
  }

  async hashKey(key: string): Promise<string> {
    return bcrypt.hash(key, this.rounds);
  }

  async verifyKey(key: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(key, hash);
    } catch (error) {
      console.warn('[BcryptAPIKeyHasher] Stored hash could not be compared', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  extractPrefix(key: string): string {
    return key.slice(0, API_KEY_LOOKUP_PREFIX_LENGTH);
  }

  isWellFormed(key: string): boolean {
    return (
      key.length === API_KEY_LENGTH &&
      key.startsWith(API_KEY_PREFIX) &&
      SECRET_PATTERN.test(key.slice(API_KEY_PREFIX.length))
    );
  }
}
