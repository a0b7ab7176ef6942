import bcrypt from 'bcrypt';

/**
 * Salted one-way password hashing.
 */
export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, hash: string): Promise<boolean>;
}

/**
 * bcrypt password hasher.
 *
 * The async bcrypt API runs on the libuv thread pool, so a burst of logins
 * does not block the event loop.
 */
export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly rounds: number = 12) {}

  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.rounds);
  }

  async verify(plaintext: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plaintext, hash);
    } catch (error) {
      // A malformed stored hash never verifies.
      console.warn('[BcryptPasswordHasher] Hash comparison failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
