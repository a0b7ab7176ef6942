/**
 * BcryptPasswordHasher Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BcryptPasswordHasher } from '../../../src/security/password-hasher.js';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher(4);

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should produce salted bcrypt hashes with the configured cost', async () => {
    const first = await hasher.hash('password');
    const second = await hasher.hash('password');

    expect(first).toMatch(/^\$2[aby]\$04\$/);
    expect(first).not.toBe(second);
  });

  it('should verify the original password', async () => {
    const hash = await hasher.hash('password');

    expect(await hasher.verify('password', hash)).toBe(true);
    expect(await hasher.verify('Password', hash)).toBe(false);
  });

  it('should not verify against a malformed hash', async () => {
    expect(await hasher.verify('password', 'not-a-bcrypt-hash')).toBe(false);
  });
});
