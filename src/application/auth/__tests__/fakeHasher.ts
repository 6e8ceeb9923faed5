import { vi } from 'vitest';
import type { PasswordHasher } from '../../../domain/auth/password.js';

/**
 * Reversible stand-in for Argon2 so use case tests stay fast.
 */
export function fakeHasher() {
  return {
    hash: vi.fn(async (plain: string) => `hashed:${plain}`),
    verify: vi.fn(async (plain: string, hash: string) => hash === `hashed:${plain}`),
  } satisfies PasswordHasher;
}
