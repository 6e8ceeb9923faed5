import { describe, it, expect } from 'vitest';
import { Password } from '../password.js';
import { HashingError } from '../errors.js';

describe('Password', () => {
  const password = new Password();

  it('should produce an argon2id hash that differs from the plaintext', async () => {
    const hash = await password.hash('secret123');

    expect(hash).not.toBe('secret123');
    expect(hash.startsWith('$argon2id$')).toBe(true);
  });

  it('should salt every hash', async () => {
    const first = await password.hash('secret123');
    const second = await password.hash('secret123');

    expect(first).not.toBe(second);
  });

  it('should verify the original plaintext against its hash', async () => {
    const hash = await password.hash('secret123');

    await expect(password.verify('secret123', hash)).resolves.toBe(true);
  });

  it('should reject a different plaintext', async () => {
    const hash = await password.hash('secret123');

    await expect(password.verify('secret124', hash)).resolves.toBe(false);
    await expect(password.verify('', hash)).resolves.toBe(false);
  });

  it('should raise HashingError for a structurally invalid hash', async () => {
    await expect(password.verify('secret123', 'not-a-hash')).rejects.toBeInstanceOf(
      HashingError
    );
    await expect(password.verify('secret123', '$2b$10$abcdefghijklmnopqrstuv')).rejects.toBeInstanceOf(
      HashingError
    );
  });
});
