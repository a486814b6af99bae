import { describe, it, expect } from 'vitest';
import { ValidationError } from './errors.js';
import { createPasswordHasher, MAX_PASSWORD_BYTES, MIN_BCRYPT_ROUNDS } from './password.js';

const roundsOf = (hash: string): number => parseInt(hash.split('$')[2], 10);

describe('password hasher', () => {
  const hasher = createPasswordHasher();

  describe('hash', () => {
    it('should return a bcrypt hash', async () => {
      const hash = await hasher.hash('mySecurePassword123');

      // Bcrypt hashes start with $2a$, $2b$, or $2y$
      expect(hash).toMatch(/^\$2[aby]\$/);
      expect(hash).toHaveLength(60);
    });

    it('should not contain the plain text password', async () => {
      const hash = await hasher.hash('pw123');

      expect(hash).not.toContain('pw123');
    });

    it('should use 10 rounds by default', async () => {
      const hash = await hasher.hash('testPassword');

      expect(roundsOf(hash)).toBe(MIN_BCRYPT_ROUNDS);
    });

    it('should respect a higher configured cost', async () => {
      const hash = await createPasswordHasher(11).hash('testPassword');

      expect(roundsOf(hash)).toBe(11);
    });

    it('should enforce minimum 10 rounds even if lower value is set', async () => {
      const hash = await createPasswordHasher(4).hash('testPassword');

      expect(roundsOf(hash)).toBe(10);
    });

    it('should generate different hashes for the same password', async () => {
      const hash1 = await hasher.hash('samePassword');
      const hash2 = await hasher.hash('samePassword');

      // Same password should produce different hashes due to salt
      expect(hash1).not.toBe(hash2);
      expect(await hasher.verify('samePassword', hash1)).toBe(true);
      expect(await hasher.verify('samePassword', hash2)).toBe(true);
    });

    it('should reject a password longer than 72 bytes', async () => {
      await expect(hasher.hash('a'.repeat(MAX_PASSWORD_BYTES + 1))).rejects.toBeInstanceOf(ValidationError);
      // 37 two-byte characters
      await expect(hasher.hash('é'.repeat(37))).rejects.toThrow('Password must be at most 72 bytes long');
    });
  });

  describe('verify', () => {
    it('should return true for matching password', async () => {
      const hash = await hasher.hash('correctPassword123');

      expect(await hasher.verify('correctPassword123', hash)).toBe(true);
    });

    it('should return false for non-matching password', async () => {
      const hash = await hasher.hash('correctPassword123');

      expect(await hasher.verify('wrongPassword', hash)).toBe(false);
    });

    it('should handle empty passwords correctly', async () => {
      const hash = await hasher.hash('');

      expect(await hasher.verify('', hash)).toBe(true);
      expect(await hasher.verify('notEmpty', hash)).toBe(false);
    });

    it('should return false for a malformed hash instead of throwing', async () => {
      await expect(hasher.verify('pw123', 'not-a-hash')).resolves.toBe(false);
      await expect(hasher.verify('pw123', '')).resolves.toBe(false);
      await expect(hasher.verify('pw123', '$2b$10$tooshort')).resolves.toBe(false);
    });

    it('should accept a password of exactly 72 bytes', async () => {
      const hash = await hasher.hash('a'.repeat(MAX_PASSWORD_BYTES));

      expect(await hasher.verify('a'.repeat(MAX_PASSWORD_BYTES), hash)).toBe(true);
    });

    it('should return false when extra text follows a 72-byte password', async () => {
      const hash = await hasher.hash('a'.repeat(MAX_PASSWORD_BYTES));

      expect(await hasher.verify(`${'a'.repeat(MAX_PASSWORD_BYTES)}EXTRA`, hash)).toBe(false);
    });

    it('should return false when the plain text is used as the hash', async () => {
      await expect(hasher.verify('pw123', 'pw123')).resolves.toBe(false);
    });
  });
});
