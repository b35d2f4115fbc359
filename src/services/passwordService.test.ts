/**
 * Unit tests for the password service.
 *
 * @module services/passwordService.test
 */

import { describe, it, expect } from 'vitest';
import { bcryptHasher, hashPassword, verifyPassword } from './passwordService.js';

describe('passwordService', () => {
  describe('hashPassword', () => {
    it('should return a 60-character bcrypt hash with cost factor 12', async () => {
      const hash = await hashPassword('securePass1');
      expect(hash).toMatch(/^\$2[ab]\$12\$/);
      expect(hash.length).toBe(60);
    });

    it('should produce different hashes for the same password', async () => {
      const hash1 = await hashPassword('securePass1');
      const hash2 = await hashPassword('securePass1');
      expect(hash1).not.toBe(hash2);
    });
  });

  describe('verifyPassword', () => {
    it('should return true for the correct password', async () => {
      const hash = await hashPassword('myPassword123');
      expect(await verifyPassword('myPassword123', hash)).toBe(true);
    });

    it('should return false for an incorrect password', async () => {
      const hash = await hashPassword('correctPass1');
      expect(await verifyPassword('wrongPass1', hash)).toBe(false);
    });

    it('should handle passwords with unicode characters', async () => {
      const password = 'pässwörd1ñ';
      const hash = await hashPassword(password);
      expect(await verifyPassword(password, hash)).toBe(true);
    });

    it('should return false for a value that is not a bcrypt hash', async () => {
      expect(await verifyPassword('anything', 'not-a-hash')).toBe(false);
    });
  });

  describe('bcryptHasher', () => {
    it('should expose hash and verify as one capability', async () => {
      const hash = await bcryptHasher.hashPassword('hasherPass1');
      expect(await bcryptHasher.verifyPassword('hasherPass1', hash)).toBe(true);
    });
  });
});
