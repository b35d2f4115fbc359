/**
 * Unit tests for the email validator.
 *
 * @module utils/validators/emailValidator.test
 */

import { describe, it, expect } from 'vitest';
import { validateEmail } from './emailValidator.js';

describe('validateEmail', () => {
  describe('valid emails', () => {
    it.each([
      'user@example.com',
      'first.last@example.co.uk',
      'ops+alerts@mail.bank-example.org',
      "o'connor@example.com",
      'a1_b2@sub.domain.example',
    ])('should accept %s', (email) => {
      expect(validateEmail(email)).toEqual({ valid: true, errors: [] });
    });
  });

  describe('invalid emails', () => {
    it('should require a value', () => {
      expect(validateEmail('')).toEqual({ valid: false, errors: ['Email is required'] });
      expect(validateEmail('   ')).toEqual({ valid: false, errors: ['Email is required'] });
    });

    it.each([
      'plainaddress',
      '@example.com',
      'user@',
      'user@example',
      'user@example.c',
      'user..name@example.com',
      '.user@example.com',
      'user@-example.com',
      'user name@example.com',
      '"quoted"@example.com',
    ])('should reject %s as malformed', (email) => {
      expect(validateEmail(email)).toEqual({ valid: false, errors: ['Invalid email format'] });
    });

    it('should reject an address longer than 150 characters', () => {
      const email = `${'a'.repeat(60)}@${'b'.repeat(86)}.com`;
      expect(email.length).toBe(151);
      expect(validateEmail(email)).toEqual({
        valid: false,
        errors: ['Email must not exceed 150 characters'],
      });
    });

    it('should reject a local part longer than 64 characters', () => {
      const email = `${'a'.repeat(65)}@example.com`;
      expect(validateEmail(email)).toEqual({
        valid: false,
        errors: ['Email local part must not exceed 64 characters'],
      });
    });
  });
});
