/**
 * Password validation utility.
 *
 * Passwords must be at least 8 characters long and fit in the 72 bytes
 * bcrypt reads; anything past that byte would be silently ignored by the
 * hash.
 *
 * @module utils/validators/passwordValidator
 */

import type { ValidationResult } from '../../types/index.js';

const MIN_PASSWORD_LENGTH = 8;

const MAX_PASSWORD_BYTES = 72;

/**
 * Validates a password against the strength requirements.
 *
 * @example
 * ```typescript
 * validatePassword('longenough');
 * // { valid: true, errors: [] }
 *
 * validatePassword('short');
 * // { valid: false, errors: ['Password must be at least 8 characters'] }
 * ```
 */
export function validatePassword(password: string): ValidationResult {
  if (!password || password.length === 0) {
    return {
      valid: false,
      errors: ['Password is required'],
    };
  }

  const errors: string[] = [];

  if (password.length < MIN_PASSWORD_LENGTH) {
    errors.push(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }

  if (Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES) {
    errors.push(`Password must not exceed ${MAX_PASSWORD_BYTES} bytes`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
