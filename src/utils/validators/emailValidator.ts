/**
 * Email address validation for user records.
 *
 * Accepts dot-atom local parts (letters, digits and the RFC 5322 atext
 * symbols) at a dotted domain whose last label is at least two letters.
 * Quoted local parts are not accepted.
 *
 * @module utils/validators/emailValidator
 */

import type { ValidationResult } from '../../types/index.js';

/** Matches the `users.email` column. */
const MAX_EMAIL_LENGTH = 150;

const MAX_LOCAL_PART_LENGTH = 64;

const LOCAL_PART_REGEX = /^[a-zA-Z0-9!#$%&'*+/=?^_`{|}~-]+(?:\.[a-zA-Z0-9!#$%&'*+/=?^_`{|}~-]+)*$/;

const DOMAIN_REGEX = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;

/**
 * @example
 * ```typescript
 * validateEmail('analyst@bank.example');
 * // { valid: true, errors: [] }
 * ```
 */
export function validateEmail(email: string): ValidationResult {
  if (!email || email.trim().length === 0) {
    return { valid: false, errors: ['Email is required'] };
  }

  if (email.length > MAX_EMAIL_LENGTH) {
    return { valid: false, errors: [`Email must not exceed ${MAX_EMAIL_LENGTH} characters`] };
  }

  const atIndex = email.lastIndexOf('@');
  const localPart = email.slice(0, atIndex);
  const domainPart = email.slice(atIndex + 1);

  if (atIndex === -1 || !LOCAL_PART_REGEX.test(localPart) || !DOMAIN_REGEX.test(domainPart)) {
    return { valid: false, errors: ['Invalid email format'] };
  }

  if (localPart.length > MAX_LOCAL_PART_LENGTH) {
    return {
      valid: false,
      errors: [`Email local part must not exceed ${MAX_LOCAL_PART_LENGTH} characters`],
    };
  }

  return { valid: true, errors: [] };
}
