/**
 * Password service.
 *
 * Provides password hashing using bcrypt with cost factor 12 and
 * verification against stored hashes. The RBAC service receives these
 * through the {@link CredentialHasher} interface so tests can swap in a
 * cheaper implementation.
 *
 * @module services/passwordService
 */

import bcrypt from 'bcrypt';

/**
 * Bcrypt cost factor (number of salt rounds).
 */
const BCRYPT_COST_FACTOR = 12;

/** Hashing capability consumed by the RBAC service. */
export interface CredentialHasher {
  hashPassword(plaintext: string): Promise<string>;
  verifyPassword(plaintext: string, hash: string): Promise<boolean>;
}

/**
 * Hash a plaintext password using bcrypt with cost factor 12.
 *
 * Each call generates a fresh salt, so identical passwords produce
 * different hashes.
 *
 * @example
 * ```typescript
 * const hash = await hashPassword('mySecurePass1');
 * // '$2b$12$...' (60-character bcrypt hash)
 * ```
 */
export async function hashPassword(plaintext: string): Promise<string> {
  const salt = await bcrypt.genSalt(BCRYPT_COST_FACTOR);
  return bcrypt.hash(plaintext, salt);
}

/**
 * Verify a plaintext password against a stored bcrypt hash.
 *
 * A hash that bcrypt cannot parse never matches.
 */
export async function verifyPassword(plaintext: string, hash: string): Promise<boolean> {
  try {
    return await bcrypt.compare(plaintext, hash);
  } catch (err) {
    if (err instanceof Error && /Invalid salt|Illegal arguments/.test(err.message)) {
      return false;
    }
    throw err;
  }
}

export const bcryptHasher: CredentialHasher = { hashPassword, verifyPassword };
