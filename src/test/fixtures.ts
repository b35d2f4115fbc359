/**
 * Builders for domain records used across unit tests.
 *
 * @module test/fixtures
 */

import type { CredentialHasher } from '../services/passwordService.js';
import type { Permission, RoleWithPermissions, UserWithRoles } from '../types/index.js';

const CREATED_AT = new Date('2026-01-15T10:00:00Z');

export function makePermission(id: number, action: string, resource: string): Permission {
  return { id, action, resource, description: null, createdAt: CREATED_AT };
}

export function makeRole(
  id: number,
  name: string,
  permissions: Permission[] = [],
): RoleWithPermissions {
  return { id, name, description: null, createdAt: CREATED_AT, permissions };
}

export function makeUser(overrides: Partial<UserWithRoles> = {}): UserWithRoles {
  return {
    id: 1,
    username: 'amara',
    email: 'amara@example.com',
    passwordHash: 'hashed:Sup3r-secret',
    fullName: 'Amara Obi',
    department: 'Credit',
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    lastLoginAt: null,
    isActive: true,
    roles: [],
    ...overrides,
  };
}

/**
 * Deterministic stand-in for bcrypt: the hash of `p` is `hashed:p`.
 */
export const fakeHasher: CredentialHasher = {
  async hashPassword(plaintext: string): Promise<string> {
    return `hashed:${plaintext}`;
  },
  async verifyPassword(plaintext: string, hash: string): Promise<boolean> {
    return hash === `hashed:${plaintext}`;
  },
};
