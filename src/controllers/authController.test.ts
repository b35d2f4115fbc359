/**
 * Unit tests for the auth controller.
 *
 * Dependencies are real services over the in-memory identity store, with
 * the deterministic fake hasher in place of bcrypt. No vi.mock needed.
 *
 * @module controllers/authController.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentLogger } from '../logging/index.js';
import { initializeDefaultData } from '../services/catalogBootstrapper.js';
import { RBAC_MESSAGES, RbacService } from '../services/rbacService.js';
import { createTokenService } from '../services/tokenService.js';
import { fakeHasher } from '../test/fixtures.js';
import { InMemoryIdentityStore } from '../test/inMemoryIdentityStore.js';
import { createMockLogCollector, type MockLogCollector } from '../test/mockCollectors.js';
import {
  deleteProfile,
  getProfile,
  login,
  register,
  updateProfile,
  type AuthDependencies,
} from './authController.js';

const signup = {
  username: 'amara',
  email: 'amara@example.com',
  password: 'Sup3r-secret',
  fullName: 'Amara Obi',
};

describe('authController', () => {
  let service: RbacService;
  let logs: MockLogCollector;
  let deps: AuthDependencies;

  beforeEach(async () => {
    const store = new InMemoryIdentityStore();
    await initializeDefaultData(store, createSilentLogger());
    logs = createMockLogCollector();
    service = new RbacService({ store, passwordService: fakeHasher, logger: createSilentLogger() });
    deps = {
      users: service,
      passwordService: fakeHasher,
      tokenService: createTokenService({ secret: 'test-secret' }),
      logger: logs.logger,
    };
  });

  // ─── register ──────────────────────────────────────────────────────────

  describe('register', () => {
    it('creates the user and returns it without the password hash', async () => {
      const user = await register(signup, deps);

      expect(user).toMatchObject({
        id: 1,
        username: 'amara',
        email: 'amara@example.com',
        fullName: 'Amara Obi',
        department: null,
        isActive: true,
        lastLoginAt: null,
        roles: [],
      });
      expect(user).not.toHaveProperty('passwordHash');
    });

    it('ignores role names in the body', async () => {
      const user = await register({ ...signup, roleNames: ['Admin'] }, deps);

      expect(user.roles).toEqual([]);
    });

    it('rejects a taken username', async () => {
      await register(signup, deps);

      await expect(
        register({ ...signup, email: 'other@example.com' }, deps),
      ).rejects.toMatchObject({ name: 'ConflictError', message: RBAC_MESSAGES.USER_EXISTS });
    });

    it('rejects an invalid body before touching the store', async () => {
      await expect(register({ username: 'am' }, deps)).rejects.toMatchObject({
        name: 'ValidationError',
        fields: {
          username: ['username must be between 3 and 100 characters'],
          email: ['email is required'],
          password: ['password is required'],
        },
      });
      expect(await service.listUsers()).toEqual([]);
    });
  });

  // ─── login ─────────────────────────────────────────────────────────────

  describe('login', () => {
    beforeEach(async () => {
      await register(signup, deps);
    });

    it('issues a bearer token that resolves back to the user', async () => {
      const result = await login({ username: 'amara', password: 'Sup3r-secret' }, deps);

      expect(result.tokenType).toBe('bearer');
      expect(await deps.tokenService.resolvePrincipal(result.accessToken)).toBe(1);
      expect(new Date(result.expiresAt).getTime()).toBeGreaterThan(Date.now());
      expect(logs.messages('info')).toEqual(['User logged in']);
    });

    it('records the login time on the returned user', async () => {
      const result = await login({ username: 'amara', password: 'Sup3r-secret' }, deps);

      expect(result.user.lastLoginAt).not.toBeNull();
      expect((await service.getUserById(1))?.lastLoginAt).toBeInstanceOf(Date);
    });

    it('fails alike for a wrong password and an unknown user', async () => {
      const wrongPassword = login({ username: 'amara', password: 'wrong-pass' }, deps);
      const unknownUser = login({ username: 'nobody', password: 'Sup3r-secret' }, deps);

      const expected = { name: 'InvalidCredentialsError', message: 'Incorrect username or password' };
      await expect(wrongPassword).rejects.toMatchObject(expected);
      await expect(unknownUser).rejects.toMatchObject(expected);
      expect(logs.messages('warn')).toEqual(['Login failed', 'Login failed']);
    });

    it('rejects an inactive user even with the right password', async () => {
      await service.updateUser(1, { isActive: false });

      await expect(
        login({ username: 'amara', password: 'Sup3r-secret' }, deps),
      ).rejects.toMatchObject({ name: 'UnauthenticatedError', message: 'Inactive user' });
      expect((await service.getUserById(1))?.lastLoginAt).toBeNull();
    });

    it('requires both fields', async () => {
      await expect(login({ username: 'amara' }, deps)).rejects.toMatchObject({
        name: 'ValidationError',
        fields: { password: ['password is required'] },
      });
    });
  });

  // ─── profile ───────────────────────────────────────────────────────────

  describe('profile', () => {
    it('returns the caller', async () => {
      await register(signup, deps);
      const principal = await service.getUserById(1);
      if (!principal) throw new Error('user missing');

      expect(getProfile(principal).username).toBe('amara');
    });

    it('updates the caller but never the active flag', async () => {
      await register(signup, deps);
      const principal = await service.getUserById(1);
      if (!principal) throw new Error('user missing');

      const updated = await updateProfile(
        principal,
        { department: 'Risk', isActive: false },
        deps,
      );

      expect(updated.department).toBe('Risk');
      expect(updated.isActive).toBe(true);
    });

    it('re-hashes a new password', async () => {
      await register(signup, deps);
      const principal = await service.getUserById(1);
      if (!principal) throw new Error('user missing');

      await updateProfile(principal, { password: 'N3w-password' }, deps);

      expect((await service.getUserById(1))?.passwordHash).toBe('hashed:N3w-password');
    });

    it('deletes the caller', async () => {
      await register(signup, deps);
      const principal = await service.getUserById(1);
      if (!principal) throw new Error('user missing');

      await deleteProfile(principal, deps);

      expect(await service.getUserById(1)).toBeNull();
    });
  });
});
