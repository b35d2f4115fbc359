/**
 * The in-memory store must fail the way the PostgreSQL schema does, so
 * service tests see the same driver errors.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryIdentityStore } from './inMemoryIdentityStore.js';

describe('InMemoryIdentityStore constraints', () => {
  let store: InMemoryIdentityStore;
  let userId: number;
  let roleId: number;
  let permissionId: number;

  beforeEach(async () => {
    store = new InMemoryIdentityStore();
    userId = (
      await store.createUser({
        username: 'amara',
        email: 'amara@example.com',
        passwordHash: 'hashed:Sup3r-secret',
        fullName: null,
        department: null,
      })
    ).id;
    roleId = (await store.createRole({ name: 'Viewer', description: null })).id;
    permissionId = (
      await store.createPermission({ action: 'read', resource: 'reports', description: null })
    ).id;
  });

  it('rejects an assignment by an unknown user with foreign_key_violation', async () => {
    await expect(store.insertUserRole(userId, roleId, 999)).rejects.toMatchObject({
      code: '23503',
      message: expect.stringContaining('user_roles_assigned_by_fkey'),
    });
    expect(await store.listUserRoles(userId)).toEqual([]);
  });

  it('rejects assignments naming a missing user, role or permission', async () => {
    await expect(store.insertUserRole(999, roleId, null)).rejects.toMatchObject({ code: '23503' });
    await expect(store.insertUserRole(userId, 999, null)).rejects.toMatchObject({ code: '23503' });
    await expect(store.insertRolePermission(999, permissionId)).rejects.toMatchObject({
      code: '23503',
    });
    await expect(store.insertRolePermission(roleId, 999)).rejects.toMatchObject({ code: '23503' });
  });

  it('rejects ids beyond the integer range with numeric_value_out_of_range', async () => {
    await expect(store.insertUserRole(2_147_483_648, roleId, null)).rejects.toMatchObject({
      code: '22003',
      message: 'value "2147483648" is out of range for type integer',
    });
    await expect(store.insertUserRole(userId, roleId, 2_147_483_648)).rejects.toMatchObject({
      code: '22003',
    });
    await expect(store.insertRolePermission(roleId, 2_147_483_648)).rejects.toMatchObject({
      code: '22003',
    });
  });

  it('keeps an assignment and clears assigned_by when the assigner is deleted', async () => {
    const assigner = await store.createUser({
      username: 'tunde',
      email: 'tunde@example.com',
      passwordHash: 'hashed:An0ther-secret',
      fullName: null,
      department: null,
    });
    await store.insertUserRole(userId, roleId, assigner.id);

    await store.deleteUser(assigner.id);

    expect(await store.listUserRoles(userId)).toMatchObject([
      { userId, roleId, assignedBy: null },
    ]);
  });
});
