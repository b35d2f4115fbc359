/**
 * Unit tests for the assignmentRepository module: association rows and
 * the join queries behind the permission checks.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult } from 'pg';
import type { Queryable } from '../utils/db.js';
import {
  deleteRolePermission,
  deleteUserRole,
  insertRolePermission,
  insertUserRole,
  listRolePermissions,
  listRolesForUser,
  listUserPermissionGrants,
  listUserRoles,
  rolePermissionExists,
  userHasPermission,
  userRoleExists,
} from './assignmentRepository.js';

const mockQuery = vi.fn();
const db: Queryable = { query: mockQuery };

function pgResult(rows: Record<string, unknown>[], rowCount = rows.length): QueryResult {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

function lastCall(): [string, unknown] {
  const call = mockQuery.mock.calls.at(-1);
  if (!call) throw new Error('query was not called');
  return [String(call[0]), call[1]];
}

const assignedAt = new Date('2026-02-10T12:00:00Z');

beforeEach(() => {
  mockQuery.mockReset();
});

describe('assignmentRepository', () => {
  // ── user_roles ───────────────────────────────────────────────────────────

  describe('insertUserRole', () => {
    it('should insert the pair with its assigner and map the row', async () => {
      mockQuery.mockResolvedValueOnce(
        pgResult([{ user_id: 7, role_id: 2, assigned_by: 1, assigned_at: assignedAt }]),
      );

      const assignment = await insertUserRole(db, 7, 2, 1);

      expect(lastCall()[1]).toEqual([7, 2, 1]);
      expect(assignment).toEqual({ userId: 7, roleId: 2, assignedBy: 1, assignedAt });
    });

    it('should pass a null assigner through', async () => {
      mockQuery.mockResolvedValueOnce(
        pgResult([{ user_id: 7, role_id: 2, assigned_by: null, assigned_at: assignedAt }]),
      );

      const assignment = await insertUserRole(db, 7, 2, null);

      expect(lastCall()[1]).toEqual([7, 2, null]);
      expect(assignment.assignedBy).toBeNull();
    });
  });

  it('deleteUserRole should return the affected row count', async () => {
    mockQuery.mockResolvedValueOnce(pgResult([], 1));
    expect(await deleteUserRole(db, 7, 2)).toBe(1);

    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: null, command: '', oid: 0, fields: [] });
    expect(await deleteUserRole(db, 7, 2)).toBe(0);
  });

  it('userRoleExists should be true only when a row comes back', async () => {
    mockQuery.mockResolvedValueOnce(pgResult([{ '?column?': 1 }]));
    expect(await userRoleExists(db, 7, 2)).toBe(true);

    mockQuery.mockResolvedValueOnce(pgResult([]));
    expect(await userRoleExists(db, 7, 3)).toBe(false);
  });

  it('listUserRoles should order by role id', async () => {
    mockQuery.mockResolvedValueOnce(pgResult([]));

    await listUserRoles(db, 7);

    const [sql, params] = lastCall();
    expect(sql).toContain('WHERE user_id = $1 ORDER BY role_id');
    expect(params).toEqual([7]);
  });

  it('listRolesForUser should join through user_roles', async () => {
    mockQuery.mockResolvedValueOnce(
      pgResult([{ id: 1, name: 'Viewer', description: null, created_at: assignedAt }]),
    );

    const roles = await listRolesForUser(db, 7);

    expect(lastCall()[0]).toContain('JOIN user_roles ur ON ur.role_id = r.id');
    expect(roles).toEqual([{ id: 1, name: 'Viewer', description: null, createdAt: assignedAt }]);
  });

  // ── role_permissions ─────────────────────────────────────────────────────

  it('insertRolePermission should insert the pair', async () => {
    mockQuery.mockResolvedValueOnce(pgResult([], 1));

    await insertRolePermission(db, 2, 5);

    const [sql, params] = lastCall();
    expect(sql).toBe('INSERT INTO role_permissions (role_id, permission_id) VALUES ($1, $2)');
    expect(params).toEqual([2, 5]);
  });

  it('deleteRolePermission should return 0 when the pair is absent', async () => {
    mockQuery.mockResolvedValueOnce(pgResult([], 0));

    expect(await deleteRolePermission(db, 2, 5)).toBe(0);
  });

  it('rolePermissionExists should query the pair directly', async () => {
    mockQuery.mockResolvedValueOnce(pgResult([]));

    expect(await rolePermissionExists(db, 2, 5)).toBe(false);
    expect(lastCall()[1]).toEqual([2, 5]);
  });

  it('listRolePermissions should select prefixed permission columns', async () => {
    mockQuery.mockResolvedValueOnce(
      pgResult([
        { id: 5, action: 'read', resource: 'role_management', description: null, created_at: assignedAt },
      ]),
    );

    const permissions = await listRolePermissions(db, 2);

    expect(lastCall()[0]).toContain('SELECT p.id, p.action, p.resource, p.description, p.created_at');
    expect(permissions).toEqual([
      { id: 5, action: 'read', resource: 'role_management', description: null, createdAt: assignedAt },
    ]);
  });

  // ── decision queries ─────────────────────────────────────────────────────

  describe('userHasPermission', () => {
    it('should return the EXISTS result', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([{ granted: true }]));

      expect(await userHasPermission(db, 7, 'read', 'user_management')).toBe(true);
      expect(lastCall()[1]).toEqual([7, 'read', 'user_management']);
    });

    it('should treat a missing row as not granted', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));

      expect(await userHasPermission(db, 7, 'read', 'user_management')).toBe(false);
    });
  });

  it('listUserPermissionGrants should keep one row per granting role', async () => {
    mockQuery.mockResolvedValueOnce(
      pgResult([
        { action: 'read', resource: 'collateral_evaluation', role: 'Viewer' },
        { action: 'read', resource: 'collateral_evaluation', role: 'Inputter' },
      ]),
    );

    const grants = await listUserPermissionGrants(db, 7);

    expect(lastCall()[0]).toContain('ORDER BY r.id, p.id');
    expect(grants).toEqual([
      { action: 'read', resource: 'collateral_evaluation', role: 'Viewer' },
      { action: 'read', resource: 'collateral_evaluation', role: 'Inputter' },
    ]);
  });
});
