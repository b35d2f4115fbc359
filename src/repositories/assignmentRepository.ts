/**
 * Repository for the user_roles and role_permissions association tables,
 * and for the join queries the authorization decisions run on.
 *
 * Both tables are keyed on their pair, so a duplicate insert rejects
 * with unique_violation even when two writers race past the service's
 * existence pre-check.
 *
 * @module repositories/assignmentRepository
 */

import type { Queryable } from '../utils/db.js';
import type { Permission, PermissionGrant, Role, UserRoleAssignment } from '../types/index.js';
import { mapRowToPermission, PERMISSION_COLUMNS, type PermissionRow } from './permissionRepository.js';
import { mapRowToRole, type RoleRow } from './roleRepository.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface UserRoleRow {
  user_id: number;
  role_id: number;
  assigned_by: number | null;
  assigned_at: Date;
}

function mapRowToUserRole(row: UserRoleRow): UserRoleAssignment {
  return {
    userId: row.user_id,
    roleId: row.role_id,
    assignedBy: row.assigned_by,
    assignedAt: row.assigned_at,
  };
}

const USER_ROLE_COLUMNS = 'user_id, role_id, assigned_by, assigned_at';

// ─── User ↔ Role ─────────────────────────────────────────────────────────────

export async function insertUserRole(
  db: Queryable,
  userId: number,
  roleId: number,
  assignedBy: number | null,
): Promise<UserRoleAssignment> {
  const result = await db.query<UserRoleRow>(
    `INSERT INTO user_roles (user_id, role_id, assigned_by)
     VALUES ($1, $2, $3)
     RETURNING ${USER_ROLE_COLUMNS}`,
    [userId, roleId, assignedBy],
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error('INSERT INTO user_roles returned no row');
  }
  return mapRowToUserRole(row);
}

/** @returns Number of rows deleted (0 or 1). */
export async function deleteUserRole(
  db: Queryable,
  userId: number,
  roleId: number,
): Promise<number> {
  const result = await db.query('DELETE FROM user_roles WHERE user_id = $1 AND role_id = $2', [
    userId,
    roleId,
  ]);
  return result.rowCount ?? 0;
}

export async function userRoleExists(
  db: Queryable,
  userId: number,
  roleId: number,
): Promise<boolean> {
  const result = await db.query(
    'SELECT 1 FROM user_roles WHERE user_id = $1 AND role_id = $2',
    [userId, roleId],
  );
  return result.rows.length > 0;
}

export async function listUserRoles(db: Queryable, userId: number): Promise<UserRoleAssignment[]> {
  const result = await db.query<UserRoleRow>(
    `SELECT ${USER_ROLE_COLUMNS} FROM user_roles WHERE user_id = $1 ORDER BY role_id`,
    [userId],
  );
  return result.rows.map(mapRowToUserRole);
}

export async function listRolesForUser(db: Queryable, userId: number): Promise<Role[]> {
  const result = await db.query<RoleRow>(
    `SELECT r.id, r.name, r.description, r.created_at
     FROM roles r
     JOIN user_roles ur ON ur.role_id = r.id
     WHERE ur.user_id = $1
     ORDER BY r.id`,
    [userId],
  );
  return result.rows.map(mapRowToRole);
}

// ─── Role ↔ Permission ───────────────────────────────────────────────────────

export async function insertRolePermission(
  db: Queryable,
  roleId: number,
  permissionId: number,
): Promise<void> {
  await db.query('INSERT INTO role_permissions (role_id, permission_id) VALUES ($1, $2)', [
    roleId,
    permissionId,
  ]);
}

/** @returns Number of rows deleted (0 or 1). */
export async function deleteRolePermission(
  db: Queryable,
  roleId: number,
  permissionId: number,
): Promise<number> {
  const result = await db.query(
    'DELETE FROM role_permissions WHERE role_id = $1 AND permission_id = $2',
    [roleId, permissionId],
  );
  return result.rowCount ?? 0;
}

export async function rolePermissionExists(
  db: Queryable,
  roleId: number,
  permissionId: number,
): Promise<boolean> {
  const result = await db.query(
    'SELECT 1 FROM role_permissions WHERE role_id = $1 AND permission_id = $2',
    [roleId, permissionId],
  );
  return result.rows.length > 0;
}

export async function listRolePermissions(db: Queryable, roleId: number): Promise<Permission[]> {
  const columns = PERMISSION_COLUMNS.split(', ')
    .map((column) => `p.${column}`)
    .join(', ');
  const result = await db.query<PermissionRow>(
    `SELECT ${columns}
     FROM permissions p
     JOIN role_permissions rp ON rp.permission_id = p.id
     WHERE rp.role_id = $1
     ORDER BY p.id`,
    [roleId],
  );
  return result.rows.map(mapRowToPermission);
}

// ─── Decision Queries ────────────────────────────────────────────────────────

/**
 * True iff some role held by the user grants exactly (action, resource).
 */
export async function userHasPermission(
  db: Queryable,
  userId: number,
  action: string,
  resource: string,
): Promise<boolean> {
  const result = await db.query<{ granted: boolean }>(
    `SELECT EXISTS (
       SELECT 1
       FROM user_roles ur
       JOIN role_permissions rp ON rp.role_id = ur.role_id
       JOIN permissions p ON p.id = rp.permission_id
       WHERE ur.user_id = $1 AND p.action = $2 AND p.resource = $3
     ) AS granted`,
    [userId, action, resource],
  );
  return result.rows[0]?.granted === true;
}

/**
 * One row per (permission, granting role) pair held by the user. A
 * permission reachable through two roles appears twice.
 */
export async function listUserPermissionGrants(
  db: Queryable,
  userId: number,
): Promise<PermissionGrant[]> {
  const result = await db.query<{ action: string; resource: string; role: string }>(
    `SELECT p.action, p.resource, r.name AS role
     FROM user_roles ur
     JOIN roles r ON r.id = ur.role_id
     JOIN role_permissions rp ON rp.role_id = r.id
     JOIN permissions p ON p.id = rp.permission_id
     WHERE ur.user_id = $1
     ORDER BY r.id, p.id`,
    [userId],
  );
  return result.rows.map((row) => ({ action: row.action, resource: row.resource, role: row.role }));
}
