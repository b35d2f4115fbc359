/**
 * Permission repository for database operations on the permissions table.
 *
 * A permission is identified by its (action, resource) pair, which the
 * schema keeps unique.
 *
 * @module repositories/permissionRepository
 */

import type { Queryable } from '../utils/db.js';
import type { NewPermission, Permission, PermissionChanges } from '../types/index.js';
import { buildSetClause } from './sql.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

export interface PermissionRow {
  id: number;
  action: string;
  resource: string;
  description: string | null;
  created_at: Date;
}

export const PERMISSION_COLUMNS = 'id, action, resource, description, created_at';

export function mapRowToPermission(row: PermissionRow): Permission {
  return {
    id: row.id,
    action: row.action,
    resource: row.resource,
    description: row.description,
    createdAt: row.created_at,
  };
}

function firstPermission(rows: PermissionRow[]): Permission | null {
  const row = rows[0];
  return row ? mapRowToPermission(row) : null;
}

const PERMISSION_CHANGE_COLUMNS: Record<keyof PermissionChanges, string> = {
  action: 'action',
  resource: 'resource',
  description: 'description',
};

// ─── Repository Functions ────────────────────────────────────────────────────

export async function createPermission(db: Queryable, input: NewPermission): Promise<Permission> {
  const result = await db.query<PermissionRow>(
    `INSERT INTO permissions (action, resource, description)
     VALUES ($1, $2, $3)
     RETURNING ${PERMISSION_COLUMNS}`,
    [input.action, input.resource, input.description ?? null],
  );

  const permission = firstPermission(result.rows);
  if (!permission) {
    throw new Error('INSERT INTO permissions returned no row');
  }
  return permission;
}

export async function findById(db: Queryable, id: number): Promise<Permission | null> {
  const result = await db.query<PermissionRow>(
    `SELECT ${PERMISSION_COLUMNS} FROM permissions WHERE id = $1`,
    [id],
  );
  return firstPermission(result.rows);
}

export async function findByPair(
  db: Queryable,
  action: string,
  resource: string,
): Promise<Permission | null> {
  const result = await db.query<PermissionRow>(
    `SELECT ${PERMISSION_COLUMNS} FROM permissions WHERE action = $1 AND resource = $2`,
    [action, resource],
  );
  return firstPermission(result.rows);
}

export async function listAll(db: Queryable): Promise<Permission[]> {
  const result = await db.query<PermissionRow>(
    `SELECT ${PERMISSION_COLUMNS} FROM permissions ORDER BY id`,
  );
  return result.rows.map(mapRowToPermission);
}

/**
 * Write the supplied fields of a permission.
 *
 * @returns The updated Permission or null if no permission has this id
 */
export async function update(
  db: Queryable,
  id: number,
  changes: PermissionChanges,
): Promise<Permission | null> {
  const set = buildSetClause(changes, PERMISSION_CHANGE_COLUMNS, 2);
  if (set.assignments.length === 0) {
    return findById(db, id);
  }

  const result = await db.query<PermissionRow>(
    `UPDATE permissions SET ${set.assignments.join(', ')} WHERE id = $1 RETURNING ${PERMISSION_COLUMNS}`,
    [id, ...set.values],
  );
  return firstPermission(result.rows);
}

export async function remove(db: Queryable, id: number): Promise<boolean> {
  const result = await db.query('DELETE FROM permissions WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

export async function count(db: Queryable): Promise<number> {
  const result = await db.query<{ count: string }>('SELECT COUNT(*) AS count FROM permissions');
  return Number(result.rows[0]?.count ?? 0);
}
