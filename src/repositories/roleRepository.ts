/**
 * Role repository for database operations on the roles table.
 *
 * @module repositories/roleRepository
 */

import type { Queryable } from '../utils/db.js';
import type { NewRole, Role, RoleChanges } from '../types/index.js';
import { buildSetClause } from './sql.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

export interface RoleRow {
  id: number;
  name: string;
  description: string | null;
  created_at: Date;
}

const ROLE_COLUMNS = 'id, name, description, created_at';

export function mapRowToRole(row: RoleRow): Role {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
  };
}

function firstRole(rows: RoleRow[]): Role | null {
  const row = rows[0];
  return row ? mapRowToRole(row) : null;
}

const ROLE_CHANGE_COLUMNS: Record<keyof RoleChanges, string> = {
  name: 'name',
  description: 'description',
};

// ─── Repository Functions ────────────────────────────────────────────────────

export async function createRole(db: Queryable, input: NewRole): Promise<Role> {
  const result = await db.query<RoleRow>(
    `INSERT INTO roles (name, description)
     VALUES ($1, $2)
     RETURNING ${ROLE_COLUMNS}`,
    [input.name, input.description ?? null],
  );

  const role = firstRole(result.rows);
  if (!role) {
    throw new Error('INSERT INTO roles returned no row');
  }
  return role;
}

export async function findById(db: Queryable, id: number): Promise<Role | null> {
  const result = await db.query<RoleRow>(`SELECT ${ROLE_COLUMNS} FROM roles WHERE id = $1`, [id]);
  return firstRole(result.rows);
}

export async function findByName(db: Queryable, name: string): Promise<Role | null> {
  const result = await db.query<RoleRow>(`SELECT ${ROLE_COLUMNS} FROM roles WHERE name = $1`, [
    name,
  ]);
  return firstRole(result.rows);
}

export async function listAll(db: Queryable): Promise<Role[]> {
  const result = await db.query<RoleRow>(`SELECT ${ROLE_COLUMNS} FROM roles ORDER BY id`);
  return result.rows.map(mapRowToRole);
}

/**
 * Write the supplied fields of a role.
 *
 * @returns The updated Role or null if no role has this id
 */
export async function update(
  db: Queryable,
  id: number,
  changes: RoleChanges,
): Promise<Role | null> {
  const set = buildSetClause(changes, ROLE_CHANGE_COLUMNS, 2);
  if (set.assignments.length === 0) {
    return findById(db, id);
  }

  const result = await db.query<RoleRow>(
    `UPDATE roles SET ${set.assignments.join(', ')} WHERE id = $1 RETURNING ${ROLE_COLUMNS}`,
    [id, ...set.values],
  );
  return firstRole(result.rows);
}

/** Delete a role and, by cascade, its user and permission links. */
export async function remove(db: Queryable, id: number): Promise<boolean> {
  const result = await db.query('DELETE FROM roles WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

export async function count(db: Queryable): Promise<number> {
  const result = await db.query<{ count: string }>('SELECT COUNT(*) AS count FROM roles');
  return Number(result.rows[0]?.count ?? 0);
}
