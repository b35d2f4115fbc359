/**
 * User repository for database operations on the users table.
 *
 * Provides CRUD operations for user records and snake_case ↔ camelCase
 * mapping between the PostgreSQL schema and TypeScript types. Every
 * function runs on the {@link Queryable} it is given, so the same calls
 * work on the pool and inside a transaction.
 *
 * @module repositories/userRepository
 */

import type { Queryable } from '../utils/db.js';
import type { NewUser, User, UserChanges } from '../types/index.js';
import { buildSetClause } from './sql.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the users table. */
export interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  full_name: string | null;
  department: string | null;
  created_at: Date;
  updated_at: Date;
  last_login_at: Date | null;
  is_active: boolean;
}

const USER_COLUMNS =
  'id, username, email, password_hash, full_name, department, created_at, updated_at, last_login_at, is_active';

/**
 * Map a database row (snake_case) to a User domain object (camelCase).
 */
export function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    department: row.department,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastLoginAt: row.last_login_at,
    isActive: row.is_active,
  };
}

function firstUser(rows: UserRow[]): User | null {
  const row = rows[0];
  return row ? mapRowToUser(row) : null;
}

/** Column names for each updatable User field. */
const USER_CHANGE_COLUMNS: Record<keyof UserChanges, string> = {
  username: 'username',
  email: 'email',
  passwordHash: 'password_hash',
  fullName: 'full_name',
  department: 'department',
  isActive: 'is_active',
};

// ─── Repository Functions ────────────────────────────────────────────────────

/**
 * Insert a user. The user starts active with no recorded login.
 *
 * Rejects with the driver's unique_violation when the username or email
 * is taken.
 */
export async function createUser(db: Queryable, input: NewUser): Promise<User> {
  const result = await db.query<UserRow>(
    `INSERT INTO users (username, email, password_hash, full_name, department)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING ${USER_COLUMNS}`,
    [input.username, input.email, input.passwordHash, input.fullName ?? null, input.department ?? null],
  );

  const user = firstUser(result.rows);
  if (!user) {
    throw new Error('INSERT INTO users returned no row');
  }
  return user;
}

export async function findById(db: Queryable, id: number): Promise<User | null> {
  const result = await db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
  return firstUser(result.rows);
}

export async function findByUsername(db: Queryable, username: string): Promise<User | null> {
  const result = await db.query<UserRow>(
    `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
    [username],
  );
  return firstUser(result.rows);
}

/**
 * Find any user holding the given username or the given email.
 * Used as the pre-check for registration conflicts.
 */
export async function findByUsernameOrEmail(
  db: Queryable,
  username: string,
  email: string,
): Promise<User | null> {
  const result = await db.query<UserRow>(
    `SELECT ${USER_COLUMNS} FROM users WHERE username = $1 OR email = $2 ORDER BY id LIMIT 1`,
    [username, email],
  );
  return firstUser(result.rows);
}

export async function listAll(db: Queryable): Promise<User[]> {
  const result = await db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY id`);
  return result.rows.map(mapRowToUser);
}

/**
 * Write the supplied fields and bump updated_at.
 *
 * With no fields to write the current row is returned unchanged.
 *
 * @returns The updated User or null if no user has this id
 */
export async function update(
  db: Queryable,
  id: number,
  changes: UserChanges,
): Promise<User | null> {
  const set = buildSetClause(changes, USER_CHANGE_COLUMNS, 2);
  if (set.assignments.length === 0) {
    return findById(db, id);
  }

  const result = await db.query<UserRow>(
    `UPDATE users
     SET ${set.assignments.join(', ')}, updated_at = NOW()
     WHERE id = $1
     RETURNING ${USER_COLUMNS}`,
    [id, ...set.values],
  );
  return firstUser(result.rows);
}

/**
 * Delete a user. Role assignments go with it via ON DELETE CASCADE.
 *
 * @returns true if a row was deleted
 */
export async function remove(db: Queryable, id: number): Promise<boolean> {
  const result = await db.query('DELETE FROM users WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

/**
 * Set a user's last_login_at timestamp.
 */
export async function updateLastLogin(db: Queryable, id: number, at: Date): Promise<void> {
  await db.query('UPDATE users SET last_login_at = $2 WHERE id = $1', [id, at]);
}

export async function count(db: Queryable): Promise<number> {
  const result = await db.query<{ count: string }>('SELECT COUNT(*) AS count FROM users');
  return Number(result.rows[0]?.count ?? 0);
}
