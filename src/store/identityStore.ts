/**
 * Persistence contract for users, roles, permissions and the two
 * association sets between them.
 *
 * Lookups resolve to `null` for a missing record. Keys are PostgreSQL
 * `integer` columns: reads, updates and deletes given an id outside that
 * range treat it as missing instead of sending it to the database.
 * Writes that would break a uniqueness rule reject with an error whose
 * `code` is the PostgreSQL unique_violation SQLSTATE, and an association
 * insert naming a missing row rejects with foreign_key_violation,
 * whatever the backing implementation.
 *
 * @module store/identityStore
 */

import type {
  NewPermission,
  NewRole,
  NewUser,
  Permission,
  PermissionChanges,
  PermissionGrant,
  Role,
  RoleChanges,
  User,
  UserChanges,
  UserRoleAssignment,
} from '../types/index.js';

/** Bounds of a PostgreSQL `integer` (int4) column. */
export const MIN_ROW_ID = -2_147_483_648;
export const MAX_ROW_ID = 2_147_483_647;

/** True when `id` fits the key columns. */
export function isRowId(id: number): boolean {
  return Number.isInteger(id) && id >= MIN_ROW_ID && id <= MAX_ROW_ID;
}

export interface RecordCounts {
  users: number;
  roles: number;
  permissions: number;
}

export interface IdentityStore {
  // ─── Users ─────────────────────────────────────────────────────────────
  createUser(input: NewUser): Promise<User>;
  findUserById(id: number): Promise<User | null>;
  findUserByUsername(username: string): Promise<User | null>;
  findUserByUsernameOrEmail(username: string, email: string): Promise<User | null>;
  listUsers(): Promise<User[]>;
  /** Writes only the defined fields of `changes`. */
  updateUser(id: number, changes: UserChanges): Promise<User | null>;
  deleteUser(id: number): Promise<boolean>;
  recordLogin(id: number, at: Date): Promise<void>;

  // ─── Roles ─────────────────────────────────────────────────────────────
  createRole(input: NewRole): Promise<Role>;
  findRoleById(id: number): Promise<Role | null>;
  findRoleByName(name: string): Promise<Role | null>;
  listRoles(): Promise<Role[]>;
  updateRole(id: number, changes: RoleChanges): Promise<Role | null>;
  deleteRole(id: number): Promise<boolean>;

  // ─── Permissions ───────────────────────────────────────────────────────
  createPermission(input: NewPermission): Promise<Permission>;
  findPermissionById(id: number): Promise<Permission | null>;
  findPermissionByPair(action: string, resource: string): Promise<Permission | null>;
  listPermissions(): Promise<Permission[]>;
  updatePermission(id: number, changes: PermissionChanges): Promise<Permission | null>;
  deletePermission(id: number): Promise<boolean>;

  // ─── User ↔ Role ───────────────────────────────────────────────────────
  insertUserRole(userId: number, roleId: number, assignedBy: number | null): Promise<UserRoleAssignment>;
  /** @returns Number of assignments removed (0 or 1). */
  deleteUserRole(userId: number, roleId: number): Promise<number>;
  userRoleExists(userId: number, roleId: number): Promise<boolean>;
  listUserRoles(userId: number): Promise<UserRoleAssignment[]>;
  listRolesForUser(userId: number): Promise<Role[]>;

  // ─── Role ↔ Permission ─────────────────────────────────────────────────
  insertRolePermission(roleId: number, permissionId: number): Promise<void>;
  /** @returns Number of links removed (0 or 1). */
  deleteRolePermission(roleId: number, permissionId: number): Promise<number>;
  rolePermissionExists(roleId: number, permissionId: number): Promise<boolean>;
  listRolePermissions(roleId: number): Promise<Permission[]>;

  // ─── Decisions ─────────────────────────────────────────────────────────
  userHasPermission(userId: number, action: string, resource: string): Promise<boolean>;
  listUserPermissionGrants(userId: number): Promise<PermissionGrant[]>;
  countRecords(): Promise<RecordCounts>;

  /**
   * Run `work` against a store bound to one transaction. Everything
   * `work` wrote is discarded if it rejects.
   */
  transaction<T>(work: (store: IdentityStore) => Promise<T>): Promise<T>;
}
