/**
 * PostgreSQL-backed {@link IdentityStore} built on the repository modules.
 *
 * @module store/pgIdentityStore
 */

import type pg from 'pg';
import * as assignments from '../repositories/assignmentRepository.js';
import * as permissions from '../repositories/permissionRepository.js';
import * as roles from '../repositories/roleRepository.js';
import * as users from '../repositories/userRepository.js';
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
import { asQueryable, withTransaction, type Queryable } from '../utils/db.js';
import { isRowId, type IdentityStore, type RecordCounts } from './identityStore.js';

export class PgIdentityStore implements IdentityStore {
  /**
   * @param db - Where statements run: the pool, or a transaction's client
   * @param pool - Pool to open transactions on; null when already inside one
   */
  constructor(
    private readonly db: Queryable,
    private readonly pool: pg.Pool | null,
  ) {}

  static fromPool(pool: pg.Pool): PgIdentityStore {
    return new PgIdentityStore(asQueryable(pool), pool);
  }

  createUser(input: NewUser): Promise<User> {
    return users.createUser(this.db, input);
  }

  async findUserById(id: number): Promise<User | null> {
    if (!isRowId(id)) return null;
    return users.findById(this.db, id);
  }

  findUserByUsername(username: string): Promise<User | null> {
    return users.findByUsername(this.db, username);
  }

  findUserByUsernameOrEmail(username: string, email: string): Promise<User | null> {
    return users.findByUsernameOrEmail(this.db, username, email);
  }

  listUsers(): Promise<User[]> {
    return users.listAll(this.db);
  }

  async updateUser(id: number, changes: UserChanges): Promise<User | null> {
    if (!isRowId(id)) return null;
    return users.update(this.db, id, changes);
  }

  async deleteUser(id: number): Promise<boolean> {
    if (!isRowId(id)) return false;
    return users.remove(this.db, id);
  }

  async recordLogin(id: number, at: Date): Promise<void> {
    if (!isRowId(id)) return;
    return users.updateLastLogin(this.db, id, at);
  }

  createRole(input: NewRole): Promise<Role> {
    return roles.createRole(this.db, input);
  }

  async findRoleById(id: number): Promise<Role | null> {
    if (!isRowId(id)) return null;
    return roles.findById(this.db, id);
  }

  findRoleByName(name: string): Promise<Role | null> {
    return roles.findByName(this.db, name);
  }

  listRoles(): Promise<Role[]> {
    return roles.listAll(this.db);
  }

  async updateRole(id: number, changes: RoleChanges): Promise<Role | null> {
    if (!isRowId(id)) return null;
    return roles.update(this.db, id, changes);
  }

  async deleteRole(id: number): Promise<boolean> {
    if (!isRowId(id)) return false;
    return roles.remove(this.db, id);
  }

  createPermission(input: NewPermission): Promise<Permission> {
    return permissions.createPermission(this.db, input);
  }

  async findPermissionById(id: number): Promise<Permission | null> {
    if (!isRowId(id)) return null;
    return permissions.findById(this.db, id);
  }

  findPermissionByPair(action: string, resource: string): Promise<Permission | null> {
    return permissions.findByPair(this.db, action, resource);
  }

  listPermissions(): Promise<Permission[]> {
    return permissions.listAll(this.db);
  }

  async updatePermission(id: number, changes: PermissionChanges): Promise<Permission | null> {
    if (!isRowId(id)) return null;
    return permissions.update(this.db, id, changes);
  }

  async deletePermission(id: number): Promise<boolean> {
    if (!isRowId(id)) return false;
    return permissions.remove(this.db, id);
  }

  insertUserRole(
    userId: number,
    roleId: number,
    assignedBy: number | null,
  ): Promise<UserRoleAssignment> {
    return assignments.insertUserRole(this.db, userId, roleId, assignedBy);
  }

  async deleteUserRole(userId: number, roleId: number): Promise<number> {
    if (!isRowId(userId) || !isRowId(roleId)) return 0;
    return assignments.deleteUserRole(this.db, userId, roleId);
  }

  async userRoleExists(userId: number, roleId: number): Promise<boolean> {
    if (!isRowId(userId) || !isRowId(roleId)) return false;
    return assignments.userRoleExists(this.db, userId, roleId);
  }

  async listUserRoles(userId: number): Promise<UserRoleAssignment[]> {
    if (!isRowId(userId)) return [];
    return assignments.listUserRoles(this.db, userId);
  }

  async listRolesForUser(userId: number): Promise<Role[]> {
    if (!isRowId(userId)) return [];
    return assignments.listRolesForUser(this.db, userId);
  }

  insertRolePermission(roleId: number, permissionId: number): Promise<void> {
    return assignments.insertRolePermission(this.db, roleId, permissionId);
  }

  async deleteRolePermission(roleId: number, permissionId: number): Promise<number> {
    if (!isRowId(roleId) || !isRowId(permissionId)) return 0;
    return assignments.deleteRolePermission(this.db, roleId, permissionId);
  }

  async rolePermissionExists(roleId: number, permissionId: number): Promise<boolean> {
    if (!isRowId(roleId) || !isRowId(permissionId)) return false;
    return assignments.rolePermissionExists(this.db, roleId, permissionId);
  }

  async listRolePermissions(roleId: number): Promise<Permission[]> {
    if (!isRowId(roleId)) return [];
    return assignments.listRolePermissions(this.db, roleId);
  }

  async userHasPermission(userId: number, action: string, resource: string): Promise<boolean> {
    if (!isRowId(userId)) return false;
    return assignments.userHasPermission(this.db, userId, action, resource);
  }

  async listUserPermissionGrants(userId: number): Promise<PermissionGrant[]> {
    if (!isRowId(userId)) return [];
    return assignments.listUserPermissionGrants(this.db, userId);
  }

  async countRecords(): Promise<RecordCounts> {
    const [userCount, roleCount, permissionCount] = await Promise.all([
      users.count(this.db),
      roles.count(this.db),
      permissions.count(this.db),
    ]);
    return { users: userCount, roles: roleCount, permissions: permissionCount };
  }

  /**
   * Opens a transaction on the pool. A store already bound to a
   * transaction runs `work` on itself, so nested calls join the outer one.
   */
  transaction<T>(work: (store: IdentityStore) => Promise<T>): Promise<T> {
    if (!this.pool) {
      return work(this);
    }
    return withTransaction(this.pool, (client) => work(new PgIdentityStore(client, null)));
  }
}
