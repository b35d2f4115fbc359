/**
 * RBAC service: user, role and permission management, the assignment
 * operations that link them, and store-backed authorization checks.
 *
 * Absence is reported with NotFoundError and duplicates with
 * ConflictError, whether the duplicate is caught by the existence
 * pre-check or by the store's unique key when two writers race. The
 * permission checks never throw for an unknown user; they answer `false`
 * or an empty list.
 *
 * @module services/rbacService
 */

import type { Logger } from '../logging/index.js';
import type { IdentityStore, RecordCounts } from '../store/identityStore.js';
import type {
  CreatePermissionRequest,
  CreateRoleRequest,
  CreateUserRequest,
  Permission,
  PermissionGrant,
  Role,
  RoleWithPermissions,
  UpdatePermissionRequest,
  UpdateRoleRequest,
  UpdateUserRequest,
  User,
  UserChanges,
  UserRoleAssignment,
  UserWithRoles,
} from '../types/index.js';
import {
  ConflictError,
  NotFoundError,
  isForeignKeyViolation,
  translateUniqueViolation,
} from '../utils/errors.js';
import { parsePermissionName } from './decisionEngine.js';
import type { CredentialHasher } from './passwordService.js';

// ─── Messages ────────────────────────────────────────────────────────────────

export const RBAC_MESSAGES = {
  USER_EXISTS: 'Username or email already registered',
  USER_NOT_FOUND: 'User not found',
  ROLE_EXISTS: 'Role already exists',
  ROLE_NOT_FOUND: 'Role not found',
  PERMISSION_EXISTS: 'Permission already exists',
  PERMISSION_NOT_FOUND: 'Permission not found',
  USER_HAS_ROLE: 'User already has this role',
  ROLE_ASSIGNMENT_NOT_FOUND: 'Role assignment not found',
  ROLE_HAS_PERMISSION: 'Role already has this permission',
  ROLE_LACKS_PERMISSION: 'Role does not have this permission',
} as const;

// ─── Dependencies ────────────────────────────────────────────────────────────

export interface RbacServiceDependencies {
  store: IdentityStore;
  passwordService: CredentialHasher;
  logger: Logger;
}

export interface RoleAssignmentResult {
  userId: number;
  roleId: number;
}

export interface PermissionAssignmentResult {
  roleId: number;
  permissionId: number;
}

// ─── Service ─────────────────────────────────────────────────────────────────

export class RbacService {
  private readonly store: IdentityStore;
  private readonly passwordService: CredentialHasher;
  private readonly logger: Logger;

  constructor(deps: RbacServiceDependencies) {
    this.store = deps.store;
    this.passwordService = deps.passwordService;
    this.logger = deps.logger.child({ operation: 'rbac' });
  }

  // ─── Loading ───────────────────────────────────────────────────────────

  private async loadRole(store: IdentityStore, role: Role): Promise<RoleWithPermissions> {
    return { ...role, permissions: await store.listRolePermissions(role.id) };
  }

  private async loadUser(store: IdentityStore, user: User): Promise<UserWithRoles> {
    const roles = await store.listRolesForUser(user.id);
    return {
      ...user,
      roles: await Promise.all(roles.map((role) => this.loadRole(store, role))),
    };
  }

  private async requireUser(store: IdentityStore, userId: number): Promise<User> {
    const user = await store.findUserById(userId);
    if (!user) {
      throw new NotFoundError(RBAC_MESSAGES.USER_NOT_FOUND);
    }
    return user;
  }

  private async requireRole(store: IdentityStore, roleId: number): Promise<Role> {
    const role = await store.findRoleById(roleId);
    if (!role) {
      throw new NotFoundError(RBAC_MESSAGES.ROLE_NOT_FOUND);
    }
    return role;
  }

  private async requirePermission(
    store: IdentityStore,
    permissionId: number,
  ): Promise<Permission> {
    const permission = await store.findPermissionById(permissionId);
    if (!permission) {
      throw new NotFoundError(RBAC_MESSAGES.PERMISSION_NOT_FOUND);
    }
    return permission;
  }

  /**
   * Run an association insert. A duplicate row becomes a Conflict. A foreign
   * key failure means a referenced row went away after the pre-checks, so
   * `recheck` runs them again to raise the matching NotFound.
   */
  private async insertAssociation<T>(
    insert: Promise<T>,
    conflictMessage: string,
    recheck: () => Promise<void>,
  ): Promise<T> {
    try {
      return await translateUniqueViolation(insert, conflictMessage);
    } catch (err) {
      if (isForeignKeyViolation(err)) {
        await recheck();
      }
      throw err;
    }
  }

  // ─── Users ─────────────────────────────────────────────────────────────

  /**
   * Create a user and attach the named roles that exist.
   *
   * Flow:
   * 1. Reject an unknown `createdBy`, then a taken username or email
   * 2. Hash the password
   * 3. Insert the user
   * 4. Attach each existing role in `roleNames`; unknown names are skipped
   *
   * All four steps run in one transaction.
   */
  async createUser(input: CreateUserRequest, createdBy?: number): Promise<UserWithRoles> {
    const user = await this.store.transaction(async (tx) => {
      // 1. Pre-checks
      if (createdBy !== undefined) {
        await this.requireUser(tx, createdBy);
      }
      const existing = await tx.findUserByUsernameOrEmail(input.username, input.email);
      if (existing) {
        throw new ConflictError(RBAC_MESSAGES.USER_EXISTS);
      }

      // 2. Hash
      const passwordHash = await this.passwordService.hashPassword(input.password);

      // 3. Insert
      const created = await translateUniqueViolation(
        tx.createUser({
          username: input.username,
          email: input.email,
          passwordHash,
          fullName: input.fullName ?? null,
          department: input.department ?? null,
        }),
        RBAC_MESSAGES.USER_EXISTS,
      );

      // 4. Attach named roles
      for (const roleName of new Set(input.roleNames ?? [])) {
        const role = await tx.findRoleByName(roleName);
        if (role) {
          await tx.insertUserRole(created.id, role.id, createdBy ?? null);
        }
      }

      return this.loadUser(tx, created);
    });

    this.logger.info('User created', { userId: user.id, createdBy: createdBy ?? null });
    return user;
  }

  async getUserById(userId: number): Promise<UserWithRoles | null> {
    const user = await this.store.findUserById(userId);
    return user ? this.loadUser(this.store, user) : null;
  }

  async getUserByUsername(username: string): Promise<UserWithRoles | null> {
    const user = await this.store.findUserByUsername(username);
    return user ? this.loadUser(this.store, user) : null;
  }

  async listUsers(): Promise<UserWithRoles[]> {
    const users = await this.store.listUsers();
    return Promise.all(users.map((user) => this.loadUser(this.store, user)));
  }

  /**
   * Apply a partial update. Fields left undefined keep their value; a
   * supplied password is re-hashed.
   */
  async updateUser(userId: number, fields: UpdateUserRequest): Promise<UserWithRoles> {
    await this.requireUser(this.store, userId);

    const changes: UserChanges = {
      username: fields.username,
      email: fields.email,
      fullName: fields.fullName,
      department: fields.department,
      isActive: fields.isActive,
    };
    if (fields.password !== undefined) {
      changes.passwordHash = await this.passwordService.hashPassword(fields.password);
    }

    const updated = await translateUniqueViolation(
      this.store.updateUser(userId, changes),
      RBAC_MESSAGES.USER_EXISTS,
    );
    if (!updated) {
      throw new NotFoundError(RBAC_MESSAGES.USER_NOT_FOUND);
    }
    return this.loadUser(this.store, updated);
  }

  async deleteUser(userId: number): Promise<void> {
    if (!(await this.store.deleteUser(userId))) {
      throw new NotFoundError(RBAC_MESSAGES.USER_NOT_FOUND);
    }
    this.logger.info('User deleted', { userId });
  }

  async recordLogin(userId: number): Promise<void> {
    await this.store.recordLogin(userId, new Date());
  }

  // ─── Roles ─────────────────────────────────────────────────────────────

  /**
   * Create a role and attach the named permissions that exist. Names are
   * `action:resource`; a bare name means resource `*`.
   */
  async createRole(input: CreateRoleRequest): Promise<RoleWithPermissions> {
    const role = await this.store.transaction(async (tx) => {
      if (await tx.findRoleByName(input.name)) {
        throw new ConflictError(RBAC_MESSAGES.ROLE_EXISTS);
      }

      const created = await translateUniqueViolation(
        tx.createRole({ name: input.name, description: input.description ?? null }),
        RBAC_MESSAGES.ROLE_EXISTS,
      );

      for (const name of new Set(input.permissionNames ?? [])) {
        const { action, resource } = parsePermissionName(name);
        const permission = await tx.findPermissionByPair(action, resource);
        if (permission) {
          await tx.insertRolePermission(created.id, permission.id);
        }
      }

      return this.loadRole(tx, created);
    });

    this.logger.info('Role created', { roleId: role.id, name: role.name });
    return role;
  }

  async getRoleById(roleId: number): Promise<RoleWithPermissions | null> {
    const role = await this.store.findRoleById(roleId);
    return role ? this.loadRole(this.store, role) : null;
  }

  async getRoleByName(name: string): Promise<RoleWithPermissions | null> {
    const role = await this.store.findRoleByName(name);
    return role ? this.loadRole(this.store, role) : null;
  }

  async listRoles(): Promise<RoleWithPermissions[]> {
    const roles = await this.store.listRoles();
    return Promise.all(roles.map((role) => this.loadRole(this.store, role)));
  }

  async updateRole(roleId: number, fields: UpdateRoleRequest): Promise<RoleWithPermissions> {
    await this.requireRole(this.store, roleId);
    const updated = await translateUniqueViolation(
      this.store.updateRole(roleId, { name: fields.name, description: fields.description }),
      RBAC_MESSAGES.ROLE_EXISTS,
    );
    if (!updated) {
      throw new NotFoundError(RBAC_MESSAGES.ROLE_NOT_FOUND);
    }
    return this.loadRole(this.store, updated);
  }

  /** Deleting a role drops its user and permission links with it. */
  async deleteRole(roleId: number): Promise<void> {
    if (!(await this.store.deleteRole(roleId))) {
      throw new NotFoundError(RBAC_MESSAGES.ROLE_NOT_FOUND);
    }
    this.logger.info('Role deleted', { roleId });
  }

  // ─── Permissions ───────────────────────────────────────────────────────

  async createPermission(input: CreatePermissionRequest): Promise<Permission> {
    const permission = await this.store.transaction(async (tx) => {
      if (await tx.findPermissionByPair(input.action, input.resource)) {
        throw new ConflictError(RBAC_MESSAGES.PERMISSION_EXISTS);
      }
      return translateUniqueViolation(
        tx.createPermission({
          action: input.action,
          resource: input.resource,
          description: input.description ?? null,
        }),
        RBAC_MESSAGES.PERMISSION_EXISTS,
      );
    });

    this.logger.info('Permission created', {
      permissionId: permission.id,
      action: permission.action,
      resource: permission.resource,
    });
    return permission;
  }

  async getPermissionById(permissionId: number): Promise<Permission | null> {
    return this.store.findPermissionById(permissionId);
  }

  async listPermissions(): Promise<Permission[]> {
    return this.store.listPermissions();
  }

  async updatePermission(
    permissionId: number,
    fields: UpdatePermissionRequest,
  ): Promise<Permission> {
    await this.requirePermission(this.store, permissionId);
    const updated = await translateUniqueViolation(
      this.store.updatePermission(permissionId, {
        action: fields.action,
        resource: fields.resource,
        description: fields.description,
      }),
      RBAC_MESSAGES.PERMISSION_EXISTS,
    );
    if (!updated) {
      throw new NotFoundError(RBAC_MESSAGES.PERMISSION_NOT_FOUND);
    }
    return updated;
  }

  async deletePermission(permissionId: number): Promise<void> {
    if (!(await this.store.deletePermission(permissionId))) {
      throw new NotFoundError(RBAC_MESSAGES.PERMISSION_NOT_FOUND);
    }
    this.logger.info('Permission deleted', { permissionId });
  }

  // ─── Assignments ───────────────────────────────────────────────────────

  /**
   * Give a user a role.
   *
   * @throws {NotFoundError} When the user, the role or the assigning user does not exist
   * @throws {ConflictError} When the user already holds the role
   */
  async assignRoleToUser(
    userId: number,
    roleId: number,
    assignedBy?: number,
  ): Promise<RoleAssignmentResult> {
    const references = async (): Promise<void> => {
      await this.requireUser(this.store, userId);
      await this.requireRole(this.store, roleId);
      if (assignedBy !== undefined) {
        await this.requireUser(this.store, assignedBy);
      }
    };
    await references();

    if (await this.store.userRoleExists(userId, roleId)) {
      throw new ConflictError(RBAC_MESSAGES.USER_HAS_ROLE);
    }

    await this.insertAssociation(
      this.store.insertUserRole(userId, roleId, assignedBy ?? null),
      RBAC_MESSAGES.USER_HAS_ROLE,
      references,
    );

    this.logger.info('Role assigned', { userId, roleId, assignedBy: assignedBy ?? null });
    return { userId, roleId };
  }

  /**
   * Take a role away from a user. Only the assignment itself is looked
   * up, so an unknown user or role also reads as a missing assignment.
   */
  async removeRoleFromUser(userId: number, roleId: number): Promise<void> {
    const removed = await this.store.deleteUserRole(userId, roleId);
    if (removed === 0) {
      throw new NotFoundError(RBAC_MESSAGES.ROLE_ASSIGNMENT_NOT_FOUND);
    }
    this.logger.info('Role removed', { userId, roleId });
  }

  /** The user's assignment rows; empty for an unknown user. */
  async getUserRoles(userId: number): Promise<UserRoleAssignment[]> {
    return this.store.listUserRoles(userId);
  }

  async assignPermissionToRole(
    roleId: number,
    permissionId: number,
  ): Promise<PermissionAssignmentResult> {
    const references = async (): Promise<void> => {
      await this.requireRole(this.store, roleId);
      await this.requirePermission(this.store, permissionId);
    };
    await references();

    if (await this.store.rolePermissionExists(roleId, permissionId)) {
      throw new ConflictError(RBAC_MESSAGES.ROLE_HAS_PERMISSION);
    }

    await this.insertAssociation(
      this.store.insertRolePermission(roleId, permissionId),
      RBAC_MESSAGES.ROLE_HAS_PERMISSION,
      references,
    );

    this.logger.info('Permission assigned', { roleId, permissionId });
    return { roleId, permissionId };
  }

  async removePermissionFromRole(roleId: number, permissionId: number): Promise<void> {
    await this.requireRole(this.store, roleId);
    await this.requirePermission(this.store, permissionId);

    const removed = await this.store.deleteRolePermission(roleId, permissionId);
    if (removed === 0) {
      throw new NotFoundError(RBAC_MESSAGES.ROLE_LACKS_PERMISSION);
    }
    this.logger.info('Permission removed', { roleId, permissionId });
  }

  // ─── Checks ────────────────────────────────────────────────────────────

  /**
   * Whether the user holds a role granting exactly (action, resource).
   * An unknown user has no permissions.
   */
  async checkUserPermission(userId: number, action: string, resource: string): Promise<boolean> {
    const user = await this.store.findUserById(userId);
    if (!user) {
      return false;
    }
    return this.store.userHasPermission(userId, action, resource);
  }

  async checkUserRole(userId: number, roleName: string): Promise<boolean> {
    const user = await this.store.findUserById(userId);
    if (!user) {
      return false;
    }
    const roles = await this.store.listRolesForUser(userId);
    return roles.some((role) => role.name === roleName);
  }

  /**
   * Every (permission, granting role) pair the user holds, duplicates
   * included. An unknown user gets an empty list.
   */
  async getUserPermissions(userId: number): Promise<PermissionGrant[]> {
    const user = await this.store.findUserById(userId);
    if (!user) {
      return [];
    }
    return this.store.listUserPermissionGrants(userId);
  }

  async countRecords(): Promise<RecordCounts> {
    return this.store.countRecords();
  }
}
