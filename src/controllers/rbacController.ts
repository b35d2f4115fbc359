/**
 * RBAC administration controller: users, roles, permissions, their
 * assignments, the caller's own permission checks and catalog seeding.
 *
 * Handlers take path parameters and the raw decoded body, return the
 * response body, and throw RbacError subclasses for the error handler to
 * render. Route guards run before any of these.
 *
 * @module controllers/rbacController
 */

import type { RecordCounts } from '../store/identityStore.js';
import type { RbacService } from '../services/rbacService.js';
import { RBAC_MESSAGES } from '../services/rbacService.js';
import { formatPermission } from '../services/decisionEngine.js';
import type {
  BootstrapSummary,
  PermissionCheckResponse,
  PermissionGrant,
  PermissionResponse,
  RoleResponse,
  UserResponse,
  UserRoleResponse,
  UserWithRoles,
} from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';
import {
  serializePermission,
  serializeRole,
  serializeUser,
  serializeUserRole,
} from '../utils/serialize.js';
import {
  parseAssignPermission,
  parseAssignRole,
  parseCreatePermission,
  parseCreateRole,
  parseCreateUser,
  parseIdParam,
  parsePermissionCheck,
  parseUpdatePermission,
  parseUpdateRole,
  parseUpdateUser,
} from '../utils/validators/inputValidators.js';

// ─── Dependency Interfaces ───────────────────────────────────────────────────

export interface RbacControllerDependencies {
  rbac: RbacService;
  /** Runs the catalog bootstrap against the service's store. */
  initializeCatalog(): Promise<BootstrapSummary>;
}

export type RouteParams = Record<string, string | undefined>;

// ─── Response Types ──────────────────────────────────────────────────────────

export interface MessageResponse {
  message: string;
}

export interface RoleAssignedResponse extends MessageResponse {
  userId: number;
  roleId: number;
}

export interface PermissionAssignedResponse extends MessageResponse {
  roleId: number;
  permissionId: number;
}

export interface MyPermissionsResponse {
  user: Pick<UserResponse, 'id' | 'username' | 'email' | 'fullName' | 'department'>;
  roles: string[];
  permissions: PermissionGrant[];
}

export interface InitializeResponse extends MessageResponse, BootstrapSummary {}

export interface RbacHealthResponse {
  status: 'healthy';
  userCount: number;
  roleCount: number;
  permissionCount: number;
}

// ─── Users ───────────────────────────────────────────────────────────────────

/** Administrative create; unlike registration, `roleNames` is honored. */
export async function createUser(
  body: unknown,
  principal: UserWithRoles,
  deps: RbacControllerDependencies,
): Promise<UserResponse> {
  const user = await deps.rbac.createUser(parseCreateUser(body), principal.id);
  return serializeUser(user);
}

export async function listUsers(deps: RbacControllerDependencies): Promise<UserResponse[]> {
  const users = await deps.rbac.listUsers();
  return users.map(serializeUser);
}

export async function getUser(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<UserResponse> {
  const user = await deps.rbac.getUserById(parseIdParam(params['userId'], 'userId'));
  if (!user) {
    throw new NotFoundError(RBAC_MESSAGES.USER_NOT_FOUND);
  }
  return serializeUser(user);
}

export async function updateUser(
  params: RouteParams,
  body: unknown,
  deps: RbacControllerDependencies,
): Promise<UserResponse> {
  const userId = parseIdParam(params['userId'], 'userId');
  const user = await deps.rbac.updateUser(userId, parseUpdateUser(body));
  return serializeUser(user);
}

export async function deleteUser(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<void> {
  await deps.rbac.deleteUser(parseIdParam(params['userId'], 'userId'));
}

// ─── User Roles ──────────────────────────────────────────────────────────────

export async function getUserRoles(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<UserRoleResponse[]> {
  const assignments = await deps.rbac.getUserRoles(parseIdParam(params['userId'], 'userId'));
  return assignments.map(serializeUserRole);
}

/**
 * The user comes from the path. `assignedBy` defaults to the caller.
 */
export async function assignRole(
  params: RouteParams,
  body: unknown,
  principal: UserWithRoles,
  deps: RbacControllerDependencies,
): Promise<RoleAssignedResponse> {
  const userId = parseIdParam(params['userId'], 'userId');
  const request = parseAssignRole(body);
  const result = await deps.rbac.assignRoleToUser(
    userId,
    request.roleId,
    request.assignedBy ?? principal.id,
  );
  return { message: 'Role assigned successfully', ...result };
}

export async function removeRole(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<void> {
  await deps.rbac.removeRoleFromUser(
    parseIdParam(params['userId'], 'userId'),
    parseIdParam(params['roleId'], 'roleId'),
  );
}

// ─── Roles ───────────────────────────────────────────────────────────────────

export async function createRole(
  body: unknown,
  deps: RbacControllerDependencies,
): Promise<RoleResponse> {
  const role = await deps.rbac.createRole(parseCreateRole(body));
  return serializeRole(role);
}

export async function listRoles(deps: RbacControllerDependencies): Promise<RoleResponse[]> {
  const roles = await deps.rbac.listRoles();
  return roles.map(serializeRole);
}

export async function getRole(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<RoleResponse> {
  const role = await deps.rbac.getRoleById(parseIdParam(params['roleId'], 'roleId'));
  if (!role) {
    throw new NotFoundError(RBAC_MESSAGES.ROLE_NOT_FOUND);
  }
  return serializeRole(role);
}

export async function updateRole(
  params: RouteParams,
  body: unknown,
  deps: RbacControllerDependencies,
): Promise<RoleResponse> {
  const roleId = parseIdParam(params['roleId'], 'roleId');
  const role = await deps.rbac.updateRole(roleId, parseUpdateRole(body));
  return serializeRole(role);
}

export async function deleteRole(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<void> {
  await deps.rbac.deleteRole(parseIdParam(params['roleId'], 'roleId'));
}

export async function assignPermission(
  params: RouteParams,
  body: unknown,
  deps: RbacControllerDependencies,
): Promise<PermissionAssignedResponse> {
  const roleId = parseIdParam(params['roleId'], 'roleId');
  const { permissionId } = parseAssignPermission(body);
  const result = await deps.rbac.assignPermissionToRole(roleId, permissionId);
  return { message: 'Permission assigned successfully', ...result };
}

export async function removePermission(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<void> {
  await deps.rbac.removePermissionFromRole(
    parseIdParam(params['roleId'], 'roleId'),
    parseIdParam(params['permissionId'], 'permissionId'),
  );
}

// ─── Permissions ─────────────────────────────────────────────────────────────

export async function createPermission(
  body: unknown,
  deps: RbacControllerDependencies,
): Promise<PermissionResponse> {
  const permission = await deps.rbac.createPermission(parseCreatePermission(body));
  return serializePermission(permission);
}

export async function listPermissions(
  deps: RbacControllerDependencies,
): Promise<PermissionResponse[]> {
  const permissions = await deps.rbac.listPermissions();
  return permissions.map(serializePermission);
}

export async function getPermission(
  params: RouteParams,
  deps: RbacControllerDependencies,
): Promise<PermissionResponse> {
  const permission = await deps.rbac.getPermissionById(
    parseIdParam(params['permissionId'], 'permissionId'),
  );
  if (!permission) {
    throw new NotFoundError(RBAC_MESSAGES.PERMISSION_NOT_FOUND);
  }
  return serializePermission(permission);
}

export async function updatePermission(
  params: RouteParams,
  body: unknown,
  deps: RbacControllerDependencies,
): Promise<PermissionResponse> {
  const permissionId = parseIdParam(params['permissionId'], 'permissionId');
  const permission = await deps.rbac.updatePermission(permissionId, parseUpdatePermission(body));
  return serializePermission(permission);
}

// ─── Caller Checks ───────────────────────────────────────────────────────────

/** Answers for the caller; a `false` here is a normal 200 response. */
export async function checkPermission(
  body: unknown,
  principal: UserWithRoles,
  deps: RbacControllerDependencies,
): Promise<PermissionCheckResponse> {
  const { action, resource } = parsePermissionCheck(body);
  return {
    hasPermission: await deps.rbac.checkUserPermission(principal.id, action, resource),
    userRoles: principal.roles.map((role) => role.name),
    requiredPermission: formatPermission(action, resource),
  };
}

export async function myPermissions(
  principal: UserWithRoles,
  deps: RbacControllerDependencies,
): Promise<MyPermissionsResponse> {
  return {
    user: {
      id: principal.id,
      username: principal.username,
      email: principal.email,
      fullName: principal.fullName,
      department: principal.department,
    },
    roles: principal.roles.map((role) => role.name),
    permissions: await deps.rbac.getUserPermissions(principal.id),
  };
}

// ─── System ──────────────────────────────────────────────────────────────────

export async function initialize(deps: RbacControllerDependencies): Promise<InitializeResponse> {
  const summary = await deps.initializeCatalog();
  return { message: 'RBAC system initialized successfully', ...summary };
}

export async function health(deps: RbacControllerDependencies): Promise<RbacHealthResponse> {
  const counts: RecordCounts = await deps.rbac.countRecords();
  return {
    status: 'healthy',
    userCount: counts.users,
    roleCount: counts.roles,
    permissionCount: counts.permissions,
  };
}
