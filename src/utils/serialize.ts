/**
 * Converts domain records to their JSON response shapes.
 *
 * Dates become ISO 8601 strings; a user's password hash is never copied.
 *
 * @module utils/serialize
 */

import type {
  Permission,
  PermissionResponse,
  RoleResponse,
  RoleWithPermissions,
  UserResponse,
  UserRoleAssignment,
  UserRoleResponse,
  UserWithRoles,
} from '../types/index.js';

export function serializePermission(permission: Permission): PermissionResponse {
  return {
    id: permission.id,
    action: permission.action,
    resource: permission.resource,
    description: permission.description,
    createdAt: permission.createdAt.toISOString(),
  };
}

export function serializeRole(role: RoleWithPermissions): RoleResponse {
  return {
    id: role.id,
    name: role.name,
    description: role.description,
    createdAt: role.createdAt.toISOString(),
    permissions: role.permissions.map(serializePermission),
  };
}

export function serializeUser(user: UserWithRoles): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: user.fullName,
    department: user.department,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
    lastLoginAt: user.lastLoginAt?.toISOString() ?? null,
    isActive: user.isActive,
    roles: user.roles.map(serializeRole),
  };
}

export function serializeUserRole(assignment: UserRoleAssignment): UserRoleResponse {
  return {
    userId: assignment.userId,
    roleId: assignment.roleId,
    assignedBy: assignment.assignedBy,
    assignedAt: assignment.assignedAt.toISOString(),
  };
}
