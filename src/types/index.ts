/**
 * Core type definitions for the RBAC module.
 * Domain records mirror the `users`, `roles`, `permissions`, `user_roles`
 * and `role_permissions` tables.
 */

// ─── Data Models ─────────────────────────────────────────────────────────────

export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  department: string | null;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
  isActive: boolean;
}

export interface Role {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
}

/** An atomic capability, unique on (action, resource). */
export interface Permission {
  id: number;
  action: string;
  resource: string;
  description: string | null;
  createdAt: Date;
}

export interface UserRoleAssignment {
  userId: number;
  roleId: number;
  assignedBy: number | null;
  assignedAt: Date;
}

export interface RolePermissionAssignment {
  roleId: number;
  permissionId: number;
}

export interface RoleWithPermissions extends Role {
  permissions: Permission[];
}

export interface UserWithRoles extends User {
  roles: RoleWithPermissions[];
}

/** One (permission, granting role) pair in a user's effective permission set. */
export interface PermissionGrant {
  action: string;
  resource: string;
  role: string;
}

// ─── Store Inputs ────────────────────────────────────────────────────────────

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  fullName?: string | null;
  department?: string | null;
}

/** Columns an update may touch. Absent keys are left as they are. */
export interface UserChanges {
  username?: string;
  email?: string;
  passwordHash?: string;
  fullName?: string;
  department?: string;
  isActive?: boolean;
}

export interface NewRole {
  name: string;
  description?: string | null;
}

export interface RoleChanges {
  name?: string;
  description?: string;
}

export interface NewPermission {
  action: string;
  resource: string;
  description?: string | null;
}

export interface PermissionChanges {
  action?: string;
  resource?: string;
  description?: string;
}

// ─── API Request Types ───────────────────────────────────────────────────────

export interface CreateUserRequest {
  username: string;
  email: string;
  password: string;
  fullName?: string;
  department?: string;
  roleNames?: string[];
}

export interface UpdateUserRequest {
  username?: string;
  email?: string;
  password?: string;
  fullName?: string;
  department?: string;
  isActive?: boolean;
}

export interface CreateRoleRequest {
  name: string;
  description?: string;
  /** `action:resource` names; a bare name means resource `*`. */
  permissionNames?: string[];
}

export interface UpdateRoleRequest {
  name?: string;
  description?: string;
}

export interface CreatePermissionRequest {
  action: string;
  resource: string;
  description?: string;
}

export interface UpdatePermissionRequest {
  action?: string;
  resource?: string;
  description?: string;
}

export interface AssignRoleRequest {
  roleId: number;
  assignedBy?: number;
}

export interface AssignPermissionRequest {
  permissionId: number;
}

export interface PermissionCheckRequest {
  action: string;
  resource: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

// ─── API Response Types ──────────────────────────────────────────────────────

export interface PermissionResponse {
  id: number;
  action: string;
  resource: string;
  description: string | null;
  createdAt: string;
}

export interface RoleResponse {
  id: number;
  name: string;
  description: string | null;
  createdAt: string;
  permissions: PermissionResponse[];
}

export interface UserResponse {
  id: number;
  username: string;
  email: string;
  fullName: string | null;
  department: string | null;
  createdAt: string;
  updatedAt: string;
  lastLoginAt: string | null;
  isActive: boolean;
  roles: RoleResponse[];
}

export interface UserRoleResponse {
  userId: number;
  roleId: number;
  assignedBy: number | null;
  assignedAt: string;
}

export interface LoginResponse {
  accessToken: string;
  tokenType: 'bearer';
  expiresAt: string;
  user: UserResponse;
}

export interface PermissionCheckResponse {
  hasPermission: boolean;
  userRoles: string[];
  requiredPermission: string;
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    fields?: Record<string, string[]>;
  };
  requestId: string;
}

// ─── Service Types ───────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface BootstrapSummary {
  permissionsCreated: number;
  rolesCreated: number;
}

export interface AccessToken {
  accessToken: string;
  expiresAt: Date;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export const RBAC_ERROR_CODES = {
  VALIDATION_ERROR: 'RBAC_VALIDATION_ERROR',
  UNAUTHENTICATED: 'AUTH_UNAUTHENTICATED',
  INVALID_CREDENTIALS: 'AUTH_INVALID_CREDENTIALS',
  FORBIDDEN: 'RBAC_FORBIDDEN',
  NOT_FOUND: 'RBAC_NOT_FOUND',
  CONFLICT: 'RBAC_CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type RbacErrorCode = (typeof RBAC_ERROR_CODES)[keyof typeof RBAC_ERROR_CODES];
