/**
 * Authorization decisions over an already-loaded principal.
 *
 * A user's effective permission set is the union of the permissions of
 * every role they hold. Matching is exact string equality on both action
 * and resource: `*` carries no wildcard meaning here, there are no deny
 * rules, and no role takes precedence over another.
 *
 * @module services/decisionEngine
 */

import type { UserWithRoles } from '../types/index.js';

/** A required capability, written `action:resource`. */
export interface PermissionRequirement {
  action: string;
  resource: string;
}

/**
 * True iff some held role has exactly this name.
 */
export function hasRole(user: UserWithRoles, roleName: string): boolean {
  return user.roles.some((role) => role.name === roleName);
}

/**
 * True iff some held role grants exactly (action, resource).
 */
export function hasPermission(user: UserWithRoles, action: string, resource: string): boolean {
  return user.roles.some((role) =>
    role.permissions.some((p) => p.action === action && p.resource === resource),
  );
}

export function hasAnyPermission(
  user: UserWithRoles,
  requirements: readonly PermissionRequirement[],
): boolean {
  return requirements.some((r) => hasPermission(user, r.action, r.resource));
}

export function hasAllPermissions(
  user: UserWithRoles,
  requirements: readonly PermissionRequirement[],
): boolean {
  return requirements.every((r) => hasPermission(user, r.action, r.resource));
}

export function formatPermission(action: string, resource: string): string {
  return `${action}:${resource}`;
}

/**
 * Split an `action:resource` name at its first colon. A name without a
 * colon is an action on every resource, written `*`.
 */
export function parsePermissionName(name: string): PermissionRequirement {
  const separator = name.indexOf(':');
  if (separator === -1) {
    return { action: name, resource: '*' };
  }
  return { action: name.slice(0, separator), resource: name.slice(separator + 1) };
}
