/**
 * Seeds the built-in permission and role catalog.
 *
 * Runs at startup and on demand. Safe to repeat: a permission or role
 * that already exists is left alone. Permissions are attached to a role
 * only in the run that creates it, so edits an administrator made to a
 * built-in role survive every later run.
 *
 * @module services/catalogBootstrapper
 */

import type { Logger } from '../logging/index.js';
import type { IdentityStore } from '../store/identityStore.js';
import type { BootstrapSummary, Permission } from '../types/index.js';

export interface CatalogPermission {
  action: string;
  resource: string;
  description: string;
}

export interface CatalogRole {
  name: string;
  description: string;
  /** Actions whose permissions the role receives on creation. */
  actions: readonly string[] | 'all';
}

export const DEFAULT_PERMISSIONS: readonly CatalogPermission[] = [
  { action: 'read', resource: 'collateral_evaluation', description: 'View collateral evaluation data' },
  { action: 'edit', resource: 'collateral_evaluation', description: 'Edit collateral evaluation data' },
  { action: 'clear', resource: 'collateral_evaluation', description: 'Clear collateral evaluation data' },
  { action: 'authorize', resource: 'collateral_evaluation', description: 'Authorize collateral evaluation' },
  { action: 'comment', resource: 'collateral_evaluation', description: 'Add comments to evaluations' },
  { action: 'read', resource: 'user_management', description: 'View user information' },
  { action: 'edit', resource: 'user_management', description: 'Manage users' },
  { action: 'read', resource: 'role_management', description: 'View roles and permissions' },
  { action: 'edit', resource: 'role_management', description: 'Manage roles and permissions' },
];

export const DEFAULT_ROLES: readonly CatalogRole[] = [
  { name: 'Viewer', description: 'Can only view collateral evaluation data', actions: ['read'] },
  {
    name: 'Inputter',
    description: 'Can input and edit collateral evaluation data',
    actions: ['read', 'edit', 'clear'],
  },
  {
    name: 'Authorizer',
    description: 'Can authorize collateral evaluations and manage the system',
    actions: ['read', 'edit', 'authorize', 'comment'],
  },
  { name: 'Admin', description: 'Full system administration access', actions: 'all' },
];

export const ADMIN_ROLE = 'Admin';

function grantedBy(role: CatalogRole, permission: Permission): boolean {
  return role.actions === 'all' || role.actions.includes(permission.action);
}

/**
 * Create missing catalog permissions, then missing catalog roles with
 * the permissions their rule selects from everything in the store at
 * that point (custom permissions included).
 *
 * Each create is its own write; a failure part-way leaves what was
 * already created in place and a later run completes the rest.
 */
export async function initializeDefaultData(
  store: IdentityStore,
  logger: Logger,
): Promise<BootstrapSummary> {
  const log = logger.child({ operation: 'initializeDefaultData' });
  let permissionsCreated = 0;
  let rolesCreated = 0;

  for (const entry of DEFAULT_PERMISSIONS) {
    if (await store.findPermissionByPair(entry.action, entry.resource)) continue;
    await store.createPermission(entry);
    permissionsCreated++;
    log.info('Created permission', { action: entry.action, resource: entry.resource });
  }

  for (const entry of DEFAULT_ROLES) {
    if (await store.findRoleByName(entry.name)) continue;

    const attached = await store.transaction(async (tx) => {
      const role = await tx.createRole({ name: entry.name, description: entry.description });
      const permissions = (await tx.listPermissions()).filter((p) => grantedBy(entry, p));
      for (const permission of permissions) {
        await tx.insertRolePermission(role.id, permission.id);
      }
      return permissions.length;
    });

    rolesCreated++;
    log.info('Created role', { role: entry.name, permissions: attached });
  }

  log.info('Default catalog initialized', { permissionsCreated, rolesCreated });
  return { permissionsCreated, rolesCreated };
}
