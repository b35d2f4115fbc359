/**
 * RBAC core – entry point.
 *
 * Re-exports the identity store, the RBAC service and decision engine,
 * the catalog bootstrapper and the Express application factory.
 *
 * @module rbac-core
 */

// ─── Types ───
export * from './types/index.js';

// ─── Errors ───
export {
  ConflictError,
  ForbiddenError,
  InvalidCredentialsError,
  NotFoundError,
  RbacError,
  UnauthenticatedError,
  ValidationError,
  isRbacError,
  isForeignKeyViolation,
  isUniqueViolation,
} from './utils/errors.js';

// ─── Store ───
export type { IdentityStore, RecordCounts } from './store/identityStore.js';
export { isRowId, MAX_ROW_ID, MIN_ROW_ID } from './store/identityStore.js';
export { PgIdentityStore } from './store/pgIdentityStore.js';

// ─── Services ───
export { RbacService, RBAC_MESSAGES } from './services/rbacService.js';
export type { RbacServiceDependencies } from './services/rbacService.js';
export {
  formatPermission,
  hasAllPermissions,
  hasAnyPermission,
  hasPermission,
  hasRole,
  parsePermissionName,
} from './services/decisionEngine.js';
export type { PermissionRequirement } from './services/decisionEngine.js';
export {
  ADMIN_ROLE,
  DEFAULT_PERMISSIONS,
  DEFAULT_ROLES,
  initializeDefaultData,
} from './services/catalogBootstrapper.js';
export { bcryptHasher } from './services/passwordService.js';
export type { CredentialHasher } from './services/passwordService.js';
export { createTokenService } from './services/tokenService.js';
export type { PrincipalResolver, TokenService } from './services/tokenService.js';

// ─── HTTP ───
export { createApp } from './app.js';
export type { AppDependencies } from './app.js';
export { createGuards } from './middleware/rbacGuards.js';
export type { RbacGuards } from './middleware/rbacGuards.js';

// ─── Infrastructure ───
export { loadAppConfig } from './config.js';
export { createLogger } from './logging/index.js';
export type { Logger } from './logging/index.js';
export { runMigrations } from './utils/migrationRunner.js';
