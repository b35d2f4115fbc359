/**
 * Express application factory with dependency injection.
 *
 * Creates a fully configured Express app with middleware wired in order:
 * 1. Request logging with correlation IDs
 * 2. JSON body parser
 * 3. Auth and RBAC routes under /api/v1, each behind its guard
 * 4. Not-found fallback and global error handling
 *
 * The factory accepts all dependencies (service, hasher, token issuer,
 * logger) so tests can run the whole stack against an in-memory store.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import './types/express.js';
import type { Logger } from './logging/index.js';
import type { CredentialHasher } from './services/passwordService.js';
import type { RbacService } from './services/rbacService.js';
import { ADMIN_ROLE } from './services/catalogBootstrapper.js';
import type { TokenService } from './services/tokenService.js';
import type { BootstrapSummary, UserWithRoles } from './types/index.js';
import { NotFoundError, UnauthenticatedError } from './utils/errors.js';
import { createGuards } from './middleware/rbacGuards.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';

import * as auth from './controllers/authController.js';
import * as rbac from './controllers/rbacController.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

/** All dependencies required to create the Express application. */
export interface AppDependencies {
  rbac: RbacService;
  passwordService: CredentialHasher;
  tokenService: TokenService;
  logger: Logger;
  /** Seeds the built-in permissions and roles. */
  initializeCatalog(): Promise<BootstrapSummary>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

type RouteAction = (req: Request) => Promise<unknown> | unknown;

/**
 * Wrap a controller call: send its result with `status` (no body for
 * 204) and pass any failure to the error handler.
 */
function respond(status: number, action: RouteAction): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await action(req);
      if (status === 204) {
        res.status(204).end();
      } else {
        res.status(status).json(body);
      }
    } catch (err) {
      next(err);
    }
  };
}

/** The principal stored by the authentication guard. */
function principalOf(req: Request): UserWithRoles {
  if (!req.principal) {
    throw new UnauthenticatedError('Not authenticated');
  }
  return req.principal;
}

// ─── Application Factory ────────────────────────────────────────────────────

/**
 * Create a configured Express application with all routes and middleware.
 *
 * @param deps - All injected dependencies
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const guards = createGuards({ tokens: deps.tokenService, users: deps.rbac });
  const authDeps: auth.AuthDependencies = {
    users: deps.rbac,
    passwordService: deps.passwordService,
    tokenService: deps.tokenService,
    logger: deps.logger,
  };
  const rbacDeps: rbac.RbacControllerDependencies = {
    rbac: deps.rbac,
    initializeCatalog: deps.initializeCatalog,
  };

  const readUsers = guards.requirePermission('read', 'user_management');
  const editUsers = guards.requirePermission('edit', 'user_management');
  const readRoles = guards.requirePermission('read', 'role_management');
  const editRoles = guards.requirePermission('edit', 'role_management');

  // ── Global Middleware (order matters) ──────────────────────────────────

  app.use(requestLogger(deps.logger));
  app.use(express.json());

  // ── Liveness ──────────────────────────────────────────────────────────

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy' });
  });

  // ── Auth Routes ───────────────────────────────────────────────────────

  const authRouter = express.Router();

  authRouter.post('/register', respond(201, (req) => auth.register(req.body, authDeps)));
  authRouter.post('/login', respond(200, (req) => auth.login(req.body, authDeps)));
  authRouter.get(
    '/profile',
    guards.authenticate,
    respond(200, (req) => auth.getProfile(principalOf(req))),
  );
  authRouter.put(
    '/profile',
    guards.authenticate,
    respond(200, (req) => auth.updateProfile(principalOf(req), req.body, authDeps)),
  );
  authRouter.delete(
    '/profile',
    guards.authenticate,
    respond(204, (req) => auth.deleteProfile(principalOf(req), authDeps)),
  );

  // ── RBAC Routes ───────────────────────────────────────────────────────

  const rbacRouter = express.Router();

  // Users
  rbacRouter.post(
    '/users',
    editUsers,
    respond(201, (req) => rbac.createUser(req.body, principalOf(req), rbacDeps)),
  );
  rbacRouter.get('/users', readUsers, respond(200, () => rbac.listUsers(rbacDeps)));
  rbacRouter.get(
    '/users/:userId',
    readUsers,
    respond(200, (req) => rbac.getUser(req.params, rbacDeps)),
  );
  rbacRouter.put(
    '/users/:userId',
    editUsers,
    respond(200, (req) => rbac.updateUser(req.params, req.body, rbacDeps)),
  );
  rbacRouter.delete(
    '/users/:userId',
    editUsers,
    respond(204, (req) => rbac.deleteUser(req.params, rbacDeps)),
  );

  // User roles
  rbacRouter.get(
    '/users/:userId/roles',
    readUsers,
    respond(200, (req) => rbac.getUserRoles(req.params, rbacDeps)),
  );
  rbacRouter.post(
    '/users/:userId/roles',
    editUsers,
    respond(200, (req) => rbac.assignRole(req.params, req.body, principalOf(req), rbacDeps)),
  );
  rbacRouter.delete(
    '/users/:userId/roles/:roleId',
    editUsers,
    respond(204, (req) => rbac.removeRole(req.params, rbacDeps)),
  );

  // Roles
  rbacRouter.post('/roles', editRoles, respond(201, (req) => rbac.createRole(req.body, rbacDeps)));
  rbacRouter.get('/roles', readRoles, respond(200, () => rbac.listRoles(rbacDeps)));
  rbacRouter.get(
    '/roles/:roleId',
    readRoles,
    respond(200, (req) => rbac.getRole(req.params, rbacDeps)),
  );
  rbacRouter.put(
    '/roles/:roleId',
    editRoles,
    respond(200, (req) => rbac.updateRole(req.params, req.body, rbacDeps)),
  );
  rbacRouter.delete(
    '/roles/:roleId',
    editRoles,
    respond(204, (req) => rbac.deleteRole(req.params, rbacDeps)),
  );
  rbacRouter.post(
    '/roles/:roleId/permissions',
    editRoles,
    respond(200, (req) => rbac.assignPermission(req.params, req.body, rbacDeps)),
  );
  rbacRouter.delete(
    '/roles/:roleId/permissions/:permissionId',
    editRoles,
    respond(204, (req) => rbac.removePermission(req.params, rbacDeps)),
  );

  // Permissions
  rbacRouter.post(
    '/permissions',
    editRoles,
    respond(201, (req) => rbac.createPermission(req.body, rbacDeps)),
  );
  rbacRouter.get('/permissions', readRoles, respond(200, () => rbac.listPermissions(rbacDeps)));
  rbacRouter.get(
    '/permissions/:permissionId',
    readRoles,
    respond(200, (req) => rbac.getPermission(req.params, rbacDeps)),
  );
  rbacRouter.put(
    '/permissions/:permissionId',
    editRoles,
    respond(200, (req) => rbac.updatePermission(req.params, req.body, rbacDeps)),
  );

  // Caller checks
  rbacRouter.post(
    '/check-permission',
    guards.authenticate,
    respond(200, (req) => rbac.checkPermission(req.body, principalOf(req), rbacDeps)),
  );
  rbacRouter.get(
    '/my-permissions',
    guards.authenticate,
    respond(200, (req) => rbac.myPermissions(principalOf(req), rbacDeps)),
  );

  // System
  rbacRouter.post(
    '/initialize',
    guards.requireRole(ADMIN_ROLE),
    respond(200, () => rbac.initialize(rbacDeps)),
  );
  rbacRouter.get('/health', respond(200, () => rbac.health(rbacDeps)));

  app.use('/api/v1/auth', authRouter);
  app.use('/api/v1/rbac', rbacRouter);

  // ── Fallback and Error Handling ───────────────────────────────────────

  app.use((_req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError('Route not found'));
  });
  app.use(errorHandler(deps.logger));

  return app;
}
