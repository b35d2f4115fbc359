/**
 * Authentication and authorization guards for Express routes.
 *
 * `authenticate` resolves the bearer token to an active user and stores
 * it, with roles and permissions loaded, on `req.principal`. Every other
 * guard authenticates first when that has not happened yet, then decides
 * on the loaded principal. Failures are passed to `next` as
 * UnauthenticatedError or ForbiddenError for the error handler to render.
 *
 * @module middleware/rbacGuards
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import {
  formatPermission,
  hasAllPermissions,
  hasAnyPermission,
  hasPermission,
  hasRole,
  type PermissionRequirement,
} from '../services/decisionEngine.js';
import type { PrincipalResolver } from '../services/tokenService.js';
import type { UserWithRoles } from '../types/index.js';
import { ForbiddenError, UnauthenticatedError } from '../utils/errors.js';

// ─── Dependencies ────────────────────────────────────────────────────────────

/** Subset of RbacService the guards need. */
export interface PrincipalLoader {
  getUserById(userId: number): Promise<UserWithRoles | null>;
}

export interface GuardDependencies {
  tokens: PrincipalResolver;
  users: PrincipalLoader;
}

export interface RbacGuards {
  authenticate: RequestHandler;
  requirePermission(action: string, resource: string): RequestHandler;
  requireAnyPermission(requirements: readonly PermissionRequirement[]): RequestHandler;
  requireAllPermissions(requirements: readonly PermissionRequirement[]): RequestHandler;
  requireRole(roleName: string): RequestHandler;
  requireAnyRole(roleNames: readonly string[]): RequestHandler;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_PATTERN.exec(header.trim());
  return match?.[1] ?? null;
}

function listRequirements(requirements: readonly PermissionRequirement[]): string {
  return requirements.map((r) => formatPermission(r.action, r.resource)).join(', ');
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createGuards(deps: GuardDependencies): RbacGuards {
  async function resolve(req: Request): Promise<UserWithRoles> {
    if (req.principal) {
      return req.principal;
    }

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      throw new UnauthenticatedError('Not authenticated');
    }

    const userId = await deps.tokens.resolvePrincipal(token);
    const user = userId === null ? null : await deps.users.getUserById(userId);
    if (!user) {
      throw new UnauthenticatedError();
    }
    if (!user.isActive) {
      throw new UnauthenticatedError('Inactive user');
    }

    req.principal = user;
    return user;
  }

  /**
   * Build a guard from a decision over the principal. `decide` returns
   * the Forbidden message, or null to let the request through.
   */
  function guard(decide: (user: UserWithRoles) => string | null): RequestHandler {
    async function check(req: Request, next: NextFunction): Promise<void> {
      let denial: string | null;
      try {
        denial = decide(await resolve(req));
      } catch (err) {
        next(err);
        return;
      }
      next(denial === null ? undefined : new ForbiddenError(denial));
    }

    return (req: Request, _res: Response, next: NextFunction): void => {
      void check(req, next);
    };
  }

  return {
    authenticate: guard(() => null),

    requirePermission(action, resource) {
      return guard((user) =>
        hasPermission(user, action, resource)
          ? null
          : `Insufficient permissions. Required: ${formatPermission(action, resource)}`,
      );
    },

    requireAnyPermission(requirements) {
      return guard((user) =>
        hasAnyPermission(user, requirements)
          ? null
          : `Insufficient permissions. Required one of: ${listRequirements(requirements)}`,
      );
    },

    requireAllPermissions(requirements) {
      return guard((user) => {
        const missing = requirements.filter((r) => !hasPermission(user, r.action, r.resource));
        return hasAllPermissions(user, requirements)
          ? null
          : `Insufficient permissions. Required: ${listRequirements(missing)}`;
      });
    },

    requireRole(roleName) {
      return guard((user) =>
        hasRole(user, roleName) ? null : `Insufficient permissions. Required role: ${roleName}`,
      );
    },

    requireAnyRole(roleNames) {
      return guard((user) =>
        roleNames.some((name) => hasRole(user, name))
          ? null
          : `Insufficient permissions. Required one of roles: ${roleNames.join(', ')}`,
      );
    },
  };
}
