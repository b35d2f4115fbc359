/**
 * Authentication controller: self-registration, password login and the
 * caller's own profile.
 *
 * Uses dependency injection for the service, hasher and token issuer so
 * it can be unit tested without mocks of the module system. Handlers take
 * the raw decoded body, return the response body, and throw RbacError
 * subclasses for the error handler to render.
 *
 * @module controllers/authController
 */

import type { Logger } from '../logging/index.js';
import type { CredentialHasher } from '../services/passwordService.js';
import type { TokenService } from '../services/tokenService.js';
import type {
  CreateUserRequest,
  LoginResponse,
  UpdateUserRequest,
  UserResponse,
  UserWithRoles,
} from '../types/index.js';
import { InvalidCredentialsError, UnauthenticatedError } from '../utils/errors.js';
import { serializeUser } from '../utils/serialize.js';
import {
  parseCreateUser,
  parseLogin,
  parseUpdateUser,
} from '../utils/validators/inputValidators.js';

// ─── Dependency Interfaces ───────────────────────────────────────────────────

/** Subset of RbacService used by the auth controller. */
export interface AuthUserService {
  createUser(input: CreateUserRequest, createdBy?: number): Promise<UserWithRoles>;
  getUserById(userId: number): Promise<UserWithRoles | null>;
  getUserByUsername(username: string): Promise<UserWithRoles | null>;
  updateUser(userId: number, fields: UpdateUserRequest): Promise<UserWithRoles>;
  deleteUser(userId: number): Promise<void>;
  recordLogin(userId: number): Promise<void>;
}

export interface AuthDependencies {
  users: AuthUserService;
  passwordService: CredentialHasher;
  tokenService: TokenService;
  logger: Logger;
}

// ─── Controllers ─────────────────────────────────────────────────────────────

/**
 * Public registration. Role names in the body are ignored: a caller
 * cannot grant itself roles by signing up.
 */
export async function register(body: unknown, deps: AuthDependencies): Promise<UserResponse> {
  const parsed = parseCreateUser(body);
  const user = await deps.users.createUser({
    username: parsed.username,
    email: parsed.email,
    password: parsed.password,
    fullName: parsed.fullName,
    department: parsed.department,
  });
  return serializeUser(user);
}

/**
 * Password login.
 *
 * Flow:
 * 1. Look the user up by username
 * 2. Verify the password; an unknown user and a wrong password fail alike
 * 3. Reject an inactive account
 * 4. Issue an access token and record the login time
 */
export async function login(body: unknown, deps: AuthDependencies): Promise<LoginResponse> {
  const request = parseLogin(body);
  const log = deps.logger.child({ operation: 'login' });

  // 1. Find user
  const user = await deps.users.getUserByUsername(request.username);

  // 2. Verify password
  const passwordValid =
    user !== null && (await deps.passwordService.verifyPassword(request.password, user.passwordHash));
  if (!user || !passwordValid) {
    log.warn('Login failed', { username: request.username });
    throw new InvalidCredentialsError();
  }

  // 3. Active accounts only
  if (!user.isActive) {
    log.warn('Login rejected for inactive user', { userId: user.id });
    throw new UnauthenticatedError('Inactive user');
  }

  // 4. Issue token
  const token = deps.tokenService.issueAccessToken(user.id);
  await deps.users.recordLogin(user.id);
  const current = (await deps.users.getUserById(user.id)) ?? user;

  log.info('User logged in', { userId: user.id });
  return {
    accessToken: token.accessToken,
    tokenType: 'bearer',
    expiresAt: token.expiresAt.toISOString(),
    user: serializeUser(current),
  };
}

export function getProfile(principal: UserWithRoles): UserResponse {
  return serializeUser(principal);
}

/** Update the caller's own record. `isActive` cannot be changed here. */
export async function updateProfile(
  principal: UserWithRoles,
  body: unknown,
  deps: AuthDependencies,
): Promise<UserResponse> {
  const fields = parseUpdateUser(body);
  const updated = await deps.users.updateUser(principal.id, {
    username: fields.username,
    email: fields.email,
    password: fields.password,
    fullName: fields.fullName,
    department: fields.department,
  });
  return serializeUser(updated);
}

export async function deleteProfile(
  principal: UserWithRoles,
  deps: AuthDependencies,
): Promise<void> {
  await deps.users.deleteUser(principal.id);
}
