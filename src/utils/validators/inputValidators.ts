/**
 * Request body and path parameter parsing for the RBAC API.
 *
 * Each parser takes the raw decoded JSON, checks every field against the
 * column limits of the schema, and either returns a typed request or
 * throws a ValidationError listing every failing field. Optional fields
 * sent as `null` come back as undefined, which the service reads as
 * "leave unchanged".
 *
 * @module utils/validators/inputValidators
 */

import type {
  AssignPermissionRequest,
  AssignRoleRequest,
  CreatePermissionRequest,
  CreateRoleRequest,
  CreateUserRequest,
  LoginRequest,
  PermissionCheckRequest,
  UpdatePermissionRequest,
  UpdateRoleRequest,
  UpdateUserRequest,
} from '../../types/index.js';
import { ValidationError } from '../errors.js';
import { validateEmail } from './emailValidator.js';
import { validatePassword } from './passwordValidator.js';

// ─── Field Limits ────────────────────────────────────────────────────────────

export const FIELD_LIMITS = {
  username: { min: 3, max: 100 },
  fullName: { min: 0, max: 150 },
  department: { min: 0, max: 100 },
  roleName: { min: 2, max: 50 },
  action: { min: 2, max: 50 },
  resource: { min: 2, max: 50 },
} as const;

type FieldErrors = Record<string, string[]>;

class FieldReader {
  readonly errors: FieldErrors = {};

  constructor(private readonly body: Record<string, unknown>) {}

  fail(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  string(
    field: string,
    limits: { min: number; max: number } | null,
    required: boolean,
  ): string | undefined {
    const value = this.body[field];
    if (value === undefined || value === null) {
      if (required) this.fail(field, `${field} is required`);
      return undefined;
    }
    if (typeof value !== 'string') {
      this.fail(field, `${field} must be a string`);
      return undefined;
    }
    if (limits && (value.length < limits.min || value.length > limits.max)) {
      this.fail(
        field,
        limits.min > 0
          ? `${field} must be between ${limits.min} and ${limits.max} characters`
          : `${field} must not exceed ${limits.max} characters`,
      );
      return undefined;
    }
    return value;
  }

  email(field: string, required: boolean): string | undefined {
    const value = this.string(field, null, required);
    if (value === undefined) return undefined;
    const result = validateEmail(value);
    if (!result.valid) {
      result.errors.forEach((message) => this.fail(field, message));
      return undefined;
    }
    return value;
  }

  password(field: string, required: boolean): string | undefined {
    const value = this.string(field, null, required);
    if (value === undefined) return undefined;
    const result = validatePassword(value);
    if (!result.valid) {
      result.errors.forEach((message) => this.fail(field, message));
      return undefined;
    }
    return value;
  }

  boolean(field: string): boolean | undefined {
    const value = this.body[field];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
      this.fail(field, `${field} must be a boolean`);
      return undefined;
    }
    return value;
  }

  id(field: string, required: boolean): number | undefined {
    const value = this.body[field];
    if (value === undefined || value === null) {
      if (required) this.fail(field, `${field} is required`);
      return undefined;
    }
    if (!isPositiveInteger(value)) {
      this.fail(field, `${field} must be a positive integer`);
      return undefined;
    }
    return value;
  }

  stringList(field: string): string[] | undefined {
    const value = this.body[field];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      this.fail(field, `${field} must be a list of strings`);
      return undefined;
    }
    return value;
  }

  /** Throw the collected field errors, if any. */
  finish(): void {
    if (Object.keys(this.errors).length > 0) {
      throw new ValidationError('Request validation failed', this.errors);
    }
  }
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function readerFor(body: unknown): FieldReader {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object', {
      body: ['Expected a JSON object'],
    });
  }
  return new FieldReader(Object.fromEntries(Object.entries(body)));
}

// ─── Users ───────────────────────────────────────────────────────────────────

export function parseCreateUser(body: unknown): CreateUserRequest {
  const r = readerFor(body);
  const username = r.string('username', FIELD_LIMITS.username, true);
  const email = r.email('email', true);
  const password = r.password('password', true);
  const fullName = r.string('fullName', FIELD_LIMITS.fullName, false);
  const department = r.string('department', FIELD_LIMITS.department, false);
  const roleNames = r.stringList('roleNames');
  r.finish();

  if (username === undefined || email === undefined || password === undefined) {
    throw new ValidationError('Request validation failed', r.errors);
  }
  return { username, email, password, fullName, department, roleNames };
}

export function parseUpdateUser(body: unknown): UpdateUserRequest {
  const r = readerFor(body);
  const request = {
    username: r.string('username', FIELD_LIMITS.username, false),
    email: r.email('email', false),
    password: r.password('password', false),
    fullName: r.string('fullName', FIELD_LIMITS.fullName, false),
    department: r.string('department', FIELD_LIMITS.department, false),
    isActive: r.boolean('isActive'),
  };
  r.finish();
  return request;
}

export function parseLogin(body: unknown): LoginRequest {
  const r = readerFor(body);
  const username = r.string('username', null, true);
  const password = r.string('password', null, true);
  r.finish();

  if (username === undefined || password === undefined) {
    throw new ValidationError('Request validation failed', r.errors);
  }
  return { username, password };
}

// ─── Roles ───────────────────────────────────────────────────────────────────

export function parseCreateRole(body: unknown): CreateRoleRequest {
  const r = readerFor(body);
  const name = r.string('name', FIELD_LIMITS.roleName, true);
  const description = r.string('description', null, false);
  const permissionNames = r.stringList('permissionNames');
  r.finish();

  if (name === undefined) {
    throw new ValidationError('Request validation failed', r.errors);
  }
  return { name, description, permissionNames };
}

export function parseUpdateRole(body: unknown): UpdateRoleRequest {
  const r = readerFor(body);
  const request = {
    name: r.string('name', FIELD_LIMITS.roleName, false),
    description: r.string('description', null, false),
  };
  r.finish();
  return request;
}

export function parseAssignRole(body: unknown): AssignRoleRequest {
  const r = readerFor(body);
  const roleId = r.id('roleId', true);
  const assignedBy = r.id('assignedBy', false);
  r.finish();

  if (roleId === undefined) {
    throw new ValidationError('Request validation failed', r.errors);
  }
  return { roleId, assignedBy };
}

// ─── Permissions ─────────────────────────────────────────────────────────────

export function parseCreatePermission(body: unknown): CreatePermissionRequest {
  const r = readerFor(body);
  const action = r.string('action', FIELD_LIMITS.action, true);
  const resource = r.string('resource', FIELD_LIMITS.resource, true);
  const description = r.string('description', null, false);
  r.finish();

  if (action === undefined || resource === undefined) {
    throw new ValidationError('Request validation failed', r.errors);
  }
  return { action, resource, description };
}

export function parseUpdatePermission(body: unknown): UpdatePermissionRequest {
  const r = readerFor(body);
  const request = {
    action: r.string('action', FIELD_LIMITS.action, false),
    resource: r.string('resource', FIELD_LIMITS.resource, false),
    description: r.string('description', null, false),
  };
  r.finish();
  return request;
}

export function parseAssignPermission(body: unknown): AssignPermissionRequest {
  const r = readerFor(body);
  const permissionId = r.id('permissionId', true);
  r.finish();

  if (permissionId === undefined) {
    throw new ValidationError('Request validation failed', r.errors);
  }
  return { permissionId };
}

export function parsePermissionCheck(body: unknown): PermissionCheckRequest {
  const r = readerFor(body);
  const action = r.string('action', null, true);
  const resource = r.string('resource', null, true);
  r.finish();

  if (action === undefined || resource === undefined) {
    throw new ValidationError('Request validation failed', r.errors);
  }
  return { action, resource };
}

// ─── Path Parameters ─────────────────────────────────────────────────────────

/**
 * Parse a numeric path parameter such as `:userId`.
 */
export function parseIdParam(value: string | undefined, name: string): number {
  const parsed = value !== undefined && /^\d+$/.test(value) ? Number(value) : NaN;
  if (!isPositiveInteger(parsed)) {
    throw new ValidationError('Invalid path parameter', {
      [name]: [`${name} must be a positive integer`],
    });
  }
  return parsed;
}
