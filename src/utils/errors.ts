/**
 * Typed errors raised by the RBAC service layer.
 *
 * Each class carries a stable machine-readable `code` so the HTTP boundary
 * can map it to a status without re-deriving the reason. The decision
 * engine never throws these for an absent permission; it returns `false`.
 *
 * @module utils/errors
 */

import { RBAC_ERROR_CODES, type RbacErrorCode } from '../types/index.js';

/** PostgreSQL SQLSTATE for unique_violation. */
export const PG_UNIQUE_VIOLATION = '23505';

/** PostgreSQL SQLSTATE for foreign_key_violation. */
export const PG_FOREIGN_KEY_VIOLATION = '23503';

/** PostgreSQL SQLSTATE for numeric_value_out_of_range. */
export const PG_NUMERIC_OUT_OF_RANGE = '22003';

export class RbacError extends Error {
  constructor(
    public readonly code: RbacErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'RbacError';
  }
}

export class ValidationError extends RbacError {
  constructor(
    message: string,
    public readonly fields: Record<string, string[]> = {},
  ) {
    super(RBAC_ERROR_CODES.VALIDATION_ERROR, message);
    this.name = 'ValidationError';
  }
}

export class UnauthenticatedError extends RbacError {
  constructor(message = 'Could not validate credentials') {
    super(RBAC_ERROR_CODES.UNAUTHENTICATED, message);
    this.name = 'UnauthenticatedError';
  }
}

export class InvalidCredentialsError extends RbacError {
  constructor(message = 'Incorrect username or password') {
    super(RBAC_ERROR_CODES.INVALID_CREDENTIALS, message);
    this.name = 'InvalidCredentialsError';
  }
}

export class ForbiddenError extends RbacError {
  constructor(message = 'Insufficient permissions') {
    super(RBAC_ERROR_CODES.FORBIDDEN, message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends RbacError {
  constructor(message: string) {
    super(RBAC_ERROR_CODES.NOT_FOUND, message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends RbacError {
  constructor(message: string) {
    super(RBAC_ERROR_CODES.CONFLICT, message);
    this.name = 'ConflictError';
  }
}

export function isRbacError(err: unknown): err is RbacError {
  return err instanceof RbacError;
}

/** True when `err` is a driver error carrying the given SQLSTATE. */
function hasSqlState(err: unknown, sqlState: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === sqlState;
}

/**
 * True when `err` is a driver error for a violated unique or primary-key
 * constraint.
 */
export function isUniqueViolation(err: unknown): boolean {
  return hasSqlState(err, PG_UNIQUE_VIOLATION);
}

/** True when `err` is a driver error for a row referencing a missing row. */
export function isForeignKeyViolation(err: unknown): boolean {
  return hasSqlState(err, PG_FOREIGN_KEY_VIOLATION);
}

/**
 * Await a store write and rethrow a unique violation as a ConflictError
 * carrying `message`. Any other failure propagates unchanged.
 */
export async function translateUniqueViolation<T>(
  write: Promise<T>,
  message: string,
): Promise<T> {
  try {
    return await write;
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ConflictError(message);
    }
    throw err;
  }
}
