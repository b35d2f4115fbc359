/**
 * API response formatters for consistent JSON error structure.
 *
 * Error responses carry `success: false`, an error object with
 * code/message/fields, and a request correlation ID for debugging.
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import { RBAC_ERROR_CODES, type ErrorResponse } from '../types/index.js';

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

const ERROR_STATUS_MAP: Record<string, number> = {
  [RBAC_ERROR_CODES.VALIDATION_ERROR]: 400,
  [RBAC_ERROR_CODES.UNAUTHENTICATED]: 401,
  [RBAC_ERROR_CODES.INVALID_CREDENTIALS]: 401,
  [RBAC_ERROR_CODES.FORBIDDEN]: 403,
  [RBAC_ERROR_CODES.NOT_FOUND]: 404,
  [RBAC_ERROR_CODES.CONFLICT]: 409,
  [RBAC_ERROR_CODES.INTERNAL_ERROR]: 500,
};

/** Default HTTP status for unknown error codes. */
const DEFAULT_ERROR_STATUS = 500;

// ─── Correlation ID ──────────────────────────────────────────────────────────

/**
 * Generate a unique request correlation ID (UUID v4).
 */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Error Formatters ────────────────────────────────────────────────────────

/**
 * Format an error response with error code, message, optional field errors,
 * and a correlation ID.
 *
 * @param code - Machine-readable error code (e.g. RBAC_CONFLICT)
 * @param message - Human-readable error description
 * @param requestId - Correlation ID; auto-generated if not provided
 * @param fields - Optional field-specific validation errors
 */
export function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
  fields?: Record<string, string[]>,
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    requestId: requestId ?? generateRequestId(),
  };

  if (fields && Object.keys(fields).length > 0) {
    response.error.fields = fields;
  }

  return response;
}

/**
 * Get the HTTP status code for a given error code, or 500 for unknown codes.
 */
export function getHttpStatusForError(code: string): number {
  return ERROR_STATUS_MAP[code] ?? DEFAULT_ERROR_STATUS;
}

/**
 * Format an internal server error response.
 * Uses a generic message to avoid leaking implementation details.
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    RBAC_ERROR_CODES.INTERNAL_ERROR,
    'An unexpected error occurred. Please try again later.',
    requestId,
  );
}
