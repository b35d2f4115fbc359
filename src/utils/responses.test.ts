/**
 * Unit tests for API response formatters.
 *
 * Validates the JSON error structure, field-specific details, HTTP status
 * mapping, and request correlation IDs.
 */

import { describe, it, expect } from 'vitest';
import {
  generateRequestId,
  formatErrorResponse,
  getHttpStatusForError,
  formatInternalError,
} from './responses.js';
import { RBAC_ERROR_CODES } from '../types/index.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

// ─── generateRequestId ──────────────────────────────────────────────────────

describe('generateRequestId', () => {
  it('should return a valid UUID v4 string', () => {
    expect(generateRequestId()).toMatch(UUID_REGEX);
  });

  it('should return unique IDs on successive calls', () => {
    expect(generateRequestId()).not.toBe(generateRequestId());
  });
});

// ─── formatErrorResponse ────────────────────────────────────────────────────

describe('formatErrorResponse', () => {
  it('should return success: false with code and message', () => {
    const result = formatErrorResponse(RBAC_ERROR_CODES.NOT_FOUND, 'Role not found', 'req-1');

    expect(result).toEqual({
      success: false,
      error: { code: 'RBAC_NOT_FOUND', message: 'Role not found' },
      requestId: 'req-1',
    });
  });

  it('should generate a request ID when none is provided', () => {
    const result = formatErrorResponse(RBAC_ERROR_CODES.CONFLICT, 'Role already exists');

    expect(result.requestId).toMatch(UUID_REGEX);
  });

  it('should include field errors when present', () => {
    const result = formatErrorResponse(
      RBAC_ERROR_CODES.VALIDATION_ERROR,
      'Request validation failed',
      'req-2',
      { roleId: ['roleId is required'] },
    );

    expect(result.error.fields).toEqual({ roleId: ['roleId is required'] });
  });

  it('should omit an empty field map', () => {
    const result = formatErrorResponse(
      RBAC_ERROR_CODES.VALIDATION_ERROR,
      'Request validation failed',
      'req-3',
      {},
    );

    expect(result.error).not.toHaveProperty('fields');
  });
});

// ─── getHttpStatusForError ──────────────────────────────────────────────────

describe('getHttpStatusForError', () => {
  it.each([
    [RBAC_ERROR_CODES.VALIDATION_ERROR, 400],
    [RBAC_ERROR_CODES.UNAUTHENTICATED, 401],
    [RBAC_ERROR_CODES.INVALID_CREDENTIALS, 401],
    [RBAC_ERROR_CODES.FORBIDDEN, 403],
    [RBAC_ERROR_CODES.NOT_FOUND, 404],
    [RBAC_ERROR_CODES.CONFLICT, 409],
    [RBAC_ERROR_CODES.INTERNAL_ERROR, 500],
  ])('should map %s to %i', (code, status) => {
    expect(getHttpStatusForError(code)).toBe(status);
  });

  it('should return 500 for unknown codes', () => {
    expect(getHttpStatusForError('SOMETHING_ELSE')).toBe(500);
  });
});

// ─── formatInternalError ────────────────────────────────────────────────────

describe('formatInternalError', () => {
  it('should use a generic message', () => {
    expect(formatInternalError('req-4')).toEqual({
      success: false,
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred. Please try again later.',
      },
      requestId: 'req-4',
    });
  });
});
