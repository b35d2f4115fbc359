/**
 * Global Express error handler.
 *
 * Renders RbacError subclasses with their own code and status, turns a
 * malformed JSON body into a validation error, and reports anything else
 * as INTERNAL_ERROR with a generic message after logging it.
 *
 * @module middleware/errorHandler
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import type { Logger } from '../logging/index.js';
import { isRbacError, ValidationError } from '../utils/errors.js';
import {
  formatErrorResponse,
  formatInternalError,
  getHttpStatusForError,
} from '../utils/responses.js';

/** body-parser marks unparseable JSON with this type. */
function isJsonParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed'
  );
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  // Express recognises error middleware by its four parameters
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = req.correlationId;

    const known = isJsonParseError(err)
      ? new ValidationError('Malformed JSON body', { body: ['Body is not valid JSON'] })
      : err;

    if (isRbacError(known)) {
      const fields = known instanceof ValidationError ? known.fields : undefined;
      const status = getHttpStatusForError(known.code);
      if (status === 401) {
        res.set('WWW-Authenticate', 'Bearer');
      }
      res
        .status(status)
        .json(formatErrorResponse(known.code, known.message, requestId, fields));
      return;
    }

    const log = requestId ? logger.child({ correlationId: requestId }) : logger;
    log.error(
        'Unhandled error',
        err instanceof Error ? err : new Error(String(err)),
        { method: req.method, url: req.originalUrl },
      );
    res.status(500).json(formatInternalError(requestId));
  };
}
