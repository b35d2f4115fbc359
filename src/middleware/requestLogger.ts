/**
 * Request Logger Middleware
 *
 * Logs every HTTP request on arrival and on completion under a
 * correlation ID, which is taken from the `x-correlation-id` header when
 * the caller sends one and echoed back on the response.
 *
 * @module middleware/requestLogger
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logging/index.js';

// ── Express-compatible types (structural, so tests can pass plain objects) ──

interface Request {
  method: string;
  url: string;
  originalUrl?: string;
  headers: Record<string, string | string[] | undefined>;
  correlationId?: string;
}

interface Response {
  statusCode: number;
  on(event: string, listener: () => void): void;
  setHeader(name: string, value: string): void;
}

type NextFunction = (err?: unknown) => void;

export const CORRELATION_HEADER = 'x-correlation-id';

function getOrCreateCorrelationId(req: Request): string {
  const existing = req.headers[CORRELATION_HEADER];
  if (typeof existing === 'string' && existing.length > 0) return existing;
  return uuidv4();
}

/**
 * Logs incoming requests and outgoing responses with correlation ID.
 * Completed requests log at warn for 4xx and error for 5xx.
 */
export function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = getOrCreateCorrelationId(req);
    req.correlationId = correlationId;
    res.setHeader(CORRELATION_HEADER, correlationId);

    const start = Date.now();
    const method = req.method;
    const url = req.originalUrl ?? req.url;

    const child = logger.child({ correlationId });
    child.debug('request started', { method, url });

    res.on('finish', () => {
      const meta = { method, url, statusCode: res.statusCode, durationMs: Date.now() - start };
      if (res.statusCode >= 500) {
        child.error('request failed', undefined, meta);
      } else if (res.statusCode >= 400) {
        child.warn('request rejected', meta);
      } else {
        child.info('request completed', meta);
      }
    });

    next();
  };
}
