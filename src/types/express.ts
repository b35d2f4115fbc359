/**
 * Fields the middleware attaches to an Express request.
 */

import type { UserWithRoles } from './index.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by `requestLogger`. */
      correlationId?: string;
      /** The authenticated caller, set by the `authenticate` guard. */
      principal?: UserWithRoles;
    }
  }
}

export {};
