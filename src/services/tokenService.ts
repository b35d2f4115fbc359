/**
 * Token service.
 *
 * Issues and validates the HS256-signed JWT access tokens that carry a
 * caller's identity. The HTTP layer resolves a bearer token to a user id
 * through {@link PrincipalResolver}; everything past that point works on
 * the id alone.
 *
 * @module services/tokenService
 */

import jwt from 'jsonwebtoken';
import type { AccessToken } from '../types/index.js';

// ─── Constants ───────────────────────────────────────────────────────────────

/** Default access token lifetime in minutes. */
export const DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES = 30;

// ─── Types ───────────────────────────────────────────────────────────────────

/** Maps a bearer token to the id of the user it was issued for. */
export interface PrincipalResolver {
  /** @returns The user id, or null for an invalid, expired or foreign token */
  resolvePrincipal(token: string): Promise<number | null>;
}

export interface TokenService extends PrincipalResolver {
  issueAccessToken(userId: number): AccessToken;
}

export interface TokenServiceOptions {
  secret: string;
  expiresInMinutes?: number;
}

// ─── Implementation ──────────────────────────────────────────────────────────

/**
 * Create a token service signing with `secret`.
 *
 * @throws {Error} If the secret is empty.
 */
export function createTokenService(options: TokenServiceOptions): TokenService {
  if (!options.secret) {
    throw new Error('JWT_SECRET environment variable is not set');
  }
  const secret = options.secret;
  const expirySeconds = (options.expiresInMinutes ?? DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES) * 60;

  return {
    /**
     * The payload carries `userId` and `type: 'access'` claims.
     */
    issueAccessToken(userId: number): AccessToken {
      const now = Math.floor(Date.now() / 1000);
      const accessToken = jwt.sign({ userId, type: 'access' }, secret, {
        algorithm: 'HS256',
        expiresIn: expirySeconds,
      });
      return { accessToken, expiresAt: new Date((now + expirySeconds) * 1000) };
    },

    async resolvePrincipal(token: string): Promise<number | null> {
      let decoded: string | jwt.JwtPayload;
      try {
        decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
      } catch (err) {
        if (err instanceof jwt.JsonWebTokenError) {
          // Covers expiry and not-yet-valid, which subclass it
          return null;
        }
        throw err;
      }

      if (typeof decoded === 'string' || decoded['type'] !== 'access') {
        return null;
      }

      const userId: unknown = decoded['userId'];
      if (typeof userId !== 'number' || !Number.isInteger(userId) || userId <= 0) {
        return null;
      }
      return userId;
    },
  };
}
