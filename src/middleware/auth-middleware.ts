import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { UserStore } from '../models/user.js';
import { toPublicUser } from '../services/auth-service.js';
import type { IdentityResult, PublicUser } from '../types/auth-types.js';
import { ExpiredTokenError, InvalidTokenError, UnauthenticatedError } from '../utils/errors.js';
import type { TokenService } from '../utils/jwt.js';

export interface IdentityResolverDeps {
  tokens: TokenService;
  users: UserStore;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Extract the token from a raw Authorization header value
 * @returns Token string or null if the header is absent or not a bearer credential
 */
export const extractBearerToken = (authorization: string | undefined): string | null => {
  if (!authorization) {
    return null;
  }

  const match = BEARER_PATTERN.exec(authorization.trim());
  return match ? match[1] : null;
};

/**
 * Resolve the user behind an Authorization header.
 *
 * Missing or malformed credentials, invalid or expired tokens, and tokens for
 * users that no longer exist all come back as an UnauthenticatedError result.
 * Anything else (a broken store, say) is thrown.
 */
export const resolveIdentity = (
  authorization: string | undefined,
  { tokens, users }: IdentityResolverDeps,
  now: Date = new Date()
): IdentityResult => {
  const token = extractBearerToken(authorization);

  if (!token) {
    return { ok: false, error: new UnauthenticatedError('Not authenticated') };
  }

  let userId: number;
  try {
    userId = tokens.validate(token, now);
  } catch (error) {
    if (error instanceof InvalidTokenError || error instanceof ExpiredTokenError) {
      return { ok: false, error: new UnauthenticatedError(error.message) };
    }
    throw error;
  }

  const user = users.findById(userId);
  if (!user) {
    return { ok: false, error: new UnauthenticatedError('User not found') };
  }

  return { ok: true, user: toPublicUser(user) };
};

/**
 * Authentication middleware that requires a valid bearer token.
 * Attaches the resolved user to req.user for this request only;
 * failures go to the error handler as 401s.
 */
export const requireAuth = (deps: IdentityResolverDeps): RequestHandler => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      const result = resolveIdentity(req.headers.authorization, deps);

      if (!result.ok) {
        next(result.error);
        return;
      }

      req.user = result.user;
      next();
    } catch (error) {
      next(error);
    }
  };
};

/**
 * Read the user attached by requireAuth
 * @throws UnauthenticatedError if the route was not mounted behind requireAuth
 */
export const currentUser = (req: Request): PublicUser => {
  if (!req.user) {
    throw new UnauthenticatedError('Not authenticated');
  }
  return req.user;
};
