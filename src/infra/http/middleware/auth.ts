import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthenticationError } from '../../../application/errors.js';
import type { Principal } from '../../../application/auth/guards.js';
import type { TokenService } from '../../../application/auth/tokens.js';

// Auth schemes are case-insensitive
const BEARER_PATTERN = /^bearer\s+(\S+)\s*$/i;

/**
 * Require a valid access token and attach the principal to the request.
 * Refresh tokens are rejected here.
 */
export function authenticate(tokens: TokenService): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    const match = authHeader ? BEARER_PATTERN.exec(authHeader) : null;
    if (!match) {
      next(new AuthenticationError('Missing or invalid authorization header'));
      return;
    }

    const token = match[1];

    try {
      const claims = tokens.verify(token, 'access');
      req.principal = {
        userId: claims.sub,
        email: claims.email,
        isAdmin: claims.is_admin === true,
      };
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Principal of an authenticated request. Handlers mounted behind
 * `authenticate` can rely on it being present.
 */
export function requirePrincipal(req: Request): Principal {
  if (!req.principal) {
    throw new AuthenticationError('Authentication required');
  }
  return req.principal;
}
