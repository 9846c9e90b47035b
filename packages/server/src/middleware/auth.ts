import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { User, UserStore } from '../repositories/types.js';
import { asyncHandler, ForbiddenError, UnauthorizedError } from './error-handler.js';
import { bearerToken, verifyToken } from '../utils/token.js';
import { isListedRoute, type RouteRule } from '../utils/route-pattern.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('AuthMiddleware');

/**
 * Routes served without identity resolution (paths relative to the API prefix)
 */
export const PUBLIC_ROUTES: readonly RouteRule[] = [
  { method: 'POST', path: '/users' },
  { method: 'POST', path: '/token' },
  { method: 'POST', path: '/token/refresh' },
  { method: 'POST', path: '/users/verify-email/{token}' },
  { method: 'GET', path: '/health' },
];

/**
 * Routes open to anonymous callers. A token, when sent, must still be valid.
 */
export const OPTIONAL_AUTH_ROUTES: readonly RouteRule[] = [
  { method: 'GET', path: '/notes' },
  { method: 'GET', path: '/notes/{id}' },
  { method: 'GET', path: '/notes/{id}/authors' },
];

async function resolveUser(users: UserStore, token: string): Promise<User> {
  const claims = verifyToken(token, 'access');
  if (!claims) {
    throw new UnauthorizedError('Invalid or expired token');
  }

  let user: User | null;
  try {
    user = await users.findById(claims.userId);
  } catch (error) {
    logger.error({ error, userId: claims.userId }, 'User lookup failed during authentication');
    throw new UnauthorizedError('Invalid or expired token');
  }

  if (!user || !user.isActive) {
    logger.warn({ userId: claims.userId }, 'Token subject is missing or inactive');
    throw new UnauthorizedError('User account inactive or not found');
  }

  return user;
}

/**
 * Authentication gate - resolves the bearer token to an active user and
 * attaches it as `req.user`. Mounted once, ahead of every API route.
 */
export function createAuthGate(users: UserStore): RequestHandler {
  return asyncHandler(async (req: Request, _res: Response, next: NextFunction) => {
    if (isListedRoute(PUBLIC_ROUTES, req.method, req.path)) {
      next();
      return;
    }

    const token = bearerToken(req.headers.authorization);
    if (!token) {
      if (isListedRoute(OPTIONAL_AUTH_ROUTES, req.method, req.path)) {
        next();
        return;
      }
      throw new UnauthorizedError('Missing authentication token');
    }

    req.user = await resolveUser(users, token);
    next();
  });
}

/**
 * Route guard for endpoints that need an identity
 */
export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new UnauthorizedError('Authentication required'));
    return;
  }
  next();
}

export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new UnauthorizedError('Authentication required'));
    return;
  }
  if (req.user.role !== 'admin') {
    next(new ForbiddenError('Admin privileges required'));
    return;
  }
  next();
}

/**
 * Identity attached by the gate; only valid behind `requireAuth`
 */
export function currentUser(req: Request): User {
  if (!req.user) {
    throw new UnauthorizedError('Authentication required');
  }
  return req.user;
}
