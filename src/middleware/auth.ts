import { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AppConfig } from '../config/env';
import type { AuthUser, UserRole } from '../types/auth';
import { AuthenticationError, AuthorizationError } from '../utils/errors';
import { verifyToken } from '../utils/jwt';

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

const extractToken = (req: Request): string | undefined => {
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim();
  }
  const cookieToken: unknown = req.cookies?.token;
  return typeof cookieToken === 'string' ? cookieToken : undefined;
};

/**
 * Resolves the caller from a bearer token or the `token` cookie. Users listed
 * in `ADMIN_USER_IDS` are administrators whatever role their token carries.
 */
export const createAuthenticate = (auth: AppConfig['auth']): RequestHandler => {
  const adminIds = new Set(auth.adminUserIds);

  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = extractToken(req);
    if (!token) {
      next(new AuthenticationError('Authentication required'));
      return;
    }

    try {
      const payload = verifyToken(token, auth.jwtSecret);
      req.user = {
        userId: payload.userId,
        email: payload.email,
        role: adminIds.has(payload.userId) ? 'admin' : payload.role,
      };
      next();
    } catch {
      next(new AuthenticationError('Invalid or expired token'));
    }
  };
};

export const authorize = (...roles: UserRole[]): RequestHandler => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new AuthenticationError('Authentication required'));
      return;
    }
    if (!roles.includes(req.user.role)) {
      next(new AuthorizationError());
      return;
    }
    next();
  };
};

export const requireUser = (req: Request): AuthUser => {
  if (!req.user) {
    throw new AuthenticationError('Authentication required');
  }
  return req.user;
};
