import jwt from 'jsonwebtoken';
import type { UserRole } from '../types/auth';

export interface JWTPayload {
  userId: string;
  email?: string;
  role: UserRole;
}

/** Throws when the token is malformed, expired or signed with another secret. */
export const verifyToken = (token: string, secret: string): JWTPayload => {
  const decoded = jwt.verify(token, secret);
  if (typeof decoded === 'string' || typeof decoded.userId !== 'string') {
    throw new jwt.JsonWebTokenError('Token payload is missing userId');
  }

  return {
    userId: decoded.userId,
    email: typeof decoded.email === 'string' ? decoded.email : undefined,
    role: decoded.role === 'admin' ? 'admin' : 'user',
  };
};
