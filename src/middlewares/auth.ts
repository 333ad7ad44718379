import { Request, Response, NextFunction } from 'express';
import { settings } from '../config/settings';
import { AppError } from '../utils/AppError';
import { verifyToken } from '../utils/tokens';
import { USER_ROLES, UserRole } from '../models/User';
import type { AuthContext } from '../types/express';

const isRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && USER_ROLES.some((role) => role === value);

export const readSession = (token: string, secret: string = settings.security.tokenSecret): AuthContext | null => {
  const payload = verifyToken(token, secret);
  if (!payload || payload.typ !== 'session') return null;
  const { sub, role } = payload;
  if (typeof sub !== 'string' || !isRole(role)) return null;
  return { userId: sub, role };
};

/** Bearer session token issued by login. */
export const authenticate = (req: Request, _res: Response, next: NextFunction) => {
  const header = req.headers.authorization ?? '';
  const [scheme, token] = header.split(' ');
  if (scheme !== 'Bearer' || !token) return next(new AppError('Authentication required', 401, 'UNAUTHENTICATED'));

  const session = readSession(token);
  if (!session) return next(new AppError('Invalid or expired session', 401, 'UNAUTHENTICATED'));
  req.auth = session;
  next();
};

export const requireRole = (...roles: UserRole[]) => (req: Request, _res: Response, next: NextFunction) => {
  if (!req.auth) return next(new AppError('Authentication required', 401, 'UNAUTHENTICATED'));
  if (!roles.includes(req.auth.role)) return next(new AppError('Forbidden', 403, 'FORBIDDEN'));
  next();
};

/** The authenticated caller; `authenticate` must run first. */
export const currentAuth = (req: Request): AuthContext => {
  if (!req.auth) throw new AppError('Authentication required', 401, 'UNAUTHENTICATED');
  return req.auth;
};
