import { Request, Response, NextFunction } from 'express';
import jwt, { JwtPayload } from 'jsonwebtoken';
import { UserRole } from '../models/user';
import { config } from '../config/env';
import type { Principal } from '../types/auth';
import { UnauthorizedError } from '../utils/errors';

// Extend Express Request interface
export interface AuthRequest extends Request {
  user?: Principal;
}

const ROLES: readonly string[] = Object.values(UserRole);

const isRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && ROLES.includes(value);

const readToken = (req: Request): string | undefined => {
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) return header.slice('Bearer '.length).trim();

  const cookie: unknown = req.cookies?.token;
  return typeof cookie === 'string' && cookie !== '' ? cookie : undefined;
};

/** Narrows verified claims `{ id, role, email, phone, name }` into a principal. */
export const toPrincipal = (payload: string | JwtPayload): Principal | null => {
  if (typeof payload === 'string') return null;

  const { id, role, email, phone, name } = payload;
  if (typeof id !== 'string' || !isRole(role)) return null;

  return {
    userId: id,
    role,
    email: typeof email === 'string' ? email : '',
    phone: typeof phone === 'string' && phone !== '' ? phone : null,
    name: typeof name === 'string' ? name : '',
  };
};

// Tokens are trusted as issued; there is no user lookup per request.
export const protect = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  const token = readToken(req);
  if (!token) {
    next(new UnauthorizedError('Not authorized'));
    return;
  }

  let principal: Principal | null;
  try {
    principal = toPrincipal(jwt.verify(token, config.jwtSecret));
  } catch {
    next(new UnauthorizedError('Not authorized'));
    return;
  }

  if (!principal) {
    next(new UnauthorizedError('Invalid token claims'));
    return;
  }

  req.user = principal;
  next();
};

/** Principal set by `protect`; routes without it are a wiring bug. */
export const requireUser = (req: AuthRequest): Principal => {
  if (!req.user) throw new UnauthorizedError('Not authorized');
  return req.user;
};
