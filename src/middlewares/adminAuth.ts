import { NextFunction, Response } from "express";
import { UserRole } from "../models/user";
import { AuthRequest } from "./auth";
import { ForbiddenError, UnauthorizedError } from "../utils/errors";

export const authorize = (...roles: UserRole[]) => {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthorizedError('Not authorized to access this route'));
      return;
    }

    if (!roles.includes(req.user.role)) {
      next(new ForbiddenError(`User role '${req.user.role}' is not authorized to access this route`));
      return;
    }

    next();
  };
};

// Admin only middleware
export const adminOnly = authorize(UserRole.ADMIN);
