import { Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { pool } from '../connections';
import { appConfig } from '../connections/config/app.config';
import { USER_STATUS } from '../constants/user.constants';
import type { UserRole } from '../constants/user.constants';
import type { User } from '../connections/db/models/user.model';
import { AuthRequest, AuthUser } from '../types/request.types';
import { ResponseHandler } from '../utils/response';
import { AppError } from '../utils/errors';

const resolveUserFromToken = async (token: string): Promise<AuthUser> => {
  const decoded = jwt.verify(token, appConfig.jwtSecret);

  if (typeof decoded === 'string' || typeof decoded.userId !== 'string') {
    throw new Error('Invalid token payload');
  }

  const result = await pool.query<Pick<User, 'id' | 'email' | 'role' | 'status'>>(
    'SELECT id, email, role, status FROM users WHERE id = $1',
    [decoded.userId]
  );

  if (result.rows.length === 0) {
    throw new Error('User does not exist');
  }

  const user = result.rows[0];

  if (user.status !== USER_STATUS.ACTIVE) {
    throw new Error('Account is locked');
  }

  return {
    id: user.id,
    email: user.email,
    role: user.role,
  };
};

export const authenticate = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
) => {
  try {
    const token = req.headers.authorization?.split(' ')[1];

    if (!token) {
      return ResponseHandler.unauthorized(res, 'Token not provided');
    }

    req.user = await resolveUserFromToken(token);

    next();
  } catch (error: unknown) {
    return ResponseHandler.unauthorized(res, error instanceof Error ? error.message : 'Invalid token');
  }
};

export const requireRole = (...roles: UserRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'Access denied');
    }

    next();
  };
};

/**
 * User set by `authenticate`; throws 401 when the route forgot the middleware
 */
export const getAuthUser = (req: AuthRequest): AuthUser => {
  if (!req.user) {
    throw new AppError('Not authenticated', 401, 'UNAUTHORIZED');
  }
  return req.user;
};
