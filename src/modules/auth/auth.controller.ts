import { Response, NextFunction } from 'express';
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { pool } from '../../connections';
import { appConfig } from '../../connections/config/app.config';
import type { PublicUser, User } from '../../connections/db/models/user.model';
import { PASSWORD_SALT_ROUNDS, USER_STATUS } from '../../constants/user.constants';
import { getAuthUser } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { AuthResponse, LoginResponse } from '../../types/response.types';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { loginSchema, registerSchema } from './auth.validation';

const PUBLIC_USER_COLUMNS = 'id, email, full_name, status, role, last_login_at, created_at, updated_at';

const toAuthResponse = (user: Pick<PublicUser, 'id' | 'email' | 'full_name' | 'role'>): AuthResponse => ({
  user: {
    id: user.id,
    email: user.email,
    full_name: user.full_name,
    role: user.role,
  },
});

// Đăng ký
export const register = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { email, password, full_name } = registerSchema.parse(req.body);

    const existingUser = await pool.query<{ id: string }>('SELECT id FROM users WHERE email = $1', [email]);
    if (existingUser.rows.length > 0) {
      logger.warn('[Register] User already exists', { email, ip: req.ip });
      throw new ConflictError('Email is already registered');
    }

    const passwordHash = await bcrypt.hash(password, PASSWORD_SALT_ROUNDS);

    const result = await pool.query<PublicUser>(
      `INSERT INTO users (email, password_hash, full_name)
       VALUES ($1, $2, $3)
       RETURNING ${PUBLIC_USER_COLUMNS}`,
      [email, passwordHash, full_name ?? null]
    );
    const user = result.rows[0];

    auditLog('USER_REGISTERED', { userId: user.id, email, ip: req.ip });
    logger.info('[Register] User registered successfully', { userId: user.id });

    return ResponseHandler.created(res, toAuthResponse(user), 'Registration successful');
  } catch (error: unknown) {
    next(error);
  }
};

// Đăng nhập
export const login = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { email, password } = loginSchema.parse(req.body);

    const result = await pool.query<User>('SELECT * FROM users WHERE email = $1', [email]);

    if (result.rows.length === 0) {
      logger.warn('[Login] User not found', { email, ip: req.ip });
      return ResponseHandler.unauthorized(res, 'Invalid email or password');
    }

    const user = result.rows[0];

    if (user.status !== USER_STATUS.ACTIVE) {
      logger.warn('[Login] Account banned', { userId: user.id, ip: req.ip });
      return ResponseHandler.forbidden(res, 'Account is locked');
    }

    const isValidPassword = await bcrypt.compare(password, user.password_hash);
    if (!isValidPassword) {
      logger.warn('[Login] Invalid password', { userId: user.id, ip: req.ip });
      return ResponseHandler.unauthorized(res, 'Invalid email or password');
    }

    const token = jwt.sign({ userId: user.id, role: user.role }, appConfig.jwtSecret, {
      expiresIn: appConfig.jwtExpiresIn,
    });

    await pool.query('UPDATE users SET last_login_at = NOW() WHERE id = $1', [user.id]);

    auditLog('USER_LOGIN', { userId: user.id, email: user.email, ip: req.ip });

    const responseData: LoginResponse = { token, ...toAuthResponse(user) };
    return ResponseHandler.success(res, responseData, 'Login successful');
  } catch (error: unknown) {
    next(error);
  }
};

// Get current user
export const getCurrentUser = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const authUser = getAuthUser(req);

    const result = await pool.query<PublicUser>(
      `SELECT ${PUBLIC_USER_COLUMNS} FROM users WHERE id = $1`,
      [authUser.id]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('User not found');
    }

    return ResponseHandler.success(res, result.rows[0]);
  } catch (error: unknown) {
    next(error);
  }
};
