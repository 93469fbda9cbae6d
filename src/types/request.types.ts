import { Request } from 'express';
import type { UserRole } from '../constants/user.constants';

/**
 * Request Types và Interfaces cho toàn hệ thống
 */

/**
 * Auth Request - Request với thông tin user đã authenticated
 */
export interface AuthRequest extends Request {
  user?: AuthUser;
}

export interface AuthUser {
  id: string; // UUID từ database
  email: string;
  role: UserRole;
}

/**
 * Pagination Query Parameters
 */
export interface PaginationQuery {
  page?: number;
  limit?: number;
}
