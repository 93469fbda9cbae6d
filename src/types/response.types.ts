import type { PublicUser } from '../connections/db/models/user.model';

/**
 * Response Types cho các modules
 */

export interface AuthResponse {
  user: Pick<PublicUser, 'id' | 'email' | 'full_name' | 'role'>;
}

export interface LoginResponse extends AuthResponse {
  token: string;
}

export interface PaginationParams {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}
