import type { UserRole, UserStatus } from '../../../constants/user.constants';

// User Model

export interface User {
  id: string; // UUID
  email: string;
  password_hash: string;
  full_name: string | null;
  status: UserStatus; // default: 'active'
  role: UserRole; // default: 'user'
  last_login_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export type PublicUser = Omit<User, 'password_hash'>;

export interface CreateUserInput {
  email: string;
  password: string;
  full_name?: string | null;
}
