/**
 * User Role Constants
 */
export const USER_ROLE = {
  USER: 'user', // default
  ADMIN: 'admin',
} as const;

export type UserRole = typeof USER_ROLE[keyof typeof USER_ROLE];

/**
 * User Status Constants
 * Note: status is varchar enum: active, banned
 */
export const USER_STATUS = {
  ACTIVE: 'active', // default
  BANNED: 'banned',
} as const;

export type UserStatus = typeof USER_STATUS[keyof typeof USER_STATUS];

/**
 * Password hashing rounds (bcryptjs)
 */
export const PASSWORD_SALT_ROUNDS = 10;
