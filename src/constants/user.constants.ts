/**
 * User Role Constants
 */
export const USER_ROLE = {
  CUSTOMER: 'customer', // default
  STAFF: 'staff',
  ADMIN: 'admin',
} as const;

export type UserRole = typeof USER_ROLE[keyof typeof USER_ROLE];

export const USER_STATUS = {
  ACTIVE: 'active', // default
  BANNED: 'banned',
  DELETED: 'deleted',
} as const;

export type UserStatus = typeof USER_STATUS[keyof typeof USER_STATUS];

export const isUserRole = (value: unknown): value is UserRole =>
  Object.values(USER_ROLE).some(role => role === value);
