import type { Timestamp, UserId } from "../types/brand.js";

/**
 * User entity: plain data.
 */
export interface User {
  readonly id: UserId;
  readonly email: string;
  readonly passwordHash: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly role: UserRole;
  readonly status: UserStatus;
  readonly avatarUrl: string | null;
  readonly phone: string | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

export const UserRole = {
  GAMER: "gamer",
  ADMIN: "admin",
  SUPER_ADMIN: "super_admin",
} as const;

export type UserRole = (typeof UserRole)[keyof typeof UserRole];

export const USER_ROLES = [UserRole.GAMER, UserRole.ADMIN, UserRole.SUPER_ADMIN] as const;

/** Soft delete is a move to INACTIVE; rows are never removed. */
export const UserStatus = {
  ACTIVE: "active",
  INACTIVE: "inactive",
  SUSPENDED: "suspended",
} as const;

export type UserStatus = (typeof UserStatus)[keyof typeof UserStatus];

export const USER_STATUSES = [UserStatus.ACTIVE, UserStatus.INACTIVE, UserStatus.SUSPENDED] as const;
