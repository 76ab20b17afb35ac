import type { User, UserRole, UserStatus } from "../entities/user.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: User Repository
 * Contract the domain expects; infrastructure implements it.
 *
 * Lookups resolve to `null` when no row matches; an `Err` always means the
 * lookup itself failed. Every call takes an optional AbortSignal and resolves
 * to CANCELLED or TIMEOUT once it fires.
 */
export interface UserRepository {
  /** Fails with CONFLICT when the email is already taken */
  create(data: CreateUserData, signal?: AbortSignal): Promise<Result<User, AppError>>;
  findById(id: UserId, signal?: AbortSignal): Promise<Result<User | null, AppError>>;
  findByEmail(email: string, signal?: AbortSignal): Promise<Result<User | null, AppError>>;
  update(
    id: UserId,
    data: UpdateUserData,
    signal?: AbortSignal,
  ): Promise<Result<User | null, AppError>>;
  /** Resolves to false when no row matched the id */
  updateStatus(
    id: UserId,
    status: UserStatus,
    signal?: AbortSignal,
  ): Promise<Result<boolean, AppError>>;
  list(options: UserListOptions, signal?: AbortSignal): Promise<Result<readonly User[], AppError>>;
  ping(signal?: AbortSignal): Promise<Result<void, AppError>>;
}

export interface CreateUserData {
  readonly email: string;
  readonly passwordHash: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly role: UserRole;
  readonly status: UserStatus;
  readonly phone: string | null;
}

/** Full replacement of the mutable profile columns */
export interface UpdateUserData {
  readonly firstName: string;
  readonly lastName: string;
  readonly phone: string | null;
  readonly avatarUrl: string | null;
}

export interface UserListOptions {
  readonly role?: UserRole | undefined;
  readonly status?: UserStatus | undefined;
  readonly limit: number;
  readonly offset: number;
}
