import { type User, type UserRole, UserStatus } from "../../core/entities/user.entity.js";
import {
  type AppError,
  accountInactive,
  conflict,
  invalidCredentials,
  notFound,
} from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import type { UserId } from "../../core/types/brand.js";
import { normalizePage, toOffset } from "../../core/types/pagination.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { abortError } from "../../shared/utils/abort.js";
import type { CreateUserDto, LoginDto, UpdateUserDto } from "../dtos/user.dto.js";

/** Outward user projection without the password hash */
export interface UserView {
  readonly id: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly role: UserRole;
  readonly status: UserStatus;
  readonly avatarUrl: string | null;
  readonly phone: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export const toUserView = (u: User): UserView => ({
  id: u.id,
  email: u.email,
  firstName: u.firstName,
  lastName: u.lastName,
  role: u.role,
  status: u.status,
  avatarUrl: u.avatarUrl,
  phone: u.phone,
  createdAt: new Date(u.createdAt).toISOString(),
  updatedAt: new Date(u.updatedAt).toISOString(),
});

export interface ListUsersOptions {
  readonly role?: UserRole | undefined;
  readonly status?: UserStatus | undefined;
  readonly page: number;
  readonly limit: number;
}

/**
 * Every operation takes an optional AbortSignal; once it fires the
 * operation resolves to CANCELLED (or TIMEOUT) instead of waiting on the
 * database.
 */
export interface UserService {
  createUser(dto: CreateUserDto, signal?: AbortSignal): Promise<Result<UserView, AppError>>;
  getUserById(id: UserId, signal?: AbortSignal): Promise<Result<UserView, AppError>>;
  getUserByEmail(email: string, signal?: AbortSignal): Promise<Result<UserView, AppError>>;
  /** Names always overwrite; phone and avatar only when non-empty */
  updateUser(
    id: UserId,
    dto: UpdateUserDto,
    signal?: AbortSignal,
  ): Promise<Result<UserView, AppError>>;
  /** Any status may move to any other; there is no transition graph */
  updateUserStatus(
    id: UserId,
    status: UserStatus,
    signal?: AbortSignal,
  ): Promise<Result<void, AppError>>;
  /** Newest first; an empty page is an empty array */
  listUsers(
    options: ListUsersOptions,
    signal?: AbortSignal,
  ): Promise<Result<readonly UserView[], AppError>>;
  login(dto: LoginDto, signal?: AbortSignal): Promise<Result<UserView, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly passwordHasher: PasswordHasher;
  readonly logger: Logger;
}

export const createUserService = (deps: Deps): UserService => {
  const { userRepo, passwordHasher, logger } = deps;

  return {
    async createUser(dto: CreateUserDto, signal?: AbortSignal) {
      logger.debug("Creating user", { role: dto.role });

      const existing = await userRepo.findByEmail(dto.email, signal);
      if (!existing.ok) {
        logger.error("Existing-user lookup failed", { code: existing.error.code });
        return existing;
      }
      if (existing.value !== null) {
        logger.warn("Email already registered", { userId: existing.value.id });
        return err(conflict("User with this email already exists"));
      }

      const hashResult = await passwordHasher.hash(dto.password);
      if (!hashResult.ok) {
        logger.error("Password hashing failed during create");
        return hashResult;
      }

      // Hashing can't be interrupted; don't write once the caller has gone
      if (signal?.aborted) return err(abortError(signal));

      const created = await userRepo.create(
        {
          email: dto.email,
          passwordHash: hashResult.value,
          firstName: dto.firstName,
          lastName: dto.lastName,
          role: dto.role,
          status: UserStatus.ACTIVE,
          phone: dto.phone || null,
        },
        signal,
      );
      if (!created.ok) {
        // CONFLICT here means a concurrent create won the unique index
        logger.warn("User creation failed", { code: created.error.code });
        return created;
      }

      logger.info("User created", { userId: created.value.id, role: created.value.role });
      return ok(toUserView(created.value));
    },

    async getUserById(id: UserId, signal?: AbortSignal) {
      const result = await userRepo.findById(id, signal);
      if (!result.ok) return result;
      if (result.value === null) {
        logger.debug("User not found", { userId: id });
        return err(notFound("User"));
      }
      return ok(toUserView(result.value));
    },

    async getUserByEmail(email: string, signal?: AbortSignal) {
      const result = await userRepo.findByEmail(email, signal);
      if (!result.ok) return result;
      if (result.value === null) return err(notFound("User"));
      return ok(toUserView(result.value));
    },

    async updateUser(id: UserId, dto: UpdateUserDto, signal?: AbortSignal) {
      const existing = await userRepo.findById(id, signal);
      if (!existing.ok) return existing;
      if (existing.value === null) return err(notFound("User"));

      const current = existing.value;
      // An empty string is indistinguishable from "not supplied": keep what's stored
      const result = await userRepo.update(
        id,
        {
          firstName: dto.firstName,
          lastName: dto.lastName,
          phone: dto.phone || current.phone,
          avatarUrl: dto.avatarUrl || current.avatarUrl,
        },
        signal,
      );
      if (!result.ok) {
        logger.warn("User update failed", { userId: id, code: result.error.code });
        return result;
      }
      // Row vanished between the read and the write
      if (result.value === null) return err(notFound("User"));

      logger.info("User updated", { userId: id });
      return ok(toUserView(result.value));
    },

    async updateUserStatus(id: UserId, status: UserStatus, signal?: AbortSignal) {
      const existing = await userRepo.findById(id, signal);
      if (!existing.ok) return existing;
      if (existing.value === null) return err(notFound("User"));

      const result = await userRepo.updateStatus(id, status, signal);
      if (!result.ok) {
        logger.warn("Status update failed", { userId: id, code: result.error.code });
        return result;
      }
      if (!result.value) return err(notFound("User"));

      logger.info("User status changed", { userId: id, from: existing.value.status, to: status });
      return ok(undefined);
    },

    async listUsers(options: ListUsersOptions, signal?: AbortSignal) {
      const page = normalizePage(options.page, options.limit);

      const result = await userRepo.list(
        {
          role: options.role,
          status: options.status,
          limit: page.limit,
          offset: toOffset(page),
        },
        signal,
      );
      if (!result.ok) {
        logger.error("Listing users failed", { code: result.error.code });
        return result;
      }
      return ok(result.value.map(toUserView));
    },

    async login(dto: LoginDto, signal?: AbortSignal) {
      const found = await userRepo.findByEmail(dto.email, signal);
      if (!found.ok) return found;

      const user = found.value;
      if (user === null) {
        logger.warn("Login failed", { reason: "unknown_email" });
        return err(invalidCredentials());
      }

      const verified = await passwordHasher.verify(dto.password, user.passwordHash);
      if (!verified.ok) {
        logger.error("Password verification errored", { userId: user.id });
        return verified;
      }
      if (!verified.value) {
        logger.warn("Login failed", { userId: user.id, reason: "bad_password" });
        return err(invalidCredentials());
      }

      // Status is checked only once the password has verified
      if (user.status !== UserStatus.ACTIVE) {
        logger.warn("Login refused", { userId: user.id, status: user.status });
        return err(accountInactive());
      }

      logger.info("User logged in", { userId: user.id });
      return ok(toUserView(user));
    },
  };
};
