/**
 * PostgreSQL user repository. Implements the UserRepository port on top of
 * the users query gateway.
 *
 * "No row" comes back as null, a unique-email violation as CONFLICT, an
 * abort as CANCELLED/TIMEOUT, and anything else as a generic INTERNAL whose
 * cause is kept for logging only.
 */

import type { User } from "../../../core/entities/user.entity.js";
import { type AppError, conflict, internal } from "../../../core/errors/app-error.js";
import type {
  CreateUserData,
  UpdateUserData,
  UserListOptions,
  UserRepository,
} from "../../../core/ports/user.repository.js";
import type { UserId } from "../../../core/types/brand.js";
import { brand } from "../../../core/types/brand.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { abortError, untilAborted } from "../../../shared/utils/abort.js";
import { isUuid } from "../../../shared/utils/id.js";
import type { UserQueries, UserRow } from "./user.queries.js";

const rowToUser = (row: UserRow): User => ({
  id: brand<string, "UserId">(row.id),
  email: row.email,
  passwordHash: row.password_hash,
  firstName: row.first_name,
  lastName: row.last_name,
  role: row.role,
  status: row.status,
  avatarUrl: row.avatar_url,
  phone: row.phone,
  createdAt: brand<number, "Timestamp">(row.created_at.getTime()),
  updatedAt: brand<number, "Timestamp">(row.updated_at.getTime()),
});

/** SQLSTATE 23505 unique_violation */
const isUniqueViolation = (e: unknown): boolean =>
  e instanceof Error && "code" in e && e.code === "23505";

/**
 * Await a gateway call under the caller's signal and fold every failure
 * into an AppError.
 */
const run = async <T>(
  signal: AbortSignal | undefined,
  op: () => Promise<T>,
): Promise<Result<T, AppError>> => {
  if (signal?.aborted) return err(abortError(signal));
  try {
    return ok(await untilAborted(op(), signal));
  } catch (e: unknown) {
    if (signal?.aborted) return err(abortError(signal));
    if (isUniqueViolation(e)) return err(conflict("User with this email already exists"));
    return err(internal("Database error", e));
  }
};

export const createPgUserRepository = (queries: UserQueries): UserRepository => ({
  async create(data: CreateUserData, signal?: AbortSignal): Promise<Result<User, AppError>> {
    const result = await run(signal, () => queries.insertUser(data));
    return result.ok ? ok(rowToUser(result.value)) : result;
  },

  async findById(id: UserId, signal?: AbortSignal): Promise<Result<User | null, AppError>> {
    // A malformed id can't match any row; don't let the driver reject it
    if (!isUuid(id)) return ok(null);

    const result = await run(signal, () => queries.selectUserById(id));
    if (!result.ok) return result;
    return ok(result.value ? rowToUser(result.value) : null);
  },

  async findByEmail(email: string, signal?: AbortSignal): Promise<Result<User | null, AppError>> {
    const result = await run(signal, () => queries.selectUserByEmail(email));
    if (!result.ok) return result;
    return ok(result.value ? rowToUser(result.value) : null);
  },

  async update(
    id: UserId,
    data: UpdateUserData,
    signal?: AbortSignal,
  ): Promise<Result<User | null, AppError>> {
    if (!isUuid(id)) return ok(null);

    const result = await run(signal, () => queries.updateUser({ id, ...data }));
    if (!result.ok) return result;
    return ok(result.value ? rowToUser(result.value) : null);
  },

  async updateStatus(id, status, signal) {
    if (!isUuid(id)) return ok(false);

    const result = await run(signal, () => queries.updateUserStatus(id, status));
    if (!result.ok) return result;
    return ok(result.value > 0);
  },

  async list(options: UserListOptions, signal?: AbortSignal) {
    const result = await run(signal, () =>
      queries.selectUsers({
        role: options.role ?? null,
        status: options.status ?? null,
        limit: options.limit,
        offset: options.offset,
      }),
    );
    if (!result.ok) return result;
    return ok(result.value.map(rowToUser));
  },

  async ping(signal?: AbortSignal) {
    return run(signal, () => queries.ping());
  },
});
