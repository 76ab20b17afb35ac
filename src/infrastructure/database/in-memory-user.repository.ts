import type { User } from "../../core/entities/user.entity.js";
import { type AppError, conflict } from "../../core/errors/app-error.js";
import type {
  CreateUserData,
  UpdateUserData,
  UserListOptions,
  UserRepository,
} from "../../core/ports/user.repository.js";
import type { UserId } from "../../core/types/brand.js";
import { brand } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { abortError } from "../../shared/utils/abort.js";
import { generateId } from "../../shared/utils/id.js";

interface Options {
  /** Clock override, lets tests pin creation order */
  readonly now?: () => number;
}

/**
 * In-memory user repository; swap for the Postgres adapter in production.
 * Used by the test suite and as the development fallback when no
 * DATABASE_URL is configured.
 */
export const createInMemoryUserRepository = (options: Options = {}): UserRepository => {
  const now = options.now ?? Date.now;
  const store = new Map<string, User>();
  // Insertion sequence breaks created_at ties so "newest first" stays stable
  const sequence = new Map<string, number>();
  let nextSeq = 0;

  const aborted = (signal?: AbortSignal): Result<never, AppError> | null =>
    signal?.aborted ? err(abortError(signal)) : null;

  return {
    async create(data: CreateUserData, signal?: AbortSignal): Promise<Result<User, AppError>> {
      const cancelled = aborted(signal);
      if (cancelled) return cancelled;

      // Mirrors the unique index on users.email
      for (const user of store.values()) {
        if (user.email === data.email) {
          return err(conflict("User with this email already exists"));
        }
      }

      const ts = brand<number, "Timestamp">(now());
      const user: User = {
        id: brand<string, "UserId">(generateId()),
        email: data.email,
        passwordHash: data.passwordHash,
        firstName: data.firstName,
        lastName: data.lastName,
        role: data.role,
        status: data.status,
        avatarUrl: null,
        phone: data.phone,
        createdAt: ts,
        updatedAt: ts,
      };

      store.set(user.id, user);
      sequence.set(user.id, nextSeq++);
      return ok(user);
    },

    async findById(id: UserId, signal?: AbortSignal): Promise<Result<User | null, AppError>> {
      const cancelled = aborted(signal);
      if (cancelled) return cancelled;
      return ok(store.get(id) ?? null);
    },

    async findByEmail(email: string, signal?: AbortSignal): Promise<Result<User | null, AppError>> {
      const cancelled = aborted(signal);
      if (cancelled) return cancelled;

      for (const user of store.values()) {
        if (user.email === email) return ok(user);
      }
      return ok(null);
    },

    async update(
      id: UserId,
      data: UpdateUserData,
      signal?: AbortSignal,
    ): Promise<Result<User | null, AppError>> {
      const cancelled = aborted(signal);
      if (cancelled) return cancelled;

      const existing = store.get(id);
      if (!existing) return ok(null);

      const updated: User = {
        ...existing,
        firstName: data.firstName,
        lastName: data.lastName,
        phone: data.phone,
        avatarUrl: data.avatarUrl,
        updatedAt: brand<number, "Timestamp">(now()),
      };

      store.set(id, updated);
      return ok(updated);
    },

    async updateStatus(id, status, signal) {
      const cancelled = aborted(signal);
      if (cancelled) return cancelled;

      const existing = store.get(id);
      if (!existing) return ok(false);

      store.set(id, { ...existing, status, updatedAt: brand<number, "Timestamp">(now()) });
      return ok(true);
    },

    async list(options: UserListOptions, signal?: AbortSignal) {
      const cancelled = aborted(signal);
      if (cancelled) return cancelled;

      const seq = (u: User): number => sequence.get(u.id) ?? 0;
      const users = Array.from(store.values())
        .filter((u) => options.role === undefined || u.role === options.role)
        .filter((u) => options.status === undefined || u.status === options.status)
        // Newest first
        .sort((a, b) => b.createdAt - a.createdAt || seq(b) - seq(a));

      return ok(users.slice(options.offset, options.offset + options.limit));
    },

    async ping(signal?: AbortSignal) {
      const cancelled = aborted(signal);
      if (cancelled) return cancelled;
      return ok(undefined);
    },
  };
};
