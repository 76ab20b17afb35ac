/**
 * Persistence gateway for the users table: one parameterised statement per
 * function. Rows are validated on the way out so a role or status outside
 * the enumerations can never reach the domain.
 */

import { z } from "zod";
import { USER_ROLES, USER_STATUSES } from "../../../core/entities/user.entity.js";
import type { UserRole, UserStatus } from "../../../core/entities/user.entity.js";
import type { SqlExecutor } from "./pool.js";

const userRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  password_hash: z.string().min(1),
  first_name: z.string(),
  last_name: z.string(),
  role: z.enum(USER_ROLES),
  status: z.enum(USER_STATUSES),
  avatar_url: z.string().nullable(),
  phone: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

export type UserRow = z.infer<typeof userRowSchema>;

export interface InsertUserParams {
  readonly email: string;
  readonly passwordHash: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly role: UserRole;
  readonly status: UserStatus;
  readonly phone: string | null;
}

export interface UpdateUserParams {
  readonly id: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phone: string | null;
  readonly avatarUrl: string | null;
}

export interface SelectUsersParams {
  readonly role: UserRole | null;
  readonly status: UserStatus | null;
  readonly limit: number;
  readonly offset: number;
}

export const SQL = {
  insertUser: `
    INSERT INTO users (email, password_hash, first_name, last_name, role, status, phone)
    VALUES ($1, $2, $3, $4, $5, $6, $7)
    RETURNING *`,
  selectUserById: "SELECT * FROM users WHERE id = $1 LIMIT 1",
  selectUserByEmail: "SELECT * FROM users WHERE email = $1 LIMIT 1",
  updateUser: `
    UPDATE users
    SET first_name = $2, last_name = $3, phone = $4, avatar_url = $5, updated_at = NOW()
    WHERE id = $1
    RETURNING *`,
  updateUserStatus: "UPDATE users SET status = $2, updated_at = NOW() WHERE id = $1",
  selectUsers: `
    SELECT * FROM users
    WHERE ($1::text IS NULL OR role = $1)
      AND ($2::text IS NULL OR status = $2)
    ORDER BY created_at DESC
    LIMIT $3 OFFSET $4`,
  ping: "SELECT 1",
} as const;

const firstRow = (rows: readonly unknown[]): UserRow | null =>
  rows.length === 0 ? null : userRowSchema.parse(rows[0]);

/**
 * Driver errors propagate as thrown exceptions; the repository decides
 * what they mean.
 */
export const createUserQueries = (exec: SqlExecutor) => ({
  async insertUser(p: InsertUserParams): Promise<UserRow> {
    const { rows } = await exec(SQL.insertUser, [
      p.email,
      p.passwordHash,
      p.firstName,
      p.lastName,
      p.role,
      p.status,
      p.phone,
    ]);
    return userRowSchema.parse(rows[0]);
  },

  async selectUserById(id: string): Promise<UserRow | null> {
    const { rows } = await exec(SQL.selectUserById, [id]);
    return firstRow(rows);
  },

  async selectUserByEmail(email: string): Promise<UserRow | null> {
    const { rows } = await exec(SQL.selectUserByEmail, [email]);
    return firstRow(rows);
  },

  async updateUser(p: UpdateUserParams): Promise<UserRow | null> {
    const { rows } = await exec(SQL.updateUser, [
      p.id,
      p.firstName,
      p.lastName,
      p.phone,
      p.avatarUrl,
    ]);
    return firstRow(rows);
  },

  /** Number of rows touched (0 or 1) */
  async updateUserStatus(id: string, status: UserStatus): Promise<number> {
    const { rowCount } = await exec(SQL.updateUserStatus, [id, status]);
    return rowCount ?? 0;
  },

  async selectUsers(p: SelectUsersParams): Promise<UserRow[]> {
    const { rows } = await exec(SQL.selectUsers, [p.role, p.status, p.limit, p.offset]);
    return rows.map((row) => userRowSchema.parse(row));
  },

  async ping(): Promise<void> {
    await exec(SQL.ping);
  },
});

export type UserQueries = ReturnType<typeof createUserQueries>;
