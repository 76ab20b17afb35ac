import { z } from "zod";
import { USER_ROLES, USER_STATUSES } from "../../core/entities/user.entity.js";
import { MAX_PASSWORD_BYTES } from "../../core/ports/password-hasher.js";

/** DTOs validated at the edge via Zod */

const email = z.string().trim().email().max(255);
const name = z.string().trim().min(2).max(100);

/** "" means "not supplied"; anything else must look like a phone number */
const phone = z
  .string()
  .trim()
  .max(20)
  .refine((v) => v.length === 0 || v.length >= 10, {
    message: "Phone must be at least 10 characters",
  });

const avatarUrl = z.union([z.literal(""), z.string().trim().url().max(500)]);

export const createUserDto = z.object({
  email,
  password: z
    .string()
    .min(8)
    .refine((p) => Buffer.byteLength(p, "utf8") <= MAX_PASSWORD_BYTES, {
      message: `Password must be at most ${MAX_PASSWORD_BYTES} bytes`,
    }),
  firstName: name,
  lastName: name,
  role: z.enum(USER_ROLES),
  phone: phone.optional(),
});

export const updateUserDto = z.object({
  firstName: name,
  lastName: name,
  phone: phone.optional(),
  avatarUrl: avatarUrl.optional(),
});

export const updateUserStatusDto = z.object({
  status: z.enum(USER_STATUSES),
});

export const loginDto = z.object({
  email,
  password: z.string().min(1).max(128),
});

export const listUsersQuery = z.object({
  role: z.enum(USER_ROLES).optional(),
  status: z.enum(USER_STATUSES).optional(),
});

export const lookupUserQuery = z.object({
  email,
});

export type CreateUserDto = z.infer<typeof createUserDto>;
export type UpdateUserDto = z.infer<typeof updateUserDto>;
export type UpdateUserStatusDto = z.infer<typeof updateUserStatusDto>;
export type LoginDto = z.infer<typeof loginDto>;
export type ListUsersQuery = z.infer<typeof listUsersQuery>;
export type LookupUserQuery = z.infer<typeof lookupUserQuery>;
