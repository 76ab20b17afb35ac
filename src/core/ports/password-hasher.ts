import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/** bcrypt ignores every byte of the UTF-8 encoding past this one */
export const MAX_PASSWORD_BYTES = 72;

/**
 * Port: Password Hasher
 * Output must be self-describing (algorithm, cost and salt embedded) so
 * `verify` needs nothing but the stored hash.
 */
export interface PasswordHasher {
  hash(plain: string): Promise<Result<string, AppError>>;
  verify(plain: string, hash: string): Promise<Result<boolean, AppError>>;
}
