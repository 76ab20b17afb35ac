import bcrypt from "bcryptjs";
import { type AppError, internal, validation } from "../../core/errors/app-error.js";
import { MAX_PASSWORD_BYTES, type PasswordHasher } from "../../core/ports/password-hasher.js";
import { type Result, err, ok } from "../../core/types/result.js";

/** bcrypt's default work factor */
export const DEFAULT_BCRYPT_COST = 10;

const tooLong = (plain: string): boolean => Buffer.byteLength(plain, "utf8") > MAX_PASSWORD_BYTES;

/**
 * bcrypt password hasher. The cost is fixed per instance; every hash it
 * produces embeds that cost and its salt (`$2a$10$...`), so verification
 * reads both from the stored value.
 */
export const createPasswordHasher = (cost: number = DEFAULT_BCRYPT_COST): PasswordHasher => ({
  async hash(plain: string): Promise<Result<string, AppError>> {
    if (tooLong(plain)) {
      return err(
        validation({
          formErrors: [],
          fieldErrors: { password: [`Password must be at most ${MAX_PASSWORD_BYTES} bytes`] },
        }),
      );
    }
    try {
      return ok(await bcrypt.hash(plain, cost));
    } catch (e: unknown) {
      return err(internal("Failed to hash password", e));
    }
  },

  async verify(plain: string, hash: string): Promise<Result<boolean, AppError>> {
    // no stored password is this long, so a truncated match would be a false positive
    if (tooLong(plain)) return ok(false);
    try {
      return ok(await bcrypt.compare(plain, hash));
    } catch (e: unknown) {
      return err(internal("Failed to verify password", e));
    }
  },
});
