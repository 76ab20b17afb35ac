import type { ZodSchema } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Validate an unknown body against a Zod schema.
 * Returns a typed Result; never throws.
 */
export const validateBody = <T>(schema: ZodSchema<T>, body: unknown): Result<T, AppError> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    const { formErrors, fieldErrors } = result.error.flatten();
    return err(validation({ formErrors, fieldErrors }));
  }
  return ok(result.data);
};

/**
 * Query params as a plain object for schema validation. Empty values are
 * dropped so `?role=` means "no filter".
 */
export const queryObject = (url: string): Record<string, string> => {
  const qIdx = url.indexOf("?");
  const params = new URLSearchParams(qIdx === -1 ? "" : url.substring(qIdx + 1));
  const out: Record<string, string> = {};
  for (const [key, value] of params) {
    if (value !== "") out[key] = value;
  }
  return out;
};

/** Validate the URL's query string against a Zod schema */
export const validateQuery = <T>(schema: ZodSchema<T>, url: string): Result<T, AppError> =>
  validateBody(schema, queryObject(url));
