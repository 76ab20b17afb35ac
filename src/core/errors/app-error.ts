/**
 * Canonical application error. Every failure in the system is expressed
 * as an AppError so HTTP and logging layers have a single shape.
 */

export const ErrorCode = {
  // Client errors
  BAD_REQUEST: "BAD_REQUEST",
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  ACCOUNT_INACTIVE: "ACCOUNT_INACTIVE",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  VALIDATION: "VALIDATION",
  CANCELLED: "CANCELLED",
  // Server errors
  INTERNAL: "INTERNAL",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
  TIMEOUT: "TIMEOUT",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  INVALID_CREDENTIALS: 401,
  ACCOUNT_INACTIVE: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  VALIDATION: 422,
  // nginx's "client closed request"
  CANCELLED: 499,
  INTERNAL: 500,
  SERVICE_UNAVAILABLE: 503,
  TIMEOUT: 504,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

const isErrorCode = (value: unknown): value is ErrorCode =>
  typeof value === "string" && Object.hasOwn(STATUS_MAP, value);

/** Narrow an unknown value (e.g. an abort reason) back to an AppError */
export const isAppError = (value: unknown): value is AppError =>
  typeof value === "object" &&
  value !== null &&
  "code" in value &&
  "message" in value &&
  isErrorCode(value.code) &&
  typeof value.message === "string";

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause !== undefined ? { ...error, details, cause } : { ...error, details };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const badRequest = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.BAD_REQUEST, msg, details);

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const conflict = (msg: string): AppError => appError(ErrorCode.CONFLICT, msg);

/** Same error for unknown email and wrong password */
export const invalidCredentials = (): AppError =>
  appError(ErrorCode.INVALID_CREDENTIALS, "Invalid credentials");

export const accountInactive = (): AppError =>
  appError(ErrorCode.ACCOUNT_INACTIVE, "User account is inactive");

export const validation = (details: Record<string, unknown>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", details);

export const cancelled = (msg = "Request cancelled"): AppError =>
  appError(ErrorCode.CANCELLED, msg);

export const timeout = (msg = "Request timed out"): AppError => appError(ErrorCode.TIMEOUT, msg);

export const serviceUnavailable = (msg = "Service unavailable"): AppError =>
  appError(ErrorCode.SERVICE_UNAVAILABLE, msg);

export const internal = (msg = "Internal server error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, undefined, cause);
