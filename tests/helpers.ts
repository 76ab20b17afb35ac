import type { CreateUserDto } from "../src/application/dtos/user.dto.js";
import type { LogLevel, Logger } from "../src/core/ports/logger.js";
import { createInMemoryUserRepository } from "../src/infrastructure/database/in-memory-user.repository.js";
import { createPasswordHasher } from "../src/infrastructure/security/password-hasher.js";
import { createUserService } from "../src/application/services/user.service.js";

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => noopLogger,
};

export interface LogRecord {
  readonly level: LogLevel;
  readonly msg: string;
  readonly meta: Record<string, unknown>;
}

/** Logger that keeps every call, bindings merged into meta */
export const recordingLogger = (
  records: LogRecord[] = [],
  bindings: Record<string, unknown> = {},
): Logger & { readonly records: LogRecord[] } => {
  const at =
    (level: LogLevel) =>
    (msg: string, meta?: Record<string, unknown>): void => {
      records.push({ level, msg, meta: { ...bindings, ...meta } });
    };
  return {
    records,
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    fatal: at("fatal"),
    child: (extra) => recordingLogger(records, { ...bindings, ...extra }),
  };
};

/** Cost 4 keeps bcrypt fast enough for tests */
export const fastHasher = () => createPasswordHasher(4);

/** Monotonic fake clock: each call is one second later */
export const steppingClock = (start = Date.UTC(2024, 0, 1)) => {
  let t = start - 1000;
  return () => {
    t += 1000;
    return t;
  };
};

export const makeUserService = (options: { now?: () => number } = {}) => {
  const userRepo = createInMemoryUserRepository(options.now ? { now: options.now } : {});
  const service = createUserService({ userRepo, passwordHasher: fastHasher(), logger: noopLogger });
  return { userRepo, service };
};

export const validCreate = (
  n: number | string,
  overrides: Partial<CreateUserDto> = {},
): CreateUserDto => ({
  email: `player${n}@example.com`,
  password: "correct-horse-1",
  firstName: "Test",
  lastName: "Player",
  role: "gamer",
  ...overrides,
});
