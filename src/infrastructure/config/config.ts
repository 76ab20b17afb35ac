import { z } from "zod";
import { printConfigError } from "../../shared/cli.js";

/**
 * Application config, validated at boot via Zod.
 * Fails fast with clear messages if env vars are malformed.
 */
const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  host: z.string().min(1).default("0.0.0.0"),

  cors: z.object({
    origins: z
      .string()
      .default("*")
      .transform((s) =>
        s
          .split(",")
          .map((o) => o.trim())
          .filter((o) => o.length > 0),
      ),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  database: z.object({
    /** Absent → in-memory repository (development only) */
    url: z.string().url().optional(),
    poolMax: z.coerce.number().int().positive().default(10),
    statementTimeoutMs: z.coerce.number().int().positive().default(5_000),
  }),

  security: z.object({
    bcryptCost: z.coerce.number().int().min(4).max(15).default(10),
  }),

  http: z.object({
    requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
    maxBodyBytes: z.coerce.number().int().positive().default(1_048_576), // 1 MiB
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type ConfigResult =
  | { readonly ok: true; readonly config: AppConfig }
  | { readonly ok: false; readonly errors: Record<string, string[]> };

/** Empty strings count as unset so `FOO=` in a .env file falls back to the default */
const read = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
};

export const parseConfig = (env: NodeJS.ProcessEnv = process.env): ConfigResult => {
  const result = configSchema.safeParse({
    env: read(env, "NODE_ENV"),
    port: read(env, "PORT"),
    host: read(env, "HOST"),
    cors: {
      origins: read(env, "CORS_ORIGINS"),
    },
    log: {
      level: read(env, "LOG_LEVEL"),
      format: read(env, "LOG_FORMAT"),
    },
    database: {
      url: read(env, "DATABASE_URL"),
      poolMax: read(env, "DATABASE_POOL_MAX"),
      statementTimeoutMs: read(env, "DATABASE_STATEMENT_TIMEOUT_MS"),
    },
    security: {
      bcryptCost: read(env, "BCRYPT_COST"),
    },
    http: {
      requestTimeoutMs: read(env, "REQUEST_TIMEOUT_MS"),
      maxBodyBytes: read(env, "MAX_BODY_BYTES"),
    },
  });

  if (!result.success) {
    const errors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join(".");
      errors[field] = [...(errors[field] ?? []), issue.message];
    }
    return { ok: false, errors };
  }

  return { ok: true, config: result.data };
};

/** Parse `process.env`, or print the problems and exit */
export const loadConfig = (): AppConfig => {
  const parsed = parseConfig();
  if (!parsed.ok) {
    printConfigError(parsed.errors);
    process.exit(1);
  }
  return parsed.config;
};
